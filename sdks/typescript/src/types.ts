export type ToolName =
  | 'libraries_io_license'
  | 'lookup_license_text'
  | 'fetch_repo_license'
  | 'search_license_issues'
  | 'analyze_license_text';

export type LookupResult<T> =
  | { kind: 'found'; value: T }
  | { kind: 'not_configured'; message: string }
  | { kind: 'not_found'; message: string }
  | { kind: 'transport_error'; message: string; status?: number };

export type RepositoryLicense =
  | { source: 'license_api'; repository: string; spdxId: string }
  | { source: 'contents'; repository: string; files: string[] };

export interface AuditVerdict {
  status: 'standard' | 'flagged' | 'unrecognized';
  text: string;
  explanation?: string;
}

export type PolicyStatus = 'approved' | 'not_approved' | 'unknown';

export interface ToolParameter {
  name: string;
  type: 'string' | 'boolean' | 'number' | 'unknown';
  description: string;
  required: boolean;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  parameters: ToolParameter[];
}

export interface ToolArguments {
  libraries_io_license: { group: string; artifact: string; version: string; checkPolicy?: boolean };
  lookup_license_text: { license_name: string };
  fetch_repo_license: { url?: string | null };
  search_license_issues: { package_name: string };
  analyze_license_text: { text: string };
}

export interface ToolValues {
  libraries_io_license: string;
  lookup_license_text: string;
  fetch_repo_license: string;
  search_license_issues: RepositoryLicense;
  analyze_license_text: AuditVerdict;
}

export interface ToolOutput<N extends ToolName = ToolName> {
  tool: N;
  result: LookupResult<ToolValues[N]>;
  message: string;
  policy?: PolicyStatus;
}
