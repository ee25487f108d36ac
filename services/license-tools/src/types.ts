export interface PackageCoordinate {
  ecosystem: "Maven";
  group: string;
  artifact: string;
  version: string;
}

/**
 * Outcome of every lookup. Missing credentials, misses and upstream failures
 * are values, not exceptions; the only thrown errors are the transport
 * failures of the metadata and SPDX lookups.
 */
export type LookupResult<T> =
  | { kind: "found"; value: T }
  | { kind: "not_configured"; message: string }
  | { kind: "not_found"; message: string }
  | { kind: "transport_error"; message: string; status?: number };

export type RepositoryLicense =
  | { source: "license_api"; repository: string; spdxId: string }
  | { source: "contents"; repository: string; files: string[] };

export type AuditStatus = "standard" | "flagged" | "unrecognized";

export interface AuditVerdict {
  status: AuditStatus;
  /** Model reply, trimmed and otherwise untouched. */
  text: string;
  explanation?: string;
}

export type PolicyStatus = "approved" | "not_approved" | "unknown";

export function found<T>(value: T): LookupResult<T> {
  return { kind: "found", value };
}

export function notConfigured<T>(message: string): LookupResult<T> {
  return { kind: "not_configured", message };
}

export function notFound<T>(message: string): LookupResult<T> {
  return { kind: "not_found", message };
}

export function transportError<T>(message: string, status?: number): LookupResult<T> {
  return status === undefined
    ? { kind: "transport_error", message }
    : { kind: "transport_error", message, status };
}
