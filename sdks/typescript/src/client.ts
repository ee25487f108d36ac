import type { ToolArguments, ToolDescriptor, ToolName, ToolOutput } from './types.js';

export interface LicenseToolsClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class LicenseToolsClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: LicenseToolsClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const response = await this.fetchImpl(`${this.baseUrl}/tools`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Tool listing failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as ToolDescriptor[];
  }

  async invoke<N extends ToolName>(name: N, args: ToolArguments[N]): Promise<ToolOutput<N>> {
    const response = await this.fetchImpl(`${this.baseUrl}/tools/${encodeURIComponent(name)}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify(args),
    });

    if (response.status === 404) {
      throw new Error(`Unknown tool: ${name}`);
    }

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Tool ${name} failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as ToolOutput<N>;
  }

  lookupMetadataLicense(args: ToolArguments['libraries_io_license']): Promise<ToolOutput<'libraries_io_license'>> {
    return this.invoke('libraries_io_license', args);
  }

  lookupLicenseText(licenseName: string): Promise<ToolOutput<'lookup_license_text'>> {
    return this.invoke('lookup_license_text', { license_name: licenseName });
  }

  fetchLicenseFile(url: string | null | undefined): Promise<ToolOutput<'fetch_repo_license'>> {
    return this.invoke('fetch_repo_license', { url });
  }

  searchRepositoryLicense(packageName: string): Promise<ToolOutput<'search_license_issues'>> {
    return this.invoke('search_license_issues', { package_name: packageName });
  }

  analyzeLicenseText(text: string): Promise<ToolOutput<'analyze_license_text'>> {
    return this.invoke('analyze_license_text', { text });
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
