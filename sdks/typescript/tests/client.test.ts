import { describe, expect, it, vi } from 'vitest';
import { LicenseToolsClient } from '../src/client.js';

const createFetch = (handlers: Record<string, () => Promise<Response>>) => {
  return vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${url.toString()}`;
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler();
  });
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('LicenseToolsClient', () => {
  it('lists tools', async () => {
    const fetchMock = createFetch({
      'GET https://tools.test/tools': async () =>
        json([{ name: 'lookup_license_text', description: 'SPDX text', parameters: [] }]),
    });

    const client = new LicenseToolsClient({ baseUrl: 'https://tools.test/', fetchImpl: fetchMock });
    const tools = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(['lookup_license_text']);
  });

  it('posts tool arguments and returns the output', async () => {
    const fetchMock = createFetch({
      'POST https://tools.test/tools/search_license_issues': async () =>
        json({
          tool: 'search_license_issues',
          result: { kind: 'found', value: { source: 'license_api', repository: 'acme/widgets', spdxId: 'MIT' } },
          message: 'Found license for acme/widgets: MIT',
        }),
    });

    const client = new LicenseToolsClient({
      baseUrl: 'https://tools.test',
      fetchImpl: fetchMock,
      headers: { 'X-Agent': 'reviewer' },
    });
    const output = await client.searchRepositoryLicense('widgets');

    expect(output.message).toBe('Found license for acme/widgets: MIT');
    expect(output.result.kind).toBe('found');
    const [, init] = fetchMock.mock.calls[0];
    expect(init?.body).toBe(JSON.stringify({ package_name: 'widgets' }));
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'X-Agent': 'reviewer' });
  });

  it('sends metadata lookups with the policy flag', async () => {
    const fetchMock = createFetch({
      'POST https://tools.test/tools/libraries_io_license': async () =>
        json({ tool: 'libraries_io_license', result: { kind: 'found', value: 'MIT' }, message: 'MIT', policy: 'approved' }),
    });

    const client = new LicenseToolsClient({ baseUrl: 'https://tools.test', fetchImpl: fetchMock });
    const output = await client.lookupMetadataLicense({
      group: 'org.example',
      artifact: 'widget',
      version: '1.0.0',
      checkPolicy: true,
    });

    expect(output.policy).toBe('approved');
    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({
      group: 'org.example',
      artifact: 'widget',
      version: '1.0.0',
      checkPolicy: true,
    });
  });

  it('throws on gateway errors with the body', async () => {
    const fetchMock = createFetch({
      'POST https://tools.test/tools/lookup_license_text': async () =>
        new Response('{"error":"SPDX request timed out"}', { status: 502 }),
    });

    const client = new LicenseToolsClient({ baseUrl: 'https://tools.test', fetchImpl: fetchMock });

    await expect(client.lookupLicenseText('MIT')).rejects.toThrow(
      'Tool lookup_license_text failed with 502: {"error":"SPDX request timed out"}',
    );
  });

  it('throws for unknown tools', async () => {
    const fetchMock = createFetch({
      'POST https://tools.test/tools/analyze_license_text': async () => new Response('', { status: 404 }),
    });

    const client = new LicenseToolsClient({ baseUrl: 'https://tools.test', fetchImpl: fetchMock });

    await expect(client.analyzeLicenseText('MIT License')).rejects.toThrow('Unknown tool: analyze_license_text');
  });

  it('requires a base url', () => {
    expect(() => new LicenseToolsClient({ baseUrl: '' })).toThrow('baseUrl is required');
  });
});
