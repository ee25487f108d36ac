import { createServer } from "node:http";

import { vi } from "vitest";

import type { FetchFn } from "../src/clients/http.js";
import { loadConfig, type AppConfig } from "../src/config.js";

export function buildConfig(
  credentials: AppConfig["credentials"] = {},
  overrides: Partial<Omit<AppConfig, "credentials">> = {},
): AppConfig {
  return { ...loadConfig({}), ...overrides, credentials };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/plain" } });
}

/** fetch mock answering by URL, failing loudly on anything unexpected. */
export function createFetch(handlers: Record<string, () => Promise<Response>>) {
  return vi.fn<FetchFn>(async (input) => {
    const key = input.toString();
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler();
  });
}

export function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

export interface StalledServer {
  url: string;
  close(): Promise<void>;
}

/** Local server that sends headers and a first chunk, then never finishes the body. */
export async function startStalledServer(): Promise<StalledServer> {
  const server = createServer((_request, response) => {
    response.writeHead(200, { "content-type": "text/plain" });
    response.write("MIT License\n");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Stalled server has no TCP address");
  }
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
