import { UpstreamRequestError, errorMessage } from "../errors.js";

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export const globalFetch: FetchFn = (input, init) => globalThis.fetch(input, init);

export interface TimedRequest {
  service: string;
  url: string;
  init?: RequestInit;
  timeoutMs: number;
}

export type UpstreamResponse<T> = { ok: true; status: number; body: T } | { ok: false; status: number };

export const readText = (response: Response): Promise<string> => response.text();

export const readJson = (response: Response): Promise<unknown> => response.json();

/**
 * Issues one request and reads a 2xx body with `read`, all under one abort
 * timer. Bodies of other statuses are cancelled unread. Timeouts and
 * connection failures surface as UpstreamRequestError; HTTP status codes are
 * left to the caller.
 */
export async function fetchWithTimeout<T>(
  fetchFn: FetchFn,
  request: TimedRequest,
  read: (response: Response) => Promise<T>,
): Promise<UpstreamResponse<T>> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
  try {
    const response = await fetchFn(request.url, { ...request.init, signal: controller.signal });
    if (!response.ok) {
      await response.body?.cancel();
      return { ok: false, status: response.status };
    }
    return { ok: true, status: response.status, body: await read(response) };
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new UpstreamRequestError(request.service, `${request.service} request timed out`, undefined, {
        cause: error,
      });
    }
    throw new UpstreamRequestError(request.service, `${request.service} request failed: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }
}
