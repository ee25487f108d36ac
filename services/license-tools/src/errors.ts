export class UpstreamRequestError extends Error {
  public readonly service: string;
  public readonly status?: number;

  constructor(service: string, message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamRequestError";
    this.service = service;
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
