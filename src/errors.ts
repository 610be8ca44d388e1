/**
 * Error types shared by the corpus loader, the upstream clients and the
 * orchestrators. Transports map them to HTTP status codes / tool results.
 */

/** Startup failure while reading manifests or content files. Fatal. */
export class CorpusLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusLoadError";
  }
}

/** Input that makes an operation undefined: empty batch, zero vector, dimension mismatch. */
export class DegenerateInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DegenerateInputError";
  }
}

/** Which remote endpoint an {@link UpstreamError} came from. */
export type UpstreamService = "llm" | "embedding" | "rerank";

/**
 * Failure of a remote model-serving call: network error, non-success status,
 * malformed body or a response that does not match the request. Never retried.
 */
export class UpstreamError extends Error {
  public readonly service: UpstreamService;
  public readonly status?: number;

  constructor(
    service: UpstreamService,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(`${service} upstream: ${message}`, { cause: options?.cause });
    this.name = "UpstreamError";
    this.service = service;
    this.status = options?.status;
  }
}

/** The call's deadline expired before the upstream finished. */
export class UpstreamTimeoutError extends UpstreamError {
  public readonly timeoutMs: number;

  constructor(service: UpstreamService, timeoutMs: number) {
    super(service, `no complete response within ${timeoutMs}ms`);
    this.name = "UpstreamTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  // Errors from another realm (Node internals under Jest) fail instanceof.
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}
