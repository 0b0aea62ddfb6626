export type SmokeErrorCode = "CONFIG" | "TRANSPORT" | "HTTP_STATUS" | "DECODE" | "SHAPE";

export class SmokeTestError extends Error {
  readonly code: SmokeErrorCode;

  constructor(code: SmokeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends SmokeTestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

/** Connection could not be made or the body could not be read. */
export class TransportError extends SmokeTestError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super("TRANSPORT", `request to ${url} failed: ${describeCause(cause)}`, { cause });
    this.url = url;
  }
}

export class HttpStatusError extends SmokeTestError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, statusText: string, body: string) {
    super("HTTP_STATUS", `HTTP Error ${status}: ${statusText}`);
    this.status = status;
    this.body = body;
  }
}

export class ResponseDecodeError extends SmokeTestError {
  constructor(cause: unknown) {
    super("DECODE", `response body is not valid JSON: ${describeCause(cause)}`, { cause });
  }
}

export class ResponseShapeError extends SmokeTestError {
  constructor(message: string) {
    super("SHAPE", message);
  }
}

// fetch wraps socket errors in a generic "fetch failed" TypeError
function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    if (cause.cause instanceof Error) return cause.cause.message;
    return cause.message;
  }
  return String(cause);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
