export class EventwireError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EventwireError";
    this.code = code;
  }
}

// ── Domain errors ──

export class EncodeError extends EventwireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ENCODE", options);
    this.name = "EncodeError";
  }
}

export class StreamTimeoutError extends EventwireError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`No data received within ${timeoutMs}ms`, "TIMEOUT", options);
    this.name = "StreamTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class StreamReadError extends EventwireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "READ_FAILED", options);
    this.name = "StreamReadError";
  }
}

export class FrameTooLargeError extends EventwireError {
  readonly limit: number;

  constructor(limit: number) {
    super(`SSE buffer exceeded maximum size of ${limit} characters`, "FRAME_TOO_LARGE");
    this.name = "FrameTooLargeError";
    this.limit = limit;
  }
}

export class HttpStatusError extends EventwireError {
  readonly status: number;

  constructor(status: number, statusText = "") {
    super(`Unexpected HTTP status ${status}${statusText ? ` ${statusText}` : ""}`, "HTTP_STATUS");
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class ConfigError extends EventwireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to EventwireError (preserves cause chain). */
export function toEventwireError(value: unknown): EventwireError {
  if (value instanceof EventwireError) return value;
  if (value instanceof Error) return new EventwireError(value.message, "UNKNOWN", { cause: value });
  return new EventwireError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
