import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const EVENT_STREAM = "text/event-stream";

/** Header bag as found on `IncomingMessage`, `fetch` headers, or plain objects. */
export type HeaderValue = string | string[] | number | undefined | null;
export type HeaderBag = Headers | Readonly<Record<string, HeaderValue>>;

export interface SseRequestLike {
  method?: string;
  headers: HeaderBag;
}

export interface SseResponseLike {
  headers: HeaderBag;
}

/** Case-insensitive header lookup; multi-valued headers are joined with ", ". */
export function getHeader(headers: HeaderBag | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  if (isFetchHeaders(headers)) {
    return headers.get(name) ?? undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value == null) continue;
    return Array.isArray(value) ? value.join(", ") : String(value);
  }
  return undefined;
}

function isFetchHeaders(headers: HeaderBag): headers is Headers {
  return typeof Headers !== "undefined" && headers instanceof Headers;
}

/**
 * True when `accept` lists `text/event-stream` as one of its media types.
 * Parameters such as `;q=0.9` are ignored.
 */
export function acceptsEventStream(accept: string | undefined): boolean {
  if (!accept) return false;
  return accept
    .split(",")
    .map((entry) => entry.split(";")[0].trim().toLowerCase())
    .includes(EVENT_STREAM);
}

/** GET with an Accept header that lists `text/event-stream`. The method match is exact. */
export function isValidSseRequest(request: SseRequestLike | null | undefined): boolean {
  if (!request) return false;
  if (request.method !== "GET") return false;
  return acceptsEventStream(getHeader(request.headers, "accept"));
}

/** `Content-Type` naming `text/event-stream` and `Cache-Control` containing `no-cache`. */
export function isValidSseResponse(response: SseResponseLike | null | undefined): boolean {
  if (!response) return false;

  const contentType = getHeader(response.headers, "content-type");
  if (!contentType?.toLowerCase().includes(EVENT_STREAM)) return false;

  const cacheControl = getHeader(response.headers, "cache-control");
  if (!cacheControl?.toLowerCase().includes("no-cache")) return false;

  return true;
}

export interface ProtocolGatekeeperOptions {
  logger?: Logger;
  /** Reject invalid requests instead of only logging them (default: false). */
  strict?: boolean;
}

/**
 * Advisory protocol checks at the transport boundary. Violations are logged;
 * intermediaries rewrite headers often enough that failing is left to the caller.
 */
export class ProtocolGatekeeper {
  private readonly logger: Logger;
  readonly strict: boolean;

  constructor(options: ProtocolGatekeeperOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.strict = options.strict ?? false;
  }

  checkRequest(request: SseRequestLike | null | undefined): boolean {
    const valid = isValidSseRequest(request);
    if (!valid) {
      this.logger.warn("Invalid SSE request", {
        method: request?.method,
        accept: getHeader(request?.headers, "accept"),
      });
    }
    return valid;
  }

  checkResponse(response: SseResponseLike | null | undefined): boolean {
    const valid = isValidSseResponse(response);
    if (!valid) {
      this.logger.warn("Invalid SSE response", {
        contentType: getHeader(response?.headers, "content-type"),
        cacheControl: getHeader(response?.headers, "cache-control"),
      });
    }
    return valid;
  }
}
