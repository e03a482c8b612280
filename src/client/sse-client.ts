/**
 * `fetch`-based SSE subscriber: opens the stream with the right request
 * headers, checks the response, then hands the body to {@link readEventStream}.
 */

import { errorMessage, HttpStatusError, StreamReadError, StreamTimeoutError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { ProtocolGatekeeper } from "../protocol/request-validator.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { SSE_REQUEST_HEADERS } from "../types/sse-event.js";
import { noopLogger } from "../utils/noop-logger.js";
import { type EventCallback, readEventStream, type StreamOutcome } from "./stream-reader.js";
import { webStreamSource } from "./web-stream-source.js";

export interface SubscribeOptions {
  /** Injected `fetch`; defaults to the global one. */
  fetch?: typeof fetch;
  /** Extra request headers, applied over the SSE defaults. */
  headers?: Record<string, string>;
  signal?: AbortSignal;
  readTimeoutMs?: number;
  /** Bound on the wait for response headers. */
  connectTimeoutMs?: number;
  maxBufferSize?: number;
  skipEmpty?: boolean;
  logger?: Logger;
}

export type SubscribeOutcome =
  | StreamOutcome
  | { ok: false; error: HttpStatusError | StreamTimeoutError | StreamReadError; events: 0 };

export async function subscribe(
  url: string | URL,
  onEvent: EventCallback,
  options: SubscribeOptions = {},
): Promise<SubscribeOutcome> {
  const logger = options.logger ?? noopLogger;
  const fetchImpl = options.fetch ?? fetch;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONFIG.connectTimeoutMs;

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    forwardAbort();
  } else {
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  try {
    let connectTimedOut = false;
    const connectTimer = setTimeout(() => {
      connectTimedOut = true;
      controller.abort();
    }, connectTimeoutMs);

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "GET",
        headers: { ...SSE_REQUEST_HEADERS, ...options.headers },
        signal: controller.signal,
      });
    } catch (err) {
      if (connectTimedOut) {
        logger.warn("SSE connect timed out", { url: String(url), connectTimeoutMs });
        return { ok: false, error: new StreamTimeoutError(connectTimeoutMs), events: 0 };
      }
      logger.warn("SSE request failed", { url: String(url), error: errorMessage(err) });
      return {
        ok: false,
        error: new StreamReadError(`SSE request failed: ${errorMessage(err)}`, { cause: err }),
        events: 0,
      };
    } finally {
      clearTimeout(connectTimer);
    }

    if (!response.ok) {
      logger.warn("SSE request rejected", { url: String(url), status: response.status });
      await discardBody(response, logger);
      const error = new HttpStatusError(response.status, response.statusText);
      return { ok: false, error, events: 0 };
    }

    if (!response.body) {
      return { ok: false, error: new StreamReadError("SSE response has no body"), events: 0 };
    }

    // Advisory only: a mismatch is logged and the body is read anyway.
    new ProtocolGatekeeper({ logger }).checkResponse({ headers: response.headers });

    logger.debug?.("SSE stream opened", { url: String(url), status: response.status });
    return await readEventStream(webStreamSource(response.body), onEvent, {
      readTimeoutMs: options.readTimeoutMs ?? DEFAULT_CONFIG.readTimeoutMs,
      maxBufferSize: options.maxBufferSize,
      skipEmpty: options.skipEmpty,
      logger,
    });
  } finally {
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

async function discardBody(response: Response, logger: Logger): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    logger.debug?.("Failed to discard SSE error body", { error: errorMessage(err) });
  }
}
