/**
 * Client-side consumer of an SSE byte stream.
 *
 * Pulls chunks from a {@link ByteSource} under a per-read timeout, reassembles
 * them into events and hands each one to a callback in wire order. The result
 * tells a clean end of stream (or a callback-requested stop) apart from a
 * timeout, a read failure or an oversized frame.
 */

import { FrameDecoder } from "../codec/frame-decoder.js";
import {
  errorMessage,
  FrameTooLargeError,
  StreamReadError,
  StreamTimeoutError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ByteSource, ReadChunk } from "../interfaces/transport.js";
import { isEmptyEvent, type SseEvent } from "../types/sse-event.js";
import { noopLogger } from "../utils/noop-logger.js";

/** Return `false` (or a promise of it) to stop reading. */
export type EventCallback = (event: SseEvent) => boolean | void | Promise<boolean | void>;

export type StreamFailure = StreamTimeoutError | StreamReadError | FrameTooLargeError;

/** What a stream delivered before it ended, however it ended. */
export interface StreamProgress {
  events: number;
  /** Id of the most recent delivered event that carried one; absent when none did. */
  lastEventId?: string;
}

export type StreamOutcome =
  | ({ ok: true; reason: "eof" | "stopped" } & StreamProgress)
  | ({ ok: false; error: StreamFailure } & StreamProgress);

export interface ReadEventStreamOptions {
  /** Longest wait for any single chunk. */
  readTimeoutMs: number;
  maxBufferSize?: number;
  /** Do not deliver frames that carried no fields, such as keep-alive comments. */
  skipEmpty?: boolean;
  logger?: Logger;
}

export async function readEventStream(
  source: ByteSource,
  onEvent: EventCallback,
  options: ReadEventStreamOptions,
): Promise<StreamOutcome> {
  const logger = options.logger ?? noopLogger;
  const decoder = new FrameDecoder({ maxBufferSize: options.maxBufferSize });
  let delivered = 0;
  let lastEventId: string | undefined;

  const progress = (): StreamProgress =>
    lastEventId === undefined ? { events: delivered } : { events: delivered, lastEventId };

  const fail = (error: StreamFailure): StreamOutcome => {
    logger.warn("SSE stream failed", {
      code: error.code,
      error: error.message,
      events: delivered,
      lastEventId,
    });
    return { ok: false, error, ...progress() };
  };

  try {
    while (true) {
      let chunk: ReadChunk;
      try {
        chunk = await source.read(options.readTimeoutMs);
      } catch (err) {
        return fail(toStreamFailure(err));
      }

      let events: SseEvent[];
      if (chunk.done) {
        const last = decoder.flush();
        events = last ? [last] : [];
      } else {
        try {
          events = decoder.feed(chunk.value);
        } catch (err) {
          if (err instanceof FrameTooLargeError) return fail(err);
          throw err;
        }
      }

      for (const event of events) {
        if (options.skipEmpty && isEmptyEvent(event)) continue;
        delivered++;
        if (event.id !== undefined) lastEventId = event.id;
        if ((await onEvent(event)) === false) {
          logger.debug?.("SSE stream stopped by callback", { events: delivered });
          return { ok: true, reason: "stopped", ...progress() };
        }
      }

      if (chunk.done) {
        logger.debug?.("SSE stream ended", { events: delivered });
        return { ok: true, reason: "eof", ...progress() };
      }
    }
  } finally {
    await release(source, logger);
  }
}

function toStreamFailure(err: unknown): StreamFailure {
  if (err instanceof StreamTimeoutError || err instanceof StreamReadError) return err;
  return new StreamReadError(`SSE read failed: ${errorMessage(err)}`, { cause: err });
}

async function release(source: ByteSource, logger: Logger): Promise<void> {
  if (!source.cancel) return;
  try {
    await source.cancel();
  } catch (err) {
    logger.warn("Failed to release SSE source", { error: errorMessage(err) });
  }
}
