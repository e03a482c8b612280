/**
 * SSE frame encoder.
 *
 * Turns an {@link SseEvent} into its `text/event-stream` representation:
 * one `field: value` line per field, `data` split into one line per segment,
 * and a trailing blank line closing the frame.
 */

import { EncodeError } from "../errors.js";
import { DEFAULT_EVENT_TYPE, type SseEvent } from "../types/sse-event.js";

const LINE_BREAK = /\r\n|\r|\n/;

function assertSingleLine(field: string, value: string): void {
  if (LINE_BREAK.test(value)) {
    throw new EncodeError(`SSE "${field}" field must not contain a line break`);
  }
}

function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

/**
 * Encode one event as a complete frame.
 * Throws {@link EncodeError} when `id` or `event` contain a line break, or
 * `retry` is not a non-negative integer.
 */
export function encodeEvent(event: SseEvent): string {
  let frame = "";

  if (event.id) {
    assertSingleLine("id", event.id);
    frame += `id: ${event.id}\n`;
  }

  const type = event.event ?? DEFAULT_EVENT_TYPE;
  if (type !== "") {
    assertSingleLine("event", type);
    frame += `event: ${type}\n`;
  }

  if (event.data !== "") {
    for (const line of splitLines(event.data)) {
      frame += `data: ${line}\n`;
    }
  }

  if (event.retry !== undefined) {
    frame += encodeRetryLine(event.retry);
  }

  return `${frame}\n`;
}

/** Encode several events back to back. */
export function encodeEvents(events: readonly SseEvent[]): string {
  return events.map(encodeEvent).join("");
}

/** Encode a comment frame; readers skip it, proxies see traffic. */
export function encodeComment(text = ""): string {
  const lines = splitLines(text).map((line) => (line ? `: ${line}\n` : ":\n"));
  return `${lines.join("")}\n`;
}

/** Encode a frame that only carries a reconnection-delay hint. */
export function encodeRetry(retryMs: number): string {
  return `${encodeRetryLine(retryMs)}\n`;
}

function encodeRetryLine(retryMs: number): string {
  if (!Number.isInteger(retryMs) || retryMs < 0) {
    throw new EncodeError(`SSE "retry" must be a non-negative integer, got ${retryMs}`);
  }
  return `retry: ${retryMs}\n`;
}
