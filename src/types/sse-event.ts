/**
 * Server-Sent Events value types.
 * @module
 */

/** Event type a reader assumes when a frame carries no `event:` field. */
export const DEFAULT_EVENT_TYPE = "message";

/** One SSE event. `data` is opaque text and may span several lines. */
export interface SseEvent {
  id?: string;
  /** Event type; omitted means {@link DEFAULT_EVENT_TYPE}. */
  event?: string;
  data: string;
  /** Reconnection delay hint in milliseconds. */
  retry?: number;
}

/** Headers every SSE response carries. */
export const SSE_RESPONSE_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};

/** Headers a client sends when opening an SSE stream. */
export const SSE_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  Accept: "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
};

/**
 * Canonical form of an event as a reader would see it after a round trip:
 * the default event type filled in, empty `id` dropped.
 */
export function normalizeEvent(event: SseEvent): SseEvent {
  const normalized: SseEvent = {
    event: event.event ? event.event : DEFAULT_EVENT_TYPE,
    data: event.data,
  };
  if (event.id) normalized.id = event.id;
  if (event.retry !== undefined) normalized.retry = event.retry;
  return normalized;
}

/** True for a frame that carried no fields at all (e.g. a lone comment). */
export function isEmptyEvent(event: SseEvent): boolean {
  return (
    event.data === "" &&
    event.id === undefined &&
    event.retry === undefined &&
    (event.event === undefined || event.event === DEFAULT_EVENT_TYPE)
  );
}
