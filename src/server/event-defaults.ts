import type { SseEvent } from "../types/sse-event.js";

export type EventIdGenerator = () => string;

/** Fields filled in on outgoing events that leave them unset. */
export interface EventDefaults {
  /** Stamp events that carry no `id` (default: false). */
  autoEventId?: boolean;
  /** Source of automatic ids; defaults to {@link generateEventId}. */
  eventIdGenerator?: EventIdGenerator;
  /** Type given to events with data but no `event` field. */
  defaultEventType?: string;
}

/** `<epoch ms>_<4 random digits>`, e.g. `1718000000000_4821`. */
export function generateEventId(now: number = Date.now()): string {
  const suffix = 1000 + Math.floor(Math.random() * 9000);
  return `${now}_${suffix}`;
}

/**
 * Return `event` with the configured defaults applied. The input is never
 * mutated; when nothing applies the same object comes back.
 */
export function applyEventDefaults(event: SseEvent, defaults: EventDefaults): SseEvent {
  const needsId = defaults.autoEventId === true && !event.id;
  const needsType =
    defaults.defaultEventType !== undefined && !event.event && event.data !== "";
  if (!needsId && !needsType) return event;

  const result: SseEvent = { ...event };
  if (needsId) result.id = (defaults.eventIdGenerator ?? generateEventId)();
  if (needsType) result.event = defaults.defaultEventType;
  return result;
}
