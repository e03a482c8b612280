import { eventwireConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Eventwire configuration; every field falls back to {@link DEFAULT_CONFIG}. */
export interface EventwireConfig {
  /** Port the demo HTTP server listens on */
  port?: number; // default: 8080
  /** Route that serves the event stream */
  path?: string; // default: "/events"
  /** Reject requests that fail protocol checks with 406 instead of only logging them */
  strictProtocol?: boolean; // default: false

  // Timeouts
  sendTimeoutMs?: number; // default: 5000
  readTimeoutMs?: number; // default: 60000
  connectTimeoutMs?: number; // default: 10000
  heartbeatIntervalMs?: number; // default: 15000 (0 disables)

  // Protocol
  retryMs?: number; // default: unset (no retry hint)
  maxBufferSize?: number; // default: 10 MiB

  // Event defaults
  /** Stamp outgoing events that carry no id */
  autoEventId?: boolean; // default: false
  /** Type given to outgoing events with data but no type */
  defaultEventType?: string; // default: unset
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<EventwireConfig, "retryMs" | "defaultEventType">> &
  Pick<EventwireConfig, "retryMs" | "defaultEventType">;

export const DEFAULT_CONFIG: ResolvedConfig = {
  port: 8080,
  path: "/events",
  strictProtocol: false,
  sendTimeoutMs: 5000,
  readTimeoutMs: 60000,
  connectTimeoutMs: 10000,
  heartbeatIntervalMs: 15000,
  retryMs: undefined,
  maxBufferSize: 10 * 1024 * 1024,
  autoEventId: false,
  defaultEventType: undefined,
};

/** Validate `config` and lay it over the defaults. Undefined fields keep their default. */
export function resolveConfig(config: EventwireConfig = {}): ResolvedConfig {
  const validation = eventwireConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const resolved: ResolvedConfig = { ...DEFAULT_CONFIG };
  const provided = validation.data;
  if (provided.port !== undefined) resolved.port = provided.port;
  if (provided.path !== undefined) resolved.path = provided.path;
  if (provided.strictProtocol !== undefined) resolved.strictProtocol = provided.strictProtocol;
  if (provided.sendTimeoutMs !== undefined) resolved.sendTimeoutMs = provided.sendTimeoutMs;
  if (provided.readTimeoutMs !== undefined) resolved.readTimeoutMs = provided.readTimeoutMs;
  if (provided.connectTimeoutMs !== undefined) {
    resolved.connectTimeoutMs = provided.connectTimeoutMs;
  }
  if (provided.heartbeatIntervalMs !== undefined) {
    resolved.heartbeatIntervalMs = provided.heartbeatIntervalMs;
  }
  if (provided.retryMs !== undefined) resolved.retryMs = provided.retryMs;
  if (provided.maxBufferSize !== undefined) resolved.maxBufferSize = provided.maxBufferSize;
  if (provided.autoEventId !== undefined) resolved.autoEventId = provided.autoEventId;
  if (provided.defaultEventType !== undefined) {
    resolved.defaultEventType = provided.defaultEventType;
  }
  return resolved;
}
