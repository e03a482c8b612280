import type { Logger } from "../interfaces/logger.js";

/**
 * Discards everything. The registry, writers, heartbeat, gatekeeper and
 * stream reader fall back to it, so embedding eventwire stays silent unless
 * the host passes a logger.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
