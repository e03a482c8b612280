/**
 * Public test utilities, exported from the `"eventwire/testing"` entry point.
 * Consumers can import these helpers to exercise their publishers and
 * subscribers without a network.
 */
export type { MemorySource, MemorySourceOptions } from "./testing/memory-source.js";
export { createMemorySource } from "./testing/memory-source.js";
export type { MockFn, MockTransport } from "./testing/mock-transport.js";
export { createMockTransport } from "./testing/mock-transport.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
