/**
 * eventwire public API barrel.
 *
 * Re-exports the codec, connection registry, client reader, Node adapters,
 * configuration and utilities that make up the public surface area of the
 * `eventwire` package.
 * @module
 */

// Adapters
export { ConsoleLogger } from "./adapters/console-logger.js";
export { NodeResponseTransport } from "./adapters/node-response-transport.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Client
export type { SubscribeOptions, SubscribeOutcome } from "./client/sse-client.js";
export { subscribe } from "./client/sse-client.js";
export type {
  EventCallback,
  ReadEventStreamOptions,
  StreamFailure,
  StreamOutcome,
  StreamProgress,
} from "./client/stream-reader.js";
export { readEventStream } from "./client/stream-reader.js";
export { webStreamSource } from "./client/web-stream-source.js";
// Codec
export type { FrameDecoderOptions } from "./codec/frame-decoder.js";
export { decodeFrames, FrameDecoder, MAX_SSE_BUFFER_SIZE } from "./codec/frame-decoder.js";
export { encodeComment, encodeEvent, encodeEvents, encodeRetry } from "./codec/frame-encoder.js";
// Config
export { eventwireConfigSchema } from "./config/config-schema.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Errors
export {
  ConfigError,
  EncodeError,
  errorMessage,
  EventwireError,
  FrameTooLargeError,
  HttpStatusError,
  StreamReadError,
  StreamTimeoutError,
  toEventwireError,
} from "./errors.js";
// HTTP
export type { HealthContext } from "./http/health.js";
export { handleHealth } from "./http/health.js";
export type { EventwireServerOptions } from "./http/server.js";
export { createEventwireServer } from "./http/server.js";
export type { SseHandlerOptions, SseRequestHandler } from "./http/sse-handler.js";
export { createSseHandler } from "./http/sse-handler.js";
// Interfaces
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { ByteSource, ReadChunk, SseTransport } from "./interfaces/transport.js";
// Protocol
export type {
  HeaderBag,
  HeaderValue,
  ProtocolGatekeeperOptions,
  SseRequestLike,
  SseResponseLike,
} from "./protocol/request-validator.js";
export {
  acceptsEventStream,
  getHeader,
  isValidSseRequest,
  isValidSseResponse,
  ProtocolGatekeeper,
} from "./protocol/request-validator.js";
// Server
export type {
  CloseReason,
  ConnectionRegistryEvents,
  ConnectionRegistryOptions,
  WriterSettings,
} from "./server/connection-registry.js";
export { ConnectionRegistry } from "./server/connection-registry.js";
export type { ConnectionWriterOptions } from "./server/connection-writer.js";
export { ConnectionWriter, DEFAULT_SEND_TIMEOUT_MS } from "./server/connection-writer.js";
export type { HeartbeatOptions } from "./server/heartbeat.js";
export type { EventDefaults, EventIdGenerator } from "./server/event-defaults.js";
export { applyEventDefaults, generateEventId } from "./server/event-defaults.js";
export { Heartbeat } from "./server/heartbeat.js";
// Types
export type { EventwireConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export type { SseEvent } from "./types/sse-event.js";
export {
  DEFAULT_EVENT_TYPE,
  isEmptyEvent,
  normalizeEvent,
  SSE_REQUEST_HEADERS,
  SSE_RESPONSE_HEADERS,
} from "./types/sse-event.js";
// Utilities
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
