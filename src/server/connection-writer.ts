/**
 * Serialized sink for a single SSE connection.
 *
 * Every write is queued on a per-writer promise chain, so frames reach the
 * transport in call order and never interleave. The writer moves one way from
 * open to closed: any encode or transport failure closes it, and every write
 * after that resolves `false` without touching the transport.
 */

import { encodeComment, encodeEvent, encodeEvents, encodeRetry } from "../codec/frame-encoder.js";
import type { Logger } from "../interfaces/logger.js";
import type { SseTransport } from "../interfaces/transport.js";
import { SSE_RESPONSE_HEADERS, type SseEvent } from "../types/sse-event.js";
import { noopLogger } from "../utils/noop-logger.js";
import { applyEventDefaults, type EventDefaults } from "./event-defaults.js";

export const DEFAULT_SEND_TIMEOUT_MS = 5_000;

export interface ConnectionWriterOptions extends EventDefaults {
  /** Ask the transport to emit status and SSE headers on construction (default: true). */
  sendPreamble?: boolean;
  /** Reconnection hint sent ahead of the first frame. */
  retryMs?: number;
  /** Upper bound for one asynchronous send; 0 disables the bound. */
  sendTimeoutMs?: number;
  /** Connection id used in log context. */
  connectionId?: number;
  logger?: Logger;
}

type SendOutcome = boolean | "timeout";

export class ConnectionWriter {
  private readonly transport: SseTransport;
  private readonly logger: Logger;
  private readonly sendTimeoutMs: number;
  private readonly connectionId: number | undefined;
  private readonly defaults: EventDefaults;
  private chain: Promise<unknown> = Promise.resolve();
  private open = true;
  private started = false;
  private frames = 0;
  private pendingRetry: number | undefined;

  constructor(transport: SseTransport, options: ConnectionWriterOptions = {}) {
    this.transport = transport;
    this.logger = options.logger ?? noopLogger;
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.connectionId = options.connectionId;
    this.pendingRetry = options.retryMs;
    this.defaults = {
      autoEventId: options.autoEventId,
      eventIdGenerator: options.eventIdGenerator,
      defaultEventType: options.defaultEventType,
    };

    if (options.sendPreamble ?? true) {
      this.sendPreamble();
    }
  }

  get isOpen(): boolean {
    return this.open;
  }

  get preambleSent(): boolean {
    return this.started;
  }

  /** Frames delivered so far by `write`, `writeComment`, `writeBatch` and `writeEncoded`. */
  get framesWritten(): number {
    return this.frames;
  }

  /** Emit status and headers. Runs at most once; a refused start closes the writer. */
  sendPreamble(): boolean {
    if (this.started) return true;
    if (!this.open) return false;
    this.started = true;

    if (!this.transport.start) return true;
    let ok: boolean;
    try {
      ok = this.transport.start(200, SSE_RESPONSE_HEADERS);
    } catch (err) {
      this.fail("preamble_error", err);
      return false;
    }
    if (!ok) this.fail("preamble_refused");
    return ok;
  }

  /** Write one event; configured id and type defaults are applied at delivery time. */
  write(event: SseEvent): Promise<boolean> {
    return this.enqueue(() => encodeEvent(applyEventDefaults(event, this.defaults)), 1);
  }

  writeComment(text = ""): Promise<boolean> {
    return this.enqueue(() => encodeComment(text), 1);
  }

  /** Write several events with a single transport send. */
  writeBatch(events: readonly SseEvent[]): Promise<boolean> {
    if (events.length === 0) return this.enqueue(() => "", 0);
    return this.enqueue(
      () => encodeEvents(events.map((event) => applyEventDefaults(event, this.defaults))),
      events.length,
    );
  }

  /**
   * Write text that is already framed, e.g. one encoding shared by a broadcast.
   * Event defaults are not applied.
   */
  writeEncoded(chunk: string, frameCount = 1): Promise<boolean> {
    return this.enqueue(() => chunk, frameCount);
  }

  /** Close the writer and its transport. True only for the call that closed it. */
  close(): boolean {
    if (!this.open) return false;
    this.open = false;
    this.closeTransport();
    return true;
  }

  private enqueue(render: () => string, frameCount: number): Promise<boolean> {
    const task = this.chain.then(() => this.deliver(render, frameCount));
    this.chain = task;
    return task;
  }

  private async deliver(render: () => string, frameCount: number): Promise<boolean> {
    if (!this.open) return false;

    let chunk: string;
    try {
      chunk = render();
      if (this.pendingRetry !== undefined) {
        chunk = encodeRetry(this.pendingRetry) + chunk;
      }
    } catch (err) {
      this.fail("encode_error", err);
      return false;
    }
    if (chunk === "") return true;

    let outcome: SendOutcome;
    try {
      outcome = await this.sendWithTimeout(chunk);
    } catch (err) {
      this.fail("send_error", err);
      return false;
    }

    if (outcome === "timeout") {
      this.fail("send_timeout");
      return false;
    }
    if (!outcome) {
      this.fail("send_refused");
      return false;
    }

    this.pendingRetry = undefined;
    this.frames += frameCount;
    return true;
  }

  private async sendWithTimeout(chunk: string): Promise<SendOutcome> {
    const result = this.transport.send(chunk);
    if (typeof result === "boolean" || this.sendTimeoutMs <= 0) return result;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.sendTimeoutMs);
    });
    try {
      return await Promise.race([result, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(reason: string, error?: unknown): void {
    if (!this.open) return;
    this.logger.warn("SSE write failed, closing connection", {
      connectionId: this.connectionId,
      reason,
      error,
    });
    this.open = false;
    this.closeTransport();
  }

  private closeTransport(): void {
    try {
      this.transport.close();
    } catch (err) {
      this.logger.warn("Failed to close SSE transport", {
        connectionId: this.connectionId,
        error: err,
      });
    }
  }
}
