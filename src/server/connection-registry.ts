/**
 * Owns every live SSE connection, keyed by a numeric id.
 *
 * The map is only read and mutated in synchronous sections; all awaiting
 * happens on per-connection writers, outside those sections. Broadcasts work on
 * a snapshot, so a slow peer never blocks `register` or other peers, and a
 * connection registered mid-broadcast may miss that broadcast.
 */

import { encodeComment, encodeEvent } from "../codec/frame-encoder.js";
import { TypedEventEmitter } from "../core/typed-emitter.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { SseTransport } from "../interfaces/transport.js";
import type { SseEvent } from "../types/sse-event.js";
import { noopLogger } from "../utils/noop-logger.js";
import { ConnectionWriter, type ConnectionWriterOptions } from "./connection-writer.js";
import { applyEventDefaults } from "./event-defaults.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type CloseReason = "closed" | "write_failed" | "shutdown";

export interface ConnectionRegistryEvents {
  "connection:opened": { id: number };
  "connection:closed": { id: number; reason: CloseReason };
}

/** Settings applied to the writer of every registered connection. */
export type WriterSettings = Pick<
  ConnectionWriterOptions,
  | "sendPreamble"
  | "retryMs"
  | "sendTimeoutMs"
  | "autoEventId"
  | "eventIdGenerator"
  | "defaultEventType"
>;

export interface ConnectionRegistryOptions {
  logger?: Logger;
  writer?: WriterSettings;
}

interface Connection {
  readonly id: number;
  readonly writer: ConnectionWriter;
}

// ─── ConnectionRegistry ──────────────────────────────────────────────────────

export class ConnectionRegistry extends TypedEventEmitter<ConnectionRegistryEvents> {
  private readonly connections = new Map<number, Connection>();
  private readonly logger: Logger;
  private readonly writerSettings: WriterSettings;
  private nextId = 1;
  private shutDown = false;

  constructor(options: ConnectionRegistryOptions = {}) {
    super();
    this.logger = options.logger ?? noopLogger;
    this.writerSettings = options.writer ?? {};
  }

  get size(): number {
    return this.connections.size;
  }

  get isShutdown(): boolean {
    return this.shutDown;
  }

  has(id: number): boolean {
    return this.connections.has(id);
  }

  ids(): number[] {
    return [...this.connections.keys()];
  }

  /**
   * Take ownership of `transport` and return its connection id (>= 1).
   * Returns 0 without registering anything when there is no transport or the
   * registry has been shut down.
   */
  register(transport: SseTransport | null | undefined): number {
    if (!transport || this.shutDown) return 0;

    const id = this.nextId++;
    const writer = new ConnectionWriter(transport, {
      ...this.writerSettings,
      connectionId: id,
      logger: this.logger,
    });
    this.connections.set(id, { id, writer });

    this.logger.debug?.("SSE connection opened", { connectionId: id, total: this.connections.size });
    this.emit("connection:opened", { id });
    return id;
  }

  /** Deliver one event to one connection. A failed write unregisters it. */
  async sendToClient(id: number, event: SseEvent): Promise<boolean> {
    const connection = this.connections.get(id);
    if (!connection) return false;

    const ok = await connection.writer.write(event);
    if (!ok) this.drop(connection, "write_failed");
    return ok;
  }

  /**
   * Deliver one event to every connection open at call time, concurrently.
   * Resolves the number of successful deliveries; failed connections are
   * unregistered and never retried.
   *
   * Event defaults are applied once per broadcast, so every recipient sees
   * the same automatic id for the same event.
   */
  broadcast(event: SseEvent): Promise<number> {
    let frame: string;
    try {
      frame = encodeEvent(applyEventDefaults(event, this.writerSettings));
    } catch (err) {
      this.logger.error("Refusing to broadcast unencodable event", { error: errorMessage(err) });
      return Promise.resolve(0);
    }
    return this.deliverToAll(frame);
  }

  /** Broadcast a comment frame, e.g. a keep-alive. */
  broadcastComment(text = ""): Promise<number> {
    return this.deliverToAll(encodeComment(text));
  }

  /** Close and unregister one connection. Idempotent: true only when it removed one. */
  close(id: number): boolean {
    const connection = this.connections.get(id);
    if (!connection) return false;

    this.connections.delete(id);
    connection.writer.close();
    this.logger.debug?.("SSE connection closed", { connectionId: id, reason: "closed" });
    this.emit("connection:closed", { id, reason: "closed" });
    return true;
  }

  /**
   * Close every connection and refuse new ones. The map is drained in one
   * step; closing the drained writers happens afterwards.
   */
  shutdown(): void {
    if (this.shutDown) return;
    this.shutDown = true;

    const drained = [...this.connections.values()];
    this.connections.clear();

    for (const { id, writer } of drained) {
      try {
        writer.close();
        this.emit("connection:closed", { id, reason: "shutdown" });
      } catch (err) {
        this.logger.warn("Error while closing SSE connection during shutdown", {
          connectionId: id,
          error: errorMessage(err),
        });
      }
    }

    this.logger.info("SSE registry shut down", { closed: drained.length });
  }

  private async deliverToAll(frame: string): Promise<number> {
    const snapshot = [...this.connections.values()];
    if (snapshot.length === 0) return 0;

    const results = await Promise.all(
      snapshot.map(async (connection) => {
        const ok = await connection.writer.writeEncoded(frame);
        if (!ok) this.drop(connection, "write_failed");
        return ok;
      }),
    );
    return results.filter(Boolean).length;
  }

  /** Unregister after a failed write, unless the entry was already removed or replaced. */
  private drop(connection: Connection, reason: CloseReason): void {
    if (this.connections.get(connection.id) !== connection) return;
    this.connections.delete(connection.id);
    this.logger.warn("Dropping SSE connection", { connectionId: connection.id, reason });
    this.emit("connection:closed", { id: connection.id, reason });
  }
}
