import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { ConnectionRegistry } from "./connection-registry.js";

export interface HeartbeatOptions {
  /** Interval between keep-alive comments; 0 or less keeps the heartbeat idle. */
  intervalMs: number;
  comment?: string;
  logger?: Logger;
}

/**
 * Periodic comment broadcast. Keeps idle connections from being cut by
 * proxies and surfaces dead peers, which the registry then prunes on the
 * failed write. Ticks run on a promise chain and never overlap.
 */
export class Heartbeat {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private tickChain: Promise<void> = Promise.resolve();
  private running = false;
  private readonly comment: string;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly options: HeartbeatOptions,
  ) {
    this.comment = options.comment ?? "ping";
    this.logger = options.logger ?? noopLogger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running || this.options.intervalMs <= 0) return;
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Resolves once the tick in flight (if any) has finished. */
  idle(): Promise<void> {
    return this.tickChain;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tickChain = this.tickChain.then(async () => {
        await this.tick();
        if (this.running && !this.timer) this.schedule();
      });
    }, this.options.intervalMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    const before = this.registry.size;
    const delivered = await this.registry.broadcastComment(this.comment);
    this.logger.debug?.("Heartbeat sent", { delivered, pruned: before - delivered });
  }
}
