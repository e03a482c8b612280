import type { ServerResponse } from "node:http";
import type { SseTransport } from "../interfaces/transport.js";

/**
 * {@link SseTransport} over a `node:http` response. `send` settles once the
 * chunk has been handed to the socket, waiting for `drain` when the response
 * buffer is full, and resolves false as soon as the response is gone.
 */
export class NodeResponseTransport implements SseTransport {
  constructor(private readonly res: ServerResponse) {}

  get isGone(): boolean {
    return this.res.destroyed || this.res.writableEnded;
  }

  start(status: number, headers: Readonly<Record<string, string>>): boolean {
    if (this.isGone) return false;
    if (this.res.headersSent) return true;
    this.res.writeHead(status, headers);
    this.res.flushHeaders();
    return true;
  }

  send(chunk: string): Promise<boolean> {
    if (this.isGone) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      let settled = false;
      let written = false;
      let drained = true;

      const finish = (ok: boolean) => {
        if (settled) return;
        settled = true;
        this.res.off("drain", onDrain);
        this.res.off("close", onClose);
        this.res.off("error", onClose);
        resolve(ok);
      };
      const onDrain = () => {
        drained = true;
        if (written) finish(true);
      };
      const onClose = () => finish(false);

      this.res.once("close", onClose);
      this.res.once("error", onClose);

      const accepted = this.res.write(chunk, (err) => {
        if (err) {
          finish(false);
          return;
        }
        written = true;
        if (drained) finish(true);
      });
      if (!accepted) {
        drained = false;
        this.res.once("drain", onDrain);
      }
    });
  }

  close(): void {
    if (!this.isGone) this.res.end();
  }
}
