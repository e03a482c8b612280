import type { IncomingMessage, ServerResponse } from "node:http";
import { NodeResponseTransport } from "../adapters/node-response-transport.js";
import type { Logger } from "../interfaces/logger.js";
import { ProtocolGatekeeper } from "../protocol/request-validator.js";
import type { ConnectionRegistry } from "../server/connection-registry.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface SseHandlerOptions {
  /** Request checks; strict gatekeepers turn a failed check into 406. */
  gatekeeper?: ProtocolGatekeeper;
  /** Called with the new connection id once the stream is registered. */
  onConnect?: (id: number, req: IncomingMessage) => void;
  logger?: Logger;
}

export type SseRequestHandler = (req: IncomingMessage, res: ServerResponse) => number;

function reject(res: ServerResponse, status: number, error: string): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ error }));
}

/**
 * Route handler that turns a request into a registered SSE connection.
 * Returns the connection id, or 0 when the request was turned away or the
 * client was already gone.
 */
export function createSseHandler(
  registry: ConnectionRegistry,
  options: SseHandlerOptions = {},
): SseRequestHandler {
  const logger = options.logger ?? noopLogger;
  const gatekeeper = options.gatekeeper ?? new ProtocolGatekeeper({ logger });

  return (req, res) => {
    const valid = gatekeeper.checkRequest({ method: req.method, headers: req.headers });
    if (!valid && gatekeeper.strict) {
      reject(res, 406, "Not Acceptable");
      return 0;
    }

    const id = registry.register(new NodeResponseTransport(res));
    if (id === 0) {
      reject(res, 503, "Service Unavailable");
      return 0;
    }

    // The response may have emitted `close` before the listener below exists.
    if (res.destroyed) {
      registry.close(id);
      logger.debug?.("SSE client gone before registration", { connectionId: id });
      return 0;
    }
    res.once("close", () => {
      registry.close(id);
    });
    logger.info("SSE client connected", { connectionId: id, remote: req.socket.remoteAddress });
    options.onConnect?.(id, req);
    return id;
  };
}
