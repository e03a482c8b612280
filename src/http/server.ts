import { createHash, timingSafeEqual } from "node:crypto";
import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { Logger } from "../interfaces/logger.js";
import type { ProtocolGatekeeper } from "../protocol/request-validator.js";
import type { ConnectionRegistry } from "../server/connection-registry.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";
import { type HealthContext, handleHealth } from "./health.js";
import { createSseHandler } from "./sse-handler.js";

export interface EventwireServerOptions {
  registry: ConnectionRegistry;
  /** Route serving the event stream (default: "/events"). */
  path?: string;
  gatekeeper?: ProtocolGatekeeper;
  onConnect?: (id: number, req: IncomingMessage) => void;
  healthContext?: HealthContext;
  /** When set, the stream and /health require `Authorization: Bearer <key>`. */
  apiKey?: string;
  logger?: Logger;
}

/** Timing-safe string comparison using SHA-256 to normalize lengths. */
function timingSafeCompare(a: string, b: string): boolean {
  const hashA = createHash("sha256").update(a).digest();
  const hashB = createHash("sha256").update(b).digest();
  return timingSafeEqual(hashA, hashB);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function createEventwireServer(options: EventwireServerOptions): Server {
  const { registry, apiKey } = options;
  const path = options.path ?? DEFAULT_CONFIG.path;
  const logger = options.logger ?? noopLogger;
  const handleSse = createSseHandler(registry, {
    gatekeeper: options.gatekeeper,
    onConnect: options.onConnect,
    logger,
  });
  const healthContext: HealthContext = options.healthContext ?? {
    version: resolvePackageVersion(import.meta.url, ["../../package.json"]),
    connections: () => registry.size,
  };

  return createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const isProtected = url.pathname === path || url.pathname === "/health";

    if (apiKey && isProtected) {
      const auth = req.headers.authorization ?? "";
      if (!timingSafeCompare(auth, `Bearer ${apiKey}`)) {
        sendJson(res, 401, { error: "Unauthorized" });
        return;
      }
    }

    // Route dispatch
    if (url.pathname === path) {
      if (req.method !== "GET") {
        res.setHeader("Allow", "GET");
        sendJson(res, 405, { error: "Method Not Allowed" });
        return;
      }
      handleSse(req, res);
      return;
    }

    if (url.pathname === "/health") {
      handleHealth(req, res, healthContext);
      return;
    }

    res.writeHead(404);
    res.end("Not Found");
  });
}
