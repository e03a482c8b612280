import type { IncomingMessage, ServerResponse } from "node:http";

export interface HealthContext {
  version: string;
  /** Current number of open SSE connections. */
  connections: () => number;
}

export function handleHealth(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx?: HealthContext,
): void {
  const body: Record<string, unknown> = { status: "ok" };
  if (ctx) {
    body.version = ctx.version;
    body.uptime_seconds = Math.floor(process.uptime());
    body.connections = ctx.connections();
  }
  res.writeHead(200, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
