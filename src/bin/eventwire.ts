#!/usr/bin/env node
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { subscribe } from "../client/sse-client.js";
import { errorMessage } from "../errors.js";
import { createEventwireServer } from "../http/server.js";
import { ProtocolGatekeeper } from "../protocol/request-validator.js";
import { ConnectionRegistry } from "../server/connection-registry.js";
import { Heartbeat } from "../server/heartbeat.js";
import { resolveConfig } from "../types/config.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";
import {
  CliUsageError,
  HELP_TEXT,
  type ListenCommand,
  parseArgs,
  type ServeCommand,
} from "./args.js";

const version = resolvePackageVersion(import.meta.url, ["../../package.json"]);

function createLogger(verbose: boolean): StructuredLogger {
  return new StructuredLogger({
    component: "eventwire",
    level: verbose ? LogLevel.DEBUG : LogLevel.INFO,
  });
}

// ── serve ──────────────────────────────────────────────────────────────────

async function serve(command: ServeCommand): Promise<number> {
  const config = resolveConfig(command.config);
  const logger = createLogger(command.verbose);

  const registry = new ConnectionRegistry({
    logger: logger.child("registry"),
    writer: {
      sendTimeoutMs: config.sendTimeoutMs,
      retryMs: config.retryMs,
      autoEventId: config.autoEventId,
      defaultEventType: config.defaultEventType,
    },
  });
  const server = createEventwireServer({
    registry,
    path: config.path,
    apiKey: command.apiKey,
    gatekeeper: new ProtocolGatekeeper({
      logger: logger.child("protocol"),
      strict: config.strictProtocol,
    }),
    healthContext: { version, connections: () => registry.size },
    logger: logger.child("http"),
    onConnect: (id) => {
      void registry.sendToClient(id, { event: "welcome", data: JSON.stringify({ id }) });
    },
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        reject(new CliUsageError(`Port ${config.port} is already in use.`));
        return;
      }
      reject(err);
    });
    server.listen(config.port, () => resolve());
  });

  const heartbeat = new Heartbeat(registry, {
    intervalMs: config.heartbeatIntervalMs,
    logger: logger.child("heartbeat"),
  });
  heartbeat.start();

  // Demo publisher: one `tick` event per interval, never two broadcasts at once.
  let seq = 0;
  let publishing: Promise<unknown> = Promise.resolve();
  const ticker = setInterval(() => {
    publishing = publishing.then(() => {
      seq++;
      return registry.broadcast({
        id: String(seq),
        event: "tick",
        data: JSON.stringify({ seq, time: new Date().toISOString() }),
      });
    });
  }, command.tickMs);

  logger.info("eventwire listening", {
    url: `http://localhost:${config.port}${config.path}`,
    version,
  });

  return new Promise<number>((resolve) => {
    let shuttingDown = false;
    const shutdown = () => {
      if (shuttingDown) {
        resolve(1);
        return;
      }
      shuttingDown = true;
      logger.info("Shutting down");
      clearInterval(ticker);
      heartbeat.stop();
      registry.shutdown();
      server.closeAllConnections();
      server.close(() => resolve(0));
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
}

// ── listen ─────────────────────────────────────────────────────────────────

async function listen(command: ListenCommand): Promise<number> {
  const config = resolveConfig(command.config);
  const logger = createLogger(command.verbose);
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    const outcome = await subscribe(
      command.url,
      (event) => {
        process.stdout.write(`${JSON.stringify(event)}\n`);
      },
      {
        readTimeoutMs: config.readTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
        maxBufferSize: config.maxBufferSize,
        signal: controller.signal,
        skipEmpty: true,
        logger: logger.child("client"),
      },
    );
    if (outcome.ok || controller.signal.aborted) return 0;
    console.error(`Error: ${outcome.error.message}`);
    return 1;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  const command = parseArgs(process.argv.slice(2), process.env);
  switch (command.command) {
    case "help":
      console.log(HELP_TEXT);
      return 0;
    case "version":
      console.log(version);
      return 0;
    case "serve":
      return serve(command);
    case "listen":
      return listen(command);
  }
}

main().then(
  (code) => {
    process.exit(code);
  },
  (err: unknown) => {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}\nRun with --help for usage.`);
    } else {
      console.error("Fatal error:", errorMessage(err));
    }
    process.exit(1);
  },
);
