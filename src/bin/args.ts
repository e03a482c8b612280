import { eventwireConfigSchema } from "../config/config-schema.js";
import { EventwireError } from "../errors.js";
import type { EventwireConfig } from "../types/config.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface ServeCommand {
  command: "serve";
  config: EventwireConfig;
  /** Interval of the demo `tick` publisher. */
  tickMs: number;
  apiKey?: string;
  verbose: boolean;
}

export interface ListenCommand {
  command: "listen";
  url: string;
  /** Client settings: `readTimeoutMs`, `connectTimeoutMs` and `maxBufferSize`. */
  config: EventwireConfig;
  verbose: boolean;
}

export type CliCommand = ServeCommand | ListenCommand | { command: "help" } | { command: "version" };

export class CliUsageError extends EventwireError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "CliUsageError";
  }
}

export const DEFAULT_TICK_MS = 1000;

// ── Help ───────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
  eventwire: Server-Sent Events publisher and listener

  Usage:
    eventwire serve [options]      Serve a demo event stream
    eventwire listen <url> [opts]  Print events from an SSE endpoint as JSON lines

  Serve options:
    --port <n>             HTTP port (default: 8080)
    --path <route>         Stream route (default: /events)
    --interval <ms>        Demo tick interval (default: 1000)
    --heartbeat <ms>       Keep-alive comment interval, 0 disables (default: 15000)
    --retry <ms>           Reconnection hint sent to new clients
    --strict               Reject requests that fail protocol checks with 406
    --api-key <key>        Require Authorization: Bearer <key> (or EVENTWIRE_API_KEY)
    --auto-id              Stamp events that carry no id
    --event-type <name>    Type for events published without one

  Listen options:
    --timeout <ms>         Per-read timeout (default: 60000)
    --connect-timeout <ms> Wait for response headers (default: 10000)
    --max-buffer <bytes>   Largest incomplete frame kept (default: 10485760)

  Common:
    --verbose, -v          Verbose logging
    --version              Print the version
    --help, -h             Show this help
`;

// ── Parsing ────────────────────────────────────────────────────────────────

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function requireNumber(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CliUsageError(`${flag} requires a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

/** Flag that sets each config field, for usage errors. */
const CONFIG_FLAGS: Readonly<Record<string, string>> = {
  port: "--port",
  path: "--path",
  heartbeatIntervalMs: "--heartbeat",
  retryMs: "--retry",
  defaultEventType: "--event-type",
  readTimeoutMs: "--timeout",
  connectTimeoutMs: "--connect-timeout",
  maxBufferSize: "--max-buffer",
};

/** Reject option values the config schema would refuse at startup. */
function checkConfig(config: EventwireConfig): EventwireConfig {
  const validation = eventwireConfigSchema.safeParse(config);
  if (validation.success) return config;
  const [issue] = validation.error.issues;
  const field = String(issue.path[0]);
  throw new CliUsageError(`${CONFIG_FLAGS[field] ?? field}: ${issue.message}`);
}

/** Parse `argv` without the node executable and script path. */
export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return { command: "help" };
  }
  if (command === "--version") return { command: "version" };
  if (command === "serve") return parseServe(rest, env);
  if (command === "listen") return parseListen(rest);
  throw new CliUsageError(`Unknown command: ${command}`);
}

function parseServe(args: readonly string[], env: NodeJS.ProcessEnv): ServeCommand {
  const result: ServeCommand = {
    command: "serve",
    config: {},
    tickMs: DEFAULT_TICK_MS,
    apiKey: env.EVENTWIRE_API_KEY || undefined,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--port":
        result.config.port = requireNumber(arg, args[++i]);
        break;
      case "--path":
        result.config.path = requireValue(arg, args[++i]);
        break;
      case "--interval":
        result.tickMs = requireNumber(arg, args[++i]);
        if (result.tickMs === 0) throw new CliUsageError("--interval must be greater than 0");
        break;
      case "--heartbeat":
        result.config.heartbeatIntervalMs = requireNumber(arg, args[++i]);
        break;
      case "--retry":
        result.config.retryMs = requireNumber(arg, args[++i]);
        break;
      case "--strict":
        result.config.strictProtocol = true;
        break;
      case "--api-key":
        result.apiKey = requireValue(arg, args[++i]);
        break;
      case "--auto-id":
        result.config.autoEventId = true;
        break;
      case "--event-type":
        result.config.defaultEventType = requireValue(arg, args[++i]);
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }
  checkConfig(result.config);
  return result;
}

function parseListen(args: readonly string[]): ListenCommand {
  let url: string | undefined;
  const config: EventwireConfig = {};
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--timeout":
        config.readTimeoutMs = requireNumber(arg, args[++i]);
        break;
      case "--connect-timeout":
        config.connectTimeoutMs = requireNumber(arg, args[++i]);
        break;
      case "--max-buffer":
        config.maxBufferSize = requireNumber(arg, args[++i]);
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      default:
        if (arg.startsWith("-") || url !== undefined) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        url = arg;
    }
  }

  if (url === undefined) throw new CliUsageError("listen requires a URL");
  try {
    new URL(url);
  } catch {
    throw new CliUsageError(`Invalid URL: ${url}`);
  }
  return { command: "listen", url, config: checkConfig(config), verbose };
}
