import type { LogContext, Logger } from "../interfaces/logger.js";

/** Human-readable logger over `console`, every line tagged `[prefix]`. */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix = "eventwire") {}

  debug(msg: string, ctx?: LogContext): void {
    this.print("debug", msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.print("log", msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.print("warn", msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.print("error", msg, ctx);
  }

  private print(method: "debug" | "log" | "warn" | "error", msg: string, ctx?: LogContext): void {
    const line = `[${this.prefix}] ${msg}`;
    if (ctx && Object.keys(ctx).length > 0) {
      console[method](line, ctx);
    } else {
      console[method](line);
    }
  }
}
