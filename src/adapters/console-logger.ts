/**
 * Plain-text Logger implementation for interactive use.
 * Prefixes all output with a configurable tag (default: "ws-proxy").
 */

import type { Logger } from "../interfaces/logger.js";

export class ConsoleLogger implements Logger {
  private prefix: string;
  private verbose: boolean;

  constructor(prefix = "ws-proxy", options: { verbose?: boolean } = {}) {
    this.prefix = prefix;
    this.verbose = options.verbose ?? true;
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix}:${component}`, { verbose: this.verbose });
  }

  private log(
    method: "debug" | "log" | "warn" | "error",
    msg: string,
    ctx?: Record<string, unknown>,
  ): void {
    const formatted = `[${this.prefix}] ${msg}`;
    if (ctx) {
      console[method](formatted, ctx);
    } else {
      console[method](formatted);
    }
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    if (!this.verbose) return;
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("log", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }
}
