#!/usr/bin/env node
import { ConsoleLogger } from "../adapters/console-logger.js";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { HELP_TEXT, parseCliArgs } from "../config/cli-args.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigError, ListenError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { ProxyServer } from "../server/proxy-server.js";
import { type ResolvedConfig, resolveConfig } from "../types/config.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2), process.env);
  if (parsed.kind === "help") {
    console.log(HELP_TEXT);
    process.exit(0);
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}\nRun with --help for usage.`);
    process.exit(1);
  }

  const { options } = parsed;
  const logger: Logger =
    options.logFormat === "text"
      ? new ConsoleLogger("ws-proxy", { verbose: options.verbose })
      : new StructuredLogger({
          component: "ws-proxy",
          level: options.verbose ? LogLevel.DEBUG : LogLevel.INFO,
        });
  const version = resolvePackageVersion(import.meta.url, ["../../package.json", "../package.json"]);

  // 1. Validate configuration
  let config: ResolvedConfig;
  try {
    config = resolveConfig(options.config);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  // 2. Bind the listener and start the session proxy
  const server = new ProxyServer({ config, logger, version });
  try {
    await server.start();
  } catch (err) {
    if (err instanceof ListenError) {
      logger.error(err.message, { error: err.cause });
      process.exit(1);
    }
    throw err;
  }

  // 3. Graceful shutdown
  registerSignalHandlers(() => server.stop(), { logger });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
