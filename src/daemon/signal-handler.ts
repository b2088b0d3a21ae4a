import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
  signals?: NodeJS.Signals[];
}

/**
 * Register signal handlers that run a cleanup function before exiting.
 * Force-exits with code 1 after `timeoutMs` if cleanup stalls.
 * Returns a function that removes the handlers again.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const signals = options.signals ?? DEFAULT_SIGNALS;
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, force exiting", { timeoutMs });
      process.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup()
      .catch((err) => {
        logger.error("Shutdown cleanup failed", { error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        process.exit(0);
      });
  };

  for (const signal of signals) process.on(signal, handler);
  return () => {
    for (const signal of signals) process.off(signal, handler);
  };
}
