import type { Logger } from "../interfaces/logger.js";

/** Outcome of one monitor tick. */
export type MonitorTickResult =
  /** A backend session already exists. */
  | "present"
  /** No clients are registered, so no backend is wanted. */
  | "not_needed"
  | "connected"
  | "failed";

export interface BackendMonitorDeps {
  /** Redial the backend if it is absent and wanted. Runs under the proxy lock. */
  check: () => Promise<MonitorTickResult>;
  intervalMs: number;
  /** Upper bound for the delay after consecutive failures. `intervalMs` disables backoff. */
  maxIntervalMs: number;
  logger: Logger;
}

/**
 * Periodic redial of the shared backend session.
 *
 * Reconnection is edge-triggered off the backend being absent, never off
 * probing a live session. Failed dials retry forever; the delay doubles per
 * consecutive failure up to `maxIntervalMs`.
 */
export class BackendMonitor {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private consecutiveFailures = 0;

  constructor(private deps: BackendMonitorDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Delay before the next tick given the current failure streak. */
  get nextDelayMs(): number {
    if (this.consecutiveFailures === 0) return this.deps.intervalMs;
    const scaled = this.deps.intervalMs * 2 ** this.consecutiveFailures;
    return Math.min(scaled, this.deps.maxIntervalMs);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.consecutiveFailures = 0;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = null;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.nextDelayMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    let result: MonitorTickResult;
    try {
      result = await this.deps.check();
    } catch (err) {
      this.deps.logger.error("Backend monitor check threw", { error: err });
      result = "failed";
    }

    if (result === "failed") {
      this.consecutiveFailures++;
      this.deps.logger.warn("Backend still unavailable, will retry", {
        attempt: this.consecutiveFailures,
        retryInMs: this.nextDelayMs,
      });
    } else {
      this.consecutiveFailures = 0;
    }

    if (!this.running) return;
    this.schedule();
  }
}
