import type { Logger } from "../interfaces/logger.js";

export interface SweepResult {
  evicted: number;
  remaining: number;
  backendClosed: boolean;
}

export interface IdleReaperDeps {
  /** Evict idle clients and tear down the backend if none remain. Runs under the proxy lock. */
  sweep: () => Promise<SweepResult>;
  sweepIntervalMs: number;
  logger: Logger;
}

/**
 * Fixed-period sweep of idle client sessions, independent of client count.
 * The next sweep is scheduled only after the previous one settled.
 */
export class IdleReaper {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(private deps: IdleReaperDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
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
      void this.check();
    }, this.deps.sweepIntervalMs);
  }

  private async check(): Promise<void> {
    if (!this.running) return;

    try {
      const result = await this.deps.sweep();
      this.deps.logger.debug?.(`Active connections: ${result.remaining}`, {
        evicted: result.evicted,
        backendClosed: result.backendClosed,
      });
    } catch (err) {
      this.deps.logger.warn("Idle sweep failed", { error: err });
    }

    if (!this.running) return;
    this.schedule();
  }
}
