/**
 * BackendSessionManager: owns the at-most-one shared backend session.
 *
 * Every method that changes which backend is current (`ensure`, `drop`,
 * `invalidate`) must be called while the caller holds the proxy lock; that is
 * what keeps two dials from ever overlapping.
 *
 * @module SessionControl
 */

import { randomUUID } from "node:crypto";
import { DialError } from "../errors.js";
import type { BackendDialer } from "../interfaces/backend-dialer.js";
import type { Logger } from "../interfaces/logger.js";
import type { MessageSocket } from "../interfaces/transport.js";

export interface BackendSession {
  readonly id: string;
  readonly socket: MessageSocket;
  readonly connectedAt: number;
}

export interface BackendSessionManagerDeps {
  dialer: BackendDialer;
  logger: Logger;
  now?: () => number;
}

export interface EnsureResult {
  session: BackendSession;
  /** True when this call dialed a new session. */
  created: boolean;
}

export class BackendSessionManager {
  private session: BackendSession | null = null;
  private dialAttempts = 0;
  private dialFailures = 0;
  private readonly now: () => number;

  constructor(private readonly deps: BackendSessionManagerDeps) {
    this.now = deps.now ?? Date.now;
  }

  get current(): BackendSession | null {
    return this.session;
  }

  get address(): string {
    return this.deps.dialer.address;
  }

  get stats(): { dialAttempts: number; dialFailures: number } {
    return { dialAttempts: this.dialAttempts, dialFailures: this.dialFailures };
  }

  /** Open a new backend session. Does not store it. */
  async dial(): Promise<BackendSession> {
    this.dialAttempts++;
    try {
      const socket = await this.deps.dialer.dial();
      return { id: randomUUID(), socket, connectedAt: this.now() };
    } catch (err) {
      this.dialFailures++;
      const error =
        err instanceof DialError
          ? err
          : new DialError(this.address, `Failed to dial ${this.address}`, { cause: err });
      this.deps.logger.warn("Backend dial failed", { address: this.address, error });
      throw error;
    }
  }

  /** Return the current session, dialing one only when none exists. */
  async ensure(): Promise<EnsureResult> {
    if (this.session) return { session: this.session, created: false };

    const session = await this.dial();
    this.session = session;
    this.deps.logger.info("Backend session opened", {
      address: this.address,
      backendId: session.id,
    });
    return { session, created: true };
  }

  /** Close and forget the current session. Returns the dropped session, if any. */
  drop(code = 1000, reason = "No active clients"): BackendSession | null {
    const session = this.session;
    if (!session) return null;
    this.session = null;
    session.socket.close(code, reason);
    this.deps.logger.info("Backend session closed", { backendId: session.id, reason });
    return session;
  }

  /**
   * Forget `session` after someone observed it is dead. No-op when a different
   * session (or none) is current, so late reports from old sessions are harmless.
   */
  invalidate(session: BackendSession, reason: string): boolean {
    if (this.session !== session) return false;
    this.session = null;
    session.socket.close(1011, "Backend session lost");
    this.deps.logger.warn("Backend session lost", { backendId: session.id, reason });
    return true;
  }
}
