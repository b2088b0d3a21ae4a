/**
 * SessionRegistry: bookkeeping for live client sessions.
 *
 * Keyed by the socket handle; each entry carries its last-activity timestamp.
 * Structural changes (register/remove) are made by SessionProxy while it holds
 * the proxy lock. `touch` is a single synchronous write and is safe on its own.
 *
 * @module SessionControl
 */

import { randomUUID } from "node:crypto";
import type { MessageSocket } from "../interfaces/transport.js";

export interface ClientSession {
  /** Random identifier used only for log context. */
  readonly id: string;
  readonly socket: MessageSocket;
  readonly connectedAt: number;
  lastActivity: number;
}

export class SessionRegistry {
  private sessions = new Map<MessageSocket, ClientSession>();

  constructor(private readonly now: () => number = Date.now) {}

  register(socket: MessageSocket): ClientSession {
    const existing = this.sessions.get(socket);
    if (existing) return existing;

    const timestamp = this.now();
    const session: ClientSession = {
      id: randomUUID(),
      socket,
      connectedAt: timestamp,
      lastActivity: timestamp,
    };
    this.sessions.set(socket, session);
    return session;
  }

  get(socket: MessageSocket): ClientSession | undefined {
    return this.sessions.get(socket);
  }

  has(socket: MessageSocket): boolean {
    return this.sessions.has(socket);
  }

  /** Refresh last activity. Returns false when the session is no longer registered. */
  touch(socket: MessageSocket): boolean {
    const session = this.sessions.get(socket);
    if (!session) return false;
    session.lastActivity = this.now();
    return true;
  }

  /** Returns the removed session, or undefined when it was already gone. */
  remove(socket: MessageSocket): ClientSession | undefined {
    const session = this.sessions.get(socket);
    if (!session) return undefined;
    this.sessions.delete(socket);
    return session;
  }

  /** Sessions whose inactivity strictly exceeds `timeoutMs` at `at`. */
  idleSessions(timeoutMs: number, at: number = this.now()): ClientSession[] {
    return this.list().filter((session) => at - session.lastActivity > timeoutMs);
  }

  list(): ClientSession[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  get isEmpty(): boolean {
    return this.sessions.size === 0;
  }
}
