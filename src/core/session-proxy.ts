/**
 * SessionProxy: coordinator that multiplexes client sessions onto one shared
 * backend session.
 *
 * All structural state (the registry and the current backend) is owned here
 * and mutated only inside `lock.run()`, so dials, removals and sweeps never
 * interleave. Socket I/O on an already-obtained handle happens outside the lock.
 *
 * Lifecycle:
 *   handleConnection → register → ensure backend (dial if absent) → attach reader
 *   reader: client frame → touch → backend.send
 *   forwarder: backend frame → every registered client
 *   IdleReaper: evict idle clients, drop backend when none remain
 *   BackendMonitor: redial while clients remain and the backend is gone
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { errorMessage, toProxyError } from "../errors.js";
import type { BackendDialer } from "../interfaces/backend-dialer.js";
import type { Logger } from "../interfaces/logger.js";
import type { MessageFrame, MessageSocket } from "../interfaces/transport.js";
import type { ConnectionInfo } from "../interfaces/ws-server.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { ClientRemovalReason, ProxyEventMap } from "../types/events.js";
import { SerialQueue } from "../utils/serial-queue.js";
import { BackendMonitor, type MonitorTickResult } from "./backend-monitor.js";
import { type BackendSession, BackendSessionManager } from "./backend-session-manager.js";
import { IdleReaper, type SweepResult } from "./idle-reaper.js";
import { MessageForwarder } from "./message-forwarder.js";
import { type ClientSession, SessionRegistry } from "./session-registry.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface SessionProxyOptions {
  dialer: BackendDialer;
  logger?: Logger;
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
  monitorIntervalMs?: number;
  maxMonitorIntervalMs?: number;
  now?: () => number;
}

export interface ProxySnapshot {
  clients: number;
  backendConnected: boolean;
  backendId: string | null;
  messagesToBackend: number;
  messagesFromBackend: number;
  dialAttempts: number;
  dialFailures: number;
}

const CLOSE_FRAMES: Record<ClientRemovalReason, { code: number; reason: string }> = {
  closed: { code: 1000, reason: "Closed" },
  idle: { code: 1000, reason: "Idle timeout" },
  forward_failed: { code: 1011, reason: "Backend write failed" },
  backend_unavailable: { code: 1011, reason: "Backend unavailable" },
  delivery_failed: { code: 1011, reason: "Delivery failed" },
  shutdown: { code: 1001, reason: "Proxy shutting down" },
};

export class SessionProxy extends TypedEventEmitter<ProxyEventMap> {
  readonly registry: SessionRegistry;
  private readonly backend: BackendSessionManager;
  private readonly lock = new SerialQueue();
  private readonly reaper: IdleReaper;
  private readonly monitor: BackendMonitor;
  private readonly logger: Logger;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;
  private forwarder: MessageForwarder | null = null;
  private retiredForwarded = 0;
  private messagesToBackend = 0;
  private stopped = false;

  constructor(options: SessionProxyOptions) {
    super();
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_CONFIG.idleTimeoutMs;
    this.registry = new SessionRegistry(this.now);
    this.backend = new BackendSessionManager({
      dialer: options.dialer,
      logger: this.logger,
      now: this.now,
    });

    const monitorIntervalMs = options.monitorIntervalMs ?? DEFAULT_CONFIG.monitorIntervalMs;
    this.reaper = new IdleReaper({
      sweep: () => this.sweep(),
      sweepIntervalMs: options.sweepIntervalMs ?? DEFAULT_CONFIG.sweepIntervalMs,
      logger: this.logger,
    });
    this.monitor = new BackendMonitor({
      check: () => this.redialIfNeeded(),
      intervalMs: monitorIntervalMs,
      maxIntervalMs: options.maxMonitorIntervalMs ?? monitorIntervalMs,
      logger: this.logger,
    });
  }

  // ── Lifecycle ──

  /** Start the idle sweep and the backend monitor. */
  start(): void {
    this.stopped = false;
    this.reaper.start();
    this.monitor.start();
    this.logger.info("Session proxy started", {
      backend: this.backend.address,
      idleTimeoutMs: this.idleTimeoutMs,
    });
  }

  /** Stop background activity, close every client and the backend. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.reaper.stop();
    this.monitor.stop();
    await this.lock.run(() => {
      this.dropBackendLocked("Proxy shutting down", 1001);
      for (const session of this.registry.list()) {
        this.removeLocked(session.socket, "shutdown");
      }
    });
  }

  get isRunning(): boolean {
    return this.reaper.isRunning && this.monitor.isRunning;
  }

  get backendSession(): BackendSession | null {
    return this.backend.current;
  }

  get clientCount(): number {
    return this.registry.size;
  }

  snapshot(): ProxySnapshot {
    const current = this.backend.current;
    const { dialAttempts, dialFailures } = this.backend.stats;
    return {
      clients: this.registry.size,
      backendConnected: current !== null,
      backendId: current?.id ?? null,
      messagesToBackend: this.messagesToBackend,
      messagesFromBackend: this.retiredForwarded + (this.forwarder?.forwardedCount ?? 0),
      dialAttempts,
      dialFailures,
    };
  }

  // ── Connection acceptor ──

  /**
   * Register a freshly upgraded client and make sure a backend session exists.
   * Resolves with the session, or null when the client was turned away.
   */
  handleConnection(socket: MessageSocket, info?: ConnectionInfo): Promise<ClientSession | null> {
    if (this.stopped) {
      socket.close(CLOSE_FRAMES.shutdown.code, CLOSE_FRAMES.shutdown.reason);
      return Promise.resolve(null);
    }

    return this.lock.run(async () => {
      const session = this.registry.register(socket);
      this.logger.info("New connection established", {
        clientId: session.id,
        clientCount: this.registry.size,
        ...info,
      });

      try {
        await this.connectBackendLocked();
      } catch {
        this.removeLocked(socket, "backend_unavailable");
        return null;
      }

      // Frames the client sent during the dial are forwarded before anything else
      this.attachClientReader(session);

      // The client may have gone away while the dial was in flight
      if (!socket.isOpen) {
        this.removeLocked(socket, "closed");
        return null;
      }

      this.emit("client:connected", { clientId: session.id, clientCount: this.registry.size });
      return session;
    });
  }

  /** Idempotent remove-and-close, usable by any task that observes a failure. */
  removeClient(socket: MessageSocket, reason: ClientRemovalReason): Promise<boolean> {
    return this.lock.run(() => this.removeLocked(socket, reason));
  }

  // ── Per-client reader ──

  private attachClientReader(session: ClientSession): void {
    const { socket } = session;

    socket.on("message", (frame) => {
      void this.forwardToBackend(session, frame);
    });
    socket.on("error", (err) => {
      this.logger.debug?.("Client socket error", { clientId: session.id, error: err });
    });
    socket.on("close", (code) => {
      this.logger.debug?.("Client connection closed", { clientId: session.id, code });
      void this.removeClient(socket, "closed");
    });
  }

  private async forwardToBackend(session: ClientSession, frame: MessageFrame): Promise<void> {
    // A session that already left the registry has a dead reader
    if (!this.registry.touch(session.socket)) return;

    const backend = this.backend.current;
    if (!backend) {
      this.logger.warn("No backend session for client message", { clientId: session.id });
      await this.removeClient(session.socket, "backend_unavailable");
      return;
    }

    try {
      await backend.socket.send(frame);
      this.messagesToBackend++;
    } catch (err) {
      this.logger.warn("Error sending message to backend", {
        clientId: session.id,
        backendId: backend.id,
        error: err,
      });
      await this.lock.run(() => {
        this.invalidateBackendLocked(backend, `write failed: ${errorMessage(err)}`);
        this.removeLocked(session.socket, "forward_failed");
      });
    }
  }

  // ── Idle reaper ──

  /** Evict idle clients; drop the backend when the registry ends up empty. */
  sweep(): Promise<SweepResult> {
    return this.lock.run(() => {
      const now = this.now();
      const hadBackend = this.backend.current !== null;
      const idle = this.registry.idleSessions(this.idleTimeoutMs, now);

      for (const session of idle) {
        this.logger.info("Closing connection due to inactivity", {
          clientId: session.id,
          idleMs: now - session.lastActivity,
        });
        this.removeLocked(session.socket, "idle");
      }

      if (this.registry.isEmpty && this.backend.current) {
        this.dropBackendLocked("No active clients");
      }

      const result: SweepResult = {
        evicted: idle.length,
        remaining: this.registry.size,
        backendClosed: hadBackend && this.backend.current === null,
      };
      this.emit("sweep:completed", result);
      return result;
    });
  }

  // ── Backend monitor ──

  /** One monitor tick: dial only when the backend is absent and clients remain. */
  redialIfNeeded(): Promise<MonitorTickResult> {
    return this.lock.run(async (): Promise<MonitorTickResult> => {
      if (this.backend.current) return "present";
      if (this.registry.isEmpty) return "not_needed";

      this.logger.info("Reconnecting to backend service", { address: this.backend.address });
      try {
        await this.connectBackendLocked();
        return "connected";
      } catch {
        return "failed";
      }
    });
  }

  // ── Locked helpers (caller holds the lock) ──

  private async connectBackendLocked(): Promise<BackendSession> {
    try {
      const { session, created } = await this.backend.ensure();
      if (created) this.startForwarder(session);
      return session;
    } catch (err) {
      const error = toProxyError(err);
      this.emit("backend:dial_failed", { address: this.backend.address, error });
      throw error;
    }
  }

  private startForwarder(backend: BackendSession): void {
    this.retireForwarder();
    const forwarder = new MessageForwarder({
      backend,
      recipients: () => this.registry.list(),
      onDeliveryFailed: (client, err) => {
        this.logger.warn("Error sending message to client", {
          clientId: client.id,
          error: err,
        });
        void this.removeClient(client.socket, "delivery_failed");
      },
      onBackendLost: (lost, reason) => {
        void this.lock.run(() => this.invalidateBackendLocked(lost, reason));
      },
      logger: this.logger,
    });
    this.forwarder = forwarder;
    forwarder.start();
    this.emit("backend:connected", { backendId: backend.id, address: this.backend.address });
  }

  private retireForwarder(): void {
    if (!this.forwarder) return;
    this.forwarder.stop();
    this.retiredForwarded += this.forwarder.forwardedCount;
    this.forwarder = null;
  }

  private removeLocked(socket: MessageSocket, reason: ClientRemovalReason): boolean {
    const session = this.registry.remove(socket);
    if (!session) return false;

    if (socket.isOpen) {
      const frame = CLOSE_FRAMES[reason];
      socket.close(frame.code, frame.reason);
    }
    this.logger.info("Client session removed", {
      clientId: session.id,
      reason,
      clientCount: this.registry.size,
    });
    this.emit("client:removed", {
      clientId: session.id,
      reason,
      clientCount: this.registry.size,
    });

    if (this.registry.isEmpty) {
      this.dropBackendLocked("No active clients");
    }
    return true;
  }

  private dropBackendLocked(reason: string, code = 1000): boolean {
    const current = this.backend.current;
    if (!current) return false;
    if (this.forwarder?.backend === current) this.retireForwarder();
    this.backend.drop(code, reason);
    this.emit("backend:disconnected", { backendId: current.id, reason });
    return true;
  }

  private invalidateBackendLocked(backend: BackendSession, reason: string): void {
    if (this.backend.current !== backend) return;
    if (this.forwarder?.backend === backend) this.retireForwarder();
    this.backend.invalidate(backend, reason);
    this.emit("backend:disconnected", { backendId: backend.id, reason });
  }
}
