/**
 * MessageForwarder: relays backend-originated frames to client sessions.
 *
 * One forwarder exists per backend session lifetime. Each backend frame is
 * broadcast to every registered client; a client whose write fails is reported
 * through `onDeliveryFailed` and the remaining clients still receive the frame.
 *
 * @module SessionControl
 */

import type { Logger } from "../interfaces/logger.js";
import type { MessageFrame } from "../interfaces/transport.js";
import type { BackendSession } from "./backend-session-manager.js";
import type { ClientSession } from "./session-registry.js";

export interface MessageForwarderDeps {
  backend: BackendSession;
  /** Clients registered at the moment a frame arrives. */
  recipients: () => ClientSession[];
  onDeliveryFailed: (client: ClientSession, err: unknown) => void;
  /** The backend socket closed or errored while this forwarder was active. */
  onBackendLost: (backend: BackendSession, reason: string) => void;
  logger: Logger;
}

export class MessageForwarder {
  private active = false;
  private forwarded = 0;

  constructor(private deps: MessageForwarderDeps) {}

  get backend(): BackendSession {
    return this.deps.backend;
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Frames relayed from the backend so far. */
  get forwardedCount(): number {
    return this.forwarded;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    const { socket } = this.deps.backend;

    socket.on("message", (frame) => {
      if (!this.active) return;
      void this.broadcast(frame);
    });
    socket.on("error", (err) => {
      if (!this.active) return;
      this.deps.logger.warn("Backend socket error", {
        backendId: this.deps.backend.id,
        error: err,
      });
    });
    socket.on("close", (code, reason) => {
      if (!this.active) return;
      this.active = false;
      const detail = reason ? `: ${reason}` : "";
      this.deps.onBackendLost(this.deps.backend, `closed with code ${code}${detail}`);
    });
  }

  /** Stop relaying. Used when the proxy itself closes the backend. */
  stop(): void {
    this.active = false;
  }

  /** Resolves once the frame was offered to every recipient. Never rejects. */
  broadcast(frame: MessageFrame): Promise<void> {
    const recipients = this.deps.recipients();
    this.forwarded++;
    return Promise.all(recipients.map((client) => this.deliver(client, frame))).then(() => {});
  }

  private async deliver(client: ClientSession, frame: MessageFrame): Promise<void> {
    try {
      await client.socket.send(frame);
    } catch (err) {
      this.deps.onDeliveryFailed(client, err);
    }
  }
}
