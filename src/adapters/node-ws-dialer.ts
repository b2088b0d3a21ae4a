import { WebSocket } from "ws";
import { DialError } from "../errors.js";
import type { BackendDialer } from "../interfaces/backend-dialer.js";
import type { Logger } from "../interfaces/logger.js";
import type { MessageSocket } from "../interfaces/transport.js";
import { noopLogger } from "./noop-logger.js";
import { WsMessageSocket } from "./ws-message-socket.js";

export interface NodeWebSocketDialerOptions {
  /** Abort the opening handshake after this many milliseconds. Unset: no limit beyond the OS. */
  handshakeTimeoutMs?: number;
  /** Maximum payload size in bytes accepted from the backend (default: 1MB). */
  maxPayload?: number;
  logger?: Logger;
}

/**
 * Dials the backend with the `ws` client. Resolves once the socket is open;
 * any handshake failure, including a non-101 response, rejects with DialError.
 */
export class NodeWebSocketDialer implements BackendDialer {
  private logger: Logger;

  constructor(
    readonly address: string,
    private readonly options: NodeWebSocketDialerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  dial(): Promise<MessageSocket> {
    this.logger.debug?.("Dialing backend", { address: this.address });

    return new Promise((resolve, reject) => {
      const maxPayload = this.options.maxPayload ?? 1_048_576;
      const ws = new WebSocket(this.address, {
        maxPayload,
        ...(this.options.handshakeTimeoutMs !== undefined && {
          handshakeTimeout: this.options.handshakeTimeoutMs,
        }),
      });
      let settled = false;

      // Stays attached for the socket's lifetime so a late error never goes unobserved
      ws.on("error", (err: Error) => {
        if (settled) return;
        settled = true;
        reject(new DialError(this.address, `Failed to dial ${this.address}: ${err.message}`, {
          cause: err,
        }));
      });

      ws.once("open", () => {
        if (settled) return;
        settled = true;
        resolve(new WsMessageSocket(ws, { maxHeldBytes: maxPayload }));
      });
    });
  }
}
