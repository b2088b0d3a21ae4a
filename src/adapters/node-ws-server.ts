import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer as WSServer, type WebSocket } from "ws";
import type { Logger } from "../interfaces/logger.js";
import type {
  ConnectionInfo,
  OnClientConnection,
  WebSocketServerLike,
} from "../interfaces/ws-server.js";
import { noopLogger } from "./noop-logger.js";
import { WsMessageSocket } from "./ws-message-socket.js";

export interface NodeWebSocketServerOptions {
  /** Port to listen on. Use 0 for a random free port. Ignored when `server` is provided. */
  port: number;
  /** Optional hostname to bind to. Defaults to "0.0.0.0". Ignored when `server` is provided. */
  host?: string;
  /** Upgrade path clients connect on (default: "/ws"). Other paths are refused. */
  path?: string;
  /** Maximum payload size in bytes (default: 1MB). */
  maxPayload?: number;
  /**
   * Optional external HTTP server to attach to. When provided, WS piggybacks
   * on this server instead of creating its own.
   */
  server?: Server;
  /** Wait for closing handshakes in `close()` before terminating clients (default: 1000ms). */
  closeTimeoutMs?: number;
  /** Optional logger instance. Defaults to noop. */
  logger?: Logger;
}

function connectionInfo(req: IncomingMessage): ConnectionInfo {
  return {
    url: req.url ?? "",
    origin: req.headers.origin,
    remoteAddress: req.socket.remoteAddress,
  };
}

/**
 * Node.js WebSocket server adapter using the `ws` package.
 * Accepts client connections on a single path. Origins are not checked:
 * deployments that need origin filtering apply it in front of the proxy.
 */
export class NodeWebSocketServer implements WebSocketServerLike {
  private wss: WSServer | null = null;
  private options: NodeWebSocketServerOptions;
  private logger: Logger;

  constructor(options: NodeWebSocketServerOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  /** Actual port after listen (useful when constructed with port: 0). */
  get port(): number | undefined {
    const addr = this.wss?.address();
    if (addr && typeof addr === "object") return addr.port;
    // When attached to an external server, fall back to the HTTP server's address
    if (this.options.server) {
      const httpAddr = this.options.server.address();
      if (httpAddr && typeof httpAddr === "object") return httpAddr.port;
    }
    return undefined;
  }

  get path(): string {
    return this.options.path ?? "/ws";
  }

  private get maxPayload(): number {
    return this.options.maxPayload ?? 1_048_576;
  }

  async listen(onClientConnection: OnClientConnection): Promise<void> {
    const common = { path: this.path, maxPayload: this.maxPayload };

    if (this.options.server) {
      // Attached to an external HTTP server; its owner listens
      this.wss = new WSServer({ server: this.options.server, ...common });
      this.wireConnectionHandler(onClientConnection);
      return;
    }

    return new Promise((resolve, reject) => {
      const wss = new WSServer({
        port: this.options.port,
        host: this.options.host ?? "0.0.0.0",
        ...common,
      });
      this.wss = wss;

      wss.once("listening", () => resolve());
      wss.once("error", (err) => reject(err));

      this.wireConnectionHandler(onClientConnection);
    });
  }

  private wireConnectionHandler(onClientConnection: OnClientConnection): void {
    if (!this.wss) return;

    // In attached mode the HTTP server's errors are re-emitted here
    this.wss.on("error", (err: Error) => {
      this.logger.warn("WebSocket server error", { error: err });
    });

    this.wss.on("wsClientError", (err: Error, socket: Duplex, req: IncomingMessage) => {
      this.logger.warn("WebSocket upgrade failed", {
        error: err,
        ...connectionInfo(req),
      });
      if (socket.writable) socket.end("HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n");
      socket.destroy();
    });

    this.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
      const socket = new WsMessageSocket(ws, { maxHeldBytes: this.maxPayload });
      onClientConnection(socket, connectionInfo(req));
    });
  }

  async close(): Promise<void> {
    return new Promise((resolve) => {
      const wss = this.wss;
      if (!wss) {
        resolve();
        return;
      }

      for (const client of wss.clients) {
        client.close(1001, "Server shutting down");
      }

      // ws waits up to 30s for a closing handshake; peers that never answer are cut off
      const terminateTimer = setTimeout(() => {
        for (const client of wss.clients) {
          this.logger.warn("Terminating client that did not finish closing");
          client.terminate();
        }
      }, this.options.closeTimeoutMs ?? 1_000);
      terminateTimer.unref();

      // When attached to an external server, only the WSServer is closed here
      wss.close(() => {
        clearTimeout(terminateTimer);
        this.wss = null;
        resolve();
      });
    });
  }
}
