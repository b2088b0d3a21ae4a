import type { Server } from "node:http";
import { NodeWebSocketDialer } from "../adapters/node-ws-dialer.js";
import { noopLogger } from "../adapters/noop-logger.js";
import { NodeWebSocketServer } from "../adapters/node-ws-server.js";
import { SessionProxy } from "../core/session-proxy.js";
import { ListenError, errorMessage } from "../errors.js";
import { createProxyHttpServer } from "../http/server.js";
import type { BackendDialer } from "../interfaces/backend-dialer.js";
import type { Logger } from "../interfaces/logger.js";
import type { ResolvedConfig } from "../types/config.js";

export interface ProxyServerOptions {
  config: ResolvedConfig;
  logger?: Logger;
  version?: string;
  /** Override the backend dialer (defaults to a `ws` client for `config.backendUrl`). */
  dialer?: BackendDialer;
}

export interface ProxyServerAddress {
  host: string;
  port: number;
  /** WebSocket URL clients connect to. */
  url: string;
}

/**
 * One listener serving both the WebSocket endpoint and `/health`, wired to a
 * SessionProxy. Binding failure rejects `start()` with ListenError.
 */
export class ProxyServer {
  readonly proxy: SessionProxy;
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private httpServer: Server | null = null;
  private wsServer: NodeWebSocketServer | null = null;

  constructor(options: ProxyServerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
    const dialer =
      options.dialer ??
      new NodeWebSocketDialer(this.config.backendUrl, {
        handshakeTimeoutMs: this.config.dialTimeoutMs,
        maxPayload: this.config.maxPayload,
        logger: this.logger.child?.("backend") ?? this.logger,
      });
    this.proxy = new SessionProxy({
      dialer,
      logger: this.logger,
      idleTimeoutMs: this.config.idleTimeoutMs,
      sweepIntervalMs: this.config.sweepIntervalMs,
      monitorIntervalMs: this.config.monitorIntervalMs,
      maxMonitorIntervalMs: this.config.maxMonitorIntervalMs,
    });

    const version = options.version ?? "unknown";
    this.httpServer = createProxyHttpServer({
      wsPath: this.config.path,
      healthContext: { version, snapshot: () => this.proxy.snapshot() },
    });
  }

  async start(): Promise<ProxyServerAddress> {
    const httpServer = this.httpServer;
    if (!httpServer) throw new ListenError("Proxy server was already stopped");

    const wsServer = new NodeWebSocketServer({
      port: this.config.port,
      server: httpServer,
      path: this.config.path,
      maxPayload: this.config.maxPayload,
      logger: this.logger,
    });
    this.wsServer = wsServer;
    await wsServer.listen((socket, info) => {
      void this.proxy.handleConnection(socket, info);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        reject(
          new ListenError(
            `Failed to listen on ${this.config.host}:${this.config.port}: ${errorMessage(err)}`,
            { cause: err },
          ),
        );
      };
      httpServer.once("error", onError);
      httpServer.listen(this.config.port, this.config.host, () => {
        httpServer.off("error", onError);
        resolve();
      });
    });

    this.proxy.start();
    const address = this.address();
    this.logger.info(`WebSocket proxy server started on ${address.host}:${address.port}`, {
      path: this.config.path,
      backend: this.config.backendUrl,
    });
    return address;
  }

  address(): ProxyServerAddress {
    const addr = this.httpServer?.address();
    if (!addr || typeof addr === "string") {
      throw new ListenError("Proxy server is not listening");
    }
    const { address, port } = addr;
    const host = address === "::" || address === "0.0.0.0" ? "localhost" : address;
    const urlHost = host.includes(":") ? `[${host}]` : host;
    return { host, port, url: `ws://${urlHost}:${port}${this.config.path}` };
  }

  async stop(): Promise<void> {
    await this.proxy.stop();
    if (this.wsServer) {
      await this.wsServer.close();
      this.wsServer = null;
    }
    const httpServer = this.httpServer;
    this.httpServer = null;
    if (!httpServer?.listening) return;
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
      // Upgraded sockets and keep-alive requests would otherwise hold close() open
      httpServer.closeAllConnections();
    });
  }
}
