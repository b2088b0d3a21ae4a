import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { type HealthContext, handleHealth } from "./health.js";

export interface HttpServerOptions {
  /** Upgrade path served by the WebSocket layer; plain GETs on it get 426. */
  wsPath: string;
  healthContext?: HealthContext;
}

/**
 * Plain-HTTP side of the proxy listener. WebSocket upgrades never reach this
 * handler; the `ws` server attached to the same listener takes them.
 */
export function createProxyHttpServer(options: HttpServerOptions): Server {
  return createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health") {
      handleHealth(req, res, options.healthContext);
      return;
    }

    if (url.pathname === options.wsPath) {
      res.writeHead(426, { "Content-Type": "text/plain", Upgrade: "websocket" });
      res.end("Upgrade Required");
      return;
    }

    res.writeHead(404);
    res.end("Not Found");
  });
}
