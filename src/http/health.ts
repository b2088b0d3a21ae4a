import type { IncomingMessage, ServerResponse } from "node:http";
import type { ProxySnapshot } from "../core/session-proxy.js";

export interface HealthContext {
  version: string;
  snapshot: () => ProxySnapshot;
}

export function handleHealth(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx?: HealthContext,
): void {
  const body: Record<string, unknown> = { status: "ok" };
  if (ctx) {
    const stats = ctx.snapshot();
    body.version = ctx.version;
    body.uptime_seconds = Math.floor(process.uptime());
    body.clients = stats.clients;
    body.backendConnected = stats.backendConnected;
    body.messagesToBackend = stats.messagesToBackend;
    body.messagesFromBackend = stats.messagesFromBackend;
    body.dialFailures = stats.dialFailures;
  }
  res.writeHead(200, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
