import type { MessageSocket } from "./transport.js";

/** Request metadata captured during the upgrade, used for log context. */
export interface ConnectionInfo {
  remoteAddress?: string;
  origin?: string;
  url: string;
}

/**
 * Callback invoked when a client WebSocket connects.
 */
export type OnClientConnection = (socket: MessageSocket, info: ConnectionInfo) => void;

/** Runtime-agnostic WebSocket server abstraction. */
export interface WebSocketServerLike {
  /** Start accepting upgrades. Calls the callback for each client WebSocket. */
  listen(onClientConnection: OnClientConnection): Promise<void>;
  /** Stop the server and close all connections. */
  close(): Promise<void>;
}
