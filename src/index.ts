/**
 * Public API barrel.
 *
 * Re-exports the session proxy, its components, adapters and configuration
 * helpers that make up the public surface area of the package.
 * @module
 */

// Adapters
export { ConsoleLogger } from "./adapters/console-logger.js";
export type { NodeWebSocketDialerOptions } from "./adapters/node-ws-dialer.js";
export { NodeWebSocketDialer } from "./adapters/node-ws-dialer.js";
export type { NodeWebSocketServerOptions } from "./adapters/node-ws-server.js";
export { NodeWebSocketServer } from "./adapters/node-ws-server.js";
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { WsMessageSocket, type WsMessageSocketOptions } from "./adapters/ws-message-socket.js";
// Config
export type { CliOptions, CliParseResult } from "./config/cli-args.js";
export { parseCliArgs } from "./config/cli-args.js";
export { backendUrlSchema, proxyConfigSchema } from "./config/config-schema.js";
// Core
export type { BackendMonitorDeps, MonitorTickResult } from "./core/backend-monitor.js";
export { BackendMonitor } from "./core/backend-monitor.js";
export type {
  BackendSession,
  BackendSessionManagerDeps,
  EnsureResult,
} from "./core/backend-session-manager.js";
export { BackendSessionManager } from "./core/backend-session-manager.js";
export type { IdleReaperDeps, SweepResult } from "./core/idle-reaper.js";
export { IdleReaper } from "./core/idle-reaper.js";
export type { MessageForwarderDeps } from "./core/message-forwarder.js";
export { MessageForwarder } from "./core/message-forwarder.js";
export type { ProxySnapshot, SessionProxyOptions } from "./core/session-proxy.js";
export { SessionProxy } from "./core/session-proxy.js";
export type { ClientSession } from "./core/session-registry.js";
export { SessionRegistry } from "./core/session-registry.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Daemon
export type { SignalHandlerOptions } from "./daemon/signal-handler.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export {
  ConfigError,
  DialError,
  ForwardError,
  ListenError,
  ProxyError,
  errorMessage,
  toProxyError,
} from "./errors.js";
// HTTP
export type { HealthContext } from "./http/health.js";
export { handleHealth } from "./http/health.js";
export type { HttpServerOptions } from "./http/server.js";
export { createProxyHttpServer } from "./http/server.js";
// Interfaces
export type { BackendDialer } from "./interfaces/backend-dialer.js";
export type { LogFormat, Logger } from "./interfaces/logger.js";
export type { MessageFrame, MessageSocket } from "./interfaces/transport.js";
export type {
  ConnectionInfo,
  OnClientConnection,
  WebSocketServerLike,
} from "./interfaces/ws-server.js";
// Server
export type { ProxyServerAddress, ProxyServerOptions } from "./server/proxy-server.js";
export { ProxyServer } from "./server/proxy-server.js";
// Types
export type { ProxyConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, normalizeBackendUrl, resolveConfig } from "./types/config.js";
export type { ClientRemovalReason, ProxyEventMap } from "./types/events.js";
// Utils
export { SerialQueue } from "./utils/serial-queue.js";
