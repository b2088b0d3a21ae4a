import { proxyConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Proxy configuration with sensible defaults */
export interface ProxyConfig {
  /** Address of the single backend service (required) */
  backendUrl: string;

  // Listener
  host?: string; // default: "0.0.0.0"
  port?: number; // default: 8080
  path?: string; // default: "/ws"
  maxPayload?: number; // default: 1 MiB

  // Timing
  idleTimeoutMs?: number; // default: 30000
  sweepIntervalMs?: number; // default: 5000
  monitorIntervalMs?: number; // default: 10000
  maxMonitorIntervalMs?: number; // default: monitorIntervalMs (no backoff)
  dialTimeoutMs?: number; // default: none
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<ProxyConfig, "dialTimeoutMs">> &
  Pick<ProxyConfig, "dialTimeoutMs">;

export const DEFAULT_CONFIG: Omit<ResolvedConfig, "backendUrl"> = {
  host: "0.0.0.0",
  port: 8080,
  path: "/ws",
  maxPayload: 1_048_576,
  idleTimeoutMs: 30_000,
  sweepIntervalMs: 5_000,
  monitorIntervalMs: 10_000,
  maxMonitorIntervalMs: 10_000,
  dialTimeoutMs: undefined,
};

/** Rewrite http(s) backend addresses to the matching ws(s) scheme. */
export function normalizeBackendUrl(raw: string): string {
  const url = new URL(raw);
  if (url.protocol === "http:") url.protocol = "ws:";
  else if (url.protocol === "https:") url.protocol = "wss:";
  // Drops a bare trailing "#"
  url.hash = "";
  return url.toString();
}

export function resolveConfig(config: ProxyConfig): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = proxyConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const monitorIntervalMs = config.monitorIntervalMs ?? DEFAULT_CONFIG.monitorIntervalMs;
  const resolved: ResolvedConfig = {
    host: config.host ?? DEFAULT_CONFIG.host,
    port: config.port ?? DEFAULT_CONFIG.port,
    path: config.path ?? DEFAULT_CONFIG.path,
    maxPayload: config.maxPayload ?? DEFAULT_CONFIG.maxPayload,
    idleTimeoutMs: config.idleTimeoutMs ?? DEFAULT_CONFIG.idleTimeoutMs,
    sweepIntervalMs: config.sweepIntervalMs ?? DEFAULT_CONFIG.sweepIntervalMs,
    monitorIntervalMs,
    maxMonitorIntervalMs: config.maxMonitorIntervalMs ?? monitorIntervalMs,
    dialTimeoutMs: config.dialTimeoutMs,
    backendUrl: normalizeBackendUrl(config.backendUrl),
  };

  if (resolved.maxMonitorIntervalMs < resolved.monitorIntervalMs) {
    throw new ConfigError(
      "Invalid configuration: maxMonitorIntervalMs must not be below monitorIntervalMs",
    );
  }
  return resolved;
}
