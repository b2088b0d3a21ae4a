import type { LogFormat } from "../interfaces/logger.js";
import type { ProxyConfig } from "../types/config.js";

export interface CliOptions {
  config: ProxyConfig;
  logFormat: LogFormat;
  verbose: boolean;
}

export type CliParseResult =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
  ws-proxy: share one backend WebSocket session among many clients

  Usage: ws-proxy --backend <url> [options]

  Options:
    --backend <url>        Backend address (ws://, wss://, http:// or https://)
    --host <addr>          Address to listen on (default: 0.0.0.0)
    --port <n>             Port to listen on (default: 8080)
    --listen <host:port>   Shorthand for --host and --port
    --path <path>          WebSocket endpoint path (default: /ws)
    --log-format <fmt>     "json" (default) or "text"
    --verbose, -v          Verbose logging
    --help, -h             Show this help

  Environment:
    WS_PROXY_BACKEND       Backend address when --backend is not given
`;

function parsePort(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return Number.parseInt(raw, 10);
}

/** Parse `argv` (without the node binary and script path). Never exits the process. */
export function parseCliArgs(
  argv: string[],
  env: Record<string, string | undefined> = {},
): CliParseResult {
  const config: ProxyConfig = { backendUrl: env.WS_PROXY_BACKEND ?? "" };
  let logFormat: LogFormat = "json";
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const needValue = (): string | null => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) return null;
      i++;
      return value;
    };

    switch (arg) {
      case "--backend": {
        const value = needValue();
        if (value === null) return { kind: "error", message: "--backend requires a URL" };
        config.backendUrl = value;
        break;
      }
      case "--host": {
        const value = needValue();
        if (value === null) return { kind: "error", message: "--host requires an address" };
        config.host = value;
        break;
      }
      case "--port": {
        const port = parsePort(needValue() ?? undefined);
        if (port === null) return { kind: "error", message: "--port requires a number" };
        config.port = port;
        break;
      }
      case "--listen": {
        const value = needValue();
        const separator = value?.lastIndexOf(":") ?? -1;
        if (value === null || separator < 0) {
          return { kind: "error", message: "--listen requires host:port" };
        }
        const port = parsePort(value.slice(separator + 1));
        if (port === null) return { kind: "error", message: "--listen requires host:port" };
        const host = value.slice(0, separator);
        if (host) config.host = host;
        config.port = port;
        break;
      }
      case "--path": {
        const value = needValue();
        if (value === null) return { kind: "error", message: "--path requires a value" };
        config.path = value;
        break;
      }
      case "--log-format": {
        const value = needValue();
        if (value !== "json" && value !== "text") {
          return { kind: "error", message: '--log-format must be "json" or "text"' };
        }
        logFormat = value;
        break;
      }
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        return { kind: "error", message: `Unknown option: ${arg}` };
    }
  }

  if (!config.backendUrl) {
    return { kind: "error", message: "--backend is required (or set WS_PROXY_BACKEND)" };
  }
  return { kind: "run", options: { config, logFormat, verbose } };
}
