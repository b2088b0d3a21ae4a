export class ProxyError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProxyError";
    this.code = code;
  }
}

// ── Domain errors ──

export class DialError extends ProxyError {
  readonly address: string;

  constructor(address: string, message: string, options?: ErrorOptions) {
    super(message, "DIAL", options);
    this.name = "DialError";
    this.address = address;
  }
}

export class ForwardError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "FORWARD", options);
    this.name = "ForwardError";
  }
}

export class ConfigError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class ListenError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "LISTEN", options);
    this.name = "ListenError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to ProxyError (preserves cause chain). */
export function toProxyError(value: unknown): ProxyError {
  if (value instanceof ProxyError) return value;
  if (value instanceof Error) return new ProxyError(value.message, "UNKNOWN", { cause: value });
  return new ProxyError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
