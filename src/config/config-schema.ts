import { z } from "zod";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();

const BACKEND_PROTOCOLS = new Set(["ws:", "wss:", "http:", "https:"]);

function parsed(value: string): URL | null {
  return URL.canParse(value) ? new URL(value) : null;
}

export const backendUrlSchema = z
  .string()
  .url()
  .refine(
    (value) => BACKEND_PROTOCOLS.has(parsed(value)?.protocol ?? ""),
    "must use ws:, wss:, http: or https:",
  )
  // The ws client refuses to dial a URL with a fragment
  .refine((value) => !parsed(value)?.hash, "must not contain a fragment");

export const proxyConfigSchema = z.object({
  backendUrl: backendUrlSchema,

  // Listener
  host: z.string().min(1).optional(),
  port: port.optional(),
  path: z.string().startsWith("/").optional(),
  maxPayload: z.number().int().positive().optional(),

  // Timing
  idleTimeoutMs: positiveMs.optional(),
  sweepIntervalMs: positiveMs.optional(),
  monitorIntervalMs: positiveMs.optional(),
  maxMonitorIntervalMs: positiveMs.optional(),
  dialTimeoutMs: positiveMs.optional(),
});
