/**
 * Event map for the session proxy.
 *
 * Events flow through {@link TypedEventEmitter}; the HTTP layer and tests
 * observe them, nothing in the core depends on them.
 * @module
 */

/** Why a client session left the registry. */
export type ClientRemovalReason =
  /** The client closed its socket or the transport failed. */
  | "closed"
  /** Inactive for longer than the idle timeout. */
  | "idle"
  /** A write to the backend failed on this client's behalf. */
  | "forward_failed"
  /** No backend session could be dialed or none existed when it sent. */
  | "backend_unavailable"
  /** A backend frame could not be delivered to this client. */
  | "delivery_failed"
  | "shutdown";

/** Events emitted by {@link SessionProxy}. */
export interface ProxyEventMap {
  // ── Client events ──
  "client:connected": { clientId: string; clientCount: number };
  "client:removed": { clientId: string; reason: ClientRemovalReason; clientCount: number };

  // ── Backend events ──
  "backend:connected": { backendId: string; address: string };
  "backend:disconnected": { backendId: string; reason: string };
  "backend:dial_failed": { address: string; error: Error };

  // ── Sweep events ──
  "sweep:completed": { evicted: number; remaining: number; backendClosed: boolean };
}
