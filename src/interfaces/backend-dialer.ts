import type { MessageSocket } from "./transport.js";

/**
 * Opens the downstream session to the backend service.
 * Implementations resolve once the session is open and reject with a `DialError` otherwise.
 */
export interface BackendDialer {
  readonly address: string;
  dial(): Promise<MessageSocket>;
}
