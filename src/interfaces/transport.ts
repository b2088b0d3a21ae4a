/** Payload of a single WebSocket message, forwarded without inspection. */
export interface MessageFrame {
  data: Buffer;
  /** True for binary frames, false for text frames. */
  binary: boolean;
}

/**
 * Runtime-agnostic message socket. Only the methods the proxy actually uses.
 *
 * `send` resolves once the frame has been handed to the transport and rejects
 * when the socket is no longer writable.
 */
export interface MessageSocket {
  send(frame: MessageFrame): Promise<void>;
  close(code?: number, reason?: string): void;
  readonly isOpen: boolean;
  on(event: "message", handler: (frame: MessageFrame) => void): void;
  on(event: "close", handler: (code: number, reason: string) => void): void;
  on(event: "error", handler: (err: Error) => void): void;
}
