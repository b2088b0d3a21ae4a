import { EventEmitter } from "node:events";
import { type RawData, WebSocket } from "ws";
import { ForwardError } from "../errors.js";
import type { MessageFrame, MessageSocket } from "../interfaces/transport.js";

type SocketListener =
  | ((frame: MessageFrame) => void)
  | ((code: number, reason: string) => void)
  | ((err: Error) => void);

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export interface WsMessageSocketOptions {
  /**
   * Bytes held before a reader attaches. Past this the socket is closed with
   * 1009 and the held frames are dropped (default: 1MB).
   */
  maxHeldBytes?: number;
}

/**
 * MessageSocket over a `ws` WebSocket. Frames keep their text/binary type and
 * their bytes are never decoded. Frames that arrive before the first "message"
 * listener is attached are held and replayed to it.
 */
export class WsMessageSocket implements MessageSocket {
  private events = new EventEmitter();
  private held: MessageFrame[] | null = [];
  private heldBytes = 0;
  private overflowed = false;
  private readonly maxHeldBytes: number;

  constructor(
    private readonly ws: WebSocket,
    options: WsMessageSocketOptions = {},
  ) {
    this.maxHeldBytes = options.maxHeldBytes ?? 1_048_576;
    ws.on("message", (data: RawData, isBinary: boolean) => {
      const frame: MessageFrame = { data: toBuffer(data), binary: isBinary };
      if (!this.held) {
        this.events.emit("message", frame);
        return;
      }
      if (this.overflowed) return;
      this.heldBytes += frame.data.length;
      if (this.heldBytes > this.maxHeldBytes) {
        this.overflowed = true;
        this.held = [];
        this.heldBytes = 0;
        this.close(1009, "Too much data before session start");
        return;
      }
      this.held.push(frame);
    });
    ws.on("close", (code: number, reason: Buffer) => {
      this.events.emit("close", code, reason.toString("utf-8"));
    });
    ws.on("error", (err: Error) => {
      // An unobserved "error" on a plain EventEmitter throws
      if (this.events.listenerCount("error") > 0) this.events.emit("error", err);
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  on(event: "message", handler: (frame: MessageFrame) => void): void;
  on(event: "close", handler: (code: number, reason: string) => void): void;
  on(event: "error", handler: (err: Error) => void): void;
  on(event: string, handler: SocketListener): void {
    this.events.on(event, handler);
    if (event !== "message" || !this.held) return;
    const held = this.held;
    this.held = null;
    this.heldBytes = 0;
    for (const frame of held) this.events.emit("message", frame);
  }

  send(frame: MessageFrame): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new ForwardError(`WebSocket is not open (readyState ${this.ws.readyState})`));
        return;
      }
      this.ws.send(frame.data, { binary: frame.binary }, (err) => {
        if (err) reject(new ForwardError(err.message, { cause: err }));
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    this.ws.close(code, reason);
  }
}
