import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 *
 * Usage:
 * ```ts
 * interface ProxyEvents {
 *   "client:connected": { clientId: string };
 * }
 * class Proxy extends TypedEventEmitter<ProxyEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private emitter = new EventEmitter();

  constructor() {
    // Tests and the HTTP layer may attach several observers per event
    this.emitter.setMaxListeners(100);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
