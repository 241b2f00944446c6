import { EventEmitter } from "node:events";

/**
 * Event emitter keyed by an events map, so each event name carries its
 * payload type. Listeners run synchronously, in registration order, inside
 * the emitting call.
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Every open channel subscribes to its session transport
    this.emitter.setMaxListeners(0);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners(): this {
    this.emitter.removeAllListeners();
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }
}
