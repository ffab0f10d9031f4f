import { EventEmitter } from "node:events";

type EventName<TEvents> = keyof TEvents & string;
type Listener<TEvents, K extends EventName<TEvents>> = (payload: TEvents[K]) => void;

/**
 * node:events emitter keyed by an event map. Each event carries exactly one
 * payload; only subclasses may emit.
 *
 * ```ts
 * interface DriverEvents {
 *   "state:changed": { from: SessionStatus; to: SessionStatus };
 * }
 * class WidgetDriver extends TypedEventEmitter<DriverEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly events = new EventEmitter();

  constructor() {
    // Hosts often attach one listener per embedded widget view.
    this.events.setMaxListeners(100);
  }

  on<K extends EventName<TEvents>>(event: K, listener: Listener<TEvents, K>): this {
    this.events.on(event, listener);
    return this;
  }

  once<K extends EventName<TEvents>>(event: K, listener: Listener<TEvents, K>): this {
    this.events.once(event, listener);
    return this;
  }

  off<K extends EventName<TEvents>>(event: K, listener: Listener<TEvents, K>): this {
    this.events.off(event, listener);
    return this;
  }

  /** Resolves with the payload of the next `event`. */
  nextEvent<K extends EventName<TEvents>>(event: K): Promise<TEvents[K]> {
    return new Promise((resolve) => {
      this.events.once(event, resolve);
    });
  }

  removeAllListeners(event?: EventName<TEvents>): this {
    if (event === undefined) this.events.removeAllListeners();
    else this.events.removeAllListeners(event);
    return this;
  }

  listenerCount(event: EventName<TEvents>): number {
    return this.events.listenerCount(event);
  }

  protected emit<K extends EventName<TEvents>>(event: K, payload: TEvents[K]): boolean {
    return this.events.emit(event, payload);
  }
}
