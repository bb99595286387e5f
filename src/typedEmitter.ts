import { EventEmitter } from "node:events";

type Payload<T> = [T] extends [void] ? [] : [T];
type Handler<T> = (...payload: Payload<T>) => void;

/**
 * Event hub whose names and payloads are fixed by `Events`; a `void` payload
 * is emitted with no argument. An unhandled "error" throws, as with
 * EventEmitter.
 */
export class TypedEventEmitter<Events extends { [K in keyof Events]: unknown }> {
  private readonly hub = new EventEmitter();

  on<K extends keyof Events & string>(event: K, handler: Handler<Events[K]>): this {
    this.hub.on(event, handler);
    return this;
  }

  once<K extends keyof Events & string>(event: K, handler: Handler<Events[K]>): this {
    this.hub.once(event, handler);
    return this;
  }

  off<K extends keyof Events & string>(event: K, handler: Handler<Events[K]>): this {
    this.hub.off(event, handler);
    return this;
  }

  emit<K extends keyof Events & string>(event: K, ...payload: Payload<Events[K]>): boolean {
    return this.hub.emit(event, ...payload);
  }
}
