import { EventEmitter } from "node:events";

type Listener = (...args: any[]) => void;
type EventKey<TEvents> = Extract<keyof TEvents, string>;
type EventListener<TEvents, TKey extends EventKey<TEvents>> = TEvents[TKey] extends Listener
    ? TEvents[TKey]
    : never;
type EventArgs<TEvents, TKey extends EventKey<TEvents>> = TEvents[TKey] extends Listener
    ? Parameters<TEvents[TKey]>
    : never;

/**
 * EventEmitter whose listener signatures are checked against an event map.
 * Only the methods the engine and the CLI use are narrowed.
 */
export class TypedEventEmitter<TEvents extends object> extends EventEmitter {
    on<K extends EventKey<TEvents>>(event: K, listener: EventListener<TEvents, K>): this;
    on(eventName: string | symbol, listener: Listener): this;
    on(eventName: string | symbol, listener: Listener): this {
        return super.on(eventName, listener);
    }

    once<K extends EventKey<TEvents>>(event: K, listener: EventListener<TEvents, K>): this;
    once(eventName: string | symbol, listener: Listener): this;
    once(eventName: string | symbol, listener: Listener): this {
        return super.once(eventName, listener);
    }

    off<K extends EventKey<TEvents>>(event: K, listener: EventListener<TEvents, K>): this;
    off(eventName: string | symbol, listener: Listener): this;
    off(eventName: string | symbol, listener: Listener): this {
        return super.off(eventName, listener);
    }

    emit<K extends EventKey<TEvents>>(event: K, ...args: EventArgs<TEvents, K>): boolean;
    emit(eventName: string | symbol, ...args: any[]): boolean;
    emit(eventName: string | symbol, ...args: any[]): boolean {
        // Failures also arrive through "terminal"; an unheard "error" must not throw.
        if (eventName === "error" && super.listenerCount(eventName) === 0) return false;
        return super.emit(eventName, ...args);
    }

    listenerCount<K extends EventKey<TEvents>>(event: K): number;
    listenerCount(eventName: string | symbol): number;
    listenerCount(eventName: string | symbol): number {
        return super.listenerCount(eventName);
    }
}
