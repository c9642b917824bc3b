type Listener<T> = (e: T) => void;

type ListenerTable<TEvents> = {
    [K in keyof TEvents]?: Set<Listener<TEvents[K]>>;
};

/**
 * Minimal typed event emitter. A throwing listener never stops the others;
 * its error goes to `onListenerError`.
 */
export class TypedEvents<TEvents extends object> {
    private listeners: ListenerTable<TEvents> = {};

    constructor(private readonly onListenerError: (error: unknown, event: keyof TEvents) => void) { }

    on<K extends keyof TEvents>(event: K, fn: Listener<TEvents[K]>): () => void {
        const set: Set<Listener<TEvents[K]>> = this.listeners[event] ?? new Set<Listener<TEvents[K]>>();
        set.add(fn);
        this.listeners[event] = set;
        return () => this.off(event, fn);
    }

    off<K extends keyof TEvents>(event: K, fn: Listener<TEvents[K]>): void {
        this.listeners[event]?.delete(fn);
    }

    emit<K extends keyof TEvents>(event: K, payload: TEvents[K]): void {
        const set = this.listeners[event];
        if (!set) {
            return;
        }

        for (const fn of Array.from(set)) {
            try {
                fn(payload);
            } catch (err) {
                this.onListenerError(err, event);
            }
        }
    }
}
