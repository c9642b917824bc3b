export class Deferred<T> {
    readonly promise: Promise<T>;
    readonly resolve: (value: T) => void;
    readonly reject: (reason: unknown) => void;

    constructor() {
        let resolve: (value: T) => void = () => undefined;
        let reject: (reason: unknown) => void = () => undefined;
        this.promise = new Promise<T>((res, rej) => {
            resolve = res;
            reject = rej;
        });
        this.resolve = resolve;
        this.reject = reject;
    }
}

export type Deadline = {
    /** 0 or absent means no timeout. */
    timeoutMs?: number;
    signal?: AbortSignal;
    onTimeout: () => Error;
};

/**
 * Race `promise` against a timeout and an abort signal. The underlying
 * operation is not cancelled; only the wait is.
 */
export function withDeadline<T>(promise: Promise<T>, deadline: Deadline): Promise<T> {
    const { timeoutMs = 0, signal } = deadline;
    if (timeoutMs <= 0 && !signal) {
        return promise;
    }

    return new Promise<T>((resolve, reject) => {
        let timer: ReturnType<typeof setTimeout> | undefined;

        const cleanup = () => {
            if (timer !== undefined) {
                clearTimeout(timer);
                timer = undefined;
            }
            signal?.removeEventListener("abort", onAbort);
        };
        const onAbort = () => {
            cleanup();
            reject(signal?.reason);
        };

        promise.then(
            (value) => {
                cleanup();
                resolve(value);
            },
            (err: unknown) => {
                cleanup();
                reject(err);
            }
        );

        if (signal?.aborted) {
            onAbort();
            return;
        }
        signal?.addEventListener("abort", onAbort, { once: true });

        if (timeoutMs > 0) {
            timer = setTimeout(() => {
                cleanup();
                reject(deadline.onTimeout());
            }, timeoutMs);
        }
    });
}
