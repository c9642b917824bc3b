import { Deferred } from "./deferred";

/**
 * Single-consumer buffer between a push-style socket and a pull-style
 * `receive()`. Once failed, buffered chunks are still handed out before the
 * failure is.
 */
export class ChunkQueue {
    private chunks: Uint8Array[] = [];
    private waiter: Deferred<Uint8Array> | null = null;
    private failure: Error | null = null;

    push(chunk: Uint8Array): void {
        if (this.failure) {
            return;
        }
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            waiter.resolve(chunk);
            return;
        }
        this.chunks.push(chunk);
    }

    fail(error: Error): void {
        if (this.failure) {
            return;
        }
        this.failure = error;
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            waiter.reject(error);
        }
    }

    next(): Promise<Uint8Array> {
        const chunk = this.chunks.shift();
        if (chunk) {
            return Promise.resolve(chunk);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        if (this.waiter) {
            return Promise.reject(new Error("ChunkQueue supports a single reader"));
        }
        this.waiter = new Deferred<Uint8Array>();
        return this.waiter.promise;
    }
}
