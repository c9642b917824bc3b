import { withDeadline } from "./deferred";
import { TimeoutError } from "../client/errors";

export type Task = () => void | Promise<void>;

/**
 * A task queue where at most one task is active at a time. Tasks run in
 * push order; a failing or timed-out task is reported and the queue moves on.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;
    private closed = false;

    /**
     * @param timeoutMs how long one task may hold the queue; 0 waits forever
     */
    constructor(
        private readonly onError: (error: unknown) => void,
        private readonly timeoutMs = 0
    ) { }

    get size(): number {
        return this.pending;
    }

    push(task: Task): void {
        if (this.closed) {
            return;
        }
        this.pending++;
        this.tail = this.tail.then(() => this.runTask(task));
    }

    /** Resolves once every task pushed so far has settled. */
    idle(): Promise<void> {
        return this.tail;
    }

    /** Refuse new tasks; queued ones still run. */
    close(): void {
        this.closed = true;
    }

    private async runTask(task: Task): Promise<void> {
        try {
            const result = task();
            if (result instanceof Promise) {
                await withDeadline(result, {
                    timeoutMs: this.timeoutMs,
                    onTimeout: () => new TimeoutError("message handler", this.timeoutMs)
                });
            }
        } catch (err) {
            this.onError(err);
        } finally {
            this.pending--;
        }
    }
}
