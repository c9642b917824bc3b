import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SerialQueue } from "../src/util/serial-queue";
import { TimeoutError } from "../src/client/errors";
import { Deferred, withDeadline } from "../src/util/deferred";

beforeEach(() => {
    vi.useFakeTimers();
});

afterEach(() => {
    vi.useRealTimers();
});

describe("SerialQueue", () => {
    it("runs one task at a time in push order", async () => {
        const q = new SerialQueue(() => undefined);
        const log: string[] = [];
        const gate = new Deferred<void>();

        q.push(async () => {
            log.push("a:start");
            await gate.promise;
            log.push("a:end");
        });
        q.push(() => {
            log.push("b");
        });

        await vi.advanceTimersByTimeAsync(0);
        expect(log).toEqual(["a:start"]);
        expect(q.size).toBe(2);

        gate.resolve();
        await q.idle();
        expect(log).toEqual(["a:start", "a:end", "b"]);
        expect(q.size).toBe(0);
    });

    it("reports a failing task and moves on", async () => {
        const onError = vi.fn();
        const q = new SerialQueue(onError);
        const ran = vi.fn();

        q.push(() => {
            throw new Error("boom");
        });
        q.push(ran);
        await q.idle();

        expect(onError).toHaveBeenCalledWith(new Error("boom"));
        expect(ran).toHaveBeenCalledTimes(1);
    });

    it("gives up on a task that outlives the timeout", async () => {
        const errors: unknown[] = [];
        const q = new SerialQueue((e) => errors.push(e), 100);
        const ran = vi.fn();

        q.push(() => new Promise<void>(() => undefined));
        q.push(ran);

        await vi.advanceTimersByTimeAsync(100);
        await q.idle();

        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(TimeoutError);
        expect(ran).toHaveBeenCalledTimes(1);
    });

    it("ignores tasks pushed after close", async () => {
        const q = new SerialQueue(() => undefined);
        const ran = vi.fn();
        q.close();
        q.push(ran);
        await q.idle();
        expect(ran).not.toHaveBeenCalled();
    });
});

describe("withDeadline", () => {
    it("passes the value through when there is no deadline", async () => {
        await expect(withDeadline(Promise.resolve(3), { onTimeout: () => new Error("late") })).resolves.toBe(3);
    });

    it("rejects with the timeout error", async () => {
        const pending = new Deferred<number>();
        const result = withDeadline(pending.promise, { timeoutMs: 50, onTimeout: () => new Error("late") });
        const assertion = expect(result).rejects.toThrowError("late");
        await vi.advanceTimersByTimeAsync(50);
        await assertion;
    });

    it("rejects with the abort reason", async () => {
        const controller = new AbortController();
        const result = withDeadline(new Deferred<number>().promise, {
            signal: controller.signal,
            onTimeout: () => new Error("late")
        });
        controller.abort(new Error("stop"));
        await expect(result).rejects.toThrowError("stop");
    });
});
