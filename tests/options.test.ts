import { describe, expect, it } from "vitest";
import { resolveOptions } from "../src/client/options";
import { OptionsError } from "../src/client/errors";
import { MemoryStoreBackend } from "../src/store/backend";

describe("resolveOptions", () => {
    it("fills in defaults", () => {
        const opts = resolveOptions({ clientId: "c1" });

        expect(opts).toMatchObject({
            clientId: "c1",
            autoConnect: true,
            cleanSession: true,
            keepAliveSec: 60,
            connectTimeoutMs: 10_000,
            retryIntervalMs: 5_000,
            maxRetryCount: 3,
            excludeReservedTopics: true,
            reconnect: { enabled: true, minDelayMs: 250, maxDelayMs: 10_000, jitterRatio: 0.2, maxAttempts: 10 },
            ws: { protocols: "mqtt" }
        });
        expect(opts.store).toBeInstanceOf(MemoryStoreBackend);
        expect(typeof opts.transport).toBe("function");
    });

    it("keeps a supplied store backend", () => {
        const store = new MemoryStoreBackend();
        expect(resolveOptions({ clientId: "c1", store }).store).toBe(store);
    });

    it("merges partial nested options", () => {
        const opts = resolveOptions({ clientId: "c1", reconnect: { maxAttempts: 0 } });
        expect(opts.reconnect).toEqual({ enabled: true, minDelayMs: 250, maxDelayMs: 10_000, jitterRatio: 0.2, maxAttempts: 0 });
    });

    it("names every invalid field", () => {
        expect(() => resolveOptions({ clientId: "", keepAliveSec: -1 })).toThrowError(OptionsError);
        expect(() => resolveOptions({ clientId: "c1", retryIntervalMs: 0 })).toThrowError(/retryIntervalMs/);
    });
});
