import { describe, expect, it, vi } from "vitest";
import { MessageStore } from "../src/store/message-store";
import { MemoryStoreBackend } from "../src/store/backend";
import type { PendingDelivery } from "../src/store/backend";
import { Deferred } from "../src/util/deferred";

const delivery = (packetId: number, overrides: Partial<PendingDelivery> = {}): PendingDelivery => ({
    packetId,
    topic: "t",
    payload: Uint8Array.from([1, 2, 3]),
    qos: 1,
    retain: false,
    state: "sent",
    retries: 0,
    lastSentAt: 0,
    ...overrides
});

describe("MessageStore", () => {
    it("allocates identifiers that are neither tracked nor reserved", async () => {
        const store = new MessageStore(new MemoryStoreBackend());

        expect(store.allocate()).toBe(1);
        await store.track(delivery(2));
        expect(store.reserve()).toBe(3);
        expect(store.allocate()).toBe(4);

        store.release(3);
        await store.retire(2);
        expect(store.size).toBe(0);
    });

    it("wraps around after 65535 and skips identifiers in use", async () => {
        const store = new MessageStore(new MemoryStoreBackend());
        await store.track(delivery(1));
        for (let i = 0; i < 65534; i++) store.allocate();

        expect(store.allocate()).toBe(2);
    });

    it("fails once every identifier is taken", () => {
        const store = new MessageStore(new MemoryStoreBackend());
        for (let i = 0; i < 65535; i++) store.reserve();
        expect(() => store.allocate()).toThrowError("No free packet identifiers");
    });

    it("writes entries through to the backend", async () => {
        const backend = new MemoryStoreBackend();
        const put = vi.spyOn(backend, "put");
        const store = new MessageStore(backend);

        await store.track(delivery(5));
        const next = await store.update(5, { state: "received", retries: 1 });
        expect(next).toMatchObject({ packetId: 5, state: "received", retries: 1 });
        expect(put).toHaveBeenCalledTimes(2);
        expect(await backend.get(5)).toMatchObject({ state: "received" });

        expect(await store.update(6, { retries: 1 })).toBeUndefined();

        await store.retire(5);
        expect(await backend.listAll()).toEqual([]);
    });

    it("restores entries persisted by an earlier instance", async () => {
        const backend = new MemoryStoreBackend();
        await backend.put(9, delivery(9, { qos: 2, state: "received" }));

        const store = new MessageStore(backend);
        const restored = await store.restore();

        expect(restored.map((d) => d.packetId)).toEqual([9]);
        expect(store.get(9)).toMatchObject({ qos: 2, state: "received" });
        expect(store.allocate()).toBe(1);
    });

    it("clears the index and the backend", async () => {
        const backend = new MemoryStoreBackend();
        const store = new MessageStore(backend);
        await store.track(delivery(1));
        await store.track(delivery(2));

        await store.clear();
        expect(store.list()).toEqual([]);
        expect(await backend.listAll()).toEqual([]);
    });

    it("runs a delete queued behind a slow put for the same identifier", async () => {
        const backend = new MemoryStoreBackend();
        const gate = new Deferred<void>();
        const put = backend.put.bind(backend);
        vi.spyOn(backend, "put").mockImplementation(async (id, entry) => {
            await gate.promise;
            await put(id, entry);
        });
        const store = new MessageStore(backend);

        const tracking = store.track(delivery(1));
        const clearing = store.clear();
        gate.resolve();
        await Promise.all([tracking, clearing]);

        expect(store.get(1)).toBeUndefined();
        expect(await backend.listAll()).toEqual([]);
    });
});

describe("MemoryStoreBackend", () => {
    it("hands out copies", async () => {
        const backend = new MemoryStoreBackend();
        const entry = delivery(1);
        await backend.put(1, entry);
        entry.retries = 99;

        const stored = await backend.get(1);
        expect(stored?.retries).toBe(0);
    });
});
