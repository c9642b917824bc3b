import { PublishError } from "../client/errors";
import type { PendingDelivery, StoreBackend } from "./backend";

const MAX_PACKET_ID = 0xffff;

/**
 * In-flight outbound deliveries, indexed in memory and written through to a
 * {@link StoreBackend}. Also hands out packet identifiers, which SUBSCRIBE and
 * UNSUBSCRIBE share with PUBLISH.
 *
 * Index updates happen synchronously before the backend write starts, so an
 * identifier is never handed out twice even while writes are in flight.
 * Backend writes for the same identifier run in call order.
 */
export class MessageStore {
    private entries = new Map<number, PendingDelivery>();
    private reserved = new Set<number>();
    private writes = new Map<number, Promise<void>>();
    private nextId = 1;

    constructor(private readonly backend: StoreBackend) { }

    get size(): number {
        return this.entries.size;
    }

    /** Load entries persisted by an earlier process. */
    async restore(): Promise<PendingDelivery[]> {
        const stored = await this.backend.listAll();
        for (const entry of stored) {
            this.entries.set(entry.packetId, entry);
        }
        return stored;
    }

    allocate(): number {
        for (let tries = 0; tries < MAX_PACKET_ID; tries++) {
            const id = this.nextId;
            this.nextId = id >= MAX_PACKET_ID ? 1 : id + 1;
            if (!this.entries.has(id) && !this.reserved.has(id)) {
                return id;
            }
        }
        throw new PublishError("No free packet identifiers");
    }

    /** Identifier for a request that is not tracked as a delivery. */
    reserve(): number {
        const id = this.allocate();
        this.reserved.add(id);
        return id;
    }

    release(id: number): void {
        this.reserved.delete(id);
    }

    async track(entry: PendingDelivery): Promise<void> {
        this.entries.set(entry.packetId, entry);
        await this.write(entry.packetId, () => this.backend.put(entry.packetId, entry));
    }

    get(id: number): PendingDelivery | undefined {
        return this.entries.get(id);
    }

    async update(id: number, patch: Partial<Omit<PendingDelivery, "packetId">>): Promise<PendingDelivery | undefined> {
        const current = this.entries.get(id);
        if (!current) {
            return undefined;
        }
        const next = { ...current, ...patch };
        this.entries.set(id, next);
        await this.write(id, () => this.backend.put(id, next));
        return next;
    }

    async retire(id: number): Promise<void> {
        if (!this.entries.delete(id)) {
            return;
        }
        await this.write(id, () => this.backend.delete(id));
    }

    list(): PendingDelivery[] {
        return Array.from(this.entries.values());
    }

    async clear(): Promise<void> {
        const ids = Array.from(this.entries.keys());
        this.entries.clear();
        await Promise.all(ids.map((id) => this.write(id, () => this.backend.delete(id))));
    }

    private write(id: number, op: () => Promise<void>): Promise<void> {
        const previous = this.writes.get(id) ?? Promise.resolve();
        // A failed write was reported to its own caller
        const next = previous.then(op, op);
        this.writes.set(id, next);

        const forget = () => {
            if (this.writes.get(id) === next) this.writes.delete(id);
        };
        next.then(forget, forget);
        return next;
    }
}
