import type { QoS } from "../client/types";

export type DeliveryState = "sent" | "acknowledged" | "received" | "completed";

/** One outbound QoS 1/2 message that has not finished its handshake. */
export type PendingDelivery = {
    packetId: number;
    topic: string;
    payload: Uint8Array;
    qos: Exclude<QoS, 0>;
    retain: boolean;
    state: DeliveryState;
    /** Resends within the current handshake step. */
    retries: number;
    /** 0 until the PUBLISH was first sent. */
    lastSentAt: number;
};

/**
 * Persistence for pending deliveries. A durable backend lets a non-clean
 * session pick up unfinished deliveries after a process restart.
 */
export interface StoreBackend {
    put(id: number, entry: PendingDelivery): Promise<void>;
    get(id: number): Promise<PendingDelivery | undefined>;
    delete(id: number): Promise<void>;
    listAll(): Promise<PendingDelivery[]>;
}

export class MemoryStoreBackend implements StoreBackend {
    private entries = new Map<number, PendingDelivery>();

    async put(id: number, entry: PendingDelivery): Promise<void> {
        this.entries.set(id, { ...entry });
    }

    async get(id: number): Promise<PendingDelivery | undefined> {
        const entry = this.entries.get(id);
        return entry && { ...entry };
    }

    async delete(id: number): Promise<void> {
        this.entries.delete(id);
    }

    async listAll(): Promise<PendingDelivery[]> {
        return Array.from(this.entries.values(), (e) => ({ ...e }));
    }
}
