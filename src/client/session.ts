import { isExactFilter, matchTopic } from "../util/topic-match";
import type { MatchOptions } from "../util/topic-match";
import type { SerialQueue } from "../util/serial-queue";
import { minQoS } from "./qos";
import type { MessageHandler, QoS } from "./types";

export type Subscription = {
    readonly id: number;
    readonly pattern: string;
    readonly handler: MessageHandler;
    /** Serializes deliveries to this subscription's handler. */
    readonly queue: SerialQueue;
    active: boolean;
};

export type SubscriptionMatch = {
    subscription: Subscription;
    qos: QoS;
};

type FilterBucket = {
    filter: string;
    requestedQos: QoS;
    grantedQos: QoS;
    entries: Subscription[];
};

/**
 * Per-client state: subscriptions grouped by filter, plus the identifiers of
 * inbound QoS 2 messages that were received but not yet released.
 */
export class Session {
    // Exact filters are looked up directly; wildcard filters are scanned.
    private exact = new Map<string, FilterBucket>();
    private wildcard: FilterBucket[] = [];
    private inbound = new Set<number>();
    private nextSubId = 1;

    constructor(
        readonly clientId: string,
        readonly clean: boolean,
        private readonly matchOptions: MatchOptions = {}
    ) { }

    get size(): number {
        let n = 0;
        for (const b of this.buckets()) n += b.entries.length;
        return n;
    }

    add(pattern: string, qos: QoS, handler: MessageHandler, queue: SerialQueue): Subscription {
        let bucket = this.bucket(pattern);
        if (!bucket) {
            // Until the broker answers, assume it grants what was asked for
            bucket = { filter: pattern, requestedQos: qos, grantedQos: qos, entries: [] };
            if (isExactFilter(pattern)) this.exact.set(pattern, bucket);
            else this.wildcard.push(bucket);
        } else if (qos > bucket.requestedQos) {
            bucket.requestedQos = qos;
        }

        const subscription: Subscription = { id: this.nextSubId++, pattern, handler, queue, active: true };
        bucket.entries.push(subscription);
        return subscription;
    }

    /**
     * Remove one subscription. Returns its filter when no subscription is left
     * on it, i.e. when the broker should be unsubscribed.
     */
    remove(subscription: Subscription): string | null {
        const bucket = this.bucket(subscription.pattern);
        subscription.active = false;
        subscription.queue.close();
        if (!bucket) {
            return null;
        }

        bucket.entries = bucket.entries.filter((e) => e.id !== subscription.id);
        if (bucket.entries.length > 0) {
            return null;
        }

        this.dropBucket(bucket);
        return bucket.filter;
    }

    removeFilter(filter: string): Subscription[] {
        const bucket = this.bucket(filter);
        if (!bucket) {
            return [];
        }
        for (const e of bucket.entries) {
            e.active = false;
            e.queue.close();
        }
        this.dropBucket(bucket);
        return bucket.entries;
    }

    has(filter: string): boolean {
        return this.bucket(filter) !== undefined;
    }

    grant(filter: string, qos: QoS): void {
        const bucket = this.bucket(filter);
        if (bucket) {
            bucket.grantedQos = qos;
        }
    }

    requestedQos(filter: string): QoS | undefined {
        return this.bucket(filter)?.requestedQos;
    }

    /**
     * Every active subscription whose filter matches `topic`, with the QoS the
     * message is delivered at. The array is a snapshot.
     */
    match(topic: string, messageQos: QoS): SubscriptionMatch[] {
        const out: SubscriptionMatch[] = [];

        const collect = (bucket: FilterBucket) => {
            const qos = minQoS(bucket.grantedQos, messageQos);
            for (const subscription of bucket.entries) {
                if (subscription.active) out.push({ subscription, qos });
            }
        };

        const exactBucket = this.exact.get(topic);
        if (exactBucket && matchTopic(exactBucket.filter, topic, this.matchOptions)) {
            collect(exactBucket);
        }
        for (const b of this.wildcard) {
            if (matchTopic(b.filter, topic, this.matchOptions)) collect(b);
        }
        return out;
    }

    filters(): Array<{ topic: string; qos: QoS }> {
        return this.buckets().map((b) => ({ topic: b.filter, qos: b.requestedQos }));
    }

    /** Returns `true` the first time an inbound QoS 2 identifier is seen. */
    markReceived(packetId: number): boolean {
        if (this.inbound.has(packetId)) {
            return false;
        }
        this.inbound.add(packetId);
        return true;
    }

    release(packetId: number): boolean {
        return this.inbound.delete(packetId);
    }

    resetInbound(): void {
        this.inbound.clear();
    }

    clear(): void {
        for (const b of this.buckets()) {
            for (const e of b.entries) {
                e.active = false;
                e.queue.close();
            }
        }
        this.exact.clear();
        this.wildcard = [];
        this.inbound.clear();
    }

    private buckets(): FilterBucket[] {
        return [...this.exact.values(), ...this.wildcard];
    }

    private bucket(filter: string): FilterBucket | undefined {
        return isExactFilter(filter) ? this.exact.get(filter) : this.wildcard.find((b) => b.filter === filter);
    }

    private dropBucket(bucket: FilterBucket): void {
        if (isExactFilter(bucket.filter)) this.exact.delete(bucket.filter);
        else this.wildcard = this.wildcard.filter((b) => b !== bucket);
    }
}
