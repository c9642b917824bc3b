import { publishPacket, pubrelPacket } from "../codec/packet";
import { Deferred } from "../util/deferred";
import { logger } from "../util/log";
import type { MessageStore } from "../store/message-store";
import type { PendingDelivery } from "../store/backend";
import { DeliveryFailure } from "./errors";
import type { QoS } from "./types";

const debug = logger("outbound");

export type OutboundMessage = {
    topic: string;
    payload: Uint8Array;
    qos: Exclude<QoS, 0>;
    retain: boolean;
};

export type OutboundOptions = {
    retryIntervalMs: number;
    maxRetryCount: number;
};

export type OutboundHooks = {
    send(frame: Uint8Array): Promise<void>;
    onFailure(error: DeliveryFailure): void;
};

/**
 * Sender side of the QoS 1 and QoS 2 handshakes.
 *
 * QoS 1: sent -> acknowledged (PUBACK).
 * QoS 2: sent -> received (PUBREC, answered with PUBREL) -> completed (PUBCOMP).
 *
 * Each step resends after `retryIntervalMs` (PUBLISH with DUP set, or PUBREL)
 * at most `maxRetryCount` times, then the delivery is abandoned with a
 * {@link DeliveryFailure}. Timers only run while resumed, i.e. connected.
 */
export class OutboundDeliveries {
    private waiters = new Map<number, Deferred<void>>();
    private timers = new Map<number, ReturnType<typeof setTimeout>>();
    private paused = true;

    constructor(
        private readonly store: MessageStore,
        private readonly opts: OutboundOptions,
        private readonly hooks: OutboundHooks
    ) { }

    /**
     * Track and send a message. `done` settles when the handshake completes or
     * is abandoned, and rejects if tracking the message fails.
     */
    begin(msg: OutboundMessage): { packetId: number; done: Promise<void> } {
        const packetId = this.store.allocate();
        const entry: PendingDelivery = { ...msg, packetId, state: "sent", retries: 0, lastSentAt: 0 };

        const waiter = new Deferred<void>();
        this.waiters.set(packetId, waiter);

        // The waiter may be rejected while tracking is still in progress
        const done = Promise.all([this.start(entry), waiter.promise]).then(() => undefined);
        return { packetId, done };
    }

    async onPuback(packetId: number): Promise<void> {
        const entry = this.store.get(packetId);
        if (!entry || entry.qos !== 1) {
            debug("PUBACK for unknown packet %d", packetId);
            return;
        }
        await this.finish(packetId, "acknowledged");
    }

    async onPubrec(packetId: number): Promise<void> {
        const entry = this.store.get(packetId);
        if (!entry || entry.qos !== 2) {
            debug("PUBREC for unknown packet %d", packetId);
            return;
        }

        if (entry.state === "sent") {
            const next = await this.store.update(packetId, { state: "received", retries: 0, lastSentAt: Date.now() });
            if (!next) return;
            if (!this.paused) this.schedule(packetId);
            await this.transmit(next, false);
            return;
        }

        // Our PUBREL got lost and the broker repeated its PUBREC
        await this.transmit(entry, false);
    }

    async onPubcomp(packetId: number): Promise<void> {
        const entry = this.store.get(packetId);
        if (!entry || entry.qos !== 2 || entry.state !== "received") {
            debug("PUBCOMP for unknown packet %d", packetId);
            return;
        }
        await this.finish(packetId, "completed");
    }

    /** Stop retry timers, e.g. while the connection is down. */
    pause(): void {
        this.paused = true;
        for (const timer of this.timers.values()) clearTimeout(timer);
        this.timers.clear();
    }

    /** Resend everything still tracked and restart the retry timers. */
    async resume(): Promise<void> {
        this.paused = false;
        const entries = this.store.list();
        for (const entry of entries) {
            if (entry.lastSentAt === 0) {
                await this.firstSend(entry.packetId);
                continue;
            }
            this.schedule(entry.packetId);
            await this.transmit(entry, true);
        }
    }

    /** Fail every waiting publish; the deliveries themselves stay tracked. */
    rejectWaiters(error: Error): void {
        const waiters = Array.from(this.waiters.values());
        this.waiters.clear();
        for (const w of waiters) w.reject(error);
    }

    async clear(): Promise<void> {
        this.pause();
        await this.store.clear();
    }

    private async start(entry: PendingDelivery): Promise<void> {
        try {
            await this.store.track(entry);
        } catch (err) {
            this.waiters.delete(entry.packetId);
            await this.store.retire(entry.packetId);
            throw err;
        }

        await this.firstSend(entry.packetId);
    }

    /** Stamps `lastSentAt`, which stays 0 until the PUBLISH has gone out once. */
    private async firstSend(packetId: number): Promise<void> {
        if (this.paused) return;
        const entry = await this.store.update(packetId, { lastSentAt: Date.now() });
        if (!entry) return;
        this.schedule(packetId);
        await this.transmit(entry, false);
    }

    private schedule(packetId: number): void {
        const previous = this.timers.get(packetId);
        if (previous !== undefined) clearTimeout(previous);

        this.timers.set(
            packetId,
            setTimeout(() => {
                this.timers.delete(packetId);
                this.onRetryDue(packetId).catch((err: unknown) => debug("retry of packet %d failed: %O", packetId, err));
            }, this.opts.retryIntervalMs)
        );
    }

    private async onRetryDue(packetId: number): Promise<void> {
        const entry = this.store.get(packetId);
        if (!entry || this.paused) {
            return;
        }

        if (entry.retries >= this.opts.maxRetryCount) {
            await this.abandon(entry);
            return;
        }

        const next = await this.store.update(packetId, { retries: entry.retries + 1, lastSentAt: Date.now() });
        if (!next) return;
        debug("resending packet %d (%s, retry %d)", packetId, next.state, next.retries);
        this.schedule(packetId);
        await this.transmit(next, true);
    }

    private async abandon(entry: PendingDelivery): Promise<void> {
        await this.store.retire(entry.packetId);

        const error = new DeliveryFailure(entry.packetId, entry.topic, entry.qos, entry.retries + 1);
        debug("%s", error.message);

        const waiter = this.waiters.get(entry.packetId);
        this.waiters.delete(entry.packetId);
        waiter?.reject(error);
        this.hooks.onFailure(error);
    }

    private async finish(packetId: number, state: "acknowledged" | "completed"): Promise<void> {
        const timer = this.timers.get(packetId);
        if (timer !== undefined) clearTimeout(timer);
        this.timers.delete(packetId);

        debug("packet %d %s", packetId, state);
        await this.store.update(packetId, { state });
        await this.store.retire(packetId);

        const waiter = this.waiters.get(packetId);
        this.waiters.delete(packetId);
        waiter?.resolve();
    }

    private async transmit(entry: PendingDelivery, dup: boolean): Promise<void> {
        const frame =
            entry.state === "received"
                ? pubrelPacket(entry.packetId)
                : publishPacket(entry.topic, entry.payload, {
                    qos: entry.qos,
                    retain: entry.retain,
                    dup,
                    packetId: entry.packetId
                });

        try {
            await this.hooks.send(frame);
        } catch (err) {
            // The connection owner notices the broken transport; the entry is resent on resume
            debug("send of packet %d failed: %O", entry.packetId, err);
        }
    }
}
