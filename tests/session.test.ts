import { describe, expect, it, vi } from "vitest";
import { Session } from "../src/client/session";
import { SerialQueue } from "../src/util/serial-queue";
import type { MessageHandler } from "../src/client/types";

const queue = () => new SerialQueue(() => undefined);
const noop: MessageHandler = () => undefined;

describe("Session", () => {
    it("groups subscriptions by filter and reports when a filter empties", () => {
        const session = new Session("c1", true);
        const a = session.add("a/+", 1, noop, queue());
        const b = session.add("a/+", 0, noop, queue());

        expect(session.size).toBe(2);
        expect(session.filters()).toEqual([{ topic: "a/+", qos: 1 }]);

        expect(session.remove(a)).toBeNull();
        expect(a.active).toBe(false);
        expect(session.remove(b)).toBe("a/+");
        expect(session.has("a/+")).toBe(false);
        expect(session.remove(b)).toBeNull();
    });

    it("raises the requested QoS to the highest asked for", () => {
        const session = new Session("c1", true);
        session.add("x", 0, noop, queue());
        session.add("x", 2, noop, queue());
        expect(session.requestedQos("x")).toBe(2);
    });

    it("matches exact and wildcard filters and caps QoS at the grant", () => {
        const session = new Session("c1", true);
        const exact = session.add("s/1/temp", 2, noop, queue());
        const wild = session.add("s/+/temp", 1, noop, queue());
        session.add("other", 2, noop, queue());
        session.grant("s/1/temp", 1);

        const matches = session.match("s/1/temp", 2);
        expect(matches.map((m) => [m.subscription.id, m.qos])).toEqual([
            [exact.id, 1],
            [wild.id, 1]
        ]);
        expect(session.match("s/1/temp", 0).map((m) => m.qos)).toEqual([0, 0]);
        expect(session.match("s/2/humidity", 1)).toEqual([]);
    });

    it("returns a snapshot that later removals do not change", () => {
        const session = new Session("c1", true);
        const sub = session.add("t", 0, noop, queue());
        const snapshot = session.match("t", 0);
        session.remove(sub);
        expect(snapshot).toHaveLength(1);
        expect(session.match("t", 0)).toEqual([]);
    });

    it("removes every subscription on a filter at once", () => {
        const session = new Session("c1", true);
        const close = vi.spyOn(SerialQueue.prototype, "close");
        session.add("t", 0, noop, queue());
        session.add("t", 0, noop, queue());

        const removed = session.removeFilter("t");
        expect(removed.map((s) => s.active)).toEqual([false, false]);
        expect(close).toHaveBeenCalledTimes(2);
        expect(session.removeFilter("t")).toEqual([]);
        close.mockRestore();
    });

    it("honors the reserved-topic option", () => {
        const strict = new Session("c1", true);
        strict.add("#", 0, noop, queue());
        expect(strict.match("$SYS/x", 0)).toEqual([]);

        const open = new Session("c1", true, { excludeReserved: false });
        open.add("#", 0, noop, queue());
        expect(open.match("$SYS/x", 0)).toHaveLength(1);
    });

    it("tracks inbound QoS 2 identifiers until released", () => {
        const session = new Session("c1", true);
        expect(session.markReceived(7)).toBe(true);
        expect(session.markReceived(7)).toBe(false);
        expect(session.release(7)).toBe(true);
        expect(session.release(7)).toBe(false);
        expect(session.markReceived(7)).toBe(true);

        session.resetInbound();
        expect(session.markReceived(7)).toBe(true);
    });

    it("clears everything", () => {
        const session = new Session("c1", false);
        const sub = session.add("a/#", 0, noop, queue());
        session.markReceived(1);
        session.clear();

        expect(sub.active).toBe(false);
        expect(session.size).toBe(0);
        expect(session.markReceived(1)).toBe(true);
    });
});
