import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ferrymq } from "../src/client/ferrymq";
import { QOS } from "../src/client/qos";
import { TransportError } from "../src/client/errors";
import { PacketType } from "../src/codec/packet";
import { decodeUtf8 } from "../src/codec/binary";
import { FakeBroker } from "./helpers/fake-broker";

const settle = () => vi.advanceTimersByTimeAsync(0);

beforeEach(() => {
    vi.useFakeTimers();
});

afterEach(() => {
    vi.useRealTimers();
});

describe("ferrymq", () => {
    it("connects on creation", async () => {
        const broker = new FakeBroker();
        const client = ferrymq("ws://broker.test", { clientId: "c1", keepAliveSec: 0, transport: broker.factory });
        expect(client.state).toBe("connecting");

        await settle();
        expect(client.connected).toBe(true);
        expect(broker.received(PacketType.CONNECT)).toHaveLength(1);

        const seen: string[] = [];
        await client.subscribe("greet/+", (m) => {
            seen.push(decodeUtf8(m.payload));
        }, { qos: QOS.AtLeastOnce });
        await client.publish("greet/bob", "hello", { qos: QOS.AtLeastOnce });
        await settle();
        expect(seen).toEqual(["hello"]);

        await client.disconnect();
        expect(client.state).toBe("disconnected");
    });

    it("waits for connect() when autoConnect is off", async () => {
        const broker = new FakeBroker();
        const client = ferrymq("ws://broker.test", {
            clientId: "c1",
            autoConnect: false,
            keepAliveSec: 0,
            transport: broker.factory
        });

        await settle();
        expect(client.state).toBe("disconnected");
        expect(broker.transports).toEqual([]);

        await client.connect();
        expect(client.connected).toBe(true);
    });

    it("reports a failed first connection through the error event", async () => {
        const broker = new FakeBroker();
        broker.refuse = true;
        const client = ferrymq("ws://broker.test", { clientId: "c1", keepAliveSec: 0, transport: broker.factory });
        const errors: unknown[] = [];
        client.on("error", (e) => errors.push(e.error));

        await settle();

        expect(client.state).toBe("disconnected");
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(TransportError);
        expect(errors[0]).toMatchObject({ message: "connection refused" });
    });
});
