import { concat, encodeString, u16be, encodeUtf8 } from "./binary";
import { encodeVarint } from "./varint";
import type { QoS } from "../client/types";

/** MQTT 3.1.1 control packet types (high nibble of the fixed header). */
export const PacketType = {
    CONNECT: 1,
    CONNACK: 2,
    PUBLISH: 3,
    PUBACK: 4,
    PUBREC: 5,
    PUBREL: 6,
    PUBCOMP: 7,
    SUBSCRIBE: 8,
    SUBACK: 9,
    UNSUBSCRIBE: 10,
    UNSUBACK: 11,
    PINGREQ: 12,
    PINGRESP: 13,
    DISCONNECT: 14
} as const;

export const PUBLISH_DUP = 0x08;
export const PUBLISH_RETAIN = 0x01;

export type ConnectOptions = {
    clientId: string;
    cleanSession: boolean;
    keepAliveSec: number;
    username?: string;
    password?: string;
};

function packet(typeAndFlags: number, body: Uint8Array): Uint8Array {
    return concat([Uint8Array.from([typeAndFlags]), encodeVarint(body.length), body]);
}

function ackPacket(typeAndFlags: number, packetId: number): Uint8Array {
    return packet(typeAndFlags, u16be(packetId));
}

export function connectPacket(opts: ConnectOptions): Uint8Array {
    const protocolName = encodeString("MQTT");
    const protocolLevel = Uint8Array.from([0x04]); // MQTT 3.1.1

    const payloadParts: Uint8Array[] = [encodeString(opts.clientId)];

    let flags = 0;
    if (opts.cleanSession) {
        flags |= 0x02;
    }
    if (opts.username !== undefined) {
        flags |= 0x80;
        payloadParts.push(encodeString(opts.username));
    }
    if (opts.password !== undefined) {
        flags |= 0x40;
        payloadParts.push(encodeString(opts.password));
    }

    const vh = concat([protocolName, protocolLevel, Uint8Array.from([flags]), u16be(opts.keepAliveSec)]);

    return packet(0x10, concat([vh, ...payloadParts]));
}

export function pingreqPacket(): Uint8Array {
    return Uint8Array.from([0xc0, 0x00]);
}

export function disconnectPacket(): Uint8Array {
    return Uint8Array.from([0xe0, 0x00]);
}

export function subscribePacket(packetId: number, topics: ReadonlyArray<{ topic: string; qos: QoS }>): Uint8Array {
    const items = topics.map((t) => concat([encodeString(t.topic), Uint8Array.from([t.qos])]));
    return packet(0x82, concat([u16be(packetId), ...items]));
}

export function unsubscribePacket(packetId: number, topics: readonly string[]): Uint8Array {
    return packet(0xa2, concat([u16be(packetId), ...topics.map(encodeString)]));
}

export function publishPacket(
    topic: string,
    payload: Uint8Array,
    opts: { qos?: QoS; retain?: boolean; dup?: boolean; packetId?: number } = {}
): Uint8Array {
    const qos = opts.qos ?? 0;

    let flags = qos << 1;
    if (opts.dup) {
        flags |= PUBLISH_DUP;
    }
    if (opts.retain) {
        flags |= PUBLISH_RETAIN;
    }

    const parts = [encodeString(topic)];
    if (qos > 0) {
        if (opts.packetId === undefined) {
            throw new Error("PUBLISH with QoS > 0 requires a packet id");
        }
        parts.push(u16be(opts.packetId));
    }
    parts.push(payload);

    return packet(0x30 | flags, concat(parts));
}

export function pubackPacket(packetId: number): Uint8Array {
    return ackPacket(0x40, packetId);
}

export function pubrecPacket(packetId: number): Uint8Array {
    return ackPacket(0x50, packetId);
}

// PUBREL carries the reserved flag bits 0b0010
export function pubrelPacket(packetId: number): Uint8Array {
    return ackPacket(0x62, packetId);
}

export function pubcompPacket(packetId: number): Uint8Array {
    return ackPacket(0x70, packetId);
}

export function normalizePayload(payload: string | Uint8Array): Uint8Array {
    return typeof payload === "string" ? encodeUtf8(payload) : payload;
}
