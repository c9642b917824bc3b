import { readU16BE, readString } from "./binary";
import { PUBLISH_DUP, PUBLISH_RETAIN } from "./packet";
import { toQoS } from "../client/qos";

export type DecodedPublish = {
    topic: string;
    bytes: Uint8Array;
    retain: boolean;
    dup: boolean;
} & ({ qos: 0 } | { qos: 1 | 2; packetId: number });

export function decodeConnack(body: Uint8Array): { sessionPresent: boolean; returnCode: number } {
    const [ackFlags, returnCode] = body;
    if (ackFlags === undefined || returnCode === undefined) {
        throw new Error("Malformed CONNACK");
    }
    return { sessionPresent: (ackFlags & 0x01) === 0x01, returnCode };
}

export function decodeSuback(body: Uint8Array): { packetId: number; returnCodes: number[] } {
    if (body.length < 3) {
        throw new Error("Malformed SUBACK");
    }
    return { packetId: readU16BE(body, 0), returnCodes: Array.from(body.subarray(2)) };
}

/** PUBACK, PUBREC, PUBREL, PUBCOMP and UNSUBACK carry nothing but a packet id. */
export function decodeAck(body: Uint8Array): { packetId: number } {
    if (body.length < 2) {
        throw new Error("Malformed acknowledgment");
    }
    return { packetId: readU16BE(body, 0) };
}

export function decodePublish(flags: number, body: Uint8Array): DecodedPublish {
    const retain = (flags & PUBLISH_RETAIN) === PUBLISH_RETAIN;
    const dup = (flags & PUBLISH_DUP) === PUBLISH_DUP;
    const qos = toQoS((flags >> 1) & 0x03);
    if (qos === null) {
        throw new Error("Malformed PUBLISH (QoS 3)");
    }

    const topic = readString(body, 0);
    let offset = topic.bytes;

    if (qos === 0) {
        return { topic: topic.value, bytes: body.slice(offset), qos, retain, dup };
    }

    if (offset + 2 > body.length) {
        throw new Error("Malformed PUBLISH (missing packet id)");
    }
    const packetId = readU16BE(body, offset);
    offset += 2;

    return { topic: topic.value, bytes: body.slice(offset), qos, packetId, retain, dup };
}
