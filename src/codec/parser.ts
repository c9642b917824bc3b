import { ByteQueue } from "../util/byte-queue";
import { decodeVarintAt } from "./varint";

export type RawPacket = {
    type: number; // 1..14
    flags: number;
    body: Uint8Array;
};

/**
 * Reassembles MQTT control packets from an arbitrary chunking of the byte stream.
 */
export class MqttParser {
    private q = new ByteQueue();

    constructor(private readonly maxPacketBytes = 1024 * 1024) { }

    push(chunk: Uint8Array): RawPacket[] {
        this.q.push(chunk);
        const out: RawPacket[] = [];

        for (; ;) {
            const byte1 = this.q.peek(0);
            if (byte1 === null || this.q.length < 2) {
                break;
            }

            const rl = decodeVarintAt((i) => this.q.peek(i), 1);
            if (!rl) {
                break;
            }
            if (rl.value > this.maxPacketBytes) {
                throw new Error(`Packet too large: ${rl.value}`);
            }

            const headerBytes = 1 + rl.bytes;
            if (this.q.length < headerBytes + rl.value) {
                break;
            }

            this.q.skip(headerBytes);
            out.push({ type: byte1 >> 4, flags: byte1 & 0x0f, body: this.q.readSlice(rl.value) });
        }

        return out;
    }

    /** Drop any partial packet, e.g. after the transport was replaced. */
    reset(): void {
        this.q.clear();
    }
}
