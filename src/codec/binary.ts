const te = new TextEncoder();
const td = new TextDecoder();

export function u16be(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0 || n > 0xffff) {
        throw new Error(`Value out of u16 range: ${n}`);
    }
    return Uint8Array.from([(n >> 8) & 0xff, n & 0xff]);
}

export function encodeUtf8(str: string): Uint8Array {
    return te.encode(str);
}

export function decodeUtf8(buf: Uint8Array): string {
    return td.decode(buf);
}

export function encodeString(str: string): Uint8Array {
    const s = encodeUtf8(str);
    if (s.length > 0xffff) {
        throw new Error("String too long");
    }
    const out = new Uint8Array(2 + s.length);
    out.set(u16be(s.length), 0);
    out.set(s, 2);
    return out;
}

export function readU16BE(buf: Uint8Array, offset: number): number {
    const hi = buf[offset];
    const lo = buf[offset + 1];
    if (hi === undefined || lo === undefined) {
        throw new Error("Unexpected end of packet");
    }
    return (hi << 8) | lo;
}

export function readString(buf: Uint8Array, offset: number): { value: string; bytes: number } {
    const len = readU16BE(buf, offset);
    const start = offset + 2;
    const end = start + len;
    if (end > buf.length) {
        throw new Error("String out of bounds");
    }
    return { value: decodeUtf8(buf.subarray(start, end)), bytes: 2 + len };
}

export function concat(parts: Uint8Array[]): Uint8Array {
    const total = parts.reduce((n, p) => n + p.length, 0);
    const out = new Uint8Array(total);
    let o = 0;
    for (const p of parts) {
        out.set(p, o);
        o += p.length;
    }
    return out;
}
