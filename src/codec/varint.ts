/** Largest value the four-byte Remaining Length field can carry. */
export const MAX_VARINT = 268_435_455;

export function encodeVarint(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0 || n > MAX_VARINT) {
        throw new Error("Invalid varint");
    }
    const out: number[] = [];
    let rest = n;
    do {
        const digit = rest % 128;
        rest = Math.floor(rest / 128);
        out.push(rest > 0 ? digit | 0x80 : digit);
    } while (rest > 0);
    return Uint8Array.from(out);
}

/**
 * Decode a Remaining Length varint starting at `offset`.
 * Returns `null` while more bytes are needed.
 */
export function decodeVarintAt(
    peek: (i: number) => number | null,
    offset: number
): { value: number; bytes: number } | null {
    let value = 0;

    for (let i = 0, multiplier = 1; i < 4; i++, multiplier *= 128) {
        const b = peek(offset + i);
        if (b === null) {
            return null;
        }

        value += (b & 0x7f) * multiplier;
        if ((b & 0x80) === 0) {
            return { value, bytes: i + 1 };
        }
    }

    throw new Error("Malformed Remaining Length varint");
}
