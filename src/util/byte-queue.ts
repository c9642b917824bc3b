/**
 * FIFO of received chunks that can be inspected and consumed byte-wise
 * without first concatenating everything into one buffer.
 */
export class ByteQueue {
    private chunks: Uint8Array[] = [];
    private headOffset = 0;
    private size = 0;

    get length(): number {
        return this.size;
    }

    push(chunk: Uint8Array): void {
        if (chunk.length === 0) {
            return;
        }
        this.chunks.push(chunk);
        this.size += chunk.length;
    }

    peek(i: number): number | null {
        if (i < 0 || i >= this.size) {
            return null;
        }

        let idx = i + this.headOffset;
        for (const chunk of this.chunks) {
            if (idx < chunk.length) {
                return chunk[idx] ?? null;
            }
            idx -= chunk.length;
        }
        return null;
    }

    readSlice(count: number): Uint8Array {
        const out = new Uint8Array(count);
        this.consume(count, (part, at) => out.set(part, at));
        return out;
    }

    skip(count: number): void {
        this.consume(count);
    }

    clear(): void {
        this.chunks = [];
        this.headOffset = 0;
        this.size = 0;
    }

    private consume(count: number, sink?: (part: Uint8Array, at: number) => void): void {
        if (count > this.size) {
            throw new Error("ByteQueue underflow");
        }

        let done = 0;
        while (done < count) {
            const head = this.chunks[0];
            if (head === undefined) {
                throw new Error("ByteQueue underflow");
            }

            const take = Math.min(head.length - this.headOffset, count - done);
            sink?.(head.subarray(this.headOffset, this.headOffset + take), done);

            done += take;
            this.headOffset += take;
            this.size -= take;

            if (this.headOffset >= head.length) {
                this.chunks.shift();
                this.headOffset = 0;
            }
        }
    }
}
