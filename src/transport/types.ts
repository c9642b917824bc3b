/**
 * Byte-stream link to a broker.
 *
 * `receive()` yields chunks in arrival order; packet boundaries are not
 * preserved. It rejects with `TransportError` on I/O failure and with
 * `ConnectionClosed` at end of stream. `close()` must be idempotent: the
 * client calls it on every path that ends a connection.
 */
export interface Transport {
    open(): Promise<void>;
    send(frame: Uint8Array): Promise<void>;
    receive(): Promise<Uint8Array>;
    close(): Promise<void>;
}

export type TransportFactory = (url: string) => Transport;
