import WebSocket from "ws";
import type { RawData } from "ws";
import { ChunkQueue } from "../util/chunk-queue";
import { logger } from "../util/log";
import { ConnectionClosed, TransportError } from "../client/errors";
import type { Transport, TransportFactory } from "./types";

const debug = logger("ws");

function toBytes(data: RawData): Uint8Array {
    if (Array.isArray(data)) {
        return Buffer.concat(data);
    }
    if (data instanceof ArrayBuffer) {
        return new Uint8Array(data);
    }
    return data;
}

/**
 * MQTT over WebSocket (`ws` package), binary frames on the `mqtt` subprotocol.
 */
export class WebSocketTransport implements Transport {
    private socket: WebSocket | null = null;
    private inbound = new ChunkQueue();

    constructor(
        private readonly url: string,
        private readonly protocols: string | string[] = "mqtt"
    ) { }

    async open(): Promise<void> {
        if (this.socket) {
            throw new TransportError("WebSocket transport already opened");
        }

        const socket = new WebSocket(this.url, this.protocols);
        socket.binaryType = "nodebuffer";
        this.socket = socket;

        await new Promise<void>((resolve, reject) => {
            const onOpen = () => {
                cleanup();
                resolve();
            };
            const onError = (err: Error) => {
                cleanup();
                reject(new TransportError(`WebSocket connection error: ${err.message}`, { cause: err }));
            };
            const onClose = () => {
                cleanup();
                reject(new TransportError("WebSocket closed while opening"));
            };
            const cleanup = () => {
                socket.off("open", onOpen);
                socket.off("error", onError);
                socket.off("close", onClose);
            };
            socket.on("open", onOpen);
            socket.on("error", onError);
            socket.on("close", onClose);
        });

        debug("open %s", this.url);

        socket.on("message", (data: RawData) => this.inbound.push(toBytes(data)));
        socket.on("error", (err: Error) => {
            debug("error %s: %s", this.url, err.message);
            this.inbound.fail(new TransportError(err.message, { cause: err }));
        });
        socket.on("close", (code: number) => {
            debug("closed %s (code=%d)", this.url, code);
            this.inbound.fail(new ConnectionClosed(`WebSocket closed (code=${code})`));
        });
    }

    send(frame: Uint8Array): Promise<void> {
        const socket = this.socket;
        if (!socket || socket.readyState !== WebSocket.OPEN) {
            return Promise.reject(new TransportError("WebSocket is not open"));
        }

        return new Promise<void>((resolve, reject) => {
            socket.send(frame, { binary: true }, (err) => {
                if (err) {
                    reject(new TransportError(err.message, { cause: err }));
                } else {
                    resolve();
                }
            });
        });
    }

    receive(): Promise<Uint8Array> {
        return this.inbound.next();
    }

    async close(): Promise<void> {
        const socket = this.socket;
        if (!socket || socket.readyState === WebSocket.CLOSED) {
            this.inbound.fail(new ConnectionClosed("WebSocket closed"));
            return;
        }

        const closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));
        if (socket.readyState !== WebSocket.CLOSING) {
            socket.close(1000);
        }
        await closed;
    }
}

export function webSocketTransport(protocols: string | string[] = "mqtt"): TransportFactory {
    return (url) => new WebSocketTransport(url, protocols);
}
