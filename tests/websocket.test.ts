import { afterEach, beforeEach, describe, expect, it } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { WebSocketTransport } from "../src/transport/websocket";
import { ConnectionClosed, TransportError } from "../src/client/errors";

let server: WebSocketServer;
let url: string;

function stopServer(): Promise<void> {
    for (const client of server.clients) client.terminate();
    return new Promise<void>((resolve) => server.close(() => resolve()));
}

function nextPeer(): Promise<WebSocket> {
    return new Promise((resolve) => server.once("connection", (socket: WebSocket) => resolve(socket)));
}

beforeEach(async () => {
    server = new WebSocketServer({
        host: "127.0.0.1",
        port: 0,
        handleProtocols: (protocols) => (protocols.has("mqtt") ? "mqtt" : false)
    });
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));

    const address = server.address();
    if (typeof address === "string") throw new Error(`unexpected address ${address}`);
    url = `ws://127.0.0.1:${address.port}`;
});

afterEach(async () => {
    await stopServer();
});

describe("WebSocketTransport", () => {
    it("exchanges binary frames on the mqtt subprotocol", async () => {
        const transport = new WebSocketTransport(url);
        const peer = nextPeer();
        await transport.open();
        const socket = await peer;

        expect(socket.protocol).toBe("mqtt");

        const received = new Promise<{ data: unknown; isBinary: boolean }>((resolve) =>
            socket.once("message", (data, isBinary) => resolve({ data, isBinary }))
        );
        await transport.send(Uint8Array.from([0xc0, 0x00]));
        expect(await received).toEqual({ data: Buffer.from([0xc0, 0x00]), isBinary: true });

        socket.send(Uint8Array.from([0xd0, 0x00]));
        expect(await transport.receive()).toEqual(Buffer.from([0xd0, 0x00]));

        await transport.close();
    });

    it("refuses to open twice", async () => {
        const transport = new WebSocketTransport(url);
        await transport.open();

        await expect(transport.open()).rejects.toThrowError("WebSocket transport already opened");
        await transport.close();
    });

    it("ends the stream after close()", async () => {
        const transport = new WebSocketTransport(url);
        await transport.open();
        await transport.close();

        await expect(transport.receive()).rejects.toThrowError(new ConnectionClosed("WebSocket closed (code=1000)"));
        await expect(transport.send(Uint8Array.from([0xc0, 0x00]))).rejects.toThrowError("WebSocket is not open");
        await transport.close();
    });

    it("ends the stream when the server closes", async () => {
        const transport = new WebSocketTransport(url);
        const peer = nextPeer();
        await transport.open();

        (await peer).close(4000);

        const err = await transport.receive().catch((e: unknown) => e);
        expect(err).toBeInstanceOf(ConnectionClosed);
        expect(err).toMatchObject({ message: "WebSocket closed (code=4000)" });
        await transport.close();
    });

    it("fails to open when nothing listens", async () => {
        await stopServer();
        const transport = new WebSocketTransport(url);

        const err = await transport.open().catch((e: unknown) => e);
        expect(err).toBeInstanceOf(TransportError);
        expect(err).toMatchObject({ message: expect.stringMatching(/^WebSocket connection error: /) });
    });
});
