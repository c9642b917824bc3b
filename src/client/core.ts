import { MqttParser } from "../codec/parser";
import type { RawPacket } from "../codec/parser";
import { decodeAck, decodeConnack, decodePublish, decodeSuback } from "../codec/decoder";
import type { DecodedPublish } from "../codec/decoder";
import {
    PacketType,
    connectPacket,
    disconnectPacket,
    normalizePayload,
    pingreqPacket,
    pubackPacket,
    pubcompPacket,
    publishPacket,
    pubrecPacket,
    subscribePacket,
    unsubscribePacket
} from "../codec/packet";
import { validateFilter, validateTopicName } from "../util/topic-match";
import { Deferred, withDeadline } from "../util/deferred";
import { SerialQueue } from "../util/serial-queue";
import { TypedEvents } from "../util/typed-event";
import { logger } from "../util/log";
import { MessageStore } from "../store/message-store";
import type { Transport } from "../transport/types";
import {
    ConnectionClosed,
    ConnectionError,
    HandlerError,
    PublishError,
    SubscriptionError,
    TimeoutError,
    asTransportError,
    connackError
} from "./errors";
import { OutboundDeliveries } from "./outbound";
import { Session } from "./session";
import type { Subscription } from "./session";
import { toQoS } from "./qos";
import type { ResolvedFerryOptions } from "./options";
import type {
    ClientEventMap,
    ConnectionState,
    DisconnectReason,
    IncomingMessage,
    MessageHandler,
    PublishOptions,
    QoS,
    SubscribeOptions,
    SubscriptionHandle,
    SubscriptionResult,
    TopicList,
    TopicRequest
} from "./types";

const debug = logger("core");

const now = () => Date.now();

type Connack = { sessionPresent: boolean; returnCode: number };

type PendingRequest<T> = {
    frame: Uint8Array;
    deferred: Deferred<T>;
};

type OutFrame = {
    bytes: Uint8Array;
    deferred: Deferred<void>;
};

type AttemptMode = "connecting" | "reconnecting";

function backoff(attempt: number, min: number, max: number, jitterRatio: number): number {
    const base = Math.min(max, min * Math.pow(2, Math.max(0, attempt)));
    const jitter = base * jitterRatio * (Math.random() * 2 - 1);
    return Math.max(0, Math.floor(base + jitter));
}

function isTopicArray(topics: TopicList): topics is ReadonlyArray<string | TopicRequest> {
    return Array.isArray(topics);
}

function normalizeTopics(topics: TopicList, defaultQos: QoS): Array<{ pattern: string; qos: QoS }> {
    const list = isTopicArray(topics) ? topics : [topics];
    return list.map((t) => (typeof t === "string" ? { pattern: t, qos: defaultQos } : { pattern: t.pattern, qos: t.qos ?? defaultQos }));
}

/**
 * The client engine: owns one transport at a time, runs the inbound read loop,
 * drives the QoS handshakes and reconnects after transport failures.
 */
export class FerryCore {
    private transport: Transport | null = null;
    private currentState: ConnectionState = "disconnected";
    private readonly parser: MqttParser;

    private readonly events: TypedEvents<ClientEventMap>;
    private readonly session: Session;
    private readonly store: MessageStore;
    private readonly outbound: OutboundDeliveries;

    private connecting: Promise<void> | null = null;
    private connack: Deferred<Connack> | null = null;
    private restored = false;

    private lastActivityAt = 0;
    private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
    private pingOutstanding = false;
    private pingTimeoutTimer: ReturnType<typeof setTimeout> | null = null;

    private reconnectAttempt = 0;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

    // SUBSCRIBE / UNSUBSCRIBE awaiting their ack, resent after a reconnect
    private pendingSub = new Map<number, PendingRequest<number[]>>();
    private pendingUnsub = new Map<number, PendingRequest<void>>();

    // Outgoing queue
    private outQ: OutFrame[] = [];
    private outBytes = 0;
    private flushing = false;

    constructor(private readonly url: string, private readonly opts: ResolvedFerryOptions) {
        this.parser = new MqttParser(opts.maxPacketBytes);
        this.events = new TypedEvents<ClientEventMap>((err, event) => debug("listener for %s threw: %O", event, err));
        this.session = new Session(opts.clientId, opts.cleanSession, { excludeReserved: opts.excludeReservedTopics });
        this.store = new MessageStore(opts.store);
        this.outbound = new OutboundDeliveries(
            this.store,
            { retryIntervalMs: opts.retryIntervalMs, maxRetryCount: opts.maxRetryCount },
            {
                send: (frame) => this.send(frame),
                onFailure: (error) => this.emit("deliveryFailure", { error })
            }
        );
    }

    // ----- Public state -----

    get connected(): boolean {
        return this.currentState === "connected";
    }

    get state(): ConnectionState {
        return this.currentState;
    }

    on<K extends keyof ClientEventMap>(event: K, handler: (e: ClientEventMap[K]) => void): () => void {
        return this.events.on(event, handler);
    }

    // ----- Connect / Disconnect -----

    connect(): Promise<void> {
        switch (this.currentState) {
            case "connected":
                return Promise.resolve();
            case "disconnecting":
                return Promise.reject(new ConnectionClosed("Disconnect in progress"));
            case "reconnecting":
                if (this.connecting) return this.connecting;
                // Skip the remaining backoff delay
                this.clearReconnect();
                return this.runAttempt("reconnecting").catch((err: unknown) => {
                    if (this.currentState === "reconnecting") this.scheduleReconnect(err);
                    throw err;
                });
            default:
                return this.connecting ?? this.runAttempt("connecting");
        }
    }

    async disconnect(): Promise<void> {
        if (this.currentState === "disconnected" || this.currentState === "disconnecting") return;

        const transport = this.transport;
        const wasConnected = this.currentState === "connected";

        this.setState("disconnecting");
        this.transport = null;
        this.clearReconnect();
        this.stopKeepAlive();
        this.outbound.pause();

        const closed = new ConnectionClosed("Disconnected");
        this.connack?.reject(closed);
        this.failWaiters(closed);

        try {
            if (wasConnected && transport) {
                await transport.send(disconnectPacket()).catch((err: unknown) => debug("DISCONNECT not sent: %O", err));
            }
        } finally {
            if (transport) await this.closeTransport(transport);
            if (this.opts.cleanSession) await this.discardSession();
            this.setState("disconnected");
            this.emit("disconnect", { reason: "requested" });
        }
    }

    // ----- Publish -----

    async publish(topic: string, payload: string | Uint8Array, opts: PublishOptions = {}): Promise<void> {
        const invalid = validateTopicName(topic);
        if (invalid) {
            throw new PublishError(`Invalid topic "${topic}": ${invalid}`);
        }
        opts.signal?.throwIfAborted();

        const qos = opts.qos ?? 0;
        const retain = opts.retain ?? false;
        const bytes = normalizePayload(payload);
        const timeoutMs = opts.timeoutMs ?? 0;
        const deadline = {
            timeoutMs,
            signal: opts.signal,
            onTimeout: () => new TimeoutError(`publish to "${topic}"`, timeoutMs)
        };

        await this.whenOnline();

        if (qos === 0) {
            if (!this.connected) {
                throw new ConnectionClosed("Not connected");
            }
            await withDeadline(this.send(publishPacket(topic, bytes, { qos, retain })), deadline);
            return;
        }

        const { done } = this.outbound.begin({ topic, payload: bytes, qos, retain });
        await withDeadline(done, deadline);
    }

    publishJson(topic: string, value: unknown, opts?: PublishOptions): Promise<void> {
        return this.publish(topic, JSON.stringify(value), opts);
    }

    // ----- Subscribe -----

    async subscribe(topics: TopicList, handler: MessageHandler, opts: SubscribeOptions = {}): Promise<SubscriptionHandle> {
        const requests = normalizeTopics(topics, opts.qos ?? 0);
        if (requests.length === 0) {
            throw new SubscriptionError("No topic filters given", []);
        }

        const problems = requests.map((r) => validateFilter(r.pattern));
        if (problems.some((p) => p !== null)) {
            const results = requests.map((r) => ({ pattern: r.pattern, requestedQos: r.qos, grantedQos: null, returnCode: 0x80 }));
            const reasons = requests.flatMap((r, i) => (problems[i] ? [`"${r.pattern}": ${problems[i]}`] : []));
            throw new SubscriptionError(`Malformed topic filter ${reasons.join(", ")}`, results);
        }

        await this.whenOnline();

        const subs = requests.map((r) => this.session.add(r.pattern, r.qos, handler, this.createQueue(r.pattern)));
        const wire = requests.map((r) => ({ topic: r.pattern, qos: this.session.requestedQos(r.pattern) ?? r.qos }));

        let codes: number[];
        try {
            codes = await this.request(this.pendingSub, (id) => subscribePacket(id, wire), opts, "SUBACK");
        } catch (err) {
            for (const s of subs) this.session.remove(s);
            throw err;
        }

        const results: SubscriptionResult[] = [];
        const accepted: Subscription[] = [];
        requests.forEach((r, i) => {
            const returnCode = codes[i] ?? 0x80;
            const grantedQos = toQoS(returnCode);
            results.push({ pattern: r.pattern, requestedQos: r.qos, grantedQos, returnCode });

            const sub = subs[i];
            if (!sub) return;
            if (grantedQos === null) {
                this.session.remove(sub);
            } else {
                this.session.grant(r.pattern, grantedQos);
                accepted.push(sub);
            }
        });

        const unsubscribe = () => this.removeSubscriptions(accepted, {});
        const rejected = results.filter((r) => r.grantedQos === null).length;
        if (rejected > 0) {
            throw new SubscriptionError(`Broker rejected ${rejected} of ${results.length} topic filters`, results, unsubscribe);
        }

        debug("subscribed %o", results);
        return { results, unsubscribe };
    }

    async unsubscribe(filters: string | readonly string[], opts: SubscribeOptions = {}): Promise<void> {
        const list = typeof filters === "string" ? [filters] : filters;
        const emptied = list.filter((f) => this.session.removeFilter(f).length > 0);
        await this.sendUnsubscribe(emptied, opts);
    }

    private async removeSubscriptions(subs: Subscription[], opts: SubscribeOptions): Promise<void> {
        const emptied: string[] = [];
        for (const s of subs) {
            const filter = this.session.remove(s);
            if (filter !== null) emptied.push(filter);
        }
        await this.sendUnsubscribe(emptied, opts);
    }

    private async sendUnsubscribe(filters: string[], opts: SubscribeOptions): Promise<void> {
        if (filters.length === 0 || (this.currentState !== "connected" && this.currentState !== "reconnecting")) {
            return;
        }
        await this.request(this.pendingUnsub, (id) => unsubscribePacket(id, filters), opts, "UNSUBACK");
    }

    private async resubscribeAll(): Promise<void> {
        const filters = this.session.filters();
        if (filters.length === 0) return;

        const codes = await this.request(this.pendingSub, (id) => subscribePacket(id, filters), {}, "SUBACK");
        filters.forEach((f, i) => {
            const granted = toQoS(codes[i] ?? 0x80);
            if (granted !== null) {
                this.session.grant(f.topic, granted);
                return;
            }
            this.session.removeFilter(f.topic);
            const result = { pattern: f.topic, requestedQos: f.qos, grantedQos: null, returnCode: codes[i] ?? 0x80 };
            this.emit("error", { error: new SubscriptionError(`Broker rejected "${f.topic}" on resubscribe`, [result]) });
        });
    }

    private request<T>(
        pending: Map<number, PendingRequest<T>>,
        build: (packetId: number) => Uint8Array,
        opts: SubscribeOptions,
        operation: string
    ): Promise<T> {
        const packetId = this.store.reserve();

        let frame: Uint8Array;
        try {
            frame = build(packetId);
        } catch (err) {
            this.store.release(packetId);
            throw err;
        }

        const deferred = new Deferred<T>();
        pending.set(packetId, { frame, deferred });
        this.sendQuietly(frame);

        // On timeout the packet id stays reserved until the late ack arrives or the session ends
        const timeoutMs = opts.timeoutMs ?? this.opts.operationTimeoutMs;
        return withDeadline(deferred.promise, {
            timeoutMs,
            signal: opts.signal,
            onTimeout: () => new TimeoutError(`${operation} (packetId=${packetId})`, timeoutMs)
        });
    }

    private createQueue(pattern: string): SerialQueue {
        return new SerialQueue(
            (err) => this.emit("error", { error: err instanceof TimeoutError ? err : new HandlerError(pattern, err) }),
            this.opts.handlerTimeoutMs
        );
    }

    // ----- Connection internals -----

    private runAttempt(mode: AttemptMode): Promise<void> {
        const attempt: Promise<void> = this.openConnection(mode).finally(() => {
            if (this.connecting === attempt) this.connecting = null;
        });
        this.connecting = attempt;
        return attempt;
    }

    private async openConnection(mode: AttemptMode): Promise<void> {
        this.setState(mode);
        try {
            await this.establish();
        } catch (err) {
            if (this.currentState === mode && mode === "connecting") {
                this.setState("disconnected");
                this.emit("error", { error: err });
            }
            throw err;
        }
    }

    private async establish(): Promise<void> {
        if (!this.restored) {
            this.restored = true;
            if (!this.opts.cleanSession) {
                const restored = await this.store.restore();
                if (restored.length) debug("restored %d pending deliveries", restored.length);
            }
        }
        if (this.currentState !== "connecting" && this.currentState !== "reconnecting") {
            throw new ConnectionClosed("Connection attempt cancelled");
        }

        const transport = this.opts.transport(this.url);
        this.transport = transport;
        this.parser.reset();

        const connack = new Deferred<Connack>();
        this.connack = connack;
        const timeoutMs = this.opts.connectTimeoutMs;

        let sessionPresent: boolean;
        try {
            await withDeadline(transport.open(), {
                timeoutMs,
                onTimeout: () => new TimeoutError(`opening ${this.url}`, timeoutMs)
            });
            if (this.transport !== transport) {
                throw new ConnectionClosed("Connection attempt cancelled");
            }

            void this.readLoop(transport);
            this.lastActivityAt = now();
            await this.send(
                connectPacket({
                    clientId: this.opts.clientId,
                    cleanSession: this.opts.cleanSession,
                    keepAliveSec: this.opts.keepAliveSec,
                    username: this.opts.username,
                    password: this.opts.password
                })
            );

            const ack = await withDeadline(connack.promise, {
                timeoutMs,
                onTimeout: () => new TimeoutError("CONNACK", timeoutMs)
            });
            if (ack.returnCode !== 0) {
                throw connackError(ack.returnCode);
            }
            sessionPresent = ack.sessionPresent;
        } catch (err) {
            if (this.connack === connack) this.connack = null;
            if (this.transport === transport) {
                this.transport = null;
                this.failFrames(new ConnectionClosed("Connection attempt failed", { cause: err }));
            }
            await this.closeTransport(transport);

            const error = asTransportError(err);
            debug("connect to %s failed: %s", this.url, error.message);
            if (error instanceof ConnectionError) {
                this.emit("disconnect", { reason: "auth_failed", error });
            }
            throw error;
        }

        this.connack = null;
        this.onConnected(sessionPresent);
    }

    private onConnected(sessionPresent: boolean): void {
        this.setState("connected");
        this.reconnectAttempt = 0;
        this.startKeepAlive();

        if (!sessionPresent) {
            this.session.resetInbound();
        }

        debug("connected to %s (sessionPresent=%s)", this.url, sessionPresent);
        this.emit("connect", { sessionPresent });

        for (const p of this.pendingSub.values()) this.sendQuietly(p.frame);
        for (const p of this.pendingUnsub.values()) this.sendQuietly(p.frame);
        this.background(this.outbound.resume());

        // The broker replays retained messages when it receives SUBSCRIBE
        if (this.opts.replayRetainedOnReconnect || !sessionPresent) {
            this.background(this.resubscribeAll());
        }
    }

    private async readLoop(transport: Transport): Promise<void> {
        try {
            for (; ;) {
                const chunk = await transport.receive();
                if (this.transport !== transport) return;
                this.lastActivityAt = now();

                try {
                    this.onData(chunk);
                } catch (err) {
                    this.onTransportLost(transport, err, "protocol_error");
                    return;
                }
            }
        } catch (err) {
            this.onTransportLost(transport, err, err instanceof ConnectionClosed ? "socket_closed" : "error");
        } finally {
            await this.closeTransport(transport);
        }
    }

    private onData(chunk: Uint8Array): void {
        for (const p of this.parser.push(chunk)) {
            this.onPacket(p);
        }
    }

    private onPacket(p: RawPacket): void {
        switch (p.type) {
            case PacketType.CONNACK: {
                if (!this.connack) throw new Error("Unexpected CONNACK");
                this.connack.resolve(decodeConnack(p.body));
                break;
            }

            case PacketType.PUBLISH:
                this.onPublish(decodePublish(p.flags, p.body));
                break;

            case PacketType.PUBACK:
                this.background(this.outbound.onPuback(decodeAck(p.body).packetId));
                break;

            case PacketType.PUBREC:
                this.background(this.outbound.onPubrec(decodeAck(p.body).packetId));
                break;

            case PacketType.PUBCOMP:
                this.background(this.outbound.onPubcomp(decodeAck(p.body).packetId));
                break;

            case PacketType.PUBREL: {
                const { packetId } = decodeAck(p.body);
                if (this.session.release(packetId)) {
                    this.emit("release", { packetId });
                }
                this.sendQuietly(pubcompPacket(packetId));
                break;
            }

            case PacketType.SUBACK: {
                const { packetId, returnCodes } = decodeSuback(p.body);
                const pending = this.pendingSub.get(packetId);
                if (pending) {
                    this.pendingSub.delete(packetId);
                    this.store.release(packetId);
                    pending.deferred.resolve(returnCodes);
                }
                break;
            }

            case PacketType.UNSUBACK: {
                const { packetId } = decodeAck(p.body);
                const pending = this.pendingUnsub.get(packetId);
                if (pending) {
                    this.pendingUnsub.delete(packetId);
                    this.store.release(packetId);
                    pending.deferred.resolve();
                }
                break;
            }

            case PacketType.PINGRESP:
                this.pingOutstanding = false;
                if (this.pingTimeoutTimer != null) {
                    clearTimeout(this.pingTimeoutTimer);
                    this.pingTimeoutTimer = null;
                }
                break;

            default:
                debug("ignoring packet type %d", p.type);
                break;
        }
    }

    private onPublish(msg: DecodedPublish): void {
        switch (msg.qos) {
            case 0:
                this.dispatch(msg);
                break;

            case 1:
                this.dispatch(msg);
                this.sendQuietly(pubackPacket(msg.packetId));
                break;

            case 2:
                if (this.session.markReceived(msg.packetId)) {
                    this.dispatch(msg);
                } else {
                    debug("packet %d already received, not redelivered", msg.packetId);
                }
                this.sendQuietly(pubrecPacket(msg.packetId));
                break;
        }
    }

    /** Hand the message to every matching subscription's queue; never waits on handlers. */
    private dispatch(msg: DecodedPublish): void {
        const packetId = msg.qos === 0 ? undefined : msg.packetId;

        for (const { subscription, qos } of this.session.match(msg.topic, msg.qos)) {
            const incoming: IncomingMessage = {
                topic: msg.topic,
                payload: msg.bytes,
                qos,
                retain: msg.retain,
                dup: msg.dup,
                packetId
            };
            subscription.queue.push(() => (subscription.active ? subscription.handler(incoming) : undefined));
        }
    }

    private onTransportLost(transport: Transport, error: unknown, reason: DisconnectReason): void {
        if (this.transport !== transport) return;

        this.transport = null;
        this.failFrames(new ConnectionClosed("Connection lost", { cause: error }));

        // Still handshaking: establish() reports the failure
        if (this.connack) {
            this.connack.reject(asTransportError(error));
            return;
        }

        debug("connection lost (%s): %O", reason, error);
        this.stopKeepAlive();
        this.outbound.pause();
        this.emit("disconnect", { reason, error });

        if (this.opts.reconnect.enabled && this.currentState === "connected") {
            this.setState("reconnecting");
            this.scheduleReconnect(error);
        } else {
            this.background(this.shutdown(new ConnectionClosed("Connection lost", { cause: error })));
        }
    }

    private async shutdown(error: Error): Promise<void> {
        this.clearReconnect();
        this.stopKeepAlive();
        this.outbound.pause();
        this.setState("disconnected");
        this.failWaiters(error);
        if (this.opts.cleanSession) {
            await this.discardSession();
        }
    }

    private async discardSession(): Promise<void> {
        this.session.clear();
        await this.outbound.clear();
    }

    private async closeTransport(transport: Transport): Promise<void> {
        try {
            await transport.close();
        } catch (err) {
            debug("closing transport failed: %O", err);
        }
    }

    // ----- Keepalive -----

    private startKeepAlive(): void {
        this.stopKeepAlive();
        if (this.opts.keepAliveSec <= 0) return;

        const intervalMs = Math.max(1000, Math.floor((this.opts.keepAliveSec * 1000) / 2));
        this.keepAliveTimer = setInterval(() => {
            const transport = this.transport;
            if (!transport || !this.connected) return;

            const idle = now() - this.lastActivityAt;
            if (idle < intervalMs) return;

            if (this.pingOutstanding) return;

            this.pingOutstanding = true;
            this.sendQuietly(pingreqPacket());

            this.pingTimeoutTimer = setTimeout(() => {
                this.pingTimeoutTimer = null;
                if (!this.pingOutstanding) return;
                this.onTransportLost(transport, new TimeoutError("PINGRESP", this.opts.pingTimeoutMs), "timeout");
            }, this.opts.pingTimeoutMs);
        }, intervalMs);
    }

    private stopKeepAlive(): void {
        if (this.keepAliveTimer != null) {
            clearInterval(this.keepAliveTimer);
            this.keepAliveTimer = null;
        }
        if (this.pingTimeoutTimer != null) {
            clearTimeout(this.pingTimeoutTimer);
            this.pingTimeoutTimer = null;
        }
        this.pingOutstanding = false;
    }

    // ----- Reconnect -----

    private scheduleReconnect(lastError: unknown): void {
        this.clearReconnect();

        const { maxAttempts, minDelayMs, maxDelayMs, jitterRatio } = this.opts.reconnect;
        if (maxAttempts > 0 && this.reconnectAttempt >= maxAttempts) {
            this.giveUp(lastError);
            return;
        }

        const delay = backoff(this.reconnectAttempt++, minDelayMs, maxDelayMs, jitterRatio);
        this.emit("reconnect", { attempt: this.reconnectAttempt, delayMs: delay });

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            this.runAttempt("reconnecting").catch((err: unknown) => {
                if (this.currentState !== "reconnecting") return;
                // A refused handshake is not retried
                if (err instanceof ConnectionError) this.giveUp(err);
                else this.scheduleReconnect(err);
            });
        }, delay);
    }

    private giveUp(error: unknown): void {
        debug("giving up reconnecting after %d attempts", this.reconnectAttempt);
        this.reconnectAttempt = 0;
        this.emit("disconnect", { reason: "reconnect_exhausted", error });
        this.background(this.shutdown(new ConnectionClosed("Reconnect attempts exhausted", { cause: error })));
    }

    private clearReconnect(): void {
        if (this.reconnectTimer != null) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    // ----- Outgoing queue -----

    private send(bytes: Uint8Array): Promise<void> {
        if (!this.transport) {
            return Promise.reject(new ConnectionClosed("Not connected"));
        }

        const max = this.opts.maxQueueBytes;
        if (this.outBytes + bytes.length > max) {
            return Promise.reject(new PublishError(`Outgoing queue overflow (> ${max} bytes)`));
        }

        const frame: OutFrame = { bytes, deferred: new Deferred<void>() };
        this.outQ.push(frame);
        this.outBytes += bytes.length;
        void this.flush();
        return frame.deferred.promise;
    }

    private sendQuietly(bytes: Uint8Array): void {
        this.send(bytes).catch((err: unknown) => debug("frame dropped: %O", err));
    }

    private async flush(): Promise<void> {
        if (this.flushing) return;
        this.flushing = true;

        try {
            for (; ;) {
                const transport = this.transport;
                if (!transport) return;

                const frame = this.outQ.shift();
                if (!frame) return;
                this.outBytes -= frame.bytes.length;

                try {
                    await transport.send(frame.bytes);
                } catch (err) {
                    frame.deferred.reject(asTransportError(err));
                    this.onTransportLost(transport, err, "error");
                    return;
                }
                this.lastActivityAt = now();
                frame.deferred.resolve();
            }
        } finally {
            this.flushing = false;
        }
    }

    private failFrames(error: Error): void {
        const frames = this.outQ;
        this.outQ = [];
        this.outBytes = 0;
        for (const f of frames) f.deferred.reject(error);
    }

    // ----- Helpers -----

    /** Waits out an initial connect in progress; throws unless connected or reconnecting. */
    private async whenOnline(): Promise<void> {
        if (this.currentState === "connecting" && this.connecting) {
            await this.connecting;
        }
        if (this.currentState !== "connected" && this.currentState !== "reconnecting") {
            throw new ConnectionClosed(`Not connected (state=${this.currentState})`);
        }
    }

    private failWaiters(error: Error): void {
        this.rejectRequests(this.pendingSub, error);
        this.rejectRequests(this.pendingUnsub, error);
        this.outbound.rejectWaiters(error);
        this.failFrames(error);
    }

    private rejectRequests<T>(pending: Map<number, PendingRequest<T>>, error: Error): void {
        const entries = Array.from(pending);
        pending.clear();
        for (const [id, p] of entries) {
            this.store.release(id);
            p.deferred.reject(error);
        }
    }

    private background(task: Promise<unknown>): void {
        task.catch((error: unknown) => this.emit("error", { error }));
    }

    private setState(to: ConnectionState): void {
        const from = this.currentState;
        if (from === to) return;
        this.currentState = to;
        this.emit("state", { from, to });
    }

    private emit<K extends keyof ClientEventMap>(event: K, payload: ClientEventMap[K]): void {
        this.events.emit(event, payload);
    }
}
