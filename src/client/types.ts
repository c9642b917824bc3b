import type { DeliveryFailure } from "./errors";

export type QoS = 0 | 1 | 2;

export type IncomingMessage = {
    topic: string;
    payload: Uint8Array;
    /** Effective QoS: the lower of the granted and the published QoS. */
    qos: QoS;
    retain: boolean;
    dup: boolean;
    packetId?: number;
};

export type MessageHandler = (msg: IncomingMessage) => void | Promise<void>;

export type TopicRequest = {
    pattern: string;
    qos?: QoS;
};

export type TopicList = string | TopicRequest | ReadonlyArray<string | TopicRequest>;

export type SubscribeOptions = {
    /** QoS for entries given as bare strings. */
    qos?: QoS;
    timeoutMs?: number;
    signal?: AbortSignal;
};

export type PublishOptions = {
    qos?: QoS;
    retain?: boolean;
    timeoutMs?: number;
    signal?: AbortSignal;
};

export type SubscriptionResult = {
    pattern: string;
    requestedQos: QoS;
    /** `null` when the broker (or validation) rejected the filter. */
    grantedQos: QoS | null;
    returnCode: number;
};

export type SubscriptionHandle = {
    readonly results: SubscriptionResult[];
    unsubscribe(): Promise<void>;
};

export type ConnectionState = "disconnected" | "connecting" | "connected" | "disconnecting" | "reconnecting";

export type DisconnectReason =
    | "requested"
    | "socket_closed"
    | "timeout"
    | "protocol_error"
    | "auth_failed"
    | "reconnect_exhausted"
    | "error";

export type ClientEventMap = {
    connect: { sessionPresent: boolean };
    reconnect: { attempt: number; delayMs: number };
    disconnect: { reason: DisconnectReason; error?: unknown };
    error: { error: unknown };
    deliveryFailure: { error: DeliveryFailure };
    /** An inbound QoS 2 message was released by the broker. */
    release: { packetId: number };
    state: { from: ConnectionState; to: ConnectionState };
};

export type FerryClient = {
    readonly connected: boolean;
    readonly state: ConnectionState;
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    publish(topic: string, payload: string | Uint8Array, opts?: PublishOptions): Promise<void>;
    publishJson(topic: string, value: unknown, opts?: PublishOptions): Promise<void>;
    subscribe(topics: TopicList, handler: MessageHandler, opts?: SubscribeOptions): Promise<SubscriptionHandle>;
    unsubscribe(filters: string | readonly string[], opts?: SubscribeOptions): Promise<void>;

    on<K extends keyof ClientEventMap>(event: K, handler: (e: ClientEventMap[K]) => void): () => void;
};
