export { ferrymq } from "./client/ferrymq";
export { FerryCore } from "./client/core";
export { resolveOptions } from "./client/options";
export type { FerryOptions, ResolvedFerryOptions } from "./client/options";
export {
    FerryError,
    TransportError,
    ConnectionError,
    TimeoutError,
    SubscriptionError,
    PublishError,
    DeliveryFailure,
    ConnectionClosed,
    HandlerError,
    OptionsError
} from "./client/errors";
export { QOS } from "./client/qos";
export { matchTopic, validateFilter, validateTopicName } from "./util/topic-match";
export { MemoryStoreBackend } from "./store/backend";
export type { StoreBackend, PendingDelivery, DeliveryState } from "./store/backend";
export type { Transport, TransportFactory } from "./transport/types";
export { WebSocketTransport, webSocketTransport } from "./transport/websocket";
export type {
    FerryClient,
    IncomingMessage,
    MessageHandler,
    QoS,
    TopicRequest,
    TopicList,
    SubscribeOptions,
    PublishOptions,
    SubscriptionResult,
    SubscriptionHandle,
    ConnectionState,
    DisconnectReason,
    ClientEventMap
} from "./client/types";
