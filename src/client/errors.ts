import type { QoS, SubscriptionResult } from "./types";

export class FerryError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Lower-layer I/O failure (DNS, refused connection, socket error). */
export class TransportError extends FerryError { }

/** The broker answered CONNECT with a non-zero return code. */
export class ConnectionError extends FerryError {
    constructor(
        message: string,
        readonly returnCode: number
    ) {
        super(message);
    }
}

export class TimeoutError extends FerryError {
    constructor(
        readonly operation: string,
        readonly timeoutMs: number
    ) {
        super(`${operation} timed out after ${timeoutMs}ms`);
    }
}

/**
 * The broker rejected one or more filters, or a filter was malformed.
 * Accepted filters stay subscribed; `unsubscribe` removes them.
 */
export class SubscriptionError extends FerryError {
    constructor(
        message: string,
        readonly results: SubscriptionResult[],
        readonly unsubscribe: () => Promise<void> = async () => undefined
    ) {
        super(message);
    }
}

export class PublishError extends FerryError { }

/** A QoS 1/2 delivery ran out of retries and was dropped from tracking. */
export class DeliveryFailure extends FerryError {
    constructor(
        readonly packetId: number,
        readonly topic: string,
        readonly qos: QoS,
        readonly attempts: number
    ) {
        super(`Delivery of packet ${packetId} to "${topic}" failed after ${attempts} attempts`);
    }
}

/** Resolves operations still waiting when the connection goes away. */
export class ConnectionClosed extends FerryError { }

export class HandlerError extends FerryError {
    constructor(
        readonly pattern: string,
        cause: unknown
    ) {
        super(`Handler for "${pattern}" failed`, { cause });
    }
}

export class OptionsError extends FerryError { }

const CONNACK_REASONS: Record<number, string> = {
    1: "unacceptable protocol version",
    2: "identifier rejected",
    3: "server unavailable",
    4: "bad user name or password",
    5: "not authorized"
};

export function connackError(returnCode: number): ConnectionError {
    const reason = CONNACK_REASONS[returnCode] ?? "unknown reason";
    return new ConnectionError(`Connection refused: ${reason} (returnCode=${returnCode})`, returnCode);
}

export function asTransportError(err: unknown): FerryError {
    if (err instanceof FerryError) {
        return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError(message, { cause: err });
}
