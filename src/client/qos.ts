import type { QoS } from "./types";

export const QOS = {
    AtMostOnce: 0,
    AtLeastOnce: 1,
    ExactlyOnce: 2
} as const satisfies Record<string, QoS>;

export function toQoS(n: number): QoS | null {
    switch (n) {
        case 0:
        case 1:
        case 2:
            return n;
        default:
            return null;
    }
}

export function minQoS(a: QoS, b: QoS): QoS {
    return a < b ? a : b;
}
