import type { ClientEventMap, FerryClient } from "./types";
import { FerryCore } from "./core";
import { resolveOptions } from "./options";
import type { FerryOptions } from "./options";
import { logger } from "../util/log";

const debug = logger("client");

/**
 * Create a client for the broker at `url`. With `autoConnect` (the default)
 * the first connection attempt starts immediately; its failure is reported
 * through the `error` event and, when enabled, the reconnect loop.
 */
export function ferrymq(url: string, options: FerryOptions): FerryClient {
    const opts = resolveOptions(options);
    const core = new FerryCore(url, opts);

    if (opts.autoConnect) {
        core.connect().catch((err: unknown) => debug("initial connect to %s failed: %O", url, err));
    }

    return {
        get connected() {
            return core.connected;
        },

        get state() {
            return core.state;
        },

        connect: () => core.connect(),
        disconnect: () => core.disconnect(),

        publish: (topic, payload, pOpts) => core.publish(topic, payload, pOpts),
        publishJson: (topic, value, pOpts) => core.publishJson(topic, value, pOpts),

        subscribe: (topics, handler, sOpts) => core.subscribe(topics, handler, sOpts),
        unsubscribe: (filters, sOpts) => core.unsubscribe(filters, sOpts),

        on<K extends keyof ClientEventMap>(event: K, handler: (e: ClientEventMap[K]) => void) {
            return core.on(event, handler);
        }
    };
}
