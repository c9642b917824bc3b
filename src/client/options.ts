import { z } from "zod";
import { OptionsError } from "./errors";
import { MemoryStoreBackend } from "../store/backend";
import type { StoreBackend } from "../store/backend";
import type { TransportFactory } from "../transport/types";
import { webSocketTransport } from "../transport/websocket";

const ms = () => z.number().int().nonnegative();

const reconnectSchema = z
    .object({
        enabled: z.boolean().default(true),
        minDelayMs: ms().default(250),
        maxDelayMs: ms().default(10_000),
        jitterRatio: z.number().min(0).max(1).default(0.2),
        /** 0 retries forever. */
        maxAttempts: z.number().int().nonnegative().default(10)
    })
    .default({});

export const optionsSchema = z.object({
    clientId: z.string().min(1).max(65_535),
    username: z.string().optional(),
    password: z.string().optional(),
    autoConnect: z.boolean().default(true),
    cleanSession: z.boolean().default(true),
    keepAliveSec: z.number().int().min(0).max(0xffff).default(60),
    pingTimeoutMs: ms().default(10_000),
    connectTimeoutMs: ms().default(10_000),
    operationTimeoutMs: ms().default(10_000),
    retryIntervalMs: z.number().int().positive().default(5_000),
    maxRetryCount: z.number().int().nonnegative().default(3),
    handlerTimeoutMs: ms().default(30_000),
    excludeReservedTopics: z.boolean().default(true),
    replayRetainedOnReconnect: z.boolean().default(true),
    maxQueueBytes: z.number().int().positive().default(5 * 1024 * 1024),
    maxPacketBytes: z.number().int().positive().default(1024 * 1024),
    reconnect: reconnectSchema,
    ws: z
        .object({
            protocols: z.union([z.string(), z.array(z.string())]).default("mqtt")
        })
        .default({})
});

type Collaborators = {
    transport: TransportFactory;
    store: StoreBackend;
};

export type FerryOptions = z.input<typeof optionsSchema> & Partial<Collaborators>;

export type ResolvedFerryOptions = z.output<typeof optionsSchema> & Collaborators;

export function resolveOptions(opts: FerryOptions): ResolvedFerryOptions {
    const parsed = optionsSchema.safeParse(opts);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`);
        throw new OptionsError(`Invalid client options: ${issues.join("; ")}`);
    }

    const resolved = parsed.data;
    return {
        ...resolved,
        transport: opts.transport ?? webSocketTransport(resolved.ws.protocols),
        store: opts.store ?? new MemoryStoreBackend()
    };
}
