/**
 * Key-value store for short-lived records. Injected by class token so the
 * Redis-backed and in-process implementations are interchangeable.
 */
export abstract class CacheClient {
    /** Stores `value` under `key`, replacing any previous value, for `ttlSeconds`. */
    abstract set(key: string, value: string, ttlSeconds: number): Promise<void>;

    abstract get(key: string): Promise<string | null>;

    /** Keys matching a Redis-style glob (`*` and `?`). Order is unspecified. */
    abstract scan(pattern: string): Promise<string[]>;

    abstract close(): Promise<void>;
}
