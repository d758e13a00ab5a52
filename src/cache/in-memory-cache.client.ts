import { CacheClient } from './cache-client';

export type Clock = () => number;

interface Entry {
    value: string;
    expiresAt: number;
}

export function globToRegExp(pattern: string): RegExp {
    const source = pattern
        .split('')
        .map((char) => {
            if (char === '*') return '.*';
            if (char === '?') return '.';
            return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
        })
        .join('');
    return new RegExp(`^${source}$`);
}

// Used when no REDIS_URL is configured, and by the tests.
export class InMemoryCacheClient extends CacheClient {
    private readonly entries = new Map<string, Entry>();

    constructor(private readonly now: Clock = Date.now) {
        super();
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null;
    }

    async scan(pattern: string): Promise<string[]> {
        const matcher = globToRegExp(pattern);
        return [...this.entries.keys()].filter((key) => matcher.test(key) && this.live(key) !== undefined);
    }

    async close(): Promise<void> {
        this.entries.clear();
    }

    private live(key: string): Entry | undefined {
        const entry = this.entries.get(key);
        if (entry && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }
}
