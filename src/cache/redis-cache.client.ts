import { Logger } from '@nestjs/common';
import { createClient } from 'redis';
import { CacheClient } from './cache-client';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCacheClient extends CacheClient {
    private readonly logger = new Logger(RedisCacheClient.name);
    private readonly client: RedisClient;

    constructor(url: string) {
        super();
        this.client = createClient({
            url,
            socket: {
                connectTimeout: 10_000,
                reconnectStrategy: (retries: number) => {
                    if (retries > 10) {
                        return new Error('Redis reconnection limit exceeded');
                    }
                    return Math.min(retries * 100, 3000);
                },
            },
        });

        this.client.on('error', (err: Error) => {
            this.logger.error(`Redis client error: ${err.message}`);
        });
    }

    async connect(): Promise<void> {
        await this.client.connect();
        this.logger.log('Redis client connected');
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.client.set(key, value, { EX: ttlSeconds });
    }

    async get(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async scan(pattern: string): Promise<string[]> {
        const keys: string[] = [];
        for await (const key of this.client.scanIterator({ MATCH: pattern, COUNT: 100 })) {
            keys.push(key);
        }
        return keys;
    }

    async close(): Promise<void> {
        if (this.client.isOpen) {
            await this.client.quit();
            this.logger.log('Redis client closed');
        }
    }
}
