import { Global, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheClient } from './cache-client';
import { InMemoryCacheClient } from './in-memory-cache.client';
import { RedisCacheClient } from './redis-cache.client';

@Global()
@Module({
    providers: [
        {
            provide: CacheClient,
            inject: [ConfigService],
            useFactory: async (configService: ConfigService): Promise<CacheClient> => {
                const url = configService.get<string>('redis.url');
                if (!url) {
                    new Logger(CacheModule.name).warn('REDIS_URL is not set, completion records are kept in process memory');
                    return new InMemoryCacheClient();
                }
                const client = new RedisCacheClient(url);
                await client.connect();
                return client;
            },
        },
    ],
    exports: [CacheClient],
})
export class CacheModule implements OnApplicationShutdown {
    constructor(private readonly cache: CacheClient) { }

    async onApplicationShutdown() {
        await this.cache.close();
    }
}
