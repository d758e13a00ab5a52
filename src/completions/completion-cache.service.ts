import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheClient } from '../cache/cache-client';
import { CompletionFilter, CompletionRecord, completionKey, isCompletionRecord, matchesFilter } from './completion-record';

@Injectable()
export class CompletionCacheService {
    private readonly logger = new Logger(CompletionCacheService.name);
    private readonly ttlSeconds: number;
    private readonly writeAttempts: number;

    constructor(
        private readonly cache: CacheClient,
        configService: ConfigService,
    ) {
        this.ttlSeconds = configService.get<number>('completions.ttlSeconds', 172_800);
        this.writeAttempts = Math.max(1, configService.get<number>('completions.writeAttempts', 3));
    }

    /**
     * Stores the record under its exact key, replacing the previous submission.
     * Resolves to false once every attempt has failed; it never rejects.
     */
    async write(record: CompletionRecord): Promise<boolean> {
        const key = completionKey(record);
        const value = JSON.stringify(record);

        for (let attempt = 1; attempt <= this.writeAttempts; attempt++) {
            try {
                await this.cache.set(key, value, this.ttlSeconds);
                return true;
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                this.logger.warn(`Attempt ${attempt}/${this.writeAttempts} to cache ${key} failed: ${message}`);
            }
        }

        this.logger.error(`Giving up on caching ${key}`);
        return false;
    }

    /** Newest first. */
    async find(filter: CompletionFilter): Promise<CompletionRecord[]> {
        const keys = await this.cache.scan(completionKey(filter));
        const records: CompletionRecord[] = [];

        for (const key of keys) {
            const raw = await this.cache.get(key);
            if (raw === null) continue;

            const record = this.parse(key, raw);
            if (record && matchesFilter(record, filter)) {
                records.push(record);
            }
        }

        return records.sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));
    }

    private parse(key: string, raw: string): CompletionRecord | null {
        let value: unknown;
        try {
            value = JSON.parse(raw);
        } catch {
            this.logger.warn(`Skipping ${key}: not valid JSON`);
            return null;
        }
        if (!isCompletionRecord(value)) {
            this.logger.warn(`Skipping ${key}: unexpected shape`);
            return null;
        }
        return value;
    }
}
