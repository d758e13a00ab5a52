import { AppConfig } from '../config/app.config';

/**
 * A reminder pass run outside the server process only sees completions through
 * Redis. An in-process cache would be empty and remind everyone.
 */
export function requireSharedCache(config: Pick<AppConfig, 'redis'>): string {
    const url = config.redis.url;
    if (!url) {
        throw new Error('REDIS_URL must be set to run reminders outside the server');
    }
    return url;
}
