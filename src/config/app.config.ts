function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new Error(`Environment variable ${name} must be an integer, got "${raw}"`);
    }
    return value;
}

export interface AppConfig {
    http: {
        port: number;
        requestTimeoutMs: number;
        corsOrigins: string[];
    };
    database: {
        host: string;
        port: number;
        username: string;
        password: string;
        name: string;
        synchronize: boolean;
    };
    redis: {
        url: string | undefined;
    };
    completions: {
        ttlSeconds: number;
        writeAttempts: number;
    };
    reminders: {
        windowHours: number;
    };
}

export const appConfig = (): AppConfig => ({
    http: {
        port: intFromEnv('PORT', 3000),
        requestTimeoutMs: intFromEnv('REQUEST_TIMEOUT_MS', 10_000),
        corsOrigins: (process.env.CORS_ORIGINS ?? '')
            .split(',')
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0),
    },
    database: {
        host: process.env.DB_HOST ?? 'localhost',
        port: intFromEnv('DB_PORT', 5432),
        username: process.env.DB_USERNAME ?? 'postgres',
        password: process.env.DB_PASSWORD ?? 'postgres',
        name: process.env.DB_NAME ?? 'quizworkforce',
        synchronize: process.env.DB_SYNCHRONIZE === 'true',
    },
    redis: {
        url: process.env.REDIS_URL || undefined,
    },
    completions: {
        ttlSeconds: intFromEnv('COMPLETION_TTL_SECONDS', 48 * 60 * 60),
        writeAttempts: intFromEnv('COMPLETION_WRITE_ATTEMPTS', 3),
    },
    reminders: {
        windowHours: intFromEnv('REMINDER_WINDOW_HOURS', 24),
    },
});
