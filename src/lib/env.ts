import { z } from 'zod';
import logger from '@/lib/logger';
import { AUTH, DOWNSTREAM } from '@/constants';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.string().default('development'),

    INTERNAL_TOKEN_LENGTH: z.coerce.number().int().positive().default(AUTH.DEFAULT_INTERNAL_TOKEN_LENGTH),

    INTROSPECTION_URL: z.url(),
    INTROSPECTION_CLIENT_ID: z.string().min(1),
    INTROSPECTION_CLIENT_SECRET: z.string().min(1),
    INTROSPECTION_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(AUTH.DEFAULT_CACHE_TTL_SECONDS),
    INTROSPECTION_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(AUTH.DEFAULT_CACHE_MAX_ENTRIES),

    SESSION_SERVICE_URL: z.url(),
    ACCOUNT_SERVICE_URL: z.url(),
    HISTORY_SERVICE_URL: z.url(),
    ASSETS_SERVICE_URL: z.url(),
    EXPLORER_SERVICE_URL: z.url(),
    DOWNSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(DOWNSTREAM.DEFAULT_TIMEOUT_MS)
});

export interface AppConfig {
    port: number;
    nodeEnv: string;
    auth: {
        internalTokenLength: number;
        introspection: {
            endpoint: string;
            clientId: string;
            clientSecret: string;
        };
        cache: {
            ttlSeconds: number;
            maxEntries: number;
        };
    };
    services: {
        sessionUrl: string;
        accountUrl: string;
        historyUrl: string;
        assetsUrl: string;
        explorerUrl: string;
        timeoutMs: number;
    };
}

/**
 * Reads and validates the process environment. Throws listing every
 * offending variable so a misconfigured deployment fails at startup.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        const msg = `Invalid environment configuration: ${problems.join('; ')}`;
        logger.error(msg);
        throw new Error(msg);
    }

    const e = parsed.data;

    logger.info('✓ Environment validation passed', {
        port: e.PORT,
        nodeEnv: e.NODE_ENV,
        internalTokenLength: e.INTERNAL_TOKEN_LENGTH,
        cacheTtlSeconds: e.INTROSPECTION_CACHE_TTL_SECONDS
    });

    return {
        port: e.PORT,
        nodeEnv: e.NODE_ENV,
        auth: {
            internalTokenLength: e.INTERNAL_TOKEN_LENGTH,
            introspection: {
                endpoint: e.INTROSPECTION_URL,
                clientId: e.INTROSPECTION_CLIENT_ID,
                clientSecret: e.INTROSPECTION_CLIENT_SECRET
            },
            cache: {
                ttlSeconds: e.INTROSPECTION_CACHE_TTL_SECONDS,
                maxEntries: e.INTROSPECTION_CACHE_MAX_ENTRIES
            }
        },
        services: {
            sessionUrl: e.SESSION_SERVICE_URL,
            accountUrl: e.ACCOUNT_SERVICE_URL,
            historyUrl: e.HISTORY_SERVICE_URL,
            assetsUrl: e.ASSETS_SERVICE_URL,
            explorerUrl: e.EXPLORER_SERVICE_URL,
            timeoutMs: e.DOWNSTREAM_TIMEOUT_MS
        }
    };
};
