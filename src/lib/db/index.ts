import { drizzle, type PostgresJsDatabase, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import { getCmsConfig } from '@/lib/config';
import { logger } from '@/lib/logger';
import * as schema from './schema';

// ─── Pool configuration (env-driven) ─────
const DB_POOL_MAX = Math.max(1, parseInt(process.env.DB_POOL_MAX || '10', 10) || 10);
const DB_IDLE_TIMEOUT = Math.max(0, parseInt(process.env.DB_IDLE_TIMEOUT || '20', 10) || 20);
const DB_CONNECT_TIMEOUT = Math.max(1, parseInt(process.env.DB_CONNECT_TIMEOUT || '10', 10) || 10);
const DB_MAX_LIFETIME = parseInt(process.env.DB_MAX_LIFETIME || '3600', 10) || 3600; // 1 hour

/** The pooled database or an open transaction; repositories accept either. */
export type DbOrTx = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

// Lazy-initialized database instance
// This prevents import-time errors when DATABASE_URL is not set
let _db: PostgresJsDatabase<typeof schema> | null = null;
let _sql: ReturnType<typeof postgres> | null = null;

export function getDb(): PostgresJsDatabase<typeof schema> {
    if (_db) {
        return _db;
    }

    const connectionString = getCmsConfig().databaseUrl;

    if (!connectionString) {
        throw new Error(
            'DATABASE_URL environment variable is not set. ' +
            'Please set it in your .env.local file or environment.'
        );
    }

    const forceSsl = process.env.DATABASE_SSL === 'true' || process.env.NODE_ENV === 'production';
    _sql = postgres(connectionString, {
        max: DB_POOL_MAX,
        idle_timeout: DB_IDLE_TIMEOUT,
        connect_timeout: DB_CONNECT_TIMEOUT,
        max_lifetime: DB_MAX_LIFETIME,
        onnotice: () => {}, // suppress notice logs
        ...(forceSsl ? { ssl: 'require' as const } : {}),
        transform: {
            undefined: null,
        },
        connection: {
            application_name: 'page-composer',
        },
    });

    _db = drizzle(_sql, { schema });

    logger.debug('Database pool initialized', {
        max: DB_POOL_MAX,
        idleTimeout: DB_IDLE_TIMEOUT,
        connectTimeout: DB_CONNECT_TIMEOUT,
        maxLifetime: DB_MAX_LIFETIME,
    });

    return _db;
}

/** Drain the pool so short-lived scripts can exit. */
export async function closeDb(): Promise<void> {
    if (_sql) {
        await _sql.end({ timeout: 5 });
    }
    _sql = null;
    _db = null;
}

// Export a proxy that lazily initializes the database
// This allows importing `db` directly while still being lazy
export const db = new Proxy({} as PostgresJsDatabase<typeof schema>, {
    get(_target, prop) {
        const instance = getDb();
        return (instance as unknown as Record<string | symbol, unknown>)[prop];
    },
});

// Export schema for use in queries
export * from './schema';
