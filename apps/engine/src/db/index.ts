/**
 * Connection factories for Postgres and Redis.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString = process.env.DATABASE_URL): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client backing the reaper's leader lock */
export function createRedis(url = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
    return new Redis(url);
}

/** Postgres error code for a unique index violation */
export const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}
