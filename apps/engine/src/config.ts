import { v7 as uuid } from 'uuid';

export interface EngineConfig {
    port: number;
    databaseUrl: string | undefined;
    redisUrl: string;
    workerId: string;
    pollIntervalMs: number;
    heartbeatIntervalMs: number;
    reaperStale: number;      // seconds
    reaperInterval: number;   // ms
    leaderTtlSeconds: number;
    maxRetries: number;
    retryBackoff: {
        initialIntervalMs: number;
        multiplier: number;
        maxIntervalMs: number;
    };
    pipelineThreads: number;
    pipelines: string | undefined;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, parse: (raw: string) => number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = parse(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`${key} must be a non-negative number, got "${raw}"`);
    }
    return value;
}

const int = (env: Env, key: string, fallback: number): number =>
    readNumber(env, key, fallback, raw => parseInt(raw, 10));

const float = (env: Env, key: string, fallback: number): number =>
    readNumber(env, key, fallback, raw => parseFloat(raw));

export function loadConfig(env: Env = process.env): EngineConfig {
    return {
        port: int(env, 'PORT', 50051),
        databaseUrl: env.DATABASE_URL,
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        workerId: env.WORKER_ID || `worker-${uuid().slice(0, 8)}`,
        pollIntervalMs: int(env, 'POLL_INTERVAL_MS', 2000),
        heartbeatIntervalMs: int(env, 'HEARTBEAT_INTERVAL_MS', 5000),
        reaperStale: int(env, 'REAPER_STALE_THRESHOLD', 120),
        reaperInterval: int(env, 'REAPER_INTERVAL', 10000),
        leaderTtlSeconds: int(env, 'LEADER_TTL_SECONDS', 30),
        maxRetries: int(env, 'MAX_RETRIES', 3),
        retryBackoff: {
            initialIntervalMs: int(env, 'RETRY_BACKOFF_MS', 5000),
            multiplier: float(env, 'RETRY_BACKOFF_MULTIPLIER', 4),
            maxIntervalMs: int(env, 'RETRY_BACKOFF_MAX_MS', 60000),
        },
        pipelineThreads: Math.max(1, int(env, 'PIPELINE_THREADS', 1)),
        pipelines: env.INGEST_PIPELINES || undefined,
    };
}
