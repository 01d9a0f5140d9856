import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';
import { Pool } from 'pg';
import { Redis } from 'ioredis';

interface HealthCheckRequest {
    service: string;
}

type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

interface HealthCheckResponse {
    status: ServingStatus;
}

/**
 * Standard gRPC health check service implementation.
 * Verifies Postgres and Redis connectivity.
 */
export class HealthService {
    constructor(
        private readonly pool: Pick<Pool, 'query'>,
        private readonly redis: Pick<Redis, 'ping'>,
    ) { }

    async status(): Promise<ServingStatus> {
        try {
            await this.pool.query('SELECT 1');
            await this.redis.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ) {
        callback(null, { status: await this.status() });
    }

    async watch(call: Pick<ServerWritableStream<HealthCheckRequest, HealthCheckResponse>, 'write' | 'end'>) {
        call.write({ status: await this.status() });
        call.end();
    }
}
