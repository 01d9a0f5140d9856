import { Redis } from 'ioredis';

export const DEFAULT_LEADER_KEY = 'ingestq:reaper:leader';

export type LockClient = Pick<Redis, 'set' | 'get' | 'eval'>;

/** Whatever decides that this instance may run cluster-wide housekeeping. */
export interface Leadership {
    tryBecomeLeader(): Promise<boolean>;
    releaseLeadership(): Promise<void>;
}

export interface LeaderElectorOptions {
    workerId?: string;
    ttlSeconds?: number;
    key?: string;
}

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

export class LeaderElector implements Leadership {
    readonly workerId: string;
    private readonly ttlSeconds: number;
    private readonly key: string;
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private readonly redis: LockClient,
        options: LeaderElectorOptions = {},
    ) {
        this.workerId = options.workerId || `worker-${process.pid}-${Date.now()}`;
        this.ttlSeconds = options.ttlSeconds ?? 30;
        this.key = options.key ?? DEFAULT_LEADER_KEY;
    }

    async tryBecomeLeader(): Promise<boolean> {
        // SETNX with TTL - atomic operation
        const result = await this.redis.set(this.key, this.workerId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // Already ours (re-election after restart, or a later tick of the same leader)
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.workerId;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.workerId);
    }

    private startRenewal(): void {
        this.stopRenewal();

        // Renew lock at half the TTL interval
        const renewalMs = (this.ttlSeconds * 1000) / 2;
        this.renewalInterval = setInterval(() => void this.renew(), renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renew(): Promise<void> {
        try {
            const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.workerId, this.ttlSeconds);
            if (result !== 1) this.stopRenewal();
        } catch (error) {
            console.error('[leader] lock renewal failed:', error);
        }
    }
}
