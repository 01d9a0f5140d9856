import { QueueService, ReapedTask } from './queue.service';
import { ProgressService } from './progress.service';
import { Leadership } from './leaderelector';

const TAG = '[reaper]';

export interface ReaperOptions {
    staleThresholdSeconds?: number;
    intervalMs?: number;
}

// Recovers tasks whose worker stopped heartbeating. Only the instance holding
// the leader lock reaps, so two instances never requeue the same task twice.
export class Reaper {
    private readonly intervalMs: number;
    private readonly staleThresholdSeconds: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly queue: QueueService,
        private readonly progress: ProgressService,
        private readonly leadership: Leadership,
        options: ReaperOptions = {},
    ) {
        this.staleThresholdSeconds = options.staleThresholdSeconds ?? 120;
        this.intervalMs = options.intervalMs ?? 10_000;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);

        // Fire immediately to recover whatever a previous crash left behind, then on schedule
        void this.reap();
        this.intervalHandle = setInterval(() => void this.reap(), this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leadership.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<ReapedTask[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        try {
            if (!(await this.leadership.tryBecomeLeader())) {
                return [];
            }

            const reaped = await this.queue.recoverStale(this.staleThresholdSeconds);
            for (const task of reaped) {
                try {
                    await this.syncProgress(task);
                } catch (err) {
                    console.error(`${TAG} progress sync for task ${task.id} (subject ${task.subject_id}) failed:`, err);
                }
            }

            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} tasks: ${reaped.map(t => `${t.id}(${t.action})`).join(', ')}`);
            }
            return reaped;
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
            return [];
        } finally {
            this.isReaping = false;
        }
    }

    private async syncProgress(task: ReapedTask): Promise<void> {
        const error = task.error_message ?? 'Worker stopped responding';
        if (task.action === 'requeued') {
            await this.progress.markRequeued(task.subject_id, {
                queuePosition: task.queue_position,
                retryCount: task.retry_count,
                error,
            });
        } else {
            await this.progress.markFailed(task.subject_id, error, { retry_count: task.retry_count });
        }
    }
}
