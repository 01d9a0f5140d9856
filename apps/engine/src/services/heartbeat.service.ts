import { TaskEntity } from '../db/task.entity';
import { QueueService } from './queue.service';

const TAG = '[heartbeat]';

type HeldTask = Pick<TaskEntity, 'id' | 'worker_id'>;

/**
 * Keeps heartbeat_at fresh on the task this worker is running, so the reaper
 * can tell a slow task from a dead worker.
 *
 * A beat that matches no row means the claim is gone: the reaper requeued
 * the task, possibly to another worker. Beating stops and `claimLost()`
 * turns true until the next start().
 */
export class HeartbeatService {
    private intervalHandle: NodeJS.Timeout | null = null;
    private current: HeldTask | null = null;
    private lost = false;

    constructor(
        private readonly queue: Pick<QueueService, 'heartbeat'>,
        private readonly intervalMs: number = 5000,
    ) { }

    start(task: HeldTask): void {
        if (this.intervalHandle) {
            console.warn(`${TAG} still beating for task ${this.current?.id}, switching to ${task.id}`);
            this.stop();
        }

        this.current = { id: task.id, worker_id: task.worker_id };
        this.lost = false;
        console.log(`${TAG} started for task ${task.id} (interval: ${this.intervalMs}ms)`);

        void this.beat(this.current);
        this.intervalHandle = setInterval(() => {
            if (this.current) void this.beat(this.current);
        }, this.intervalMs);
    }

    stop(): void {
        if (!this.intervalHandle) return;

        clearInterval(this.intervalHandle);
        this.intervalHandle = null;
        console.log(`${TAG} stopped for task ${this.current?.id}`);
        this.current = null;
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    getCurrentTaskId(): string | null {
        return this.current?.id ?? null;
    }

    claimLost(): boolean {
        return this.lost;
    }

    private async beat(task: HeldTask): Promise<void> {
        let held: boolean;
        try {
            held = await this.queue.heartbeat(task.id, task.worker_id);
        } catch (err) {
            // transient: the next beat retries
            console.error(`${TAG} failed to update for task ${task.id}:`, err);
            return;
        }

        if (!held && this.current === task) {
            console.warn(`${TAG} task ${task.id} is no longer held by ${task.worker_id}, stopping`);
            this.lost = true;
            this.stop();
        }
    }
}
