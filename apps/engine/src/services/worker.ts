import { TaskEntity } from '../db/task.entity';
import { QueueService } from './queue.service';

const TAG = '[worker]';

export type WorkerState = 'stopped' | 'running' | 'stopping';

export interface WorkerStatus {
    state: WorkerState;
    workerId: string;
    currentTaskId: string | null;
    pollIntervalMs: number;
}

export interface QueueWorkerConfig {
    workerId: string;
    pollIntervalMs?: number;
    runTask: (task: TaskEntity) => Promise<void>;
}

/**
 * Single-slot consumer: claims one task, runs it to its outcome, and only
 * then claims the next. Sleeps for the poll interval when the queue is empty.
 */
export class QueueWorker {
    private state: WorkerState = 'stopped';
    private currentTimeout: NodeJS.Timeout | null = null;
    private currentTaskId: string | null = null;
    private inFlight: Promise<void> | null = null;
    private readonly workerId: string;
    private readonly pollIntervalMs: number;
    private readonly runTask: (task: TaskEntity) => Promise<void>;

    constructor(
        private readonly queue: QueueService,
        config: QueueWorkerConfig,
    ) {
        this.workerId = config.workerId;
        this.pollIntervalMs = config.pollIntervalMs ?? 2000;
        this.runTask = config.runTask;
    }

    start(): void {
        if (this.state !== 'stopped') {
            console.warn(`${TAG} already ${this.state}`);
            return;
        }
        this.state = 'running';
        console.log(`${TAG} started (worker: ${this.workerId}, poll interval: ${this.pollIntervalMs}ms)`);
        this.schedule(0);
    }

    /** Stops claiming new tasks and waits for the one in flight to finish. */
    async stop(): Promise<void> {
        if (this.state === 'stopped') return;

        this.state = 'stopping';
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        if (this.inFlight) {
            console.log(`${TAG} waiting for task ${this.currentTaskId} to finish`);
            await this.inFlight;
        }
        this.state = 'stopped';
        console.log(`${TAG} stopped`);
    }

    getStatus(): WorkerStatus {
        return {
            state: this.state,
            workerId: this.workerId,
            currentTaskId: this.currentTaskId,
            pollIntervalMs: this.pollIntervalMs,
        };
    }

    private schedule(delayMs: number): void {
        if (this.state !== 'running') return;
        this.currentTimeout = setTimeout(() => {
            this.currentTimeout = null;
            this.inFlight = this.tick().finally(() => { this.inFlight = null; });
        }, delayMs);
    }

    private async tick(): Promise<void> {
        let task: TaskEntity | null = null;
        try {
            task = await this.queue.claimNext(this.workerId);
        } catch (err) {
            console.error(`${TAG} claim error:`, err);
        }

        if (task) {
            this.currentTaskId = task.id;
            try {
                await this.runTask(task);
            } catch (err) {
                console.error(`${TAG} task ${task.id} error:`, err);
            } finally {
                this.currentTaskId = null;
            }
        }

        // straight back to the queue after a task; wait after an empty poll or an error
        this.schedule(task ? 0 : this.pollIntervalMs);
    }
}
