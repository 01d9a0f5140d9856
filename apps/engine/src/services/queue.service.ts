import { FileIngestionPayload, isTaskType } from '@ingestq/sdk';
import { NewTask, TaskEntity, taskStatus } from '../db/task.entity';
import { TaskStore } from '../repositories/task.repository';
import { ValidationError } from '../errors/queue.errors';
import { RetryBackoff, retryDelay } from '../utils/backoff';

const TAG = '[queue]';

export interface EnqueueInput {
    subjectId: string;
    resourceId: string;
    payload: unknown;
    priority?: number;
    taskType?: string;
    maxRetries?: number;
}

export interface EnqueueResult {
    task: TaskEntity;
    queuePosition: number | null;
}

export interface QueueStats {
    queued: number;
    processing: number;
    completed: number;
    failed: number;
    cancelled: number;
    total: number;  // queued + processing
}

export interface ReapedTask {
    id: string;
    subject_id: string;
    retry_count: number;
    queue_position: number | null;
    error_message: string | null;
    action: 'requeued' | 'failed';
}

export interface QueueServiceOptions {
    maxRetries?: number;
    backoff?: RetryBackoff;
}

// ingest_tasks.priority is an INTEGER column
const MIN_PRIORITY = -(2 ** 31);
const MAX_PRIORITY = 2 ** 31 - 1;

const NO_BACKOFF: RetryBackoff = { initialIntervalMs: 0, multiplier: 1, maxIntervalMs: 0 };

export class QueueService {
    private readonly maxRetries: number;
    private readonly backoff: RetryBackoff;

    constructor(
        private readonly tasks: TaskStore,
        options: QueueServiceOptions = {},
    ) {
        this.maxRetries = options.maxRetries ?? 3;
        this.backoff = options.backoff ?? NO_BACKOFF;
    }

    /**
     * Inserts a queued task and ranks it among the waiting ones.
     *
     * @throws ValidationError for a malformed submission
     * @throws DuplicateActiveJobError when the subject already has a queued or processing task
     */
    async enqueue(input: EnqueueInput): Promise<EnqueueResult> {
        const task = await this.tasks.insert(validateEnqueue(input, this.maxRetries));
        await this.refreshPositions();

        const ranked = await this.tasks.findById(task.id);
        const queuePosition = ranked?.queue_position ?? null;
        console.log(`${TAG} task ${task.id} queued for subject ${task.subject_id} (position ${queuePosition}, priority ${task.priority})`);

        return { task: ranked ?? task, queuePosition };
    }

    /** Atomically moves the best eligible queued task to processing. */
    async claimNext(workerId: string): Promise<TaskEntity | null> {
        const task = await this.tasks.claimNext(workerId);
        if (!task) return null;

        await this.refreshPositions();
        console.log(`${TAG} task ${task.id} claimed by ${workerId}`);
        return task;
    }

    async complete(taskId: string): Promise<TaskEntity | null> {
        const task = await this.tasks.markCompleted(taskId);
        if (!task) {
            console.warn(`${TAG} complete ignored: task ${taskId} is not processing`);
            return null;
        }
        await this.refreshPositions();
        console.log(`${TAG} task ${taskId} completed`);
        return task;
    }

    /**
     * Records a failed attempt. The task goes back to the end of its priority
     * tier while retries remain, otherwise (or when `permanent`) it fails for good.
     */
    async fail(taskId: string, error: string, opts: { permanent?: boolean } = {}): Promise<TaskEntity | null> {
        const current = await this.tasks.findById(taskId);
        if (!current || current.status !== taskStatus.PROCESSING) {
            console.warn(`${TAG} fail ignored: task ${taskId} is not processing`);
            return null;
        }

        const updated = await this.tasks.markFailed(taskId, error, {
            permanent: opts.permanent ?? false,
            retryDelayMs: retryDelay(current.retry_count + 1, this.backoff),
        });
        if (!updated) {
            console.warn(`${TAG} fail ignored: task ${taskId} left processing concurrently`);
            return null;
        }

        await this.refreshPositions();

        if (updated.status === taskStatus.FAILED) {
            console.error(`${TAG} task ${taskId} failed after ${updated.retry_count}/${updated.max_retries} attempts: ${error}`);
            return updated;
        }

        const requeued = await this.tasks.findById(taskId);
        console.warn(`${TAG} task ${taskId} failed, retry ${updated.retry_count}/${updated.max_retries} (position ${requeued?.queue_position ?? null})`);
        return requeued ?? updated;
    }

    /** Only queued tasks can be cancelled; in-flight work always runs to the end. */
    async cancel(taskId: string): Promise<TaskEntity | null> {
        const task = await this.tasks.cancel(taskId);
        if (!task) return null;

        await this.refreshPositions();
        console.log(`${TAG} task ${taskId} cancelled`);
        return task;
    }

    async stats(): Promise<QueueStats> {
        const counts = await this.tasks.countByStatus();
        return {
            queued: counts[taskStatus.QUEUED],
            processing: counts[taskStatus.PROCESSING],
            completed: counts[taskStatus.COMPLETED],
            failed: counts[taskStatus.FAILED],
            cancelled: counts[taskStatus.CANCELLED],
            total: counts[taskStatus.QUEUED] + counts[taskStatus.PROCESSING],
        };
    }

    /** Returns processing tasks whose worker went silent to the queue, or fails them when out of retries. */
    async recoverStale(thresholdSeconds: number): Promise<ReapedTask[]> {
        const requeued = await this.tasks.requeueStale(thresholdSeconds);
        const failed = await this.tasks.failStale(thresholdSeconds);
        if (requeued.length === 0 && failed.length === 0) return [];

        await this.refreshPositions();

        const positions = new Map((await this.tasks.findQueued()).map(t => [t.id, t.queue_position]));
        return [
            ...requeued.map(t => toReaped(t, 'requeued', positions.get(t.id) ?? null)),
            ...failed.map(t => toReaped(t, 'failed', null)),
        ];
    }

    /**
     * Re-ranks the queued tasks after a transition has been saved. A failure
     * leaves positions stale until the next transition, never the transition undone.
     */
    private async refreshPositions(): Promise<void> {
        try {
            await this.tasks.recomputePositions();
        } catch (err) {
            console.error(`${TAG} queue position recompute failed:`, err);
        }
    }

    /** Refreshes heartbeat_at. False once `workerId` no longer holds the task. */
    heartbeat(taskId: string, workerId: string | null): Promise<boolean> {
        return this.tasks.updateHeartbeat(taskId, workerId);
    }

    getTask(taskId: string): Promise<TaskEntity | null> {
        return this.tasks.findById(taskId);
    }

    findActiveTask(subjectId: string): Promise<TaskEntity | null> {
        return this.tasks.findActiveBySubject(subjectId);
    }

    listQueued(): Promise<TaskEntity[]> {
        return this.tasks.findQueued();
    }
}

function toReaped(task: TaskEntity, action: ReapedTask['action'], queuePosition: number | null): ReapedTask {
    return {
        id: task.id,
        subject_id: task.subject_id,
        retry_count: task.retry_count,
        queue_position: queuePosition,
        error_message: task.error_message,
        action,
    };
}

function requireId(value: unknown, field: string): string {
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ValidationError(`${field} is required`);
    }
    return value.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validatePayload(payload: unknown): FileIngestionPayload {
    if (!isRecord(payload)) {
        throw new ValidationError('payload must be an object');
    }
    const { files, options } = payload;
    if (!Array.isArray(files) || files.length === 0) {
        throw new ValidationError('payload.files must list at least one file');
    }
    const fileIds: string[] = [];
    for (const file of files) {
        if (typeof file !== 'string' || file.trim() === '') {
            throw new ValidationError('payload.files must contain non-empty file ids');
        }
        fileIds.push(file);
    }
    if (options !== undefined && !isRecord(options)) {
        throw new ValidationError('payload.options must be an object');
    }
    return options === undefined ? { files: fileIds } : { files: fileIds, options };
}

export function validateEnqueue(input: EnqueueInput, defaultMaxRetries: number): NewTask {
    const subjectId = requireId(input.subjectId, 'subject_id');
    const resourceId = requireId(input.resourceId, 'resource_id');

    const taskType = input.taskType ?? 'file_ingestion';
    if (!isTaskType(taskType)) {
        throw new ValidationError(`Unknown task type "${taskType}"`);
    }

    const priority = input.priority ?? 0;
    if (!Number.isInteger(priority)) {
        throw new ValidationError('priority must be an integer');
    }
    if (priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
        throw new ValidationError(`priority must be between ${MIN_PRIORITY} and ${MAX_PRIORITY}`);
    }

    const maxRetries = input.maxRetries ?? defaultMaxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
        throw new ValidationError('max_retries must be a non-negative integer');
    }

    return {
        subjectId,
        resourceId,
        taskType,
        payload: validatePayload(input.payload),
        priority,
        maxRetries,
    };
}
