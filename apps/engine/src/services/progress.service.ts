import { PipelineStage, ProgressUpdate } from '@ingestq/sdk';
import { ProgressEntity, ProgressPatch, progressStatus } from '../db/progress.entity';
import { TaskEntity, taskStatus } from '../db/task.entity';
import { ProgressStore } from '../repositories/progress.repository';
import { TaskStore } from '../repositories/task.repository';

const TAG = '[progress]';

/**
 * Share of a single file's progress covered by each stage, as [start, end]
 * percentages. Embedding dominates the cost of a file.
 */
export const STAGE_BANDS: Record<PipelineStage, readonly [number, number]> = {
    file_processing: [0, 10],
    text_extraction: [10, 20],
    embedding: [20, 90],
    storage: [90, 100],
};

function stageFraction(update: ProgressUpdate): number {
    if (update.stageProgress !== undefined) return update.stageProgress;
    if (update.stage === 'embedding' && update.totalChunks && update.currentChunk !== undefined) {
        return update.currentChunk / update.totalChunks;
    }
    return 0;
}

/**
 * Overall completion of a multi-file run: whole files done so far plus the
 * current file's position in its stage band. Rounded to two decimals.
 */
export function computeProgressPercentage(update: ProgressUpdate, totalFiles: number, fileIndex: number): number {
    if (totalFiles <= 0) return 0;

    const [start, end] = STAGE_BANDS[update.stage];
    const fraction = Math.min(1, Math.max(0, stageFraction(update)));
    const withinFile = start + (end - start) * fraction;
    const files = Math.min(Math.max(fileIndex, 0), totalFiles);
    const overall = ((files + withinFile / 100) / totalFiles) * 100;

    return Math.min(100, Math.round(overall * 100) / 100);
}

export interface RequeueInfo {
    queuePosition: number | null;
    retryCount: number;
    error: string;
}

export class ProgressService {
    constructor(
        private readonly records: ProgressStore,
        private readonly tasks: Pick<TaskStore, 'findById'>,
    ) { }

    async create(
        subjectId: string,
        resourceId: string,
        taskId: string,
        totalFiles: number,
        queuePosition: number | null = null,
    ): Promise<ProgressEntity> {
        const record = await this.records.upsert({ subjectId, resourceId, taskId, totalFiles, queuePosition });
        console.log(`${TAG} tracking subject ${subjectId} (task ${taskId}, ${totalFiles} files)`);
        return record;
    }

    async update(subjectId: string, patch: ProgressPatch): Promise<ProgressEntity | null> {
        const record = await this.records.update(subjectId, patch);
        if (!record) {
            console.warn(`${TAG} no progress record for subject ${subjectId}, update dropped`);
        }
        return record;
    }

    /** Applies a pipeline progress report, deriving the overall percentage. */
    async report(subjectId: string, update: ProgressUpdate): Promise<ProgressEntity | null> {
        const current = await this.records.findBySubject(subjectId);
        if (!current) {
            console.warn(`${TAG} no progress record for subject ${subjectId}, report dropped`);
            return null;
        }

        const totalFiles = update.totalFiles ?? current.total_files;
        const fileIndex = update.fileIndex ?? current.current_file_index;

        const patch: ProgressPatch = {
            stage: update.stage,
            status: progressStatus.IN_PROGRESS,
            currentFileIndex: fileIndex,
            totalFiles,
            progressPercentage: computeProgressPercentage(update, totalFiles, fileIndex),
        };
        if (update.currentFile !== undefined) patch.currentFile = update.currentFile;
        if (update.currentBatch !== undefined) patch.currentBatch = update.currentBatch;
        if (update.totalBatches !== undefined) patch.totalBatches = update.totalBatches;
        if (update.currentChunk !== undefined) patch.currentChunk = update.currentChunk;
        if (update.totalChunks !== undefined) patch.totalChunks = update.totalChunks;
        if (update.processedFiles !== undefined) patch.processedFiles = update.processedFiles;
        if (update.failedFiles !== undefined) patch.failedFiles = update.failedFiles;
        if (update.details !== undefined) patch.details = update.details;

        return this.update(subjectId, patch);
    }

    /**
     * Flips the subject's record to in_progress for a freshly claimed task,
     * creating it first if the submitter has not written it yet.
     */
    async markStarted(task: TaskEntity): Promise<ProgressEntity | null> {
        const current = await this.records.findBySubject(task.subject_id);
        if (!current || current.task_id !== task.id) {
            await this.create(task.subject_id, task.resource_id, task.id, task.payload.files.length);
        }

        return this.update(task.subject_id, {
            stage: 'file_processing',
            status: progressStatus.IN_PROGRESS,
            queuePosition: null,
            errorMessage: null,
            startedAt: new Date(),
            completedAt: null,
            metadata: { attempt: task.retry_count + 1, worker_id: task.worker_id },
        });
    }

    /** The task went back to the queue: the next attempt starts from zero. */
    async markRequeued(subjectId: string, info: RequeueInfo): Promise<ProgressEntity | null> {
        return this.update(subjectId, {
            stage: 'queued',
            status: progressStatus.PENDING,
            queuePosition: info.queuePosition,
            progressPercentage: 0,
            currentFile: null,
            currentFileIndex: 0,
            currentBatch: 0,
            totalBatches: 0,
            currentChunk: 0,
            totalChunks: 0,
            processedFiles: 0,
            failedFiles: 0,
            errorMessage: info.error,
            details: { retry_count: info.retryCount, last_error: info.error },
            metadata: { retry_count: info.retryCount },
        });
    }

    async markCompleted(
        subjectId: string,
        metadata: Record<string, unknown> = {},
        extra: ProgressPatch = {},
    ): Promise<ProgressEntity | null> {
        const record = await this.update(subjectId, {
            ...extra,
            stage: 'complete',
            status: progressStatus.COMPLETED,
            progressPercentage: 100,
            queuePosition: null,
            errorMessage: null,
            completedAt: new Date(),
            metadata,
        });
        if (record) console.log(`${TAG} subject ${subjectId} completed`);
        return record;
    }

    async markFailed(
        subjectId: string,
        error: string,
        metadata: Record<string, unknown> = {},
    ): Promise<ProgressEntity | null> {
        const record = await this.update(subjectId, {
            stage: 'failed',
            status: progressStatus.FAILED,
            queuePosition: null,
            errorMessage: error,
            completedAt: new Date(),
            metadata,
        });
        if (record) console.error(`${TAG} subject ${subjectId} failed: ${error}`);
        return record;
    }

    /** Current record, with queue_position taken from the live task. */
    async get(subjectId: string): Promise<ProgressEntity | null> {
        const record = await this.records.findBySubject(subjectId);
        return record ? this.withLivePosition(record) : null;
    }

    async listActive(): Promise<ProgressEntity[]> {
        const records = await this.records.findActive();
        return Promise.all(records.map(r => this.withLivePosition(r)));
    }

    async delete(subjectId: string): Promise<boolean> {
        const deleted = await this.records.delete(subjectId);
        if (deleted) console.log(`${TAG} deleted progress for subject ${subjectId}`);
        return deleted;
    }

    private async withLivePosition(record: ProgressEntity): Promise<ProgressEntity> {
        if (!record.task_id) return record;

        const task = await this.tasks.findById(record.task_id);
        if (!task) return record;

        if (task.status === taskStatus.QUEUED) return { ...record, queue_position: task.queue_position };
        if (task.status === taskStatus.PROCESSING) return { ...record, queue_position: null };
        return record;
    }
}
