import { PipelineError, PipelineResult, ProgressUpdate } from '@ingestq/sdk';
import { TaskEntity, taskStatus } from './db/task.entity';
import { ProgressPatch } from './db/progress.entity';
import { QueueService } from './services/queue.service';
import { ProgressService } from './services/progress.service';
import { PipelineRunner } from './services/pipeline-executor';
import { HeartbeatService } from './services/heartbeat.service';

const TAG = '[runner]';

export const ALL_FILES_FAILED = 'All files failed to process';

export interface TaskRunnerDeps {
    queue: QueueService;
    progress: ProgressService;
    pipeline: PipelineRunner;
    heartbeat: HeartbeatService;
}

/**
 * Writes pipeline progress reports one at a time, in the order they were
 * made. A failed write is logged and never fails the task.
 */
class ProgressForwarder {
    private chain: Promise<void> = Promise.resolve();

    constructor(
        private readonly progress: ProgressService,
        private readonly subjectId: string,
    ) { }

    push(update: ProgressUpdate): void {
        this.chain = this.chain
            .then(() => this.progress.report(this.subjectId, update))
            .then(
                () => undefined,
                err => console.error(`${TAG} progress write for subject ${this.subjectId} failed:`, err),
            );
    }

    flush(): Promise<void> {
        return this.chain;
    }
}

function failedFilesOf(result: PipelineResult): number {
    return result.failedFiles?.length ?? 0;
}

function describeFailure(err: unknown): { message: string; permanent: boolean } {
    const message = err instanceof Error ? err.message : String(err);
    return { message, permanent: err instanceof PipelineError && !err.retryable };
}

function completionMetadata(task: TaskEntity, result: PipelineResult): Record<string, unknown> {
    const successRate = result.totalFiles > 0 ? result.processedFiles / result.totalFiles : 1;
    return {
        ...result.metadata,
        processed_count: result.processedFiles,
        total_files: result.totalFiles,
        success_rate: Math.round(successRate * 10000) / 10000,
        attempts: task.retry_count + 1,
    };
}

function completionPatch(result: PipelineResult): ProgressPatch {
    const patch: ProgressPatch = {
        processedFiles: result.processedFiles,
        totalFiles: result.totalFiles,
        failedFiles: failedFilesOf(result),
    };
    if (result.failedFiles && result.failedFiles.length > 0) {
        patch.details = {
            partial_success: true,
            failed_files: result.failedFiles.map(f => ({ file_id: f.fileId, error: f.error })),
        };
    }
    return patch;
}

async function handleFailure(deps: TaskRunnerDeps, task: TaskEntity, err: unknown): Promise<void> {
    const { message, permanent } = describeFailure(err);
    console.error(`${TAG} task ${task.id} attempt ${task.retry_count + 1} failed${permanent ? ' permanently' : ''}: ${message}`);

    const updated = await deps.queue.fail(task.id, message, { permanent });
    if (!updated) return;

    if (updated.status === taskStatus.FAILED) {
        await deps.progress.markFailed(task.subject_id, message, {
            retry_count: updated.retry_count,
            permanent,
        });
        return;
    }

    await deps.progress.markRequeued(task.subject_id, {
        queuePosition: updated.queue_position,
        retryCount: updated.retry_count,
        error: message,
    });
}

// The reaper took the task back while it ran: its outcome belongs to the next attempt
function abandoned(heartbeat: HeartbeatService, task: TaskEntity): boolean {
    if (!heartbeat.claimLost()) return false;
    console.warn(`${TAG} task ${task.id} was reclaimed during attempt ${task.retry_count + 1}, discarding its outcome`);
    return true;
}

/**
 * Runs one claimed task to its outcome: completed, requeued for another
 * attempt, or failed. Heartbeats for the whole run.
 */
export async function runTask(deps: TaskRunnerDeps, task: TaskEntity): Promise<void> {
    const { queue, progress, pipeline, heartbeat } = deps;
    console.log(`${TAG} processing task ${task.id} for subject ${task.subject_id} (attempt ${task.retry_count + 1}/${task.max_retries})`);
    heartbeat.start(task);

    const forwarder = new ProgressForwarder(progress, task.subject_id);
    try {
        await progress.markStarted(task);

        let result: PipelineResult;
        try {
            result = await pipeline.run(task, update => forwarder.push(update));
            await forwarder.flush();
            if (result.totalFiles > 0 && result.processedFiles === 0) {
                throw new PipelineError(ALL_FILES_FAILED, { retryable: false });
            }
        } catch (err) {
            await forwarder.flush();
            if (abandoned(heartbeat, task)) return;
            await handleFailure(deps, task, err);
            return;
        }

        if (abandoned(heartbeat, task)) return;

        const completed = await queue.complete(task.id);
        if (!completed) return;

        await progress.markCompleted(task.subject_id, completionMetadata(task, result), completionPatch(result));
        console.log(`${TAG} completed task ${task.id} (${result.processedFiles}/${result.totalFiles} files)`);
    } finally {
        heartbeat.stop();
    }
}
