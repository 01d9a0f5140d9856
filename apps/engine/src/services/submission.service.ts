import { EnqueueInput, QueueService } from './queue.service';
import { ProgressService } from './progress.service';
import { TaskNotFoundError } from '../errors/queue.errors';

const TAG = '[submit]';

export interface SubmissionResult {
    taskId: string;
    queuePosition: number | null;
}

/** Entry point for new ingestion work: a queued task plus its visible progress record. */
export class SubmissionService {
    constructor(
        private readonly queue: QueueService,
        private readonly progress: ProgressService,
    ) { }

    async submit(input: EnqueueInput): Promise<SubmissionResult> {
        const { task, queuePosition } = await this.queue.enqueue(input);

        try {
            await this.progress.create(task.subject_id, task.resource_id, task.id, task.payload.files.length, queuePosition);
        } catch (err) {
            console.error(`${TAG} progress record for task ${task.id} failed, cancelling:`, err);
            await this.queue.cancel(task.id).catch(cancelErr =>
                console.error(`${TAG} cancel of task ${task.id} failed:`, cancelErr),
            );
            throw err;
        }

        return { taskId: task.id, queuePosition };
    }

    /**
     * Cancels a task that has not started yet. False when it is already
     * running or finished.
     *
     * @throws TaskNotFoundError for an unknown task id
     */
    async cancel(taskId: string): Promise<boolean> {
        const task = await this.queue.cancel(taskId);
        if (!task) {
            if (!(await this.queue.getTask(taskId))) throw new TaskNotFoundError(taskId);
            return false;
        }

        await this.progress.markFailed(task.subject_id, 'Task cancelled before processing', { cancelled: true });
        return true;
    }
}
