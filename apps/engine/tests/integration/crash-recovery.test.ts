import { QueueService } from '../../src/services/queue.service';
import { ProgressService } from '../../src/services/progress.service';
import { SubmissionService } from '../../src/services/submission.service';
import { HeartbeatService } from '../../src/services/heartbeat.service';
import { QueueWorker } from '../../src/services/worker';
import { Reaper } from '../../src/services/reaper';
import { Leadership } from '../../src/services/leaderelector';
import { PipelineRunner } from '../../src/services/pipeline-executor';
import { runTask } from '../../src/task-runner';
import { taskStatus } from '../../src/db/task.entity';
import { progressStatus } from '../../src/db/progress.entity';
import { MemoryProgressStore, MemoryTaskStore } from '../helpers/memory-stores';
import { waitUntil } from '../helpers/poll';

describe('crash recovery', () => {
    let tasks: MemoryTaskStore;
    let queue: QueueService;
    let progress: ProgressService;
    let submissions: SubmissionService;
    let heartbeat: HeartbeatService;
    let reaper: Reaper;
    let worker: QueueWorker | null;
    let runs: string[];

    const alwaysLeader: Leadership = {
        tryBecomeLeader: async () => true,
        releaseLeadership: async () => undefined,
    };

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        tasks = new MemoryTaskStore();
        queue = new QueueService(tasks, { maxRetries: 3 });
        progress = new ProgressService(new MemoryProgressStore(), tasks);
        submissions = new SubmissionService(queue, progress);
        heartbeat = new HeartbeatService(queue, 60_000);
        reaper = new Reaper(queue, progress, alwaysLeader, { staleThresholdSeconds: 120, intervalMs: 60_000 });
        worker = null;
        runs = [];
    });

    afterEach(async () => {
        await worker?.stop();
        await reaper.stop();
        heartbeat.stop();
        jest.restoreAllMocks();
    });

    const submit = (subjectId: string) =>
        submissions.submit({ subjectId, resourceId: 'agent-1', payload: { files: ['f1'] } });

    // Simulates a worker that claimed a task, reported some progress, and died
    async function crashWhileProcessing(subjectId: string) {
        const { taskId } = await submit(subjectId);
        const claimed = await queue.claimNext('dead-worker');
        if (!claimed || claimed.id !== taskId) throw new Error(`expected to claim ${taskId}`);

        await progress.markStarted(claimed);
        await progress.report(subjectId, { stage: 'embedding', fileIndex: 0, currentChunk: 3, totalChunks: 4 });
        tasks.patch(taskId, { heartbeat_at: new Date(Date.now() - 10 * 60_000) });
        return taskId;
    }

    it('puts an orphaned task back at the head of its tier', async () => {
        const orphan = await crashWhileProcessing('a');
        await submit('b');
        await submit('c');

        const reaped = await reaper.reap();

        expect(reaped.map(t => [t.id, t.action])).toEqual([[orphan, 'requeued']]);
        expect((await queue.listQueued()).map(t => [t.subject_id, t.queue_position])).toEqual([
            ['a', 1],
            ['b', 2],
            ['c', 3],
        ]);
        expect(await progress.get('a')).toMatchObject({
            stage: 'queued',
            status: progressStatus.PENDING,
            queue_position: 1,
            progress_percentage: 0,
        });
    });

    it('lets a restarted worker finish the recovered task first', async () => {
        await crashWhileProcessing('a');
        await submit('b');

        const pipeline: PipelineRunner = {
            run: async (task) => {
                runs.push(task.subject_id);
                return { processedFiles: 1, totalFiles: 1 };
            },
        };
        worker = new QueueWorker(queue, {
            workerId: 'worker-2',
            pollIntervalMs: 20,
            runTask: task => runTask({ queue, progress, pipeline, heartbeat }, task),
        });

        await reaper.reap();
        worker.start();
        await waitUntil(async () => (await progress.get('b'))?.status === progressStatus.COMPLETED, { timeoutMs: 3000, what: 'subject b to complete' });

        expect(runs[0]).toBe('a');
        expect(await progress.get('a')).toMatchObject({
            status: progressStatus.COMPLETED,
            metadata: { retry_count: 1, attempts: 2, worker_id: 'worker-2' },
        });
    });

    it('fails an orphaned task whose retry budget is spent', async () => {
        const orphan = await crashWhileProcessing('a');
        tasks.patch(orphan, { retry_count: 2 });

        await reaper.reap();

        expect(await queue.getTask(orphan)).toMatchObject({ status: taskStatus.FAILED, retry_count: 3 });
        expect(await progress.get('a')).toMatchObject({
            stage: 'failed',
            status: progressStatus.FAILED,
            error_message: 'Task exceeded max retries after worker failure',
            metadata: { retry_count: 3 },
        });
    });
});
