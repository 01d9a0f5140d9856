import { ProgressService, computeProgressPercentage } from '../../src/services/progress.service';
import { progressStatus } from '../../src/db/progress.entity';
import { taskStatus } from '../../src/db/task.entity';
import { MemoryProgressStore, MemoryTaskStore } from '../helpers/memory-stores';

describe('computeProgressPercentage', () => {
    it.each([
        [{ stage: 'file_processing' as const }, 4, 0, 0],
        [{ stage: 'file_processing' as const }, 3, 1, 33.33],
        [{ stage: 'text_extraction' as const, stageProgress: 0.5 }, 3, 0, 5],
        [{ stage: 'embedding' as const, currentChunk: 5, totalChunks: 10 }, 2, 1, 77.5],
        [{ stage: 'embedding' as const, currentChunk: 3, totalChunks: 0 }, 1, 0, 20],
        [{ stage: 'storage' as const, stageProgress: 1 }, 3, 2, 100],
        [{ stage: 'storage' as const, stageProgress: 4 }, 1, 0, 100],
        [{ stage: 'embedding' as const, stageProgress: 0.5 }, 0, 0, 0],
    ])('%j of %i files at index %i is %d%%', (update, totalFiles, fileIndex, expected) => {
        expect(computeProgressPercentage(update, totalFiles, fileIndex)).toBe(expected);
    });
});

describe('ProgressService', () => {
    let records: MemoryProgressStore;
    let tasks: MemoryTaskStore;
    let progress: ProgressService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        records = new MemoryProgressStore();
        tasks = new MemoryTaskStore();
        progress = new ProgressService(records, tasks);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    async function queuedTask(subjectId: string, fileIds: string[] = ['f1', 'f2']) {
        const task = await tasks.insert({
            subjectId,
            resourceId: 'agent-1',
            taskType: 'file_ingestion',
            payload: { files: fileIds },
            priority: 0,
            maxRetries: 3,
        });
        await tasks.recomputePositions();
        return task;
    }

    it('creates a pending record in the queued stage', async () => {
        const record = await progress.create('s1', 'agent-1', 'task-9', 3, 4);

        expect(record).toMatchObject({
            subject_id: 's1',
            task_id: 'task-9',
            stage: 'queued',
            status: progressStatus.PENDING,
            total_files: 3,
            queue_position: 4,
            progress_percentage: 0,
        });
    });

    it('does not reset the record of the same task', async () => {
        await progress.create('s1', 'agent-1', 'task-9', 3, 1);
        await progress.update('s1', { status: progressStatus.IN_PROGRESS, stage: 'embedding' });

        const again = await progress.create('s1', 'agent-1', 'task-9', 3, 1);
        expect(again.stage).toBe('embedding');

        const replaced = await progress.create('s1', 'agent-1', 'task-10', 1, 1);
        expect(replaced).toMatchObject({ task_id: 'task-10', stage: 'queued', total_files: 1 });
    });

    it('returns null for updates of an unknown subject', async () => {
        expect(await progress.update('ghost', { stage: 'storage' })).toBeNull();
        expect(await progress.report('ghost', { stage: 'storage' })).toBeNull();
    });

    it('maps pipeline reports onto the record', async () => {
        const task = await queuedTask('s1');
        await progress.create('s1', 'agent-1', task.id, 2, 1);

        const record = await progress.report('s1', {
            stage: 'embedding',
            fileIndex: 1,
            currentFile: 'f2',
            currentBatch: 2,
            totalBatches: 4,
            currentChunk: 5,
            totalChunks: 10,
            processedFiles: 1,
        });

        expect(record).toMatchObject({
            stage: 'embedding',
            status: progressStatus.IN_PROGRESS,
            current_file: 'f2',
            current_file_index: 1,
            total_files: 2,
            current_batch: 2,
            total_batches: 4,
            current_chunk: 5,
            total_chunks: 10,
            processed_files: 1,
            progress_percentage: 77.5,
        });
    });

    it('never lowers the percentage while the run is in progress', async () => {
        await progress.create('s1', 'agent-1', 'task-1', 2, null);
        await progress.report('s1', { stage: 'embedding', fileIndex: 1, currentChunk: 5, totalChunks: 10 });

        const later = await progress.report('s1', { stage: 'file_processing', fileIndex: 1 });

        expect(later?.stage).toBe('file_processing');
        expect(later?.progress_percentage).toBe(77.5);
    });

    it('starts a claimed task, creating the record when missing', async () => {
        const task = await queuedTask('s1', ['f1']);
        const claimed = await tasks.claimNext('w1');
        if (!claimed) throw new Error('expected a claim');

        const record = await progress.markStarted(claimed);

        expect(record).toMatchObject({
            task_id: task.id,
            stage: 'file_processing',
            status: progressStatus.IN_PROGRESS,
            total_files: 1,
            queue_position: null,
            metadata: { attempt: 1, worker_id: 'w1' },
        });
        expect(record?.started_at).toBeInstanceOf(Date);
    });

    it('resets a requeued record for the next attempt', async () => {
        await progress.create('s1', 'agent-1', 'task-1', 2, null);
        await progress.report('s1', { stage: 'storage', fileIndex: 1, stageProgress: 0.5, processedFiles: 1 });

        const record = await progress.markRequeued('s1', { queuePosition: 3, retryCount: 1, error: 'timeout' });

        expect(record).toMatchObject({
            stage: 'queued',
            status: progressStatus.PENDING,
            queue_position: 3,
            progress_percentage: 0,
            processed_files: 0,
            error_message: 'timeout',
            details: { retry_count: 1, last_error: 'timeout' },
            metadata: { retry_count: 1 },
        });
    });

    it('completes at 100% and merges metadata', async () => {
        await progress.create('s1', 'agent-1', 'task-1', 2, null);
        await progress.update('s1', { metadata: { retry_count: 1 } });

        const record = await progress.markCompleted('s1', { processed_count: 2 }, { processedFiles: 2 });

        expect(record).toMatchObject({
            stage: 'complete',
            status: progressStatus.COMPLETED,
            progress_percentage: 100,
            processed_files: 2,
            error_message: null,
            metadata: { retry_count: 1, processed_count: 2 },
        });
        expect(record?.completed_at).toBeInstanceOf(Date);
    });

    it('marks failures with the error', async () => {
        await progress.create('s1', 'agent-1', 'task-1', 2, 1);

        const record = await progress.markFailed('s1', 'All files failed to process', { permanent: true });

        expect(record).toMatchObject({
            stage: 'failed',
            status: progressStatus.FAILED,
            error_message: 'All files failed to process',
            queue_position: null,
            metadata: { permanent: true },
        });
    });

    it('reports the live queue position', async () => {
        const first = await queuedTask('s1');
        const second = await queuedTask('s2');
        await progress.create('s1', 'agent-1', first.id, 2, 1);
        await progress.create('s2', 'agent-1', second.id, 2, 2);

        await tasks.claimNext('w1');
        await tasks.recomputePositions();

        expect((await progress.get('s1'))?.queue_position).toBeNull();
        expect((await progress.get('s2'))?.queue_position).toBe(1);
        expect(await progress.get('ghost')).toBeNull();
    });

    it('lists only active records', async () => {
        const first = await queuedTask('s1');
        await progress.create('s1', 'agent-1', first.id, 2, 1);
        await progress.create('s2', 'agent-1', 'task-x', 1, null);
        await progress.markCompleted('s2');

        const active = await progress.listActive();

        expect(active.map(r => [r.subject_id, r.queue_position])).toEqual([['s1', 1]]);
    });

    it('deletes records', async () => {
        await progress.create('s1', 'agent-1', 'task-1', 1, null);

        expect(await progress.delete('s1')).toBe(true);
        expect(await progress.delete('s1')).toBe(false);
        expect(await progress.get('s1')).toBeNull();
    });

    it('keeps the stored position for finished tasks', async () => {
        const task = await queuedTask('s1');
        await progress.create('s1', 'agent-1', task.id, 2, 1);
        await tasks.claimNext('w1');
        await tasks.markCompleted(task.id);
        await progress.markCompleted('s1');

        expect((await tasks.findById(task.id))?.status).toBe(taskStatus.COMPLETED);
        expect((await progress.get('s1'))?.queue_position).toBeNull();
    });
});
