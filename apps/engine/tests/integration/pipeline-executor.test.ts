import path from 'path';
import { PermanentPipelineError, PipelineError } from '@ingestq/sdk';
import { PipelineExecutor } from '../../src/services/pipeline-executor';
import { TaskEntity, taskStatus } from '../../src/db/task.entity';

// Spawns real worker threads that load TypeScript through tsx
jest.setTimeout(30_000);

const FIXTURE = path.resolve(__dirname, '../fixtures/thread-pipelines.ts');

function taskFor(files: string[], retryCount = 0): TaskEntity {
    const now = new Date();
    return {
        id: 'task-1',
        subject_id: 'subject-1',
        resource_id: 'agent-1',
        task_type: 'file_ingestion',
        status: taskStatus.PROCESSING,
        priority: 0,
        queue_position: null,
        enqueue_seq: '1',
        available_at: now,
        payload: { files },
        retry_count: retryCount,
        max_retries: 3,
        error_message: null,
        worker_id: 'w1',
        heartbeat_at: now,
        created_at: now,
        started_at: now,
        completed_at: null,
        updated_at: now,
    };
}

async function failureOf(run: Promise<unknown>): Promise<PipelineError> {
    try {
        await run;
    } catch (err) {
        if (err instanceof PipelineError) return err;
        throw err;
    }
    throw new Error('expected the pipeline to fail');
}

describe('PipelineExecutor', () => {
    let executor: PipelineExecutor;

    beforeAll(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        executor = new PipelineExecutor({ threads: 1, pipelines: FIXTURE });
    });

    afterAll(async () => {
        await executor.destroy();
        jest.restoreAllMocks();
    });

    it('delivers every progress update before the result', async () => {
        const events: string[] = [];

        const result = await executor.run(taskFor(['a', 'b'], 1), update => {
            events.push(`${update.stage}:${update.fileIndex}`);
        });
        events.push('result');

        expect(events).toEqual(['file_processing:0', 'storage:0', 'file_processing:1', 'storage:1', 'result']);
        expect(result).toEqual({ processedFiles: 2, totalFiles: 2, metadata: { attempt: 2 } });
    });

    it('keeps a permanent failure permanent across the thread boundary', async () => {
        const updates: string[] = [];

        const err = await failureOf(executor.run(taskFor(['a', 'denied:contract.pdf']), u => updates.push(u.stage)));

        expect(err).toBeInstanceOf(PermanentPipelineError);
        expect(err.retryable).toBe(false);
        expect(err.message).toBe('Access to contract.pdf denied');
        expect(updates).toEqual(['file_processing', 'storage', 'file_processing']);
    });

    it('keeps a retryable pipeline failure retryable', async () => {
        const err = await failureOf(executor.run(taskFor(['throttled:notes.txt']), () => undefined));

        expect(err).not.toBeInstanceOf(PermanentPipelineError);
        expect(err.retryable).toBe(true);
        expect(err.name).toBe('PipelineError');
        expect(err.message).toBe('Embedding API throttled on notes.txt');
    });

    it('treats an unexpected error as retryable', async () => {
        const err = await failureOf(executor.run(taskFor(['broken:scan.png']), () => undefined));

        expect(err.retryable).toBe(true);
        expect(err.name).toBe('Error');
        expect(err.message).toBe('Cannot read scan.png');
    });
});
