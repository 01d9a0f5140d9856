import path from 'path';
import { MessageChannel } from 'worker_threads';
import Piscina from 'piscina';
import { PipelineResult, ProgressReporter, fromErrorInfo } from '@ingestq/sdk';
import { TaskEntity } from '../db/task.entity';
import { PipelineMessage, PipelineOutcome } from '../workers/pipeline.protocol';

const TAG = '[executor]';

/** Runs the pipeline for a claimed task. Rejects with a PipelineError on failure. */
export interface PipelineRunner {
    run(task: TaskEntity, onProgress: ProgressReporter): Promise<PipelineResult>;
}

export interface PipelineExecutorOptions {
    threads?: number;
    pipelines?: string;
}

/**
 * Runs pipelines on a piscina worker-thread pool so that CPU-heavy
 * extraction never stalls the event loop serving heartbeats and gRPC.
 */
export class PipelineExecutor implements PipelineRunner {
    private pool: Piscina;

    constructor(options: PipelineExecutorOptions = {}) {
        this.pool = this.createPool(options);
    }

    private createPool(options: PipelineExecutorOptions): Piscina {
        const isTs = path.extname(__filename) === '.ts';
        const workerExt = isTs ? '.ts' : '.js';
        const workerPath = path.resolve(__dirname, `../workers/pipeline.worker${workerExt}`);
        const threads = Math.max(1, options.threads ?? 1);

        const pool = new Piscina({
            filename: workerPath,
            execArgv: isTs ? ['--import', 'tsx'] : [],
            maxThreads: threads,
            minThreads: 1,
            idleTimeout: 30000,
            env: {
                ...process.env,
                INGEST_PIPELINES: options.pipelines ?? process.env.INGEST_PIPELINES ?? '',
            },
        });

        console.log(`${TAG} Piscina pool: ${threads} threads`);
        return pool;
    }

    async run(task: TaskEntity, onProgress: ProgressReporter): Promise<PipelineResult> {
        const { port1, port2 } = new MessageChannel();

        let markDrained: () => void = () => undefined;
        const drained = new Promise<void>(resolve => { markDrained = resolve; });

        port1.on('message', (message: PipelineMessage) => {
            if (message.type === 'end') {
                markDrained();
                return;
            }
            try {
                onProgress(message.update);
            } catch (err) {
                console.error(`${TAG} Task ${task.id} progress handler failed:`, err);
            }
        });

        try {
            const outcome: PipelineOutcome = await this.pool.run(
                {
                    taskId: task.id,
                    subjectId: task.subject_id,
                    resourceId: task.resource_id,
                    taskType: task.task_type,
                    payload: task.payload,
                    attempt: task.retry_count + 1,
                    port: port2,
                },
                { transferList: [port2] },
            );

            // progress posted before the outcome must reach onProgress first
            await drained;

            if (!outcome.ok) {
                throw fromErrorInfo(outcome.error);
            }
            return outcome.result;
        } finally {
            port1.close();
        }
    }

    async destroy(): Promise<void> {
        await this.pool.destroy();
        console.log(`${TAG} Pool destroyed`);
    }
}
