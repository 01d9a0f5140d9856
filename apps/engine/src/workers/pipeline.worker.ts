import path from 'path';
import { PermanentPipelineError, pipelineRegistry, toErrorInfo } from '@ingestq/sdk';
import { PipelineMessage, PipelineOutcome, PipelineThreadTask } from './pipeline.protocol';

const TAG = '[pipeline-thread]';

/** Requires every module listed in INGEST_PIPELINES so their pipeline() calls register. */
export function loadPipelines(list: string | undefined = process.env.INGEST_PIPELINES): string[] {
    const paths = list?.split(',').map(p => p.trim()).filter(Boolean) || [];
    if (paths.length === 0) {
        console.log(`${TAG} No INGEST_PIPELINES set, running without pipelines`);
        return [];
    }

    const loaded: string[] = [];
    for (const p of paths) {
        // Resolve relative to process.cwd(), not this file
        const resolved = path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
        try {
            // eslint-disable-next-line
            require(resolved);
            loaded.push(resolved);
            console.log(`${TAG} Loaded pipelines from: ${resolved}`);
        } catch (err) {
            console.error(`${TAG} Failed to load pipelines: ${p}`, err);
        }
    }
    return loaded;
}

loadPipelines();

export default async function runPipelineJob(job: PipelineThreadTask): Promise<PipelineOutcome> {
    const { port } = job;
    const post = (message: PipelineMessage): void => port.postMessage(message);

    try {
        const registered = pipelineRegistry.get(job.taskType);
        if (!registered) {
            throw new PermanentPipelineError(
                `No pipeline registered for task type "${job.taskType}". Registered: [${pipelineRegistry.list().join(', ')}]`,
            );
        }

        const result = await registered.handler({
            taskId: job.taskId,
            subjectId: job.subjectId,
            resourceId: job.resourceId,
            taskType: registered.taskType,
            payload: job.payload,
            attempt: job.attempt,
            reportProgress: update => post({ type: 'progress', update }),
        });
        return { ok: true, result };
    } catch (err) {
        return { ok: false, error: toErrorInfo(err) };
    } finally {
        post({ type: 'end' });
    }
}
