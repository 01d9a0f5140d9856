import { PipelineHandler, TaskType, TASK_TYPES } from './types';

export interface Pipeline {
    taskType: TaskType;
    handler: PipelineHandler;
}

export function isTaskType(value: unknown): value is TaskType {
    return typeof value === 'string' && TASK_TYPES.some(t => t === value);
}

class Registry {
    private pipelines = new Map<TaskType, Pipeline>();

    register(taskType: string, handler: PipelineHandler): Pipeline {
        if (!taskType) {
            throw new Error('Task type cannot be empty');
        }
        if (!isTaskType(taskType)) {
            throw new Error(`Unknown task type "${taskType}". Known: [${TASK_TYPES.join(', ')}]`);
        }
        if (this.pipelines.has(taskType)) {
            throw new Error(`Pipeline for "${taskType}" is already registered.`);
        }
        const p: Pipeline = { taskType, handler };
        this.pipelines.set(taskType, p);
        return p;
    }

    get(taskType: string): Pipeline | undefined {
        return isTaskType(taskType) ? this.pipelines.get(taskType) : undefined;
    }

    list(): TaskType[] {
        return Array.from(this.pipelines.keys());
    }
}

export const pipelineRegistry = new Registry();

/**
 * Register the handler that runs tasks of the given type. Call it at module
 * top level in a file listed in INGEST_PIPELINES.
 *
 * @example
 * pipeline('file_ingestion', async ({ payload, reportProgress }) => {
 *   reportProgress({ stage: 'file_processing', fileIndex: 0, totalFiles: payload.files.length });
 *   ...
 *   return { processedFiles: payload.files.length, totalFiles: payload.files.length };
 * });
 */
export function pipeline(taskType: TaskType, handler: PipelineHandler): Pipeline {
    return pipelineRegistry.register(taskType, handler);
}
