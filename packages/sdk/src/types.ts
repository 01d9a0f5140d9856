export type TaskType = 'file_ingestion';

export const TASK_TYPES: readonly TaskType[] = ['file_ingestion'];

/** Coarse pipeline phases, in the order a single file goes through them. */
export type PipelineStage = 'file_processing' | 'text_extraction' | 'embedding' | 'storage';

export interface FileIngestionPayload {
    files: string[];
    options?: Record<string, unknown>;
}

export interface ProgressUpdate {
    stage: PipelineStage;
    fileIndex?: number;
    totalFiles?: number;
    currentFile?: string;
    currentBatch?: number;
    totalBatches?: number;
    currentChunk?: number;
    totalChunks?: number;
    processedFiles?: number;
    failedFiles?: number;
    // 0..1 within the stage. Embedding falls back to currentChunk / totalChunks.
    stageProgress?: number;
    details?: Record<string, unknown>;
}

/** Must stay synchronous: pipelines call it once per processed batch. */
export type ProgressReporter = (update: ProgressUpdate) => void;

export interface FailedFile {
    fileId: string;
    error: string;
}

export interface PipelineResult {
    processedFiles: number;
    totalFiles: number;
    failedFiles?: FailedFile[];
    metadata?: Record<string, unknown>;
}

export interface PipelineContext {
    taskId: string;
    subjectId: string;
    resourceId: string;
    taskType: TaskType;
    payload: FileIngestionPayload;
    attempt: number;
    reportProgress: ProgressReporter;
}

export type PipelineHandler = (ctx: PipelineContext) => Promise<PipelineResult>;
