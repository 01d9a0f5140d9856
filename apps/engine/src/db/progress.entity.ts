import { PipelineStage } from '@ingestq/sdk';

export type ProgressStage = 'queued' | PipelineStage | 'complete' | 'failed';

export enum progressStatus {
    PENDING = 'pending',
    IN_PROGRESS = 'in_progress',
    COMPLETED = 'completed',
    FAILED = 'failed'
}

/**
 * A row of ingest_progress: the externally visible state of a subject's
 * current or most recent task.
 */
export interface ProgressEntity {
    subject_id: string;
    task_id: string | null;
    resource_id: string;
    stage: ProgressStage;
    status: progressStatus;
    current_file: string | null;
    current_file_index: number;
    total_files: number;
    current_batch: number;
    total_batches: number;
    current_chunk: number;
    total_chunks: number;
    processed_files: number;
    failed_files: number;
    progress_percentage: number;
    queue_position: number | null;
    error_message: string | null;
    details: Record<string, unknown> | null;
    metadata: Record<string, unknown> | null;
    started_at: Date | null;
    updated_at: Date;
    completed_at: Date | null;
}

export interface NewProgress {
    subjectId: string;
    resourceId: string;
    taskId: string;
    totalFiles: number;
    queuePosition: number | null;
}

export interface ProgressPatch {
    stage?: ProgressStage;
    status?: progressStatus;
    currentFile?: string | null;
    currentFileIndex?: number;
    totalFiles?: number;
    currentBatch?: number;
    totalBatches?: number;
    currentChunk?: number;
    totalChunks?: number;
    processedFiles?: number;
    failedFiles?: number;
    progressPercentage?: number;
    queuePosition?: number | null;
    errorMessage?: string | null;
    details?: Record<string, unknown> | null;
    startedAt?: Date | null;
    completedAt?: Date | null;
    // merged into the stored metadata, never replaces it
    metadata?: Record<string, unknown>;
}
