import { FileIngestionPayload, TaskType } from '@ingestq/sdk';

/**
 * Lifecycle states for ingestion tasks.
 * queued → processing → completed | failed, processing → queued on retry,
 * queued → cancelled. Terminal states never change again.
 */
export enum taskStatus {
    QUEUED = 'queued',
    PROCESSING = 'processing',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

export const ACTIVE_TASK_STATUSES: readonly taskStatus[] = [taskStatus.QUEUED, taskStatus.PROCESSING];

export function isTaskStatus(value: unknown): value is taskStatus {
    return Object.values(taskStatus).some(s => s === value);
}

/**
 * A row of ingest_tasks. One unit of queued ingestion work for a subject.
 */
export interface TaskEntity {
    id: string;
    subject_id: string;
    resource_id: string;   // downstream consumer, e.g. a provisioned agent
    task_type: TaskType;
    status: taskStatus;
    priority: number;
    queue_position: number | null;  // only while queued
    enqueue_seq: string;  // bigint; renewed on requeue
    available_at: Date;
    payload: FileIngestionPayload;
    retry_count: number;
    max_retries: number;
    error_message: string | null;
    worker_id: string | null;
    heartbeat_at: Date | null;  // For dead worker detection
    created_at: Date;
    started_at: Date | null;
    completed_at: Date | null;
    updated_at: Date;
}

export interface NewTask {
    subjectId: string;
    resourceId: string;
    taskType: TaskType;
    payload: FileIngestionPayload;
    priority: number;
    maxRetries: number;
}
