import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData, ServerErrorResponse } from '@grpc/grpc-js';
import { SerializationError, fromBytes, toBytes } from '@ingestq/sdk';
import { ProgressEntity } from '../db/progress.entity';
import { DuplicateActiveJobError, TaskNotFoundError, ValidationError } from '../errors/queue.errors';
import { QueueService, QueueStats } from '../services/queue.service';
import { ProgressService } from '../services/progress.service';
import { SubmissionService } from '../services/submission.service';
import { WorkerStatus } from '../services/worker';

const TAG = '[IngestService]';

interface SubmitIngestionRequest {
    subject_id: string;
    resource_id: string;
    payload: Buffer;
    priority: number;
}

interface SubmitIngestionResponse {
    task_id: string;
    queue_position: number;
}

interface SubjectRequest {
    subject_id: string;
}

interface TaskRequest {
    task_id: string;
}

type Empty = Record<string, never>;

/** The part of a unary call the handlers read. */
export type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

export interface ProgressMessage {
    subject_id: string;
    task_id: string;
    resource_id: string;
    stage: string;
    status: string;
    current_file: string;
    current_file_index: number;
    total_files: number;
    current_batch: number;
    total_batches: number;
    current_chunk: number;
    total_chunks: number;
    processed_files: number;
    failed_files: number;
    progress_percentage: number;
    queue_position: number;
    error_message: string;
    details: Buffer;
    metadata: Buffer;
    started_at: string;
    updated_at: string;
    completed_at: string;
}

interface WorkerStatusMessage {
    state: string;
    worker_id: string;
    current_task_id: string;
    poll_interval_ms: number;
}

const EMPTY_BYTES = Buffer.alloc(0);

function isoOrEmpty(date: Date | null): string {
    return date ? new Date(date).toISOString() : '';
}

export function toProgressMessage(record: ProgressEntity): ProgressMessage {
    return {
        subject_id: record.subject_id,
        task_id: record.task_id ?? '',
        resource_id: record.resource_id,
        stage: record.stage,
        status: record.status,
        current_file: record.current_file ?? '',
        current_file_index: record.current_file_index,
        total_files: record.total_files,
        current_batch: record.current_batch,
        total_batches: record.total_batches,
        current_chunk: record.current_chunk,
        total_chunks: record.total_chunks,
        processed_files: record.processed_files,
        failed_files: record.failed_files,
        progress_percentage: record.progress_percentage,
        queue_position: record.queue_position ?? 0,
        error_message: record.error_message ?? '',
        details: record.details ? toBytes(record.details) : EMPTY_BYTES,
        metadata: record.metadata ? toBytes(record.metadata) : EMPTY_BYTES,
        started_at: isoOrEmpty(record.started_at),
        updated_at: isoOrEmpty(record.updated_at),
        completed_at: isoOrEmpty(record.completed_at),
    };
}

export function toServiceError(err: unknown): Partial<ServerErrorResponse> {
    const message = err instanceof Error ? err.message : 'Unknown error';
    if (err instanceof ValidationError || err instanceof SerializationError) {
        return { code: grpc.status.INVALID_ARGUMENT, message };
    }
    if (err instanceof DuplicateActiveJobError) {
        return { code: grpc.status.ALREADY_EXISTS, message };
    }
    if (err instanceof TaskNotFoundError) {
        return { code: grpc.status.NOT_FOUND, message };
    }
    return { code: grpc.status.INTERNAL, message };
}

/**
 * gRPC surface of the ingestion queue: submission, progress queries,
 * cancellation and queue/worker introspection.
 */
export class IngestServiceImpl {
    constructor(
        private readonly submissions: SubmissionService,
        private readonly queue: QueueService,
        private readonly progress: ProgressService,
        private readonly worker: { getStatus(): WorkerStatus },
    ) { }

    /**
     * Queues an ingestion run for a subject. The payload bytes are
     * superjson-encoded. Returns ALREADY_EXISTS when the subject already
     * has a queued or processing task.
     */
    async submitIngestion(
        call: UnaryCall<SubmitIngestionRequest>,
        callback: sendUnaryData<SubmitIngestionResponse>,
    ) {
        try {
            const { subject_id, resource_id, payload, priority } = call.request;
            const decoded = fromBytes<unknown>(payload);
            if (decoded === undefined) {
                throw new ValidationError('payload is required');
            }

            const result = await this.submissions.submit({
                subjectId: subject_id,
                resourceId: resource_id,
                payload: decoded,
                priority,
            });
            callback(null, { task_id: result.taskId, queue_position: result.queuePosition ?? 0 });
        } catch (error) {
            console.error(`${TAG} submitIngestion error:`, error);
            callback(toServiceError(error));
        }
    }

    async getProgress(
        call: UnaryCall<SubjectRequest>,
        callback: sendUnaryData<ProgressMessage>,
    ) {
        try {
            const record = await this.progress.get(call.request.subject_id);
            if (!record) {
                callback({ code: grpc.status.NOT_FOUND, message: `No progress for subject ${call.request.subject_id}` });
                return;
            }
            callback(null, toProgressMessage(record));
        } catch (error) {
            console.error(`${TAG} getProgress error:`, error);
            callback(toServiceError(error));
        }
    }

    async listActiveProgress(
        _call: UnaryCall<Empty>,
        callback: sendUnaryData<{ records: ProgressMessage[] }>,
    ) {
        try {
            const records = await this.progress.listActive();
            callback(null, { records: records.map(toProgressMessage) });
        } catch (error) {
            console.error(`${TAG} listActiveProgress error:`, error);
            callback(toServiceError(error));
        }
    }

    async deleteProgress(
        call: UnaryCall<SubjectRequest>,
        callback: sendUnaryData<{ deleted: boolean }>,
    ) {
        try {
            const deleted = await this.progress.delete(call.request.subject_id);
            if (!deleted) {
                callback({ code: grpc.status.NOT_FOUND, message: `No progress for subject ${call.request.subject_id}` });
                return;
            }
            callback(null, { deleted });
        } catch (error) {
            console.error(`${TAG} deleteProgress error:`, error);
            callback(toServiceError(error));
        }
    }

    /** Only queued tasks can be cancelled; success is false otherwise, NOT_FOUND for an unknown id. */
    async cancelTask(
        call: UnaryCall<TaskRequest>,
        callback: sendUnaryData<{ success: boolean }>,
    ) {
        try {
            const success = await this.submissions.cancel(call.request.task_id);
            callback(null, { success });
        } catch (error) {
            console.error(`${TAG} cancelTask error:`, error);
            callback(toServiceError(error));
        }
    }

    async getQueueStats(
        _call: UnaryCall<Empty>,
        callback: sendUnaryData<QueueStats>,
    ) {
        try {
            callback(null, await this.queue.stats());
        } catch (error) {
            console.error(`${TAG} getQueueStats error:`, error);
            callback(toServiceError(error));
        }
    }

    getWorkerStatus(
        _call: UnaryCall<Empty>,
        callback: sendUnaryData<WorkerStatusMessage>,
    ) {
        const status = this.worker.getStatus();
        callback(null, {
            state: status.state,
            worker_id: status.workerId,
            current_task_id: status.currentTaskId ?? '',
            poll_interval_ms: status.pollIntervalMs,
        });
    }
}
