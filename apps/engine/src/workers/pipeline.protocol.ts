import type { MessagePort } from 'worker_threads';
import type { ErrorInfo, FileIngestionPayload, PipelineResult, ProgressUpdate } from '@ingestq/sdk';

// Messages crossing the worker-thread boundary. Everything here must survive structured clone.

export interface PipelineJob {
    taskId: string;
    subjectId: string;
    resourceId: string;
    taskType: string;
    payload: FileIngestionPayload;
    attempt: number;
}

export interface PipelineThreadTask extends PipelineJob {
    port: MessagePort;
}

export type PipelineMessage =
    | { type: 'progress'; update: ProgressUpdate }
    | { type: 'end' };  // posted last; no progress follows it

export type PipelineOutcome =
    | { ok: true; result: PipelineResult }
    | { ok: false; error: ErrorInfo };
