import { Pool } from 'pg';
import { NewProgress, ProgressEntity, ProgressPatch, progressStatus } from '../db/progress.entity';

export interface ProgressStore {
    upsert(progress: NewProgress): Promise<ProgressEntity>;
    findBySubject(subjectId: string): Promise<ProgressEntity | null>;
    findActive(): Promise<ProgressEntity[]>;
    update(subjectId: string, patch: ProgressPatch): Promise<ProgressEntity | null>;
    delete(subjectId: string): Promise<boolean>;
}

type PlainKey = Exclude<keyof ProgressPatch, 'status' | 'progressPercentage' | 'details' | 'metadata'>;

const PLAIN_COLUMNS: ReadonlyArray<[PlainKey, string]> = [
    ['stage', 'stage'],
    ['currentFile', 'current_file'],
    ['currentFileIndex', 'current_file_index'],
    ['totalFiles', 'total_files'],
    ['currentBatch', 'current_batch'],
    ['totalBatches', 'total_batches'],
    ['currentChunk', 'current_chunk'],
    ['totalChunks', 'total_chunks'],
    ['processedFiles', 'processed_files'],
    ['failedFiles', 'failed_files'],
    ['queuePosition', 'queue_position'],
    ['errorMessage', 'error_message'],
    ['startedAt', 'started_at'],
    ['completedAt', 'completed_at'],
];

export class ProgressRepository implements ProgressStore {
    constructor(private readonly pool: Pick<Pool, 'query'>) { }

    // A new task replaces whatever the subject's previous run left behind.
    // Re-creating the record of the same task is a no-op.
    async upsert(progress: NewProgress): Promise<ProgressEntity> {
        const res = await this.pool.query(
            `INSERT INTO ingest_progress
                 (subject_id, resource_id, task_id, total_files, queue_position, stage, status, progress_percentage)
             VALUES ($1, $2, $3, $4, $5, 'queued', $6, 0)
             ON CONFLICT (subject_id) DO UPDATE SET
                 resource_id = EXCLUDED.resource_id,
                 task_id = EXCLUDED.task_id,
                 total_files = EXCLUDED.total_files,
                 queue_position = EXCLUDED.queue_position,
                 stage = 'queued',
                 status = EXCLUDED.status,
                 current_file = NULL,
                 current_file_index = 0,
                 current_batch = 0,
                 total_batches = 0,
                 current_chunk = 0,
                 total_chunks = 0,
                 processed_files = 0,
                 failed_files = 0,
                 progress_percentage = 0,
                 error_message = NULL,
                 details = NULL,
                 metadata = NULL,
                 started_at = NULL,
                 completed_at = NULL,
                 updated_at = NOW()
             WHERE ingest_progress.task_id IS DISTINCT FROM EXCLUDED.task_id
             RETURNING *`,
            [
                progress.subjectId,
                progress.resourceId,
                progress.taskId,
                progress.totalFiles,
                progress.queuePosition,
                progressStatus.PENDING,
            ],
        );
        if (res.rows[0]) return res.rows[0];

        const existing = await this.findBySubject(progress.subjectId);
        if (!existing) throw new Error(`Progress record for subject ${progress.subjectId} vanished during upsert`);
        return existing;
    }

    async findBySubject(subjectId: string): Promise<ProgressEntity | null> {
        const res = await this.pool.query('SELECT * FROM ingest_progress WHERE subject_id = $1', [subjectId]);
        return res.rows[0] || null;
    }

    async findActive(): Promise<ProgressEntity[]> {
        const res = await this.pool.query(
            'SELECT * FROM ingest_progress WHERE status IN ($1, $2) ORDER BY updated_at DESC',
            [progressStatus.PENDING, progressStatus.IN_PROGRESS],
        );
        return res.rows;
    }

    async update(subjectId: string, patch: ProgressPatch): Promise<ProgressEntity | null> {
        const values: unknown[] = [subjectId];
        const param = (value: unknown): string => {
            values.push(value);
            return `$${values.length}`;
        };
        const sets: string[] = [];

        // Right-hand sides see the old row: `status` below is the current status
        let nextStatus = 'status';
        if (patch.status !== undefined) {
            nextStatus = `${param(patch.status)}::text`;
            sets.push(`status = ${nextStatus}`);
        }

        for (const [key, column] of PLAIN_COLUMNS) {
            const value = patch[key];
            if (value !== undefined) sets.push(`${column} = ${param(value)}`);
        }

        if (patch.progressPercentage !== undefined) {
            const pct = `${param(clampPercentage(patch.progressPercentage))}::double precision`;
            // never moves backwards while the run stays in progress
            sets.push(
                `progress_percentage = CASE
                     WHEN status = '${progressStatus.IN_PROGRESS}' AND ${nextStatus} = '${progressStatus.IN_PROGRESS}'
                     THEN GREATEST(progress_percentage, ${pct})
                     ELSE ${pct}
                 END`,
            );
        }

        if (patch.details !== undefined) {
            sets.push(`details = ${param(patch.details === null ? null : JSON.stringify(patch.details))}::jsonb`);
        }
        if (patch.metadata !== undefined) {
            // merged into what earlier attempts recorded
            sets.push(`metadata = COALESCE(metadata, '{}'::jsonb) || ${param(JSON.stringify(patch.metadata))}::jsonb`);
        }
        sets.push('updated_at = NOW()');

        const res = await this.pool.query(
            `UPDATE ingest_progress SET ${sets.join(', ')} WHERE subject_id = $1 RETURNING *`,
            values,
        );
        return res.rows[0] || null;
    }

    async delete(subjectId: string): Promise<boolean> {
        const res = await this.pool.query('DELETE FROM ingest_progress WHERE subject_id = $1', [subjectId]);
        return (res.rowCount ?? 0) > 0;
    }
}

export function clampPercentage(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(100, Math.max(0, value));
}
