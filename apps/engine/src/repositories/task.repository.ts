import { Pool } from "pg";
import { NewTask, TaskEntity, taskStatus, isTaskStatus } from "../db/task.entity";
import { TransactionManager } from "../db/transaction.manager";
import { isUniqueViolation } from "../db";
import { DuplicateActiveJobError } from "../errors/queue.errors";

// pg_advisory_xact_lock key serialising queue position rewrites
const POSITION_LOCK_KEY = 7_240_117;

export interface FailOptions {
    permanent: boolean;
    retryDelayMs: number;
}

export type StatusCounts = Record<taskStatus, number>;

/**
 * Durable task table. Every state transition is a single conditional
 * statement keyed on the current status.
 */
export interface TaskStore {
    insert(task: NewTask): Promise<TaskEntity>;
    findById(id: string): Promise<TaskEntity | null>;
    findActiveBySubject(subjectId: string): Promise<TaskEntity | null>;
    findQueued(): Promise<TaskEntity[]>;
    claimNext(workerId: string): Promise<TaskEntity | null>;
    markCompleted(id: string): Promise<TaskEntity | null>;
    markFailed(id: string, error: string, opts: FailOptions): Promise<TaskEntity | null>;
    cancel(id: string): Promise<TaskEntity | null>;
    recomputePositions(): Promise<void>;
    /** False when the task is no longer processing under `workerId`. */
    updateHeartbeat(id: string, workerId: string | null): Promise<boolean>;
    countByStatus(): Promise<StatusCounts>;
    requeueStale(thresholdSeconds: number): Promise<TaskEntity[]>;
    failStale(thresholdSeconds: number): Promise<TaskEntity[]>;
}

export function emptyStatusCounts(): StatusCounts {
    return {
        [taskStatus.QUEUED]: 0,
        [taskStatus.PROCESSING]: 0,
        [taskStatus.COMPLETED]: 0,
        [taskStatus.FAILED]: 0,
        [taskStatus.CANCELLED]: 0,
    };
}

export class TaskRepository implements TaskStore {
    private readonly tx: TransactionManager;

    constructor(private pool: Pick<Pool, 'query' | 'connect'>) {
        this.tx = new TransactionManager(pool);
    }

    async insert(task: NewTask): Promise<TaskEntity> {
        try {
            const res = await this.pool.query(
                `INSERT INTO ingest_tasks (subject_id, resource_id, task_type, payload, priority, max_retries)
                 VALUES ($1, $2, $3, $4, $5, $6)
                 RETURNING *`,
                [task.subjectId, task.resourceId, task.taskType, JSON.stringify(task.payload), task.priority, task.maxRetries]
            );
            return res.rows[0];
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new DuplicateActiveJobError(task.subjectId);
            }
            throw err;
        }
    }

    async findById(id: string): Promise<TaskEntity | null> {
        const res = await this.pool.query('SELECT * FROM ingest_tasks WHERE id = $1', [id]);
        return res.rows[0] || null;
    }

    async findActiveBySubject(subjectId: string): Promise<TaskEntity | null> {
        // the partial unique index guarantees at most one row
        const res = await this.pool.query(
            'SELECT * FROM ingest_tasks WHERE subject_id = $1 AND status IN ($2, $3)',
            [subjectId, taskStatus.QUEUED, taskStatus.PROCESSING]
        );
        return res.rows[0] || null;
    }

    async findQueued(): Promise<TaskEntity[]> {
        const res = await this.pool.query(
            'SELECT * FROM ingest_tasks WHERE status = $1 ORDER BY priority DESC, enqueue_seq ASC',
            [taskStatus.QUEUED]
        );
        return res.rows;
    }

    async claimNext(workerId: string): Promise<TaskEntity | null> {
        const query = `
            WITH next_task AS (
                SELECT id FROM ingest_tasks
                WHERE status = $1 AND available_at <= NOW()
                ORDER BY priority DESC, enqueue_seq ASC
                LIMIT 1
                FOR UPDATE SKIP LOCKED
            )
            UPDATE ingest_tasks
            SET
                status = $2,
                worker_id = $3,
                started_at = NOW(),
                heartbeat_at = NOW(),
                queue_position = NULL,
                updated_at = NOW()
            FROM next_task
            WHERE ingest_tasks.id = next_task.id AND ingest_tasks.status = $1
            RETURNING ingest_tasks.*
        `;
        const res = await this.pool.query(query, [taskStatus.QUEUED, taskStatus.PROCESSING, workerId]);
        return res.rows[0] || null;
    }

    async markCompleted(id: string): Promise<TaskEntity | null> {
        const res = await this.pool.query(
            `UPDATE ingest_tasks
             SET status = $1, completed_at = NOW(), error_message = NULL, worker_id = NULL,
                 heartbeat_at = NULL, updated_at = NOW()
             WHERE id = $2 AND status = $3
             RETURNING *`,
            [taskStatus.COMPLETED, id, taskStatus.PROCESSING]
        );
        return res.rows[0] || null;
    }

    async markFailed(id: string, error: string, opts: FailOptions): Promise<TaskEntity | null> {
        // Right-hand sides see the pre-update row, so retry_count + 1 is this attempt
        const terminal = '($3::boolean OR retry_count + 1 >= max_retries)';
        const query = `
            UPDATE ingest_tasks
            SET
                retry_count = LEAST(retry_count + 1, max_retries),
                status = CASE WHEN ${terminal} THEN $5 ELSE $6 END,
                error_message = $2,
                completed_at = CASE WHEN ${terminal} THEN NOW() ELSE NULL END,
                started_at = CASE WHEN ${terminal} THEN started_at ELSE NULL END,
                enqueue_seq = CASE WHEN ${terminal} THEN enqueue_seq ELSE nextval('ingest_task_enqueue_seq') END,
                available_at = CASE WHEN ${terminal} THEN available_at
                                    ELSE NOW() + ($4::int * INTERVAL '1 millisecond') END,
                worker_id = NULL,
                heartbeat_at = NULL,
                updated_at = NOW()
            WHERE id = $1 AND status = $7
            RETURNING *
        `;
        const res = await this.pool.query(query, [
            id,
            error,
            opts.permanent,
            Math.max(0, Math.floor(opts.retryDelayMs)),
            taskStatus.FAILED,
            taskStatus.QUEUED,
            taskStatus.PROCESSING,
        ]);
        return res.rows[0] || null;
    }

    async cancel(id: string): Promise<TaskEntity | null> {
        const res = await this.pool.query(
            `UPDATE ingest_tasks
             SET status = $1, completed_at = NOW(), queue_position = NULL, updated_at = NOW()
             WHERE id = $2 AND status = $3
             RETURNING *`,
            [taskStatus.CANCELLED, id, taskStatus.QUEUED]
        );
        return res.rows[0] || null;
    }

    async recomputePositions(): Promise<void> {
        await this.tx.runExclusive(POSITION_LOCK_KEY, async (client) => {
            await client.query(
                'UPDATE ingest_tasks SET queue_position = NULL WHERE status <> $1 AND queue_position IS NOT NULL',
                [taskStatus.QUEUED]
            );
            await client.query(
                `UPDATE ingest_tasks t
                 SET queue_position = ranked.position
                 FROM (
                     SELECT id, ROW_NUMBER() OVER (ORDER BY priority DESC, enqueue_seq ASC)::int AS position
                     FROM ingest_tasks
                     WHERE status = $1
                 ) ranked
                 WHERE t.id = ranked.id AND t.queue_position IS DISTINCT FROM ranked.position`,
                [taskStatus.QUEUED]
            );
        });
    }

    async updateHeartbeat(id: string, workerId: string | null): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE ingest_tasks SET heartbeat_at = NOW()
             WHERE id = $1 AND status = $2 AND worker_id IS NOT DISTINCT FROM $3`,
            [id, taskStatus.PROCESSING, workerId]
        );
        return (res.rowCount ?? 0) > 0;
    }

    async countByStatus(): Promise<StatusCounts> {
        const res = await this.pool.query<{ status: string; count: number }>(
            'SELECT status, COUNT(*)::int AS count FROM ingest_tasks GROUP BY status'
        );
        const counts = emptyStatusCounts();
        for (const { status, count } of res.rows) {
            if (isTaskStatus(status)) {
                counts[status] = Number(count);
            }
        }
        return counts;
    }

    // Crashed tasks keep their enqueue_seq: they were at the head of the queue when claimed
    async requeueStale(thresholdSeconds: number): Promise<TaskEntity[]> {
        const res = await this.pool.query(
            `UPDATE ingest_tasks
             SET status = $1, worker_id = NULL, heartbeat_at = NULL, started_at = NULL,
                 retry_count = retry_count + 1, available_at = NOW(),
                 error_message = 'Worker stopped responding, task requeued', updated_at = NOW()
             WHERE status = $2
               AND COALESCE(heartbeat_at, started_at) < NOW() - (INTERVAL '1 second' * $3)
               AND retry_count + 1 < max_retries
             RETURNING *`,
            [taskStatus.QUEUED, taskStatus.PROCESSING, thresholdSeconds]
        );
        return res.rows;
    }

    async failStale(thresholdSeconds: number): Promise<TaskEntity[]> {
        const res = await this.pool.query(
            `UPDATE ingest_tasks
             SET status = $1, worker_id = NULL, heartbeat_at = NULL,
                 retry_count = LEAST(retry_count + 1, max_retries),
                 error_message = 'Task exceeded max retries after worker failure',
                 completed_at = NOW(), updated_at = NOW()
             WHERE status = $2
               AND COALESCE(heartbeat_at, started_at) < NOW() - (INTERVAL '1 second' * $3)
               AND retry_count + 1 >= max_retries
             RETURNING *`,
            [taskStatus.FAILED, taskStatus.PROCESSING, thresholdSeconds]
        );
        return res.rows;
    }
}
