import { Pool, PoolClient } from 'pg';

export type TransactionCallback<T> = (client: PoolClient) => Promise<T>;

/**
 * Runs work on a single pooled connection inside BEGIN/COMMIT, rolling back
 * and re-throwing when the callback fails.
 */
export class TransactionManager {
    constructor(private readonly pool: Pick<Pool, 'connect'>) { }

    async run<T>(callback: TransactionCallback<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }

    /**
     * Same as run(), holding a transaction-scoped advisory lock for its whole
     * duration. Concurrent callers with the same key queue up behind each other.
     */
    runExclusive<T>(lockKey: number, callback: TransactionCallback<T>): Promise<T> {
        return this.run(async (client) => {
            await client.query('SELECT pg_advisory_xact_lock($1)', [lockKey]);
            return callback(client);
        });
    }
}
