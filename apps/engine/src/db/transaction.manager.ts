import { Pool, PoolClient } from 'pg';

/**
 * Runs a callback inside one database transaction.
 * Commits on success, rolls back and rethrows on error.
 *
 * @example
 * await txManager.run(async (client) => {
 *   await client.query('SELECT id FROM workflow_runs WHERE id = $1 FOR UPDATE', [runId]);
 *   await client.query('INSERT INTO step_records ...');
 * });
 */
export class TransactionManager {
    constructor(private readonly pool: Pool) { }

    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
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
}
