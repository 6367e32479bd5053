import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';

const TAG = '[migrate]';
export const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

// pg_advisory_lock key shared by every instance
export const MIGRATION_LOCK_ID = 727_401;

/**
 * Applies every .sql file in the migrations directory in name order.
 * Statements are written to be re-runnable (IF NOT EXISTS); the advisory
 * lock keeps instances starting together from applying them concurrently.
 */
export async function migrate(pool: Pool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
    const client = await pool.connect();

    try {
        await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
        try {
            for (const file of files) {
                const sql = await readFile(path.join(dir, file), 'utf-8');
                await client.query(sql);
                console.log(`${TAG} applied ${file}`);
            }
        } finally {
            await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]);
        }
    } finally {
        client.release();
    }
    return files;
}
