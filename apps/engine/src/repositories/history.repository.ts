import { Pool } from 'pg';
import {
    ScheduledStepRecord,
    StepError,
    StepRecord,
    deserialize,
    isErrorKind,
    isStepKind,
    serialize,
} from '@briefline/sdk';
import { StepRecordEntity } from '../db/step_record.entity';
import { TransactionManager } from '../db/transaction.manager';
import { ConflictError, RunNotFoundError } from '../errors';
import { StepHead, checkAppend } from './history-rules';
import { WorkflowHistory } from './types';

const UNIQUE_VIOLATION = '23505';

// jsonb columns come back parsed; superjson wants its document as text
export function fromJsonb(value: unknown): unknown {
    if (value === null || value === undefined) return undefined;
    return deserialize(typeof value === 'string' ? value : JSON.stringify(value));
}

function toJsonb(value: unknown): string | null {
    const encoded = serialize(value);
    return encoded === '' ? null : encoded;
}

function toStepError(value: unknown): StepError {
    if (
        typeof value === 'object' && value !== null &&
        'kind' in value && 'message' in value &&
        isErrorKind(value.kind) && typeof value.message === 'string'
    ) {
        return { kind: value.kind, message: value.message };
    }
    return { kind: 'permanent', message: `unreadable error payload: ${JSON.stringify(value)}` };
}

function requireEndedAt(row: StepRecordEntity): Date {
    if (!row.ended_at) {
        throw new Error(`step record ${row.seq} is ${row.status} but has no ended_at`);
    }
    return new Date(row.ended_at);
}

export function toStepRecord(row: StepRecordEntity): StepRecord {
    if (!isStepKind(row.step_name)) {
        throw new Error(`step record ${row.seq} has unknown step "${row.step_name}"`);
    }
    const base = {
        runId: row.run_id,
        stepName: row.step_name,
        attempt: row.attempt,
        input: fromJsonb(row.input),
        startedAt: new Date(row.started_at),
    };

    switch (row.status) {
        case 'scheduled':
            return { ...base, status: 'scheduled', endedAt: null };
        case 'succeeded':
            return { ...base, status: 'succeeded', output: fromJsonb(row.output), endedAt: requireEndedAt(row) };
        case 'failed':
        case 'timed_out':
            return { ...base, status: row.status, error: toStepError(row.error), endedAt: requireEndedAt(row) };
    }
}

function isUniqueViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

/**
 * Postgres-backed history. Each append is one transaction that locks the
 * run row, so appends for a run are serialised and land in `seq` order.
 */
export class PgWorkflowHistory implements WorkflowHistory {
    private readonly tx: TransactionManager;

    constructor(private readonly pool: Pool) {
        this.tx = new TransactionManager(pool);
    }

    async append(record: StepRecord): Promise<void> {
        const input = toJsonb(record.input);
        const output = record.status === 'succeeded' ? toJsonb(record.output) : null;
        const error = record.status === 'failed' || record.status === 'timed_out' ? JSON.stringify(record.error) : null;

        try {
            await this.tx.run(async (client) => {
                const run = await client.query<{ id: string }>(
                    'SELECT id FROM workflow_runs WHERE id = $1 FOR UPDATE',
                    [record.runId],
                );
                if (run.rows.length === 0) throw new RunNotFoundError(record.runId);

                const head = await client.query<StepHead>(
                    `SELECT status, attempt FROM step_records
                     WHERE run_id = $1 AND step_name = $2
                     ORDER BY seq DESC
                     LIMIT 1`,
                    [record.runId, record.stepName],
                );
                const reason = checkAppend(record, head.rows[0] ?? null);
                if (reason) throw new ConflictError(record.runId, record.stepName, reason);

                await client.query(
                    `INSERT INTO step_records (run_id, step_name, attempt, status, input, output, error, started_at, ended_at)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
                    [record.runId, record.stepName, record.attempt, record.status, input, output, error, record.startedAt, record.endedAt],
                );
            });
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new ConflictError(record.runId, record.stepName, `attempt ${record.attempt} was scheduled concurrently`);
            }
            throw err;
        }
    }

    async load(runId: string): Promise<StepRecord[]> {
        const res = await this.pool.query<StepRecordEntity>(
            'SELECT * FROM step_records WHERE run_id = $1 ORDER BY seq ASC',
            [runId],
        );
        return res.rows.map(toStepRecord);
    }

    async listOutstanding(startedBefore: Date, limit: number): Promise<ScheduledStepRecord[]> {
        const res = await this.pool.query<StepRecordEntity>(
            `SELECT s.* FROM step_records s
             WHERE s.status = 'scheduled'
               AND s.started_at < $1
               AND NOT EXISTS (
                   SELECT 1 FROM step_records t
                   WHERE t.run_id = s.run_id AND t.step_name = s.step_name
                     AND t.attempt = s.attempt AND t.seq > s.seq
               )
             ORDER BY s.started_at ASC
             LIMIT $2`,
            [startedBefore, limit],
        );

        const outstanding: ScheduledStepRecord[] = [];
        for (const row of res.rows) {
            const record = toStepRecord(row);
            if (record.status === 'scheduled') outstanding.push(record);
        }
        return outstanding;
    }
}
