import { Pool } from 'pg';
import { TerminalRunState, parseSignal, serialize } from '@briefline/sdk';
import { RunEntity } from '../db/run.entity';
import { RunNotFoundError } from '../errors';
import { fromJsonb } from './history.repository';
import { CreateRunResult, NewRun, RunHeader, RunStore, signalKey } from './types';

// the open run an insert collided with can close before we read it back
const MAX_CREATE_ATTEMPTS = 3;

export function toRunHeader(row: RunEntity): RunHeader {
    return {
        id: row.id,
        workflowName: row.workflow_name,
        accountId: row.account_id,
        signalKey: row.signal_key,
        signal: parseSignal(fromJsonb(row.signal)),
        destination: row.destination,
        cancelRequestedAt: row.cancel_requested_at ? new Date(row.cancel_requested_at) : null,
        outcome: row.outcome,
        closedAt: row.closed_at ? new Date(row.closed_at) : null,
        createdAt: new Date(row.created_at),
        updatedAt: new Date(row.updated_at),
    };
}

export class PgRunRepository implements RunStore {
    constructor(private readonly pool: Pool) { }

    async createOrFindActive(run: NewRun): Promise<CreateRunResult> {
        const key = signalKey(run.signal);

        for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
            // Conflicts on either unique index: signal_key, or the open-run-per-account partial index
            const inserted = await this.pool.query<RunEntity>(
                `INSERT INTO workflow_runs (id, workflow_name, account_id, signal_key, signal, destination)
                 VALUES ($1, $2, $3, $4, $5, $6)
                 ON CONFLICT DO NOTHING
                 RETURNING *`,
                [run.id, run.workflowName, run.signal.accountId, key, serialize(run.signal), run.destination],
            );
            const created = inserted.rows[0];
            if (created) return { status: 'created', run: toRunHeader(created) };

            const duplicate = await this.pool.query<RunEntity>(
                'SELECT * FROM workflow_runs WHERE signal_key = $1',
                [key],
            );
            const sameSignal = duplicate.rows[0];
            if (sameSignal) return { status: 'duplicate', run: toRunHeader(sameSignal) };

            const active = await this.pool.query<RunEntity>(
                'SELECT * FROM workflow_runs WHERE account_id = $1 AND closed_at IS NULL',
                [run.signal.accountId],
            );
            const open = active.rows[0];
            if (open) return { status: 'coalesced', run: toRunHeader(open) };
        }

        throw new Error(`Could not create or find a run for account ${run.signal.accountId}`);
    }

    async findById(id: string): Promise<RunHeader | null> {
        const res = await this.pool.query<RunEntity>('SELECT * FROM workflow_runs WHERE id = $1', [id]);
        const row = res.rows[0];
        return row ? toRunHeader(row) : null;
    }

    async listActive(limit: number): Promise<RunHeader[]> {
        const res = await this.pool.query<RunEntity>(
            'SELECT * FROM workflow_runs WHERE closed_at IS NULL ORDER BY created_at ASC LIMIT $1',
            [limit],
        );
        return res.rows.map(toRunHeader);
    }

    async requestCancel(id: string): Promise<boolean> {
        const res = await this.pool.query<{ id: string }>(
            `UPDATE workflow_runs
             SET cancel_requested_at = COALESCE(cancel_requested_at, NOW()), updated_at = NOW()
             WHERE id = $1 AND closed_at IS NULL
             RETURNING id`,
            [id],
        );
        if (res.rows.length > 0) return true;

        const existing = await this.findById(id);
        if (!existing) throw new RunNotFoundError(id);
        return false;
    }

    async close(id: string, outcome: TerminalRunState): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE workflow_runs
             SET outcome = $2, closed_at = NOW(), updated_at = NOW()
             WHERE id = $1 AND closed_at IS NULL`,
            [id, outcome],
        );
        return (res.rowCount ?? 0) > 0;
    }
}
