import { TerminalRunState } from '@briefline/sdk';

/**
 * Row shape of workflow_runs. Holds only facts fixed at creation plus the
 * cancellation request and the close marker; run state is derived from
 * step_records.
 */
export interface RunEntity {
    id: string;
    workflow_name: string;
    account_id: string;
    signal_key: string;
    signal: string | Record<string, unknown>;  // superjson document
    destination: string;
    cancel_requested_at: Date | null;
    outcome: TerminalRunState | null;
    closed_at: Date | null;
    created_at: Date;
    updated_at: Date;
}
