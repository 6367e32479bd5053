import { ScheduledStepRecord, Signal, StepRecord, TerminalRunState } from '@briefline/sdk';

/**
 * Append-only log of step attempts, the source of truth for recovery.
 * `append` rejects with ConflictError when the record does not follow from
 * the current head of its (runId, stepName) sequence.
 */
export interface WorkflowHistory {
    append(record: StepRecord): Promise<void>;
    load(runId: string): Promise<StepRecord[]>;
    /** Attempts that were scheduled before `startedBefore` and never closed. */
    listOutstanding(startedBefore: Date, limit: number): Promise<ScheduledStepRecord[]>;
}

export interface RunHeader {
    id: string;
    workflowName: string;
    accountId: string;
    signalKey: string;
    signal: Signal;
    destination: string;
    cancelRequestedAt: Date | null;
    outcome: TerminalRunState | null;
    closedAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface NewRun {
    id: string;
    workflowName: string;
    signal: Signal;
    destination: string;
}

export type CreateRunStatus = 'created' | 'coalesced' | 'duplicate';

export interface CreateRunResult {
    status: CreateRunStatus;
    run: RunHeader;
}

export interface RunStore {
    /**
     * Creates the run unless the account already has an open run (coalesced)
     * or the same signal already produced one (duplicate).
     */
    createOrFindActive(run: NewRun): Promise<CreateRunResult>;
    findById(id: string): Promise<RunHeader | null>;
    listActive(limit: number): Promise<RunHeader[]>;
    /** Returns false when the run is already closed. */
    requestCancel(id: string): Promise<boolean>;
    /** Idempotent: a closed run keeps its first outcome. Resolves true only for the call that closed it. */
    close(id: string, outcome: TerminalRunState): Promise<boolean>;
}

// A re-polled signal keeps its lastSeen, so this identifies it across polls
export function signalKey(signal: Signal): string {
    return `${signal.accountId}:${signal.lastSeen.toISOString()}`;
}
