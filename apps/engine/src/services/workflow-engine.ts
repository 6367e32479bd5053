import {
    ErrorKind,
    RunState,
    Signal,
    StepInputContext,
    StepKind,
    StepRecord,
    WorkflowDefinition,
    WorkflowRegistry,
} from '@briefline/sdk';
import { HistoryMismatchError, RunNotFoundError } from '../errors';
import { RunHeader, RunStore, WorkflowHistory } from '../repositories/types';
import { calculateBackOff } from '../utils/backoff';

export type Decision =
    | { type: 'execute_step'; step: StepKind; stepIndex: number; attempt: number; input: unknown; timeoutMs: number }
    | { type: 'await_retry'; step: StepKind; attempt: number; delayMs: number; dueAt: Date }
    | { type: 'wait'; step: StepKind; attempt: number }
    | { type: 'complete'; result: unknown }
    | { type: 'fail'; step: StepKind; errorKind: ErrorKind; reason: string }
    | { type: 'abandon'; reason: string };

export type DecisionType = Decision['type'];

/** The part of a run header the fold reads. */
export type RunContext = Pick<RunHeader, 'id' | 'workflowName' | 'signal' | 'destination' | 'cancelRequestedAt'>;

interface StepProgress {
    last: StepRecord | null;
    succeeded: boolean;
    output: unknown;
}

function foldHistory(definition: WorkflowDefinition, run: RunContext, records: StepRecord[]): Map<StepKind, StepProgress> {
    const progress = new Map<StepKind, StepProgress>();
    for (const step of definition.steps) {
        progress.set(step.kind, { last: null, succeeded: false, output: undefined });
    }

    for (const record of records) {
        const entry = progress.get(record.stepName);
        if (!entry) throw new HistoryMismatchError(run.id, definition.name, record.stepName);
        entry.last = record;
        if (record.status === 'succeeded') {
            entry.succeeded = true;
            entry.output = record.output;
        }
    }
    return progress;
}

function inputContext(run: RunContext, progress: Map<StepKind, StepProgress>): StepInputContext {
    const outputs = new Map<StepKind, unknown>();
    for (const [kind, entry] of progress) {
        if (entry.succeeded) outputs.set(kind, entry.output);
    }
    return { runId: run.id, signal: run.signal, destination: run.destination, outputs };
}

function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Pure decision function: identical (definition, run, records, now) always
 * yields an identical Decision, which is what makes crash recovery a replay.
 */
export function decide(
    definition: WorkflowDefinition,
    run: RunContext,
    records: StepRecord[],
    now: Date,
): Decision {
    const progress = foldHistory(definition, run, records);
    const ctx = inputContext(run, progress);

    const stepIndex = definition.steps.findIndex((step) => !progress.get(step.kind)?.succeeded);
    if (stepIndex === -1) {
        try {
            return { type: 'complete', result: definition.result(ctx) };
        } catch (err) {
            const step = definition.steps[definition.steps.length - 1].kind;
            return { type: 'fail', step, errorKind: 'malformed_input', reason: `result could not be built: ${messageOf(err)}` };
        }
    }

    const cursor = definition.steps[stepIndex];

    const last = progress.get(cursor.kind)?.last ?? null;
    if (last?.status === 'scheduled') {
        return { type: 'wait', step: cursor.kind, attempt: last.attempt };
    }

    let nextAttempt = 1;
    if (last && (last.status === 'failed' || last.status === 'timed_out')) {
        const { kind, message } = last.error;
        const policy = cursor.retry;

        if (!policy.retryableErrorKinds.includes(kind)) {
            return {
                type: 'fail',
                step: cursor.kind,
                errorKind: kind,
                reason: `${cursor.kind} attempt ${last.attempt} failed (${kind}): ${message}`,
            };
        }
        if (last.attempt >= policy.maxAttempts) {
            return {
                type: 'fail',
                step: cursor.kind,
                errorKind: kind,
                reason: `${cursor.kind} exhausted ${policy.maxAttempts} attempts; last error (${kind}): ${message}`,
            };
        }
        if (run.cancelRequestedAt) {
            return { type: 'abandon', reason: `cancelled before ${cursor.kind} attempt ${last.attempt + 1}` };
        }

        const delayMs = calculateBackOff(last.attempt, policy, `${run.id}:${cursor.kind}`);
        const dueAt = new Date(last.endedAt.getTime() + delayMs);
        if (now.getTime() < dueAt.getTime()) {
            return { type: 'await_retry', step: cursor.kind, attempt: last.attempt + 1, delayMs, dueAt };
        }
        nextAttempt = last.attempt + 1;
    } else if (run.cancelRequestedAt) {
        return { type: 'abandon', reason: `cancelled before ${cursor.kind}` };
    }

    let input: unknown;
    try {
        input = cursor.input(ctx);
    } catch (err) {
        return {
            type: 'fail',
            step: cursor.kind,
            errorKind: 'malformed_input',
            reason: `input for ${cursor.kind} could not be built: ${messageOf(err)}`,
        };
    }
    return { type: 'execute_step', step: cursor.kind, stepIndex, attempt: nextAttempt, input, timeoutMs: cursor.timeoutMs };
}

export function stateOf(decision: Decision, records: StepRecord[]): RunState {
    switch (decision.type) {
        case 'execute_step':
            return records.length === 0 ? 'pending' : 'running';
        case 'wait':
            return 'running';
        case 'await_retry':
            return 'retrying';
        case 'complete':
            return 'completed';
        case 'fail':
            return 'failed';
        case 'abandon':
            return 'abandoned';
    }
}

export function stepCursor(definition: WorkflowDefinition, records: StepRecord[]): number {
    const succeeded = new Set<StepKind>();
    for (const record of records) {
        if (record.status === 'succeeded') succeeded.add(record.stepName);
    }
    const index = definition.steps.findIndex((step) => !succeeded.has(step.kind));
    return index === -1 ? definition.steps.length : index;
}

/** Derived view of a run; never stored. */
export interface WorkflowRunView {
    runId: string;
    workflowName: string;
    accountId: string;
    signal: Signal;
    state: RunState;
    stepCursor: number;
    decision: Decision;
    records: StepRecord[];
    createdAt: Date;
    updatedAt: Date;
}

export class WorkflowEngine {
    constructor(
        private readonly registry: WorkflowRegistry,
        private readonly runs: RunStore,
        private readonly history: WorkflowHistory,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    async advance(runId: string): Promise<Decision> {
        const { run, definition, records } = await this.load(runId);
        return decide(definition, run, records, this.clock());
    }

    async getRun(runId: string): Promise<WorkflowRunView> {
        const { run, definition, records } = await this.load(runId);
        const decision = decide(definition, run, records, this.clock());

        let updatedAt = run.createdAt;
        for (const record of records) {
            const at = record.endedAt ?? record.startedAt;
            if (at.getTime() > updatedAt.getTime()) updatedAt = at;
        }

        return {
            runId: run.id,
            workflowName: run.workflowName,
            accountId: run.accountId,
            signal: run.signal,
            state: stateOf(decision, records),
            stepCursor: stepCursor(definition, records),
            decision,
            records,
            createdAt: run.createdAt,
            updatedAt,
        };
    }

    definitionFor(workflowName: string): WorkflowDefinition {
        return this.registry.require(workflowName);
    }

    private async load(runId: string): Promise<{ run: RunHeader; definition: WorkflowDefinition; records: StepRecord[] }> {
        const run = await this.runs.findById(runId);
        if (!run) throw new RunNotFoundError(runId);
        const definition = this.registry.require(run.workflowName);
        const records = await this.history.load(runId);
        return { run, definition, records };
    }
}
