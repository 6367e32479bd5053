/**
 * Closed set of activity kinds a workflow can schedule.
 * Each kind maps to exactly one handler, fixed when the executor is built.
 */
export const STEP_KINDS = ['analyze', 'deliver'] as const;
export type StepKind = (typeof STEP_KINDS)[number];

export function isStepKind(value: string): value is StepKind {
    return STEP_KINDS.some((kind) => kind === value);
}

export const ACTIVITY_ERROR_KINDS = ['transient', 'permanent', 'malformed_input'] as const;
export type ActivityErrorKind = (typeof ACTIVITY_ERROR_KINDS)[number];

// timeout is never produced by a collaborator, only by the executor's clock
export const ERROR_KINDS = [...ACTIVITY_ERROR_KINDS, 'timeout'] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: unknown): value is ErrorKind {
    return ERROR_KINDS.some((kind) => kind === value);
}

export type StepStatus = 'scheduled' | 'succeeded' | 'failed' | 'timed_out';

export type RunState = 'pending' | 'running' | 'retrying' | 'completed' | 'failed' | 'abandoned';
export type TerminalRunState = Extract<RunState, 'completed' | 'failed' | 'abandoned'>;

export const TERMINAL_STATES: readonly TerminalRunState[] = ['completed', 'failed', 'abandoned'];

export function isTerminalState(state: RunState): state is TerminalRunState {
    return TERMINAL_STATES.some((terminal) => terminal === state);
}

export interface ObservedMetric {
    type: string;
    occurredAt: Date;
    actorTitle?: string;
}

export interface AccountProfile {
    companyName: string;
    industry?: string;
    employeeCount?: number;
    revenue?: string;
}

/** An observed account behaviour indicating buying intent. Immutable once ingested. */
export interface Signal {
    accountId: string;
    observedMetrics: ObservedMetric[];
    intentScore: number;
    firstSeen: Date;
    lastSeen: Date;
    profile?: AccountProfile;
}

export interface StepError {
    kind: ErrorKind;
    message: string;
}

interface StepRecordBase {
    runId: string;
    stepName: StepKind;
    attempt: number;  // 1-indexed
    input: unknown;
    startedAt: Date;
}

export interface ScheduledStepRecord extends StepRecordBase {
    status: 'scheduled';
    endedAt: null;
}

export interface SucceededStepRecord extends StepRecordBase {
    status: 'succeeded';
    output: unknown;
    endedAt: Date;
}

export interface FailedStepRecord extends StepRecordBase {
    status: 'failed' | 'timed_out';
    error: StepError;
    endedAt: Date;
}

export type StepRecord = ScheduledStepRecord | SucceededStepRecord | FailedStepRecord;

export interface RetryPolicy {
    maxAttempts: number;
    initialBackoffMs: number;
    backoffMultiplier: number;
    maxBackoffMs: number;
    retryableErrorKinds: readonly ErrorKind[];
}

export interface AccountContext {
    accountId: string;
    intentScore: number;
    profile: AccountProfile;
    observedMetrics: ObservedMetric[];
    firstSeen: Date;
    lastSeen: Date;
}

export type Urgency = 'URGENT' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface OpportunityBrief {
    accountId: string;
    companyName: string;
    intentScore: number;
    strategyType: string;
    urgency: Urgency;
    summary: string;
    recommendedActions: string[];
    generatedAt: Date;
}

export interface DeliveryRequest {
    brief: OpportunityBrief;
    destination: string;
    idempotencyKey: string;
}

export interface DeliveryReceipt {
    deliveryId: string;
    destination: string;
}
