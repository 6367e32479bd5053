import {
    AccountContext,
    ErrorKind,
    OpportunityBrief,
    Signal,
    StepError,
    StepKind,
} from './types';

/** Pull side of signal intake. Push producers call the intake service directly. */
export interface SignalSource {
    poll(): Promise<Signal[]>;
}

/** Must be idempotent for identical contexts: the engine retries it freely. */
export interface AnalysisService {
    analyze(context: AccountContext): Promise<OpportunityBrief>;
}

/**
 * Terminal step. Receives the run id as idempotency key and must not
 * produce a second visible message when called again with the same key.
 * `signal` aborts when the attempt runs out of time.
 */
export interface DeliveryService {
    deliver(brief: OpportunityBrief, destination: string, idempotencyKey: string, signal?: AbortSignal): Promise<string>;
}

interface EventBase {
    runId: string;
    at: Date;
}

export type EngineEvent =
    | (EventBase & { type: 'run_started'; accountId: string })
    | (EventBase & { type: 'signal_coalesced'; accountId: string })
    | (EventBase & { type: 'step_started'; step: StepKind; attempt: number })
    | (EventBase & { type: 'step_succeeded'; step: StepKind; attempt: number; durationMs: number })
    | (EventBase & { type: 'step_failed'; step: StepKind; attempt: number; timedOut: boolean; error: StepError })
    | (EventBase & { type: 'run_completed' })
    | (EventBase & { type: 'run_failed'; step: StepKind; errorKind: ErrorKind; reason: string })
    | (EventBase & { type: 'run_abandoned'; reason: string });

export type EngineEventType = EngineEvent['type'];

/** Fire-and-forget. Implementations must not block the caller. */
export interface ObservabilitySink {
    emit(event: EngineEvent): void;
}
