import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { StepRecord, toBuffer } from '@briefline/sdk';
import { RunNotFoundError } from '../errors';
import { RunStore } from '../repositories/types';
import { IntakeResult, IntakeService } from '../services/intake.service';
import { WorkflowEngine, WorkflowRunView } from '../services/workflow-engine';

const TAG = '[SignalIntake]';

interface ObservedMetricMessage {
    type: string;
    occurred_at: string;
    actor_title: string;
}

interface AccountProfileMessage {
    company_name: string;
    industry: string;
    employee_count?: number | null;
    revenue: string;
}

export interface SubmitSignalRequest {
    account_id: string;
    observed_metrics: ObservedMetricMessage[];
    intent_score: number;
    first_seen: string;
    last_seen: string;
    profile: AccountProfileMessage | null;
}

export interface SubmitSignalResponse {
    status: 'STARTED' | 'COALESCED' | 'DUPLICATE' | 'REJECTED';
    run_id: string;
    reason: string;
    detail: string;
}

export interface GetRunRequest {
    run_id: string;
}

interface StepRecordMessage {
    step_name: string;
    attempt: number;
    status: string;
    started_at: string;
    ended_at: string;
    error_kind: string;
    error_message: string;
}

export interface GetRunResponse {
    run_id: string;
    workflow_name: string;
    account_id: string;
    state: string;
    step_cursor: number;
    records: StepRecordMessage[];
    result: Buffer;
    reason: string;
    created_at: string;
    updated_at: string;
}

export interface CancelRunRequest {
    run_id: string;
}

export interface CancelRunResponse {
    success: boolean;
}

// proto3 has no absent strings; empty means not set
function optional(value: string): string | undefined {
    return value === '' ? undefined : value;
}

/** Maps the wire message onto the shape the intake validator expects. */
export function toSignalInput(req: SubmitSignalRequest): Record<string, unknown> {
    return {
        accountId: req.account_id,
        observedMetrics: (req.observed_metrics ?? []).map((m) => ({
            type: m.type,
            occurredAt: optional(m.occurred_at),
            actorTitle: optional(m.actor_title),
        })),
        intentScore: req.intent_score,
        firstSeen: optional(req.first_seen),
        lastSeen: optional(req.last_seen),
        profile: req.profile
            ? {
                companyName: req.profile.company_name,
                industry: optional(req.profile.industry),
                employeeCount: req.profile.employee_count ?? undefined,
                revenue: optional(req.profile.revenue),
            }
            : undefined,
    };
}

export function toSubmitResponse(result: IntakeResult): SubmitSignalResponse {
    if (result.status === 'rejected') {
        return { status: 'REJECTED', run_id: '', reason: result.reason, detail: result.detail };
    }
    const status = result.status === 'started' ? 'STARTED' : result.status === 'coalesced' ? 'COALESCED' : 'DUPLICATE';
    return { status, run_id: result.runId, reason: '', detail: '' };
}

function toRecordMessage(record: StepRecord): StepRecordMessage {
    const failed = record.status === 'failed' || record.status === 'timed_out';
    return {
        step_name: record.stepName,
        attempt: record.attempt,
        status: record.status,
        started_at: record.startedAt.toISOString(),
        ended_at: record.endedAt ? record.endedAt.toISOString() : '',
        error_kind: failed ? record.error.kind : '',
        error_message: failed ? record.error.message : '',
    };
}

export function toRunResponse(view: WorkflowRunView): GetRunResponse {
    const { decision } = view;
    return {
        run_id: view.runId,
        workflow_name: view.workflowName,
        account_id: view.accountId,
        state: view.state.toUpperCase(),
        step_cursor: view.stepCursor,
        records: view.records.map(toRecordMessage),
        result: decision.type === 'complete' ? toBuffer(decision.result) : Buffer.alloc(0),
        reason: decision.type === 'fail' || decision.type === 'abandon' ? decision.reason : '',
        created_at: view.createdAt.toISOString(),
        updated_at: view.updatedAt.toISOString(),
    };
}

function internal(error: unknown): Partial<grpc.StatusObject> {
    return {
        code: grpc.status.INTERNAL,
        details: error instanceof Error ? error.message : 'Unknown error',
    };
}

/**
 * gRPC front of the intake service: submission, run inspection and
 * cancellation.
 */
export class SignalIntakeService {
    constructor(
        private readonly intake: IntakeService,
        private readonly engine: WorkflowEngine,
        private readonly runs: RunStore,
    ) { }

    /**
     * Rejected signals are a normal response (status REJECTED with a
     * reason), not an RPC error.
     */
    async submitSignal(
        call: ServerUnaryCall<SubmitSignalRequest, SubmitSignalResponse>,
        callback: sendUnaryData<SubmitSignalResponse>,
    ): Promise<void> {
        try {
            const result = await this.intake.onSignal(toSignalInput(call.request));
            callback(null, toSubmitResponse(result));
        } catch (error) {
            console.error(`${TAG} submitSignal error:`, error);
            callback(internal(error));
        }
    }

    /** Returns NOT_FOUND for an unknown run id. */
    async getRun(
        call: ServerUnaryCall<GetRunRequest, GetRunResponse>,
        callback: sendUnaryData<GetRunResponse>,
    ): Promise<void> {
        try {
            const view = await this.engine.getRun(call.request.run_id);
            callback(null, toRunResponse(view));
        } catch (error) {
            if (error instanceof RunNotFoundError) {
                callback({ code: grpc.status.NOT_FOUND, details: error.message });
                return;
            }
            console.error(`${TAG} getRun error:`, error);
            callback(internal(error));
        }
    }

    /**
     * Records a cancellation request; it takes effect at the run's next
     * decision. success=false when the run is already closed.
     */
    async cancelRun(
        call: ServerUnaryCall<CancelRunRequest, CancelRunResponse>,
        callback: sendUnaryData<CancelRunResponse>,
    ): Promise<void> {
        try {
            const success = await this.runs.requestCancel(call.request.run_id);
            callback(null, { success });
        } catch (error) {
            if (error instanceof RunNotFoundError) {
                callback({ code: grpc.status.NOT_FOUND, details: error.message });
                return;
            }
            console.error(`${TAG} cancelRun error:`, error);
            callback(internal(error));
        }
    }
}
