import { ObservabilitySink, ScheduledStepRecord, StepError, StepKind } from '@briefline/sdk';
import { ConflictError } from '../errors';
import { WorkflowHistory } from '../repositories/types';
import { LeaderElector } from './leaderelector';
import { emitSafely } from './observability';

const TAG = '[reaper]';

export interface ReapedAttempt {
    runId: string;
    step: StepKind;
    attempt: number;
}

export interface ReaperOptions {
    // oldest a scheduled attempt may get before it is presumed dead
    staleAfterMs: number;
    intervalMs?: number;
    batchSize?: number;
    clock?: () => Date;
}

/**
 * Closes attempts whose worker died mid-call by appending a timed_out
 * record, which hands the step back to its retry policy. Runs on one
 * instance at a time through Redis leader election.
 */
export class Reaper {
    private readonly staleAfterMs: number;
    private readonly intervalMs: number;
    private readonly batchSize: number;
    private readonly clock: () => Date;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly history: WorkflowHistory,
        private readonly leaderElector: LeaderElector,
        private readonly sink: ObservabilitySink,
        options: ReaperOptions,
    ) {
        this.staleAfterMs = options.staleAfterMs;
        this.intervalMs = options.intervalMs ?? 10_000;
        this.batchSize = options.batchSize ?? 100;
        this.clock = options.clock ?? (() => new Date());
    }

    async start(): Promise<void> {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale after: ${this.staleAfterMs}ms)`);

        // fire immediately, then on schedule
        await this.cycle();
        this.intervalHandle = setInterval(() => {
            this.cycle().catch((err) => console.error(`${TAG} cycle failed:`, err));
        }, this.intervalMs);
    }

    // a follower keeps trying, so reaping resumes when the leader dies
    private async cycle(): Promise<void> {
        const isLeader = await this.leaderElector.tryBecomeLeader();
        if (!isLeader) return;
        await this.reap();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leaderElector.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<ReapedAttempt[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        const reaped: ReapedAttempt[] = [];
        try {
            const now = this.clock();
            const cutoff = new Date(now.getTime() - this.staleAfterMs);
            const stale = await this.history.listOutstanding(cutoff, this.batchSize);

            for (const record of stale) {
                if (await this.expire(record, now)) {
                    reaped.push({ runId: record.runId, step: record.stepName, attempt: record.attempt });
                }
            }

            if (reaped.length > 0) {
                console.log(`${TAG} timed out ${reaped.length} attempts: ${reaped.map((r) => `${r.runId}/${r.step}#${r.attempt}`).join(', ')}`);
            }
        } finally {
            this.isReaping = false;
        }
        return reaped;
    }

    private async expire(record: ScheduledStepRecord, now: Date): Promise<boolean> {
        const error: StepError = {
            kind: 'timeout',
            message: `attempt abandoned by its worker (scheduled ${record.startedAt.toISOString()})`,
        };
        try {
            await this.history.append({
                runId: record.runId,
                stepName: record.stepName,
                attempt: record.attempt,
                status: 'timed_out',
                input: record.input,
                startedAt: record.startedAt,
                endedAt: now,
                error,
            });
        } catch (err) {
            // the worker finished after all
            if (err instanceof ConflictError) return false;
            throw err;
        }
        emitSafely(this.sink, {
            type: 'step_failed',
            runId: record.runId,
            step: record.stepName,
            attempt: record.attempt,
            timedOut: true,
            error,
            at: now,
        });
        return true;
    }
}
