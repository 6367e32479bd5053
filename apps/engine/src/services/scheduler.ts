import {
    EngineEvent,
    ObservabilitySink,
    SerializationError,
    StepRecord,
    TerminalRunState,
} from '@briefline/sdk';
import { ConflictError } from '../errors';
import { RunStore, WorkflowHistory } from '../repositories/types';
import { ActivityExecutor } from './activity-executor';
import { emitSafely } from './observability';
import { Decision, WorkflowEngine } from './workflow-engine';

const TAG = '[scheduler]';

type ExecuteStep = Extract<Decision, { type: 'execute_step' }>;

export interface SchedulerOptions {
    maxConcurrency: number;
    tickIntervalMs?: number;
    // active runs read per tick
    batchSize?: number;
    clock?: () => Date;
}

/**
 * Advances active runs on a bounded number of slots. A run is owned by at
 * most one slot at a time, so its decisions and appends never interleave
 * within this process; across processes the history append arbitrates.
 */
export class Scheduler {
    private readonly maxConcurrency: number;
    private readonly tickIntervalMs: number;
    private readonly batchSize: number;
    private readonly clock: () => Date;

    private readonly inFlight = new Map<string, Promise<void>>();
    private readonly dueAt = new Map<string, number>();
    private timer: NodeJS.Timeout | null = null;
    private running = false;
    private ticking = false;
    private tickAgain = false;

    constructor(
        private readonly engine: WorkflowEngine,
        private readonly runs: RunStore,
        private readonly history: WorkflowHistory,
        private readonly executor: ActivityExecutor,
        private readonly sink: ObservabilitySink,
        options: SchedulerOptions,
    ) {
        if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
            throw new Error(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
        }
        this.maxConcurrency = options.maxConcurrency;
        this.tickIntervalMs = options.tickIntervalMs ?? 1000;
        this.batchSize = options.batchSize ?? 100;
        this.clock = options.clock ?? (() => new Date());
    }

    get activeCount(): number {
        return this.inFlight.size;
    }

    isSaturated(): boolean {
        return this.inFlight.size >= this.maxConcurrency;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (slots: ${this.maxConcurrency}, tick: ${this.tickIntervalMs}ms)`);
        this.armTimer(0);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        await this.drain();
        console.log(`${TAG} stopped`);
    }

    /** Resolves once no run is being advanced. */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled(Array.from(this.inFlight.values()));
        }
    }

    /** Hands due, unowned runs to free slots. Returns how many were picked up. */
    async tick(): Promise<number> {
        const now = this.clock().getTime();
        const active = await this.runs.listActive(this.batchSize);
        if (active.length < this.batchSize) this.forgetClosed(active.map((run) => run.id));

        let advanced = 0;
        for (const run of active) {
            if (this.isSaturated()) break;
            if (this.inFlight.has(run.id)) continue;

            const due = this.dueAt.get(run.id);
            if (due !== undefined && due > now) continue;

            this.claim(run.id);
            advanced++;
        }
        return advanced;
    }

    // runs closed by another process never reach finish() here
    private forgetClosed(activeIds: string[]): void {
        const active = new Set(activeIds);
        for (const runId of this.dueAt.keys()) {
            if (!active.has(runId)) this.dueAt.delete(runId);
        }
    }

    private claim(runId: string): void {
        const work = this.process(runId)
            .catch((err) => console.error(`${TAG} run ${runId} advance failed:`, err))
            .finally(() => this.inFlight.delete(runId));
        this.inFlight.set(runId, work);
    }

    private async process(runId: string): Promise<void> {
        const decision = await this.engine.advance(runId);

        switch (decision.type) {
            case 'execute_step':
                this.dueAt.delete(runId);
                await this.executeStep(runId, decision);
                // the outcome is recorded; the next decision is due right away
                this.armTimer(0);
                return;
            case 'await_retry':
                this.dueAt.set(runId, decision.dueAt.getTime());
                console.log(`${TAG} run ${runId} ${decision.step} attempt ${decision.attempt} due in ${decision.delayMs}ms`);
                return;
            case 'wait':
                // attempt owned elsewhere; look again next interval
                this.dueAt.set(runId, this.clock().getTime() + this.tickIntervalMs);
                return;
            case 'complete':
                await this.finish(runId, 'completed', { type: 'run_completed', runId, at: this.clock() });
                return;
            case 'fail':
                await this.finish(runId, 'failed', {
                    type: 'run_failed',
                    runId,
                    step: decision.step,
                    errorKind: decision.errorKind,
                    reason: decision.reason,
                    at: this.clock(),
                });
                return;
            case 'abandon':
                await this.finish(runId, 'abandoned', { type: 'run_abandoned', runId, reason: decision.reason, at: this.clock() });
                return;
        }
    }

    private async executeStep(runId: string, decision: ExecuteStep): Promise<void> {
        const { step, attempt, input, timeoutMs } = decision;
        const startedAt = this.clock();

        try {
            await this.history.append({ runId, stepName: step, attempt, status: 'scheduled', input, startedAt, endedAt: null });
        } catch (err) {
            if (err instanceof ConflictError) {
                console.warn(`${TAG} ${err.message}; leaving attempt to its owner`);
                return;
            }
            throw err;
        }
        emitSafely(this.sink, { type: 'step_started', runId, step, attempt, at: startedAt });

        const outcome = await this.executor.execute(step, input, timeoutMs);
        const endedAt = this.clock();
        const base = { runId, stepName: step, attempt, input, startedAt, endedAt };

        if (outcome.status === 'succeeded') {
            try {
                await this.record({ ...base, status: 'succeeded', output: outcome.output });
                emitSafely(this.sink, { type: 'step_succeeded', runId, step, attempt, durationMs: outcome.durationMs, at: endedAt });
                return;
            } catch (err) {
                if (!(err instanceof SerializationError)) throw err;
                // an output the store cannot hold is a malformed result, not a success
                const error = { kind: 'malformed_input' as const, message: err.message };
                await this.record({ ...base, status: 'failed', error });
                emitSafely(this.sink, { type: 'step_failed', runId, step, attempt, timedOut: false, error, at: endedAt });
                return;
            }
        }

        await this.record({ ...base, status: outcome.status, error: outcome.error });
        emitSafely(this.sink, {
            type: 'step_failed',
            runId,
            step,
            attempt,
            timedOut: outcome.status === 'timed_out',
            error: outcome.error,
            at: endedAt,
        });
    }

    private async record(record: StepRecord): Promise<void> {
        try {
            await this.history.append(record);
        } catch (err) {
            // the reaper may have closed the attempt first; its record stands
            if (err instanceof ConflictError) {
                console.warn(`${TAG} ${err.message}; result dropped`);
                return;
            }
            throw err;
        }
    }

    private async finish(runId: string, outcome: TerminalRunState, event: EngineEvent): Promise<void> {
        this.dueAt.delete(runId);
        const closed = await this.runs.close(runId, outcome);
        if (closed) emitSafely(this.sink, event);
    }

    private armTimer(delayMs: number): void {
        if (!this.running) return;
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => {
            this.timer = null;
            this.loop().catch((err) => console.error(`${TAG} loop error:`, err));
        }, delayMs);
    }

    private async loop(): Promise<void> {
        if (this.ticking) {
            this.tickAgain = true;
            return;
        }
        this.ticking = true;
        try {
            await this.tick();
        } catch (err) {
            console.error(`${TAG} tick failed:`, err);
        } finally {
            this.ticking = false;
        }

        if (this.tickAgain) {
            this.tickAgain = false;
            this.armTimer(0);
        } else {
            this.armTimer(this.nextDelay());
        }
    }

    // the tick interval, or sooner when a retry falls due first
    private nextDelay(): number {
        const now = this.clock().getTime();
        let delay = this.tickIntervalMs;
        for (const due of this.dueAt.values()) {
            if (due > now) delay = Math.min(delay, due - now);
        }
        return delay;
    }
}
