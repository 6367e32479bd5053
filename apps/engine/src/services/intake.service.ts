import { v7 as uuid } from 'uuid';
import { ZodError } from 'zod';
import { ObservabilitySink, Signal, parseSignal } from '@briefline/sdk';
import { RunStore } from '../repositories/types';
import { emitSafely } from './observability';

const TAG = '[intake]';

export type RejectionReason = 'malformed' | 'below_threshold';

export type IntakeResult =
    | { status: 'started'; runId: string }
    | { status: 'coalesced'; runId: string }
    | { status: 'duplicate'; runId: string }
    | { status: 'rejected'; reason: RejectionReason; detail: string };

export interface IntakeOptions {
    workflowName: string;
    // signals scoring below this never start a run
    threshold: number;
    destination: string;
    newRunId?: () => string;
    clock?: () => Date;
}

/** Single entry point for pushed and polled signals. */
export class IntakeService {
    private readonly newRunId: () => string;
    private readonly clock: () => Date;

    constructor(
        private readonly runs: RunStore,
        private readonly sink: ObservabilitySink,
        private readonly options: IntakeOptions,
    ) {
        this.newRunId = options.newRunId ?? (() => uuid());
        this.clock = options.clock ?? (() => new Date());
    }

    async onSignal(raw: unknown): Promise<IntakeResult> {
        let signal: Signal;
        try {
            signal = parseSignal(raw);
        } catch (err) {
            if (!(err instanceof ZodError)) throw err;
            const detail = err.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
            console.warn(`${TAG} rejected malformed signal: ${detail}`);
            return { status: 'rejected', reason: 'malformed', detail };
        }

        if (signal.intentScore < this.options.threshold) {
            return {
                status: 'rejected',
                reason: 'below_threshold',
                detail: `intent score ${signal.intentScore} is below ${this.options.threshold}`,
            };
        }

        const { status, run } = await this.runs.createOrFindActive({
            id: this.newRunId(),
            workflowName: this.options.workflowName,
            signal,
            destination: this.options.destination,
        });

        switch (status) {
            case 'created':
                console.log(`${TAG} run ${run.id} started for ${signal.accountId} (score ${signal.intentScore})`);
                emitSafely(this.sink, { type: 'run_started', runId: run.id, accountId: signal.accountId, at: this.clock() });
                return { status: 'started', runId: run.id };
            case 'coalesced':
                emitSafely(this.sink, { type: 'signal_coalesced', runId: run.id, accountId: signal.accountId, at: this.clock() });
                return { status: 'coalesced', runId: run.id };
            case 'duplicate':
                return { status: 'duplicate', runId: run.id };
        }
    }
}
