import { ScheduledStepRecord, StepRecord, serialize } from '@briefline/sdk';
import { ConflictError } from '../errors';
import { StepHead, checkAppend } from './history-rules';
import { WorkflowHistory } from './types';

/**
 * Process-local history with the same append rules as the Postgres store.
 * The check and the push happen without an intervening await, so each
 * append is atomic with respect to other callers on the event loop.
 */
export class InMemoryWorkflowHistory implements WorkflowHistory {
    private readonly byRun = new Map<string, StepRecord[]>();

    async append(record: StepRecord): Promise<void> {
        const records = this.byRun.get(record.runId) ?? [];
        const reason = checkAppend(record, this.head(records, record));
        if (reason) throw new ConflictError(record.runId, record.stepName, reason);

        // same payload limit the Postgres store enforces
        serialize(record.input);
        if (record.status === 'succeeded') serialize(record.output);

        records.push(structuredClone(record));
        this.byRun.set(record.runId, records);
    }

    async load(runId: string): Promise<StepRecord[]> {
        return structuredClone(this.byRun.get(runId) ?? []);
    }

    async listOutstanding(startedBefore: Date, limit: number): Promise<ScheduledStepRecord[]> {
        const outstanding: ScheduledStepRecord[] = [];
        for (const records of this.byRun.values()) {
            for (const record of records) {
                if (record.status !== 'scheduled' || record.startedAt.getTime() >= startedBefore.getTime()) continue;
                const head = this.head(records, record);
                if (head?.status === 'scheduled' && head.attempt === record.attempt) {
                    outstanding.push(structuredClone(record));
                }
            }
        }
        outstanding.sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());
        return outstanding.slice(0, limit);
    }

    /** Total number of records across runs. */
    get size(): number {
        let total = 0;
        for (const records of this.byRun.values()) total += records.length;
        return total;
    }

    private head(records: StepRecord[], record: StepRecord): StepHead | null {
        for (let i = records.length - 1; i >= 0; i--) {
            const candidate = records[i];
            if (candidate && candidate.stepName === record.stepName) {
                return { status: candidate.status, attempt: candidate.attempt };
            }
        }
        return null;
    }
}
