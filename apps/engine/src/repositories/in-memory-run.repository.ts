import { TerminalRunState } from '@briefline/sdk';
import { RunNotFoundError } from '../errors';
import { CreateRunResult, NewRun, RunHeader, RunStore, signalKey } from './types';

export class InMemoryRunStore implements RunStore {
    private readonly runs = new Map<string, RunHeader>();

    constructor(private readonly clock: () => Date = () => new Date()) { }

    async createOrFindActive(run: NewRun): Promise<CreateRunResult> {
        const key = signalKey(run.signal);
        for (const existing of this.runs.values()) {
            if (existing.signalKey === key) return { status: 'duplicate', run: structuredClone(existing) };
        }
        for (const existing of this.runs.values()) {
            if (existing.accountId === run.signal.accountId && existing.closedAt === null) {
                return { status: 'coalesced', run: structuredClone(existing) };
            }
        }

        const now = this.clock();
        const header: RunHeader = {
            id: run.id,
            workflowName: run.workflowName,
            accountId: run.signal.accountId,
            signalKey: key,
            signal: structuredClone(run.signal),
            destination: run.destination,
            cancelRequestedAt: null,
            outcome: null,
            closedAt: null,
            createdAt: now,
            updatedAt: now,
        };
        this.runs.set(header.id, header);
        return { status: 'created', run: structuredClone(header) };
    }

    async findById(id: string): Promise<RunHeader | null> {
        const run = this.runs.get(id);
        return run ? structuredClone(run) : null;
    }

    async listActive(limit: number): Promise<RunHeader[]> {
        return Array.from(this.runs.values())
            .filter((run) => run.closedAt === null)
            .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
            .slice(0, limit)
            .map((run) => structuredClone(run));
    }

    async requestCancel(id: string): Promise<boolean> {
        const run = this.runs.get(id);
        if (!run) throw new RunNotFoundError(id);
        if (run.closedAt !== null) return false;

        if (run.cancelRequestedAt === null) run.cancelRequestedAt = this.clock();
        run.updatedAt = this.clock();
        return true;
    }

    async close(id: string, outcome: TerminalRunState): Promise<boolean> {
        const run = this.runs.get(id);
        if (!run || run.closedAt !== null) return false;

        const now = this.clock();
        run.outcome = outcome;
        run.closedAt = now;
        run.updatedAt = now;
        return true;
    }
}
