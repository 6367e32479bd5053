import { InMemoryRunStore } from '../../src/repositories/in-memory-run.repository';
import { IntakeService } from '../../src/services/intake.service';
import { RecordingSink } from '../../src/services/observability';
import { T0, makeSignal } from '../helpers/fixtures';

describe('IntakeService', () => {
    let runs: InMemoryRunStore;
    let sink: RecordingSink;
    let intake: IntakeService;
    let nextId: number;

    beforeEach(() => {
        runs = new InMemoryRunStore();
        sink = new RecordingSink();
        nextId = 0;
        intake = new IntakeService(runs, sink, {
            workflowName: 'opportunity-brief',
            threshold: 75,
            destination: '#gtm-opportunities',
            newRunId: () => `run-${++nextId}`,
            clock: () => T0,
        });
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('starts a run for a qualifying signal', async () => {
        const result = await intake.onSignal(makeSignal());

        expect(result).toEqual({ status: 'started', runId: 'run-1' });
        const run = await runs.findById('run-1');
        expect(run?.workflowName).toBe('opportunity-brief');
        expect(run?.destination).toBe('#gtm-opportunities');
        expect(run?.accountId).toBe('acme');
        expect(sink.events).toEqual([{ type: 'run_started', runId: 'run-1', accountId: 'acme', at: T0 }]);
    });

    it('accepts wire-shaped input with ISO timestamps', async () => {
        const result = await intake.onSignal({
            accountId: 'globex',
            intentScore: 90,
            observedMetrics: [{ type: 'demo_request', occurredAt: '2026-03-01T08:00:00.000Z' }],
            firstSeen: '2026-03-01T08:00:00.000Z',
            lastSeen: '2026-03-01T08:00:00.000Z',
        });

        expect(result).toEqual({ status: 'started', runId: 'run-1' });
        expect((await runs.findById('run-1'))?.signal.lastSeen).toEqual(new Date('2026-03-01T08:00:00.000Z'));
    });

    it('starts a run at exactly the threshold', async () => {
        expect(await intake.onSignal(makeSignal({ intentScore: 75 }))).toEqual({ status: 'started', runId: 'run-1' });
    });

    it('rejects a signal below the threshold without creating a run', async () => {
        const result = await intake.onSignal(makeSignal({ intentScore: 60 }));

        expect(result).toEqual({ status: 'rejected', reason: 'below_threshold', detail: 'intent score 60 is below 75' });
        expect(await runs.listActive(10)).toEqual([]);
        expect(sink.events).toEqual([]);
    });

    it('rejects a malformed signal with the offending field', async () => {
        const result = await intake.onSignal({ ...makeSignal(), intentScore: 'high' });

        expect(result).toEqual({
            status: 'rejected',
            reason: 'malformed',
            detail: 'intentScore: Expected number, received string',
        });
        expect(await runs.listActive(10)).toEqual([]);
    });

    it('coalesces a new signal into the open run for the account', async () => {
        await intake.onSignal(makeSignal());
        const result = await intake.onSignal(makeSignal({ lastSeen: new Date('2026-03-01T09:45:00.000Z') }));

        expect(result).toEqual({ status: 'coalesced', runId: 'run-1' });
        expect(await runs.listActive(10)).toHaveLength(1);
        expect(sink.ofType('signal_coalesced')).toEqual([{ type: 'signal_coalesced', runId: 'run-1', accountId: 'acme', at: T0 }]);
    });

    it('recognises a signal it has already seen', async () => {
        await intake.onSignal(makeSignal());
        const result = await intake.onSignal(makeSignal());

        expect(result).toEqual({ status: 'duplicate', runId: 'run-1' });
        expect(sink.events.map((e) => e.type)).toEqual(['run_started']);
    });

    it('keeps a seen signal a duplicate after its run closed', async () => {
        await intake.onSignal(makeSignal());
        await runs.close('run-1', 'completed');

        expect(await intake.onSignal(makeSignal())).toEqual({ status: 'duplicate', runId: 'run-1' });
    });

    it('starts a fresh run once the previous one for the account closed', async () => {
        await intake.onSignal(makeSignal());
        await runs.close('run-1', 'completed');

        const result = await intake.onSignal(makeSignal({ lastSeen: new Date('2026-03-02T09:00:00.000Z') }));

        expect(result).toEqual({ status: 'started', runId: 'run-2' });
    });

    it('keeps accounts independent', async () => {
        await intake.onSignal(makeSignal());
        const result = await intake.onSignal(makeSignal({ accountId: 'globex' }));

        expect(result).toEqual({ status: 'started', runId: 'run-2' });
    });
});
