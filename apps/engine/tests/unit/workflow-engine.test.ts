import { RetryPolicy, WorkflowRegistry, defineWorkflow } from '@briefline/sdk';
import { HistoryMismatchError, RunNotFoundError } from '../../src/errors';
import { InMemoryRunStore } from '../../src/repositories/in-memory-run.repository';
import { InMemoryWorkflowHistory } from '../../src/repositories/in-memory-history.repository';
import { calculateBackOff } from '../../src/utils/backoff';
import { RunContext, WorkflowEngine, decide, stateOf, stepCursor } from '../../src/services/workflow-engine';
import { T0, TestClock, makeSignal } from '../helpers/fixtures';
import { attempt, failed, scheduled, succeeded } from '../helpers/records';

const policy: RetryPolicy = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 10_000,
    retryableErrorKinds: ['transient', 'timeout'],
};

const definition = defineWorkflow({
    name: 'test-flow',
    steps: [
        { kind: 'analyze', timeoutMs: 1000, retry: policy, input: ({ signal }) => ({ accountId: signal.accountId }) },
        {
            kind: 'deliver',
            timeoutMs: 500,
            retry: policy,
            input: ({ outputs, runId }) => {
                const brief = outputs.get('analyze');
                if (brief === 'unusable') throw new Error('brief is unusable');
                return { brief, key: runId };
            },
        },
    ],
    result: ({ outputs }) => ({ delivered: outputs.get('deliver') }),
});

const run: RunContext = {
    id: 'run-1',
    workflowName: 'test-flow',
    signal: makeSignal(),
    destination: '#test',
    cancelRequestedAt: null,
};

const at = (offsetMs: number) => new Date(T0.getTime() + offsetMs);

describe('decide', () => {
    it('starts the first step on an empty history', () => {
        expect(decide(definition, run, [], T0)).toEqual({
            type: 'execute_step',
            step: 'analyze',
            stepIndex: 0,
            attempt: 1,
            input: { accountId: 'acme' },
            timeoutMs: 1000,
        });
    });

    it('waits while an attempt is in flight', () => {
        const records = [scheduled('run-1', 'analyze', 1)];
        expect(decide(definition, run, records, T0)).toEqual({ type: 'wait', step: 'analyze', attempt: 1 });
    });

    it('moves to the next step with the previous output in its input', () => {
        const records = attempt(succeeded('run-1', 'analyze', 1, { score: 85 }));
        expect(decide(definition, run, records, T0)).toEqual({
            type: 'execute_step',
            step: 'deliver',
            stepIndex: 1,
            attempt: 1,
            input: { brief: { score: 85 }, key: 'run-1' },
            timeoutMs: 500,
        });
    });

    it('completes with the built result once every step succeeded', () => {
        const records = [
            ...attempt(succeeded('run-1', 'analyze', 1, { score: 85 })),
            ...attempt(succeeded('run-1', 'deliver', 1, 'delivery-1')),
        ];
        expect(decide(definition, run, records, T0)).toEqual({ type: 'complete', result: { delivered: 'delivery-1' } });
    });

    it('waits out the backoff after a retryable failure', () => {
        const records = attempt(failed('run-1', 'analyze', 1, 'transient', 'flaky', 10));
        const delayMs = calculateBackOff(1, policy, 'run-1:analyze');

        expect(decide(definition, run, records, at(11))).toEqual({
            type: 'await_retry',
            step: 'analyze',
            attempt: 2,
            delayMs,
            dueAt: at(10 + delayMs),
        });
        expect(delayMs).toBeGreaterThanOrEqual(1000);
        expect(delayMs).toBeLessThanOrEqual(1100);
    });

    it('schedules the next attempt once the backoff has elapsed', () => {
        const records = attempt(failed('run-1', 'analyze', 1, 'transient', 'flaky', 10));
        const delayMs = calculateBackOff(1, policy, 'run-1:analyze');

        const decision = decide(definition, run, records, at(10 + delayMs));
        expect(decision).toMatchObject({ type: 'execute_step', step: 'analyze', attempt: 2 });
    });

    it('treats a timed out attempt as retryable', () => {
        const records = attempt(failed('run-1', 'analyze', 1, 'timeout', 'analyze did not finish within 1000ms', 1000));
        const decision = decide(definition, run, records, at(60_000));
        expect(decision).toMatchObject({ type: 'execute_step', step: 'analyze', attempt: 2 });
    });

    it('fails immediately on a non-retryable error', () => {
        const records = attempt(failed('run-1', 'analyze', 1, 'permanent', 'account closed'));
        expect(decide(definition, run, records, at(60_000))).toEqual({
            type: 'fail',
            step: 'analyze',
            errorKind: 'permanent',
            reason: 'analyze attempt 1 failed (permanent): account closed',
        });
    });

    it('fails once maxAttempts attempts have failed', () => {
        const records = [
            ...attempt(failed('run-1', 'analyze', 1, 'transient', 'flaky')),
            ...attempt(failed('run-1', 'analyze', 2, 'transient', 'flaky')),
            ...attempt(failed('run-1', 'analyze', 3, 'timeout', 'too slow')),
        ];
        expect(decide(definition, run, records, at(60_000))).toEqual({
            type: 'fail',
            step: 'analyze',
            errorKind: 'timeout',
            reason: 'analyze exhausted 3 attempts; last error (timeout): too slow',
        });
    });

    it('fails with malformed_input when a step input cannot be built', () => {
        const records = attempt(succeeded('run-1', 'analyze', 1, 'unusable'));
        expect(decide(definition, run, records, T0)).toEqual({
            type: 'fail',
            step: 'deliver',
            errorKind: 'malformed_input',
            reason: 'input for deliver could not be built: brief is unusable',
        });
    });

    describe('cancellation', () => {
        const cancelled: RunContext = { ...run, cancelRequestedAt: T0 };

        it('abandons before the first attempt', () => {
            expect(decide(definition, cancelled, [], T0)).toEqual({ type: 'abandon', reason: 'cancelled before analyze' });
        });

        it('abandons instead of retrying', () => {
            const records = attempt(failed('run-1', 'analyze', 1, 'transient', 'flaky'));
            expect(decide(definition, cancelled, records, at(60_000))).toEqual({
                type: 'abandon',
                reason: 'cancelled before analyze attempt 2',
            });
        });

        it('lets an in-flight attempt finish', () => {
            const records = [scheduled('run-1', 'analyze', 1)];
            expect(decide(definition, cancelled, records, T0)).toEqual({ type: 'wait', step: 'analyze', attempt: 1 });
        });

        it('still fails a run whose last attempt was not retryable', () => {
            const records = attempt(failed('run-1', 'analyze', 1, 'malformed_input', 'bad context'));
            expect(decide(definition, cancelled, records, T0)).toMatchObject({ type: 'fail', errorKind: 'malformed_input' });
        });
    });

    it('is deterministic for the same inputs', () => {
        const records = attempt(failed('run-1', 'analyze', 1, 'transient', 'flaky'));
        expect(decide(definition, run, records, at(500))).toEqual(decide(definition, run, records, at(500)));
    });

    it('rejects history for a step the definition does not have', () => {
        const analyzeOnly = defineWorkflow({
            name: 'analyze-only',
            steps: [{ kind: 'analyze', timeoutMs: 1000, retry: policy, input: () => ({}) }],
            result: () => null,
        });
        const records = [scheduled('run-1', 'deliver', 1)];
        expect(() => decide(analyzeOnly, run, records, T0)).toThrow(HistoryMismatchError);
    });
});

describe('stateOf', () => {
    it('maps decisions onto run states', () => {
        expect(stateOf(decide(definition, run, [], T0), [])).toBe('pending');

        const inFlight = [scheduled('run-1', 'analyze', 1)];
        expect(stateOf(decide(definition, run, inFlight, T0), inFlight)).toBe('running');

        const retrying = attempt(failed('run-1', 'analyze', 1, 'transient', 'flaky', 10));
        expect(stateOf(decide(definition, run, retrying, at(11)), retrying)).toBe('retrying');

        const done = [
            ...attempt(succeeded('run-1', 'analyze', 1, {})),
            ...attempt(succeeded('run-1', 'deliver', 1, 'd')),
        ];
        expect(stateOf(decide(definition, run, done, T0), done)).toBe('completed');
    });
});

describe('stepCursor', () => {
    it('points at the first step without a success', () => {
        expect(stepCursor(definition, [])).toBe(0);
        expect(stepCursor(definition, attempt(succeeded('run-1', 'analyze', 1, {})))).toBe(1);
        expect(stepCursor(definition, [
            ...attempt(succeeded('run-1', 'analyze', 1, {})),
            ...attempt(succeeded('run-1', 'deliver', 1, 'd')),
        ])).toBe(2);
    });
});

describe('WorkflowEngine', () => {
    let clock: TestClock;
    let runs: InMemoryRunStore;
    let history: InMemoryWorkflowHistory;
    let engine: WorkflowEngine;

    beforeEach(async () => {
        clock = new TestClock();
        runs = new InMemoryRunStore(clock.now);
        history = new InMemoryWorkflowHistory();
        const registry = new WorkflowRegistry();
        registry.register(definition);
        engine = new WorkflowEngine(registry, runs, history, clock.now);
        await runs.createOrFindActive({ id: 'run-1', workflowName: 'test-flow', signal: makeSignal(), destination: '#test' });
    });

    it('advances from persisted history', async () => {
        await history.append(scheduled('run-1', 'analyze', 1));
        await expect(engine.advance('run-1')).resolves.toEqual({ type: 'wait', step: 'analyze', attempt: 1 });
    });

    it('derives the run view from history', async () => {
        await history.append(scheduled('run-1', 'analyze', 1, 0));
        await history.append(succeeded('run-1', 'analyze', 1, { score: 85 }, 250));

        const view = await engine.getRun('run-1');
        expect(view).toMatchObject({
            runId: 'run-1',
            workflowName: 'test-flow',
            accountId: 'acme',
            state: 'running',
            stepCursor: 1,
            createdAt: T0,
            updatedAt: at(250),
        });
        expect(view.records).toHaveLength(2);
    });

    it('throws RunNotFoundError for an unknown run', async () => {
        await expect(engine.getRun('missing')).rejects.toThrow(RunNotFoundError);
    });
});
