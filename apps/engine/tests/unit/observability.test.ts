import { EngineEvent, ObservabilitySink, deserialize } from '@briefline/sdk';
import { CompositeSink, ConsoleSink, RecordingSink, RedisPublishSink, emitSafely } from '../../src/services/observability';
import { FakeRedis } from '../helpers/fake-redis';
import { T0 } from '../helpers/fixtures';

const completed: EngineEvent = { type: 'run_completed', runId: 'run-1', at: T0 };
const failed: EngineEvent = {
    type: 'run_failed',
    runId: 'run-1',
    step: 'deliver',
    errorKind: 'permanent',
    reason: 'deliver attempt 1 failed (permanent): webhook POST → 404: no_service',
    at: T0,
};

const throwingSink: ObservabilitySink = {
    emit: () => {
        throw new Error('sink down');
    },
};

describe('emitSafely', () => {
    it('contains a sink that throws', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        expect(() => emitSafely(throwingSink, completed)).not.toThrow();
        expect(error).toHaveBeenCalledWith('[events] sink failed on run_completed for run run-1:', expect.any(Error));
        error.mockRestore();
    });
});

describe('ConsoleSink', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('raises a failed run as an alert', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        new ConsoleSink().emit(failed);

        expect(error).toHaveBeenCalledWith(
            '[ALERT] [events] run run-1 failed at deliver (permanent): deliver attempt 1 failed (permanent): webhook POST → 404: no_service',
        );
    });

    it('warns on a failed attempt', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        new ConsoleSink().emit({
            type: 'step_failed',
            runId: 'run-1',
            step: 'analyze',
            attempt: 2,
            timedOut: true,
            error: { kind: 'timeout', message: 'analyze did not finish within 1000ms' },
            at: T0,
        });

        expect(warn).toHaveBeenCalledWith('[events] run run-1 analyze attempt 2 timed out (timeout): analyze did not finish within 1000ms');
    });

    it('logs everything else', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        new ConsoleSink().emit({ type: 'signal_coalesced', runId: 'run-1', accountId: 'acme', at: T0 });

        expect(log).toHaveBeenCalledWith('[events] signal for account acme coalesced into run run-1');
    });
});

describe('RedisPublishSink', () => {
    it('publishes the event as a superjson document', async () => {
        const redis = new FakeRedis();

        new RedisPublishSink(redis.asRedis(), 'briefline:events').emit(completed);
        await Promise.resolve();

        expect(redis.published).toHaveLength(1);
        expect(redis.published[0]?.channel).toBe('briefline:events');
        expect(deserialize(redis.published[0]?.message)).toEqual(completed);
    });
});

describe('CompositeSink', () => {
    it('keeps delivering to the other sinks when one throws', () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const first = new RecordingSink();
        const last = new RecordingSink();

        new CompositeSink(first, throwingSink, last).emit(completed);

        expect(first.events).toEqual([completed]);
        expect(last.events).toEqual([completed]);
        jest.restoreAllMocks();
    });
});

describe('RecordingSink', () => {
    it('filters events by type', () => {
        const sink = new RecordingSink();
        sink.emit(completed);
        sink.emit(failed);

        expect(sink.ofType('run_failed')).toEqual([failed]);
    });
});
