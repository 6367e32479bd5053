import { Redis } from 'ioredis';
import { EngineEvent, ObservabilitySink, serialize } from '@briefline/sdk';

const TAG = '[events]';

// A sink that throws must never take the emitting path down with it.
export function emitSafely(sink: ObservabilitySink, event: EngineEvent): void {
    try {
        sink.emit(event);
    } catch (err) {
        console.error(`${TAG} sink failed on ${event.type} for run ${event.runId}:`, err);
    }
}

function describeEvent(event: EngineEvent): string {
    switch (event.type) {
        case 'run_started':
            return `run ${event.runId} started for account ${event.accountId}`;
        case 'signal_coalesced':
            return `signal for account ${event.accountId} coalesced into run ${event.runId}`;
        case 'step_started':
            return `run ${event.runId} ${event.step} attempt ${event.attempt} started`;
        case 'step_succeeded':
            return `run ${event.runId} ${event.step} attempt ${event.attempt} succeeded in ${event.durationMs}ms`;
        case 'step_failed':
            return `run ${event.runId} ${event.step} attempt ${event.attempt} ${event.timedOut ? 'timed out' : 'failed'} (${event.error.kind}): ${event.error.message}`;
        case 'run_completed':
            return `run ${event.runId} completed`;
        case 'run_failed':
            return `run ${event.runId} failed at ${event.step} (${event.errorKind}): ${event.reason}`;
        case 'run_abandoned':
            return `run ${event.runId} abandoned: ${event.reason}`;
    }
}

/** Logs every event; a failed run is logged as an alert. */
export class ConsoleSink implements ObservabilitySink {
    emit(event: EngineEvent): void {
        const line = `${TAG} ${describeEvent(event)}`;
        if (event.type === 'run_failed') {
            console.error(`[ALERT] ${line}`);
        } else if (event.type === 'step_failed') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}

/** Publishes each event as a superjson document on a Redis channel. */
export class RedisPublishSink implements ObservabilitySink {
    constructor(
        private readonly redis: Redis,
        private readonly channel: string,
    ) { }

    emit(event: EngineEvent): void {
        this.redis
            .publish(this.channel, serialize(event))
            .catch((err) => console.error(`${TAG} publish to ${this.channel} failed:`, err));
    }
}

export class CompositeSink implements ObservabilitySink {
    private readonly sinks: ObservabilitySink[];

    constructor(...sinks: ObservabilitySink[]) {
        this.sinks = sinks;
    }

    emit(event: EngineEvent): void {
        for (const sink of this.sinks) emitSafely(sink, event);
    }
}

/** Keeps every event in memory. */
export class RecordingSink implements ObservabilitySink {
    readonly events: EngineEvent[] = [];

    emit(event: EngineEvent): void {
        this.events.push(event);
    }

    ofType<T extends EngineEvent['type']>(type: T): Extract<EngineEvent, { type: T }>[] {
        const matched: Extract<EngineEvent, { type: T }>[] = [];
        for (const event of this.events) {
            if (isOfType(event, type)) matched.push(event);
        }
        return matched;
    }
}

function isOfType<T extends EngineEvent['type']>(event: EngineEvent, type: T): event is Extract<EngineEvent, { type: T }> {
    return event.type === type;
}
