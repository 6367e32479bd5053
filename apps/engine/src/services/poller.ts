import { SignalSource } from '@briefline/sdk';
import { IntakeResult } from './intake.service';

const TAG = '[poller]';

export interface SignalPollerConfig {
    onSignal: (signal: unknown) => Promise<IntakeResult>;
    intervalMs?: number;
    // polling slows to this when sources stay quiet
    maxIntervalMs?: number;
    checkBackpressure?: () => boolean;
}

/**
 * Pulls from a SignalSource on an adaptive interval: back to the base
 * interval after a batch with new runs, doubling up to the cap otherwise.
 */
export class SignalPoller {
    private readonly minInterval: number;
    private readonly maxInterval: number;
    private interval: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly onSignal: (signal: unknown) => Promise<IntakeResult>;
    private readonly checkBackpressure?: () => boolean;

    constructor(
        private readonly source: SignalSource,
        config: SignalPollerConfig,
    ) {
        this.onSignal = config.onSignal;
        this.minInterval = config.intervalMs ?? 30_000;
        this.maxInterval = Math.max(config.maxIntervalMs ?? this.minInterval * 4, this.minInterval);
        this.interval = this.minInterval;
        this.checkBackpressure = config.checkBackpressure;
    }

    get currentInterval(): number {
        return this.interval;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.minInterval}ms)`);
        this.schedule(0);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    /** One poll cycle; returns the intake result of every signal it fed. */
    async pollOnce(): Promise<IntakeResult[]> {
        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} backpressure detected, skipping poll`);
            return [];
        }

        const results: IntakeResult[] = [];
        try {
            const signals = await this.source.poll();
            for (const signal of signals) {
                results.push(await this.onSignal(signal));
            }
        } catch (err) {
            console.error(`${TAG} poll error:`, err);
            this.interval = this.maxInterval;
            return results;
        }

        if (results.some((r) => r.status === 'started')) {
            this.interval = this.minInterval;
        } else {
            this.interval = Math.min(this.interval * 2, this.maxInterval);
        }
        return results;
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => {
            this.pollOnce()
                .catch((err) => console.error(`${TAG} cycle error:`, err))
                .finally(() => this.schedule(this.interval));
        }, delayMs);
    }
}
