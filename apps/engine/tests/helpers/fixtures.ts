import {
    AccountContext,
    OpportunityBrief,
    RetryPolicy,
    Signal,
} from '@briefline/sdk';

export const T0 = new Date('2026-03-01T10:00:00.000Z');

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
    return {
        accountId: 'acme',
        intentScore: 85,
        observedMetrics: [
            { type: 'pricing_page_visit', occurredAt: new Date('2026-03-01T09:00:00.000Z'), actorTitle: 'CTO' },
        ],
        firstSeen: new Date('2026-03-01T09:00:00.000Z'),
        lastSeen: new Date('2026-03-01T09:30:00.000Z'),
        profile: { companyName: 'Acme Corp', industry: 'SaaS', employeeCount: 250, revenue: '$40M' },
        ...overrides,
    };
}

export function makeContext(overrides: Partial<AccountContext> = {}): AccountContext {
    const signal = makeSignal();
    return {
        accountId: signal.accountId,
        intentScore: signal.intentScore,
        profile: { companyName: 'Acme Corp', industry: 'SaaS', employeeCount: 250, revenue: '$40M' },
        observedMetrics: signal.observedMetrics,
        firstSeen: signal.firstSeen,
        lastSeen: signal.lastSeen,
        ...overrides,
    };
}

export function makeBrief(overrides: Partial<OpportunityBrief> = {}): OpportunityBrief {
    return {
        accountId: 'acme',
        companyName: 'Acme Corp',
        intentScore: 85,
        strategyType: 'saas_growth',
        urgency: 'HIGH',
        summary: 'Acme Corp is evaluating pricing.',
        recommendedActions: ['Schedule discovery call within 24 hours'],
        generatedAt: T0,
        ...overrides,
    };
}

export const fastRetry: RetryPolicy = {
    maxAttempts: 3,
    initialBackoffMs: 1,
    backoffMultiplier: 2,
    maxBackoffMs: 5,
    retryableErrorKinds: ['transient', 'timeout'],
};

/** Manually advanced clock for deterministic timing. */
export class TestClock {
    private current: number;

    constructor(start: Date = T0) {
        this.current = start.getTime();
    }

    readonly now = (): Date => new Date(this.current);

    advance(ms: number): void {
        this.current += ms;
    }
}
