import {
    AccountContext,
    DeliveryReceipt,
    OpportunityBrief,
    RetryPolicy,
    Signal,
    WorkflowDefinition,
    defineWorkflow,
    deliveryReceiptSchema,
    parseOpportunityBrief,
} from '@briefline/sdk';

export const OPPORTUNITY_WORKFLOW = 'opportunity-brief';

export const ANALYZE_RETRY: RetryPolicy = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 10_000,
    retryableErrorKinds: ['transient', 'timeout'],
};

export const DELIVER_RETRY: RetryPolicy = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 5_000,
    retryableErrorKinds: ['transient', 'timeout'],
};

export interface OpportunityWorkflowOptions {
    analyzeTimeoutMs?: number;
    deliverTimeoutMs?: number;
    analyzeRetry?: Partial<RetryPolicy>;
    deliverRetry?: Partial<RetryPolicy>;
}

export interface OpportunityResult {
    brief: OpportunityBrief;
    delivery: DeliveryReceipt;
}

export function accountContextFor(signal: Signal): AccountContext {
    return {
        accountId: signal.accountId,
        intentScore: signal.intentScore,
        profile: signal.profile ?? { companyName: signal.accountId },
        observedMetrics: signal.observedMetrics,
        firstSeen: signal.firstSeen,
        lastSeen: signal.lastSeen,
    };
}

// analyze → deliver; the run id is the delivery idempotency key
export function opportunityWorkflow(options: OpportunityWorkflowOptions = {}): WorkflowDefinition {
    return defineWorkflow({
        name: OPPORTUNITY_WORKFLOW,
        steps: [
            {
                kind: 'analyze',
                timeoutMs: options.analyzeTimeoutMs ?? 5 * 60_000,
                retry: { ...ANALYZE_RETRY, ...options.analyzeRetry },
                input: ({ signal }) => accountContextFor(signal),
            },
            {
                kind: 'deliver',
                timeoutMs: options.deliverTimeoutMs ?? 2 * 60_000,
                retry: { ...DELIVER_RETRY, ...options.deliverRetry },
                input: ({ runId, destination, outputs }) => ({
                    brief: parseOpportunityBrief(outputs.get('analyze')),
                    destination,
                    idempotencyKey: runId,
                }),
            },
        ],
        result: ({ outputs }): OpportunityResult => ({
            brief: parseOpportunityBrief(outputs.get('analyze')),
            delivery: deliveryReceiptSchema.parse(outputs.get('deliver')),
        }),
    });
}
