import { RetryPolicy, Signal, StepKind } from './types';

export interface StepInputContext {
    runId: string;
    signal: Signal;
    destination: string;
    // outputs of the steps that already succeeded, keyed by step kind
    outputs: ReadonlyMap<StepKind, unknown>;
}

export interface StepDefinition {
    kind: StepKind;
    timeoutMs: number;
    retry: RetryPolicy;
    /** Must be pure: the engine rebuilds inputs on every replay. */
    input(ctx: StepInputContext): unknown;
}

export interface WorkflowDefinition {
    name: string;
    steps: readonly StepDefinition[];
    result(ctx: StepInputContext): unknown;
}

export class InvalidDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidDefinitionError';
    }
}

export class WorkflowNotRegisteredError extends Error {
    constructor(name: string, registered: string[]) {
        super(`Workflow "${name}" not found. Registered: [${registered.join(', ')}]`);
        this.name = 'WorkflowNotRegisteredError';
    }
}

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
const MAX_NAME_LENGTH = 100;

export function validateRetryPolicy(policy: RetryPolicy, label: string): void {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new InvalidDefinitionError(`${label}: maxAttempts must be a positive integer`);
    }
    if (policy.initialBackoffMs < 0) {
        throw new InvalidDefinitionError(`${label}: initialBackoffMs must not be negative`);
    }
    if (policy.backoffMultiplier < 1) {
        throw new InvalidDefinitionError(`${label}: backoffMultiplier must be at least 1`);
    }
    if (policy.maxBackoffMs < policy.initialBackoffMs) {
        throw new InvalidDefinitionError(`${label}: maxBackoffMs must not be below initialBackoffMs`);
    }
}

export function defineWorkflow(definition: WorkflowDefinition): WorkflowDefinition {
    const { name, steps } = definition;
    if (!name) {
        throw new InvalidDefinitionError('Workflow name cannot be empty');
    }
    if (name.length > MAX_NAME_LENGTH) {
        throw new InvalidDefinitionError(`Workflow name exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
    }
    if (!NAME_PATTERN.test(name)) {
        throw new InvalidDefinitionError('Workflow name must contain only alphanumeric characters, dashes, and underscores');
    }
    if (steps.length === 0) {
        throw new InvalidDefinitionError(`Workflow "${name}" has no steps`);
    }

    const seen = new Set<StepKind>();
    for (const step of steps) {
        // history is keyed by step name, so a kind may appear only once
        if (seen.has(step.kind)) {
            throw new InvalidDefinitionError(`Workflow "${name}" lists step "${step.kind}" twice`);
        }
        seen.add(step.kind);
        if (!(step.timeoutMs > 0)) {
            throw new InvalidDefinitionError(`${name}/${step.kind}: timeoutMs must be positive`);
        }
        validateRetryPolicy(step.retry, `${name}/${step.kind}`);
    }
    return definition;
}

export class WorkflowRegistry {
    private workflows = new Map<string, WorkflowDefinition>();

    register(definition: WorkflowDefinition): WorkflowDefinition {
        const validated = defineWorkflow(definition);
        if (this.workflows.has(validated.name)) {
            throw new InvalidDefinitionError(`Workflow "${validated.name}" is already registered.`);
        }
        this.workflows.set(validated.name, validated);
        return validated;
    }

    get(name: string): WorkflowDefinition | undefined {
        return this.workflows.get(name);
    }

    require(name: string): WorkflowDefinition {
        const wf = this.workflows.get(name);
        if (!wf) throw new WorkflowNotRegisteredError(name, this.list());
        return wf;
    }

    list(): string[] {
        return Array.from(this.workflows.keys());
    }

    /** Longest step timeout across all registered workflows. */
    maxStepTimeoutMs(): number {
        let max = 0;
        for (const wf of this.workflows.values()) {
            for (const step of wf.steps) max = Math.max(max, step.timeoutMs);
        }
        return max;
    }
}
