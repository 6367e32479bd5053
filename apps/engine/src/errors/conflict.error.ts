import { StepKind } from '@briefline/sdk';

/**
 * The history rejected an append because it no longer matches what the
 * caller decided from. Reload and re-advance; never retry the same append.
 */
export class ConflictError extends Error {
    constructor(
        public readonly runId: string,
        public readonly stepName: StepKind,
        reason: string,
    ) {
        super(`Conflict appending ${stepName} for run ${runId}: ${reason}`);
        this.name = 'ConflictError';
    }
}
