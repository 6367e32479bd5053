import { ActivityErrorKind } from './types';

/**
 * Thrown by collaborators (or their adapters) to state how a failure should
 * be treated. Anything else a collaborator throws is classified by the
 * executor's default rules.
 */
export class ActivityError extends Error {
    constructor(
        public readonly kind: ActivityErrorKind,
        message: string,
        public readonly originalError?: unknown,
    ) {
        super(message);
        this.name = 'ActivityError';
    }

    static transient(message: string, originalError?: unknown): ActivityError {
        return new ActivityError('transient', message, originalError);
    }

    static permanent(message: string, originalError?: unknown): ActivityError {
        return new ActivityError('permanent', message, originalError);
    }

    static malformed(message: string, originalError?: unknown): ActivityError {
        return new ActivityError('malformed_input', message, originalError);
    }
}

export function isActivityError(err: unknown): err is ActivityError {
    return err instanceof ActivityError;
}
