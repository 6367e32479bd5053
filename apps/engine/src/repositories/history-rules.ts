import { StepRecord, StepStatus } from '@briefline/sdk';

/** Latest record of one (runId, stepName) sequence. */
export interface StepHead {
    status: StepStatus;
    attempt: number;
}

/**
 * Returns why `record` cannot follow `head`, or null when the append is
 * allowed. A scheduled record opens attempt head+1; any other status must
 * close the attempt currently in flight.
 */
export function checkAppend(record: StepRecord, head: StepHead | null): string | null {
    if (record.status === 'scheduled') {
        if (head?.status === 'scheduled') {
            return `attempt ${head.attempt} is still in flight`;
        }
        if (head?.status === 'succeeded') {
            return 'step already succeeded';
        }
        const expected = (head?.attempt ?? 0) + 1;
        if (record.attempt !== expected) {
            return `expected attempt ${expected}, got ${record.attempt}`;
        }
        return null;
    }

    if (!head || head.status !== 'scheduled') {
        return `no attempt in flight to record ${record.status} for`;
    }
    if (head.attempt !== record.attempt) {
        return `attempt ${record.attempt} is not in flight (in flight: ${head.attempt})`;
    }
    return null;
}
