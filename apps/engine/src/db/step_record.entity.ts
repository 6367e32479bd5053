import { StepStatus } from '@briefline/sdk';

/**
 * Row shape of step_records. `seq` is the durable append order that
 * replay folds over.
 */
export interface StepRecordEntity {
    seq: string;  // BIGSERIAL arrives as a string
    run_id: string;
    step_name: string;
    attempt: number;
    status: StepStatus;
    input: unknown;
    output: unknown;
    error: unknown;
    started_at: Date;
    ended_at: Date | null;
    recorded_at: Date;
}
