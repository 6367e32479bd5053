import { ZodError } from 'zod';
import {
    ActivityError,
    ActivityErrorKind,
    SerializationError,
    StepError,
    StepKind,
} from '@briefline/sdk';

const TAG = '[executor]';

// `signal` aborts when the attempt times out
export type ActivityHandler = (input: unknown, signal: AbortSignal) => Promise<unknown>;

/** One handler per step kind, fixed at construction. */
export type ActivityHandlers = { readonly [K in StepKind]: ActivityHandler };

export type ActivityOutcome =
    | { status: 'succeeded'; output: unknown; durationMs: number }
    | { status: 'timed_out'; error: StepError; durationMs: number }
    | { status: 'failed'; error: StepError; durationMs: number };

export type ErrorClassifier = (err: unknown) => ActivityErrorKind;

/**
 * Maps whatever a collaborator threw onto the closed error-kind set.
 * Unknown errors fall back to `fallback` (transient by default).
 */
export function classifyError(err: unknown, fallback: ActivityErrorKind = 'transient'): ActivityErrorKind {
    if (err instanceof ActivityError) return err.kind;
    if (err instanceof ZodError || err instanceof SerializationError) return 'malformed_input';
    return fallback;
}

function errorMessage(err: unknown): string {
    if (err instanceof ZodError) {
        return `invalid input: ${err.issues.map((i) => `${i.path.join('.') || '<root>'} ${i.message}`).join('; ')}`;
    }
    return err instanceof Error ? err.message : String(err);
}

type Settled = { kind: 'settled'; ok: true; output: unknown } | { kind: 'settled'; ok: false; error: unknown };
type Expired = { kind: 'expired' };

export interface ActivityExecutorOptions {
    classify?: ErrorClassifier;
}

export class ActivityExecutor {
    private readonly classify: ErrorClassifier;

    constructor(
        private readonly handlers: ActivityHandlers,
        options: ActivityExecutorOptions = {},
    ) {
        this.classify = options.classify ?? ((err) => classifyError(err));
    }

    /**
     * Runs one attempt under a hard wall-clock timeout. On expiry the
     * handler's signal is aborted and the attempt resolves as timed_out
     * immediately; whatever the handler produces afterwards is discarded.
     */
    async execute(step: StepKind, input: unknown, timeoutMs: number): Promise<ActivityOutcome> {
        const handler = this.handlers[step];
        const controller = new AbortController();
        const started = Date.now();

        const call: Promise<Settled> = Promise.resolve()
            .then(() => handler(input, controller.signal))
            .then(
                (output): Settled => ({ kind: 'settled', ok: true, output }),
                (error: unknown): Settled => ({ kind: 'settled', ok: false, error }),
            );

        let timer: NodeJS.Timeout | undefined;
        const expiry = new Promise<Expired>((resolve) => {
            timer = setTimeout(() => resolve({ kind: 'expired' }), timeoutMs);
        });

        let winner: Settled | Expired;
        try {
            winner = await Promise.race([call, expiry]);
        } finally {
            clearTimeout(timer);
        }
        const durationMs = Date.now() - started;

        if (winner.kind === 'expired') {
            console.warn(`${TAG} ${step} timed out after ${timeoutMs}ms`);
            controller.abort(new Error(`${step} timed out after ${timeoutMs}ms`));
            call
                .then((late) => console.warn(`${TAG} ${step} ${late.ok ? 'finished' : 'failed'} after its timeout; result discarded`))
                .catch((err) => console.error(`${TAG} ${step} late-result logging failed:`, err));
            return {
                status: 'timed_out',
                error: { kind: 'timeout', message: `${step} did not finish within ${timeoutMs}ms` },
                durationMs,
            };
        }

        if (winner.ok) {
            return { status: 'succeeded', output: winner.output, durationMs };
        }

        const kind = this.classify(winner.error);
        console.error(`${TAG} ${step} failed (${kind}):`, errorMessage(winner.error));
        return { status: 'failed', error: { kind, message: errorMessage(winner.error) }, durationMs };
    }
}
