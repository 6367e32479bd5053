import { createHash } from 'crypto';
import { RetryPolicy } from '@briefline/sdk';

export const JITTER_RATIO = 0.1;

export type BackoffPolicy = Pick<RetryPolicy, 'initialBackoffMs' | 'backoffMultiplier' | 'maxBackoffMs'>;

// Stable fraction in [0, 1) derived from the seed
export function jitterFraction(seed: string): number {
    const digest = createHash('sha256').update(seed).digest();
    return digest.readUInt32BE(0) / 0x1_0000_0000;
}

// Delay after `attempt` (1-indexed) failed: initial * multiplier^(attempt-1), plus up to
// 10% jitter, capped at maxBackoff. With a seed the jitter fraction is the same for every
// attempt, so delays never shrink and replays compute the same value.
export function calculateBackOff(
    attempt: number,
    policy: BackoffPolicy,
    jitterSeed?: string,
): number {
    const base = Math.min(
        policy.initialBackoffMs * Math.pow(policy.backoffMultiplier, attempt - 1),
        policy.maxBackoffMs,
    );
    const fraction = jitterSeed === undefined ? Math.random() : jitterFraction(jitterSeed);
    return Math.floor(Math.min(base + base * JITTER_RATIO * fraction, policy.maxBackoffMs));
}
