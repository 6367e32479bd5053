import { Redis } from 'ioredis';
import { v7 as uuid } from 'uuid';
import { ActivityError, DeliveryService, OpportunityBrief } from '@briefline/sdk';

const TAG = '[delivery]';
const PENDING = 'pending';
const DELIVERED_PREFIX = 'delivered:';

export type LedgerEntry = { state: 'pending' } | { state: 'delivered'; deliveryId: string };

// no longer than the deliver step timeout, so a retry never outlives the hold
export const DEFAULT_PENDING_TTL_MS = 2 * 60_000;

/**
 * Remembers which idempotency keys already produced a visible delivery.
 * `reserve` returns null when the caller now holds the key under `token`,
 * or the entry that was already there. `release` and `commit` act only for
 * the holder of the reservation; `commit` also lands on a lapsed one.
 */
export interface DeliveryLedger {
    reserve(key: string, token: string): Promise<LedgerEntry | null>;
    commit(key: string, token: string, deliveryId: string): Promise<boolean>;
    release(key: string, token: string): Promise<void>;
}

export function parseLedgerValue(value: string): LedgerEntry {
    if (value.startsWith(DELIVERED_PREFIX)) {
        return { state: 'delivered', deliveryId: value.slice(DELIVERED_PREFIX.length) };
    }
    return { state: 'pending' };
}

function pendingValue(token: string): string {
    return `${PENDING}:${token}`;
}

export interface RedisDeliveryLedgerOptions {
    prefix?: string;
    // a reservation left by a crashed worker expires after this
    pendingTtlMs?: number;
    retentionMs?: number;
}

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const COMMIT_SCRIPT = `
    local current = redis.call("get", KEYS[1])
    if current == false or current == ARGV[1] then
        redis.call("set", KEYS[1], ARGV[2], "PX", ARGV[3])
        return 1
    else
        return 0
    end
`;

export class RedisDeliveryLedger implements DeliveryLedger {
    private readonly prefix: string;
    private readonly pendingTtlMs: number;
    private readonly retentionMs: number;

    constructor(
        private readonly redis: Redis,
        options: RedisDeliveryLedgerOptions = {},
    ) {
        this.prefix = options.prefix ?? 'briefline:delivery:';
        this.pendingTtlMs = options.pendingTtlMs ?? DEFAULT_PENDING_TTL_MS;
        this.retentionMs = options.retentionMs ?? 7 * 24 * 60 * 60_000;
    }

    async reserve(key: string, token: string): Promise<LedgerEntry | null> {
        const redisKey = this.prefix + key;
        // the entry can expire between SET and GET; one more round settles it
        for (let round = 0; round < 2; round++) {
            const result = await this.redis.set(redisKey, pendingValue(token), 'PX', this.pendingTtlMs, 'NX');
            if (result === 'OK') return null;

            const existing = await this.redis.get(redisKey);
            if (existing !== null) return parseLedgerValue(existing);
        }
        return { state: 'pending' };
    }

    async commit(key: string, token: string, deliveryId: string): Promise<boolean> {
        const result = await this.redis.eval(
            COMMIT_SCRIPT,
            1,
            this.prefix + key,
            pendingValue(token),
            DELIVERED_PREFIX + deliveryId,
            this.retentionMs,
        );
        return result === 1;
    }

    async release(key: string, token: string): Promise<void> {
        await this.redis.eval(RELEASE_SCRIPT, 1, this.prefix + key, pendingValue(token));
    }
}

type MemoryEntry =
    | { state: 'pending'; token: string; expiresAt: number }
    | { state: 'delivered'; deliveryId: string };

export interface InMemoryDeliveryLedgerOptions {
    pendingTtlMs?: number;
    now?: () => number;
}

export class InMemoryDeliveryLedger implements DeliveryLedger {
    private readonly entries = new Map<string, MemoryEntry>();
    private readonly pendingTtlMs: number;
    private readonly now: () => number;

    constructor(options: InMemoryDeliveryLedgerOptions = {}) {
        this.pendingTtlMs = options.pendingTtlMs ?? DEFAULT_PENDING_TTL_MS;
        this.now = options.now ?? (() => Date.now());
    }

    async reserve(key: string, token: string): Promise<LedgerEntry | null> {
        const existing = this.read(key);
        if (existing?.state === 'delivered') return { state: 'delivered', deliveryId: existing.deliveryId };
        if (existing) return { state: 'pending' };
        this.entries.set(key, { state: 'pending', token, expiresAt: this.now() + this.pendingTtlMs });
        return null;
    }

    async commit(key: string, token: string, deliveryId: string): Promise<boolean> {
        const existing = this.read(key);
        if (existing && !(existing.state === 'pending' && existing.token === token)) return false;
        this.entries.set(key, { state: 'delivered', deliveryId });
        return true;
    }

    async release(key: string, token: string): Promise<void> {
        const existing = this.read(key);
        if (existing?.state === 'pending' && existing.token === token) this.entries.delete(key);
    }

    private read(key: string): MemoryEntry | undefined {
        const entry = this.entries.get(key);
        if (entry?.state === 'pending' && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }
}

/**
 * Wraps a delivery service so a repeated idempotency key returns the first
 * delivery id instead of posting again. A reservation is given up as soon
 * as its attempt is aborted, so the retry that follows can post.
 */
export class IdempotentDeliveryService implements DeliveryService {
    constructor(
        private readonly inner: DeliveryService,
        private readonly ledger: DeliveryLedger,
        private readonly newToken: () => string = () => uuid(),
    ) { }

    async deliver(brief: OpportunityBrief, destination: string, idempotencyKey: string, signal?: AbortSignal): Promise<string> {
        const token = this.newToken();
        const existing = await this.ledger.reserve(idempotencyKey, token);
        if (existing?.state === 'delivered') {
            console.log(`${TAG} ${idempotencyKey} already delivered as ${existing.deliveryId}`);
            return existing.deliveryId;
        }
        if (existing?.state === 'pending') {
            throw ActivityError.transient(`delivery ${idempotencyKey} is already in progress`);
        }

        if (signal?.aborted) {
            await this.ledger.release(idempotencyKey, token);
            throw ActivityError.transient(`delivery ${idempotencyKey} was aborted before posting`);
        }

        const release = () => {
            this.ledger.release(idempotencyKey, token)
                .catch((err) => console.error(`${TAG} releasing ${idempotencyKey} failed:`, err));
        };
        signal?.addEventListener('abort', release, { once: true });

        let deliveryId: string;
        try {
            deliveryId = await this.inner.deliver(brief, destination, idempotencyKey, signal);
        } catch (err) {
            await this.ledger.release(idempotencyKey, token);
            throw err;
        } finally {
            signal?.removeEventListener('abort', release);
        }

        const committed = await this.ledger.commit(idempotencyKey, token, deliveryId);
        if (!committed) {
            console.warn(`${TAG} ${idempotencyKey} posted as ${deliveryId} after its reservation passed to another attempt`);
        }
        return deliveryId;
    }
}
