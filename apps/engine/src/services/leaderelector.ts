import { Redis } from 'ioredis';

const TAG = '[leader]';

export interface LeaderElectorOptions {
    key?: string;
    ttlSeconds?: number;
    workerId?: string;
}

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

export class LeaderElector {
    readonly workerId: string;
    private readonly key: string;
    private readonly ttlSeconds: number;
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private readonly redis: Redis,
        options: LeaderElectorOptions = {},
    ) {
        this.key = options.key ?? 'briefline:reaper:leader';
        this.ttlSeconds = options.ttlSeconds ?? 30;
        this.workerId = options.workerId ?? `worker-${process.pid}-${Date.now()}`;
    }

    async tryBecomeLeader(): Promise<boolean> {
        // SET NX with TTL - atomic
        const result = await this.redis.set(this.key, this.workerId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // re-election after a restart with the same worker id
        const currentLeader = await this.redis.get(this.key);
        if (currentLeader === this.workerId) {
            this.startRenewal();
            return true;
        }
        return false;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.workerId);
    }

    async isLeader(): Promise<boolean> {
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.workerId;
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;
        // renew at half the TTL
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renewLock()
                .then((stillLeader) => {
                    if (!stillLeader) {
                        console.warn(`${TAG} ${this.workerId} lost leadership of ${this.key}`);
                        this.stopRenewal();
                    }
                })
                .catch((error) => console.error(`${TAG} lock renewal failed:`, error));
        }, renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renewLock(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.workerId, this.ttlSeconds);
        return result === 1;
    }
}
