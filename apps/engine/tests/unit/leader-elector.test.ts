import { LeaderElector } from '../../src/services/leaderelector';
import { FakeRedis } from '../helpers/fake-redis';

describe('LeaderElector', () => {
    const key = 'briefline:reaper:leader';
    let now: number;
    let redis: FakeRedis;
    const electors: LeaderElector[] = [];

    function elector(workerId: string, ttlSeconds = 30): LeaderElector {
        const created = new LeaderElector(redis.asRedis(), { workerId, ttlSeconds });
        electors.push(created);
        return created;
    }

    beforeEach(() => {
        now = 1_000_000;
        redis = new FakeRedis(() => now);
    });

    afterEach(async () => {
        // clears renewal intervals
        await Promise.all(electors.splice(0).map((e) => e.releaseLeadership()));
        jest.useRealTimers();
    });

    it('elects a leader when the key is empty', async () => {
        const worker = elector('worker-1');

        expect(await worker.tryBecomeLeader()).toBe(true);
        expect(await redis.get(key)).toBe('worker-1');
        expect(await redis.ttl(key)).toBe(30);
        expect(await worker.isLeader()).toBe(true);
    });

    it('denies leadership while another worker holds the key', async () => {
        await redis.set(key, 'other-worker', 'EX', 30);
        const worker = elector('worker-1');

        expect(await worker.tryBecomeLeader()).toBe(false);
        expect(await worker.isLeader()).toBe(false);
        expect(await redis.get(key)).toBe('other-worker');
    });

    it('keeps leadership when the same worker asks again', async () => {
        await redis.set(key, 'worker-1', 'EX', 30);

        expect(await elector('worker-1').tryBecomeLeader()).toBe(true);
    });

    it('takes over once the previous leader lease expires', async () => {
        const first = elector('worker-1', 10);
        const second = elector('worker-2', 10);
        await first.tryBecomeLeader();
        // no renewal fires before the lease runs out
        now += 11_000;

        expect(await second.tryBecomeLeader()).toBe(true);
        expect(await first.isLeader()).toBe(false);
    });

    it('only releases a key it holds', async () => {
        const leader = elector('worker-1');
        const follower = elector('worker-2');
        await leader.tryBecomeLeader();

        await follower.releaseLeadership();
        expect(await redis.get(key)).toBe('worker-1');

        await leader.releaseLeadership();
        expect(await redis.get(key)).toBeNull();
    });

    it('renews the lease at half its ttl', async () => {
        jest.useFakeTimers();
        const worker = elector('worker-1', 10);
        await worker.tryBecomeLeader();

        now += 5_000;
        await jest.advanceTimersByTimeAsync(5_000);

        expect(await redis.ttl(key)).toBe(10);
    });

    it('stops renewing once another worker owns the key', async () => {
        jest.useFakeTimers();
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const worker = elector('worker-1', 10);
        await worker.tryBecomeLeader();

        await redis.set(key, 'worker-2', 'EX', 10);
        await jest.advanceTimersByTimeAsync(5_000);

        expect(warn).toHaveBeenCalledWith('[leader] worker-1 lost leadership of briefline:reaper:leader');
        expect(await redis.get(key)).toBe('worker-2');
        warn.mockRestore();
    });
});
