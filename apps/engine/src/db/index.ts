/**
 * Connection factories for Postgres and Redis.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string, max: number = 20): Pool {
    return new Pool({
        connectionString,
        max,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client for leader election, the delivery ledger and event pub/sub */
export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}
