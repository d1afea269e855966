/**
 * Redis Cache Client
 *
 * ioredis connection for the leaderboard cache, plus the key and TTL tables.
 * BullMQ opens its own connections (see jobs/queues.ts).
 *
 * @see config.ts for REDIS_URL / REDIS_COMMAND_TIMEOUT_MS
 */

import Redis from 'ioredis';
import type { AppConfig } from '../config';
import { logger } from '../logger';
import type { LeaderboardCategory } from '../types';

const log = logger.child({ module: 'redis' });

// ============================================================================
// CLIENT
// ============================================================================

export function createRedisClient(cfg: AppConfig['redis']): Redis {
  const client = new Redis(cfg.url, {
    keyPrefix: cfg.keyPrefix || undefined,
    // Commands fail fast; the leaderboard falls back to the database.
    commandTimeout: cfg.commandTimeoutMillis,
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on('error', (err) => {
    log.warn({ err: err.message }, 'Redis connection error');
  });
  client.on('ready', () => {
    log.info('Redis client ready');
  });

  return client;
}

// ============================================================================
// CACHE KEYS & TTL
// ============================================================================

export const CACHE_KEYS = {
  leaderboard: (category: LeaderboardCategory) => `leaderboard:${category}`,
  leaderboardUsers: (category: LeaderboardCategory) => `leaderboard:${category}:users`,
  leaderboardBuiltAt: (category: LeaderboardCategory) => `leaderboard:${category}:built_at`,
} as const;

export const CACHE_TTL = {
  leaderboard: 60 * 60,
} as const;

// ============================================================================
// SORTED-SET ACCESS
// ============================================================================

/**
 * The Redis commands the leaderboard cache issues. Implemented over ioredis
 * in production and by an in-memory fake in tests.
 */
export interface LeaderboardRedis {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  /** ZREVRANGE key start stop WITHSCORES, flattened as [member, score, ...]. */
  zrevrangeWithScores(key: string, start: number, stop: number): Promise<string[]>;
  /** Members whose score lies in [min, max]. */
  zrangebyscore(key: string, min: string, max: string): Promise<string[]>;
  hset(key: string, field: string, value: string): Promise<unknown>;
  hmget(key: string, fields: string[]): Promise<(string | null)[]>;
  expire(key: string, seconds: number): Promise<unknown>;
  del(keys: string[]): Promise<unknown>;
}

export function leaderboardRedis(client: Redis): LeaderboardRedis {
  return {
    get: (key) => client.get(key),
    setex: (key, seconds, value) => client.setex(key, seconds, value),
    zadd: (key, score, member) => client.zadd(key, score, member),
    zrevrangeWithScores: (key, start, stop) => client.zrevrange(key, start, stop, 'WITHSCORES'),
    zrangebyscore: (key, min, max) => client.zrangebyscore(key, min, max),
    hset: (key, field, value) => client.hset(key, field, value),
    hmget: (key, fields) => client.hmget(key, ...fields),
    expire: (key, seconds) => client.expire(key, seconds),
    del: (keys) => client.del(...keys),
  };
}
