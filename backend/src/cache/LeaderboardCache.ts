/**
 * Leaderboard Cache
 *
 * One sorted set per category (member = user id, score = metric) plus a hash
 * of display metadata. Score ties are ordered by account creation, then user
 * id, the same rule the database fallback applies. A category only serves
 * reads after a full `replace()` has stamped it; until then, and on any Redis
 * failure or member without metadata, reads raise CacheUnavailableError.
 */

import { AppError, CacheUnavailableError } from '../lib/errors';
import { CACHE_KEYS, CACHE_TTL, type LeaderboardRedis } from './redis';
import type {
  LeaderboardCandidate,
  LeaderboardCategory,
  LeaderboardEntry,
  LeaderboardMetadata,
  LevelTier,
} from '../types';

export interface LeaderboardCache {
  upsert(
    category: LeaderboardCategory,
    userId: string,
    score: number,
    metadata: LeaderboardMetadata
  ): Promise<void>;
  topN(category: LeaderboardCategory, n: number): Promise<LeaderboardEntry[]>;
  /** Drop the category and load `candidates` in its place. */
  replace(category: LeaderboardCategory, candidates: readonly LeaderboardCandidate[]): Promise<void>;
}

const LEVELS: readonly LevelTier[] = ['bronze', 'silver', 'gold', 'platinum'];

function isLevelTier(value: unknown): value is LevelTier {
  return typeof value === 'string' && LEVELS.some((level) => level === value);
}

function parseMetadata(raw: string): LeaderboardMetadata | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;

  const name: unknown = Reflect.get(parsed, 'name');
  const level: unknown = Reflect.get(parsed, 'level');
  const badgeCount: unknown = Reflect.get(parsed, 'badgeCount');
  const createdAt: unknown = Reflect.get(parsed, 'createdAt');
  if (
    typeof name !== 'string' ||
    !isLevelTier(level) ||
    typeof badgeCount !== 'number' ||
    typeof createdAt !== 'string'
  ) {
    return null;
  }
  return { name, level, badgeCount, createdAt };
}

/**
 * Ranking order shared by the cache and the database fallback.
 */
export function compareCandidates(a: LeaderboardCandidate, b: LeaderboardCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.userId !== b.userId) return a.userId < b.userId ? -1 : 1;
  return 0;
}

export function toEntries(candidates: readonly LeaderboardCandidate[]): LeaderboardEntry[] {
  return candidates.map((candidate, index) => ({
    userId: candidate.userId,
    name: candidate.name,
    score: candidate.score,
    rank: index + 1,
    level: candidate.level,
    badgeCount: candidate.badgeCount,
  }));
}

export class RedisLeaderboardCache implements LeaderboardCache {
  constructor(
    private readonly redis: LeaderboardRedis,
    private readonly ttlSeconds: number = CACHE_TTL.leaderboard
  ) {}

  async upsert(
    category: LeaderboardCategory,
    userId: string,
    score: number,
    metadata: LeaderboardMetadata
  ): Promise<void> {
    const setKey = CACHE_KEYS.leaderboard(category);
    const metaKey = CACHE_KEYS.leaderboardUsers(category);
    try {
      // Metadata first, so a ranked member always has display fields.
      await this.redis.hset(metaKey, userId, JSON.stringify(metadata));
      await this.redis.zadd(setKey, score, userId);
      await this.redis.expire(setKey, this.ttlSeconds);
      await this.redis.expire(metaKey, this.ttlSeconds);
    } catch (err) {
      throw new CacheUnavailableError(`Leaderboard upsert failed for ${category}`, err);
    }
  }

  async topN(category: LeaderboardCategory, n: number): Promise<LeaderboardEntry[]> {
    const setKey = CACHE_KEYS.leaderboard(category);
    const metaKey = CACHE_KEYS.leaderboardUsers(category);

    let members: { userId: string; score: number }[];
    let metadata: (string | null)[];
    try {
      if ((await this.redis.get(CACHE_KEYS.leaderboardBuiltAt(category))) === null) {
        throw AppError.cacheCold(`Leaderboard ${category} is cold`);
      }

      const flat = await this.redis.zrevrangeWithScores(setKey, 0, n - 1);
      members = [];
      for (let i = 0; i + 1 < flat.length; i += 2) {
        members.push({ userId: flat[i], score: Number(flat[i + 1]) });
      }

      // Redis orders equal scores by member; pull the whole tie group at the
      // cut-off so the creation-order tie-break can pick the right ones.
      const last = members[members.length - 1];
      if (members.length === n && last) {
        const boundary = String(last.score);
        const tied = await this.redis.zrangebyscore(setKey, boundary, boundary);
        const seen = new Set(members.map((m) => m.userId));
        for (const userId of tied) {
          if (!seen.has(userId)) {
            members.push({ userId, score: last.score });
          }
        }
      }

      metadata = members.length > 0
        ? await this.redis.hmget(metaKey, members.map((m) => m.userId))
        : [];
    } catch (err) {
      if (err instanceof CacheUnavailableError) throw err;
      throw new CacheUnavailableError(`Leaderboard read failed for ${category}`, err);
    }

    const candidates: LeaderboardCandidate[] = [];
    members.forEach((member, index) => {
      const raw = metadata[index];
      const meta = raw ? parseMetadata(raw) : null;
      if (meta) {
        candidates.push({ ...meta, userId: member.userId, score: member.score });
      }
    });
    if (candidates.length !== members.length) {
      throw AppError.cacheCold(`Leaderboard ${category} is missing member metadata`);
    }

    return toEntries(candidates.sort(compareCandidates).slice(0, n));
  }

  async replace(
    category: LeaderboardCategory,
    candidates: readonly LeaderboardCandidate[]
  ): Promise<void> {
    const builtAtKey = CACHE_KEYS.leaderboardBuiltAt(category);
    try {
      await this.redis.del([
        builtAtKey,
        CACHE_KEYS.leaderboard(category),
        CACHE_KEYS.leaderboardUsers(category),
      ]);
    } catch (err) {
      throw new CacheUnavailableError(`Leaderboard reset failed for ${category}`, err);
    }

    for (const { userId, score, ...metadata } of candidates) {
      await this.upsert(category, userId, score, metadata);
    }

    try {
      await this.redis.setex(builtAtKey, this.ttlSeconds, new Date().toISOString());
    } catch (err) {
      throw new CacheUnavailableError(`Leaderboard stamp failed for ${category}`, err);
    }
  }
}

/**
 * Stand-in for deployments without Redis: every read misses and writes are
 * dropped, so the service always ranks from the database.
 */
export class DisabledLeaderboardCache implements LeaderboardCache {
  async upsert(): Promise<void> {}

  async topN(): Promise<LeaderboardEntry[]> {
    throw new CacheUnavailableError('Leaderboard cache not configured');
  }

  async replace(): Promise<void> {}
}
