/**
 * Leaderboard Service
 *
 * Ranked pages per category, served from the Redis cache and recomputed
 * from the user store whenever the cache is unavailable. Category names
 * carry a reset cadence but scores are lifetime totals; nothing is windowed.
 */

import { CacheUnavailableError, AppError, withPersistence } from '../lib/errors';
import { leaderboardLogger } from '../logger';
import { leaderboardReadsTotal } from '../monitoring/metrics';
import { compareCandidates, toEntries, type LeaderboardCache } from '../cache/LeaderboardCache';
import type { TaskQueue } from '../jobs/TaskQueue';
import type {
  LeaderboardCategory,
  LeaderboardEntry,
  User,
  UserRole,
  UserStore,
} from '../types';

export interface CategoryDefinition {
  role: UserRole;
  period: 'weekly' | 'monthly';
  score: (user: User) => number;
}

export const LEADERBOARD_CATEGORIES: Record<LeaderboardCategory, CategoryDefinition> = {
  weekly_buyers: { role: 'buyer', period: 'weekly', score: (user) => user.totalSpent },
  monthly_sellers: { role: 'seller', period: 'monthly', score: (user) => user.totalSales },
};

export function categoryForRole(role: UserRole): LeaderboardCategory {
  return role === 'seller' ? 'monthly_sellers' : 'weekly_buyers';
}

export interface LeaderboardPage {
  category: LeaderboardCategory;
  period: 'weekly' | 'monthly';
  source: 'cache' | 'database';
  entries: LeaderboardEntry[];
}

export interface LeaderboardOptions {
  defaultLimit: number;
  maxLimit: number;
}

export class LeaderboardService {
  private readonly options: LeaderboardOptions;

  constructor(
    private readonly users: UserStore,
    private readonly cache: LeaderboardCache,
    private readonly tasks: TaskQueue,
    options: Partial<LeaderboardOptions> = {}
  ) {
    this.options = { defaultLimit: 10, maxLimit: 50, ...options };
  }

  /**
   * Clamp a requested page size to [1, maxLimit].
   */
  normalizeLimit(n?: number): number {
    if (n === undefined || !Number.isFinite(n)) return this.options.defaultLimit;
    return Math.min(Math.max(Math.floor(n), 1), this.options.maxLimit);
  }

  async topN(category: LeaderboardCategory, n?: number): Promise<LeaderboardPage> {
    const limit = this.normalizeLimit(n);
    const { period } = LEADERBOARD_CATEGORIES[category];

    try {
      const entries = await this.cache.topN(category, limit);
      leaderboardReadsTotal.inc({ category, source: 'cache' });
      return { category, period, source: 'cache', entries };
    } catch (err) {
      if (!(err instanceof CacheUnavailableError)) throw err;
      leaderboardLogger.debug({ category, reason: err.message }, 'Leaderboard cache miss, using database');
      // Only a reachable cache can be rebuilt; disabled or down means database reads.
      if (err.cold) {
        this.tasks.submit({ type: 'leaderboard.rebuild', category });
      }
    }

    const entries = await this.fromDatabase(category, limit);
    leaderboardReadsTotal.inc({ category, source: 'database' });
    return { category, period, source: 'database', entries };
  }

  /**
   * The fallback ranking, straight from the user store.
   */
  async fromDatabase(category: LeaderboardCategory, n: number): Promise<LeaderboardEntry[]> {
    const { role } = LEADERBOARD_CATEGORIES[category];
    const candidates = await withPersistence('Leaderboard query', () =>
      this.users.topByMetric(role, this.normalizeLimit(n))
    );
    return toEntries([...candidates].sort(compareCandidates));
  }

  /**
   * Re-score one user in the category matching their role.
   */
  async refresh(userId: string): Promise<void> {
    const user = await withPersistence('User read', () => this.users.get(userId));
    if (!user) {
      throw AppError.notFound('User', userId);
    }
    const badgeCount = await withPersistence('Badge count', () => this.users.badgeCount(userId));

    const category = categoryForRole(user.role);
    const score = LEADERBOARD_CATEGORIES[category].score(user);
    await this.cache.upsert(category, user.id, score, {
      name: user.name,
      level: user.level,
      badgeCount,
      createdAt: user.createdAt.toISOString(),
    });
    leaderboardLogger.debug({ userId, category, score }, 'Leaderboard entry refreshed');
  }

  /**
   * Reload a category's cache from the user store.
   */
  async rebuild(category: LeaderboardCategory): Promise<number> {
    const { role } = LEADERBOARD_CATEGORIES[category];
    const candidates = await withPersistence('Leaderboard query', () =>
      this.users.topByMetric(role, this.options.maxLimit)
    );
    await this.cache.replace(category, candidates);
    leaderboardLogger.info({ category, members: candidates.length }, 'Leaderboard cache rebuilt');
    return candidates.length;
  }
}
