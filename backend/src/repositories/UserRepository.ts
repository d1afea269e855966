/**
 * User Repository
 *
 * Reads the user aggregate and applies the engine's two writes to it:
 * the XP counter and the derived level.
 */

import { BaseRepository, type RepositoryContext } from './BaseRepository';
import type {
  LeaderboardCandidate,
  LevelTier,
  User,
  UserRole,
  UserStore,
  XPIncrement,
} from '../types';

interface UserRow {
  id: string;
  name: string;
  email: string | null;
  role: UserRole;
  total_xp: number;
  level: LevelTier;
  total_spent: string;
  total_sales: string;
  created_at: Date;
}

interface CandidateRow {
  id: string;
  name: string;
  level: LevelTier;
  score: string;
  badge_count: number;
  created_at: Date;
}

/**
 * Scoring column per role. Never interpolate anything else into the SQL.
 */
const METRIC_COLUMN: Record<UserRole, 'total_spent' | 'total_sales'> = {
  buyer: 'total_spent',
  seller: 'total_sales',
};

export class UserRepository extends BaseRepository<User, UserRow> implements UserStore {
  protected readonly tableName = 'users';

  protected mapRow(row: UserRow): User {
    return {
      id: row.id,
      name: row.name,
      email: row.email,
      role: row.role,
      totalXP: row.total_xp,
      level: row.level,
      totalSpent: Number(row.total_spent),
      totalSales: Number(row.total_sales),
      createdAt: row.created_at,
    };
  }

  async get(userId: string, ctx?: RepositoryContext): Promise<User | null> {
    return this.findById(userId, ctx);
  }

  async incrementXP(
    userId: string,
    delta: number,
    ctx?: RepositoryContext
  ): Promise<XPIncrement> {
    const query = this.getQuery(ctx);
    const result = await query<{ total_xp: number }>(
      `UPDATE users
       SET total_xp = total_xp + $2, updated_at = NOW()
       WHERE id = $1 AND total_xp + $2 >= 0
       RETURNING total_xp`,
      [userId, delta]
    );
    const updated = result.rows[0];
    if (updated) {
      return { status: 'applied', balance: updated.total_xp };
    }

    const current = await query<{ total_xp: number }>(
      `SELECT total_xp FROM users WHERE id = $1`,
      [userId]
    );
    const row = current.rows[0];
    return row
      ? { status: 'insufficient_balance', balance: row.total_xp }
      : { status: 'user_not_found' };
  }

  async setLevel(
    userId: string,
    level: LevelTier,
    atBalance?: number,
    ctx?: RepositoryContext
  ): Promise<boolean> {
    const query = this.getQuery(ctx);
    const result = atBalance === undefined
      ? await query(
          `UPDATE users SET level = $2, updated_at = NOW() WHERE id = $1`,
          [userId, level]
        )
      : await query(
          `UPDATE users SET level = $2, updated_at = NOW()
           WHERE id = $1 AND total_xp = $3`,
          [userId, level, atBalance]
        );
    return result.rowCount > 0;
  }

  async countUsers(ctx?: RepositoryContext): Promise<number> {
    return this.count(undefined, undefined, ctx);
  }

  async countOrders(buyerId: string, ctx?: RepositoryContext): Promise<number> {
    const query = this.getQuery(ctx);
    const result = await query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM orders WHERE buyer_id = $1`,
      [buyerId]
    );
    return result.rows[0]?.count ?? 0;
  }

  /**
   * Delivered orders that contain at least one of the seller's products.
   */
  async countDeliveredSales(sellerId: string, ctx?: RepositoryContext): Promise<number> {
    const query = this.getQuery(ctx);
    const result = await query<{ count: number }>(
      `SELECT COUNT(DISTINCT o.id)::int AS count
       FROM orders o
       JOIN order_items oi ON oi.order_id = o.id
       JOIN products p ON p.id = oi.product_id
       WHERE p.seller_id = $1 AND o.status = 'delivered'`,
      [sellerId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async badgeCount(userId: string, ctx?: RepositoryContext): Promise<number> {
    const query = this.getQuery(ctx);
    const result = await query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM user_badges WHERE user_id = $1`,
      [userId]
    );
    return result.rows[0]?.count ?? 0;
  }

  /**
   * Leaderboard fallback: same ordering the cache applies
   * (score desc, then account creation order). The cache keeps
   * millisecond ISO timestamps, so creation time is compared at that
   * precision here too.
   */
  async topByMetric(
    role: UserRole,
    limit: number,
    ctx?: RepositoryContext
  ): Promise<LeaderboardCandidate[]> {
    const query = this.getQuery(ctx);
    const column = METRIC_COLUMN[role];
    const result = await query<CandidateRow>(
      `SELECT u.id, u.name, u.level, u.${column}::text AS score, u.created_at,
              (SELECT COUNT(*)::int FROM user_badges ub WHERE ub.user_id = u.id) AS badge_count
       FROM users u
       WHERE u.role = $1
       ORDER BY u.${column} DESC, date_trunc('milliseconds', u.created_at) ASC, u.id ASC
       LIMIT $2`,
      [role, limit]
    );
    return result.rows.map((row) => ({
      userId: row.id,
      name: row.name,
      level: row.level,
      score: Number(row.score),
      badgeCount: row.badge_count,
      createdAt: row.created_at.toISOString(),
    }));
  }
}
