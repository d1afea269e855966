/**
 * Badge Repository
 *
 * Badge catalog plus awards. Award uniqueness is the
 * UNIQUE (user_id, badge_id) constraint on user_badges; a conflicting insert
 * reports `already_awarded` instead of failing.
 */

import { BaseRepository, type RepositoryContext } from './BaseRepository';
import { isForeignKeyViolation } from '../db';
import { AppError } from '../lib/errors';
import type {
  AwardOutcome,
  BadgeDefinition,
  BadgeSeed,
  BadgeStore,
  BadgeType,
  EarnedBadge,
} from '../types';

interface BadgeRow {
  id: string;
  type: BadgeType;
  name: string;
  description: string;
  icon_url: string | null;
  xp_reward: number;
}

interface EarnedBadgeRow extends BadgeRow {
  earned_at: Date;
}

interface UserBadgeRow {
  id: string;
  user_id: string;
  badge_id: string;
  earned_at: Date;
}

export class BadgeRepository extends BaseRepository<BadgeDefinition, BadgeRow> implements BadgeStore {
  protected readonly tableName = 'badges';

  protected mapRow(row: BadgeRow): BadgeDefinition {
    return {
      id: row.id,
      type: row.type,
      name: row.name,
      description: row.description,
      iconUrl: row.icon_url,
      xpReward: row.xp_reward,
    };
  }

  async allDefinitions(ctx?: RepositoryContext): Promise<BadgeDefinition[]> {
    const query = this.getQuery(ctx);
    const result = await query<BadgeRow>(
      `SELECT id, type, name, description, icon_url, xp_reward FROM badges ORDER BY type`
    );
    return result.rows.map((row) => this.mapRow(row));
  }

  async awardsFor(userId: string, ctx?: RepositoryContext): Promise<EarnedBadge[]> {
    const query = this.getQuery(ctx);
    const result = await query<EarnedBadgeRow>(
      `SELECT b.id, b.type, b.name, b.description, b.icon_url, b.xp_reward, ub.earned_at
       FROM user_badges ub
       JOIN badges b ON b.id = ub.badge_id
       WHERE ub.user_id = $1
       ORDER BY ub.earned_at ASC`,
      [userId]
    );
    return result.rows.map((row) => ({ ...this.mapRow(row), earnedAt: row.earned_at }));
  }

  async award(userId: string, badgeId: string, ctx?: RepositoryContext): Promise<AwardOutcome> {
    const query = this.getQuery(ctx);
    try {
      const result = await query<UserBadgeRow>(
        `INSERT INTO user_badges (user_id, badge_id)
         VALUES ($1, $2)
         ON CONFLICT (user_id, badge_id) DO NOTHING
         RETURNING id, user_id, badge_id, earned_at`,
        [userId, badgeId]
      );
      const row = result.rows[0];
      if (!row) {
        return { status: 'already_awarded' };
      }
      return {
        status: 'awarded',
        award: {
          id: row.id,
          userId: row.user_id,
          badgeId: row.badge_id,
          earnedAt: row.earned_at,
        },
      };
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw error.constraint === 'user_badges_badge_id_fkey'
          ? AppError.notFound('Badge', badgeId)
          : AppError.notFound('User', userId);
      }
      throw error;
    }
  }

  /**
   * Insert or refresh catalog entries by type. Used by the migration.
   */
  async upsertDefinitions(seeds: readonly BadgeSeed[], ctx?: RepositoryContext): Promise<number> {
    const query = this.getQuery(ctx);
    let written = 0;
    for (const seed of seeds) {
      const result = await query(
        `INSERT INTO badges (type, name, description, icon_url, xp_reward)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (type) DO UPDATE
         SET name = EXCLUDED.name,
             description = EXCLUDED.description,
             icon_url = EXCLUDED.icon_url,
             xp_reward = EXCLUDED.xp_reward`,
        [seed.type, seed.name, seed.description, seed.iconUrl, seed.xpReward]
      );
      written += result.rowCount;
    }
    return written;
  }
}
