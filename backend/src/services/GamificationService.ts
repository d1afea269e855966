/**
 * Gamification Service
 *
 * Read-side queries (XP, level, badges, profile, history) plus the manual
 * operations exposed to internal callers. Writes go through the dispatcher,
 * ledger and badge engine.
 */

import { AppError, withPersistence } from '../lib/errors';
import { getLevelInfo, type LevelInfo } from './LevelResolver';
import type { AwardedBadge, BadgeEngine, UserBadges } from './BadgeEngine';
import type { LedgerAudit, LedgerHistory, XPLedgerService } from './XPLedgerService';
import type { RewardDispatcher, RewardResult } from './RewardDispatcher';
import type { BadgeType, EarnedBadge, LevelTier, User, UserStore, XPTransaction } from '../types';

export interface UserXP {
  userId: string;
  totalXP: number;
  level: LevelInfo;
}

export interface UserProfile {
  user: User;
  level: LevelInfo;
  badges: EarnedBadge[];
  badgeCount: number;
  recentTransactions: XPTransaction[];
}

const PROFILE_RECENT_TRANSACTIONS = 10;

export class GamificationService {
  constructor(
    private readonly users: UserStore,
    private readonly ledger: XPLedgerService,
    private readonly badges: BadgeEngine,
    private readonly dispatcher: RewardDispatcher
  ) {}

  private async requireUser(userId: string): Promise<User> {
    const user = await withPersistence('User read', () => this.users.get(userId));
    if (!user) {
      throw AppError.notFound('User', userId);
    }
    return user;
  }

  async getUserXP(userId: string): Promise<UserXP> {
    const user = await this.requireUser(userId);
    return { userId, totalXP: user.totalXP, level: getLevelInfo(user.totalXP) };
  }

  async getUserLevel(userId: string): Promise<LevelInfo> {
    const user = await this.requireUser(userId);
    return getLevelInfo(user.totalXP);
  }

  async updateUserLevel(userId: string): Promise<{ level: LevelTier; changed: boolean }> {
    return this.dispatcher.reconcileLevel(userId);
  }

  async getUserBadges(userId: string): Promise<UserBadges> {
    await this.requireUser(userId);
    return this.badges.userBadges(userId);
  }

  /**
   * Evaluate the whole catalog, not just one event's badges.
   */
  async checkBadges(userId: string): Promise<AwardedBadge[]> {
    const awarded = await this.badges.checkAndAward(userId);
    if (awarded.length > 0) {
      await this.dispatcher.reconcileLevel(userId);
      this.dispatcher.refreshLeaderboard(userId);
    }
    return awarded;
  }

  async grantBadge(userId: string, badge: BadgeType): Promise<AwardedBadge> {
    const awarded = await this.badges.grant(userId, badge);
    await this.dispatcher.reconcileLevel(userId);
    this.dispatcher.refreshLeaderboard(userId);
    return awarded;
  }

  async addXP(
    userId: string,
    amount: number,
    reason: string,
    reference: string | null = null
  ): Promise<RewardResult> {
    if (amount === 0) {
      throw AppError.validation('XP amount must be a non-zero integer');
    }
    return this.dispatcher.dispatch({ userId, amount, reason, reference, kind: 'manual' });
  }

  async getProfile(userId: string): Promise<UserProfile> {
    const user = await this.requireUser(userId);
    const [earned, history] = await Promise.all([
      this.badges.userBadges(userId),
      this.ledger.history(userId, { limit: PROFILE_RECENT_TRANSACTIONS }),
    ]);
    return {
      user,
      level: getLevelInfo(user.totalXP),
      badges: earned.earned,
      badgeCount: earned.earned.length,
      recentTransactions: history.transactions,
    };
  }

  async getXPHistory(userId: string, page: { limit?: number; offset?: number }): Promise<LedgerHistory> {
    await this.requireUser(userId);
    return this.ledger.history(userId, page);
  }

  async auditLedger(userId: string): Promise<LedgerAudit> {
    return this.ledger.audit(userId);
  }
}
