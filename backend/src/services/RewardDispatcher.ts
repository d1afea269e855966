/**
 * Reward Dispatcher
 *
 * Runs one reward event end to end:
 *   1. append the primary XP to the ledger
 *   2. derive old/new level from the post-append balance
 *   3. re-check the badges the event kind can unlock (badge XP goes through
 *      the ledger as well)
 *   4. persist the level of the current balance
 *   5. submit a leaderboard refresh to the task queue, without waiting
 *
 * Steps 1-4 are sequenced and their failures reach the caller. Step 5 never
 * fails the event.
 */

import { AppError, withPersistence } from '../lib/errors';
import { rewardLogger } from '../logger';
import { isLevelUp, resolveLevel, xpToNext } from './LevelResolver';
import { BADGE_CHECKS } from './RewardRules';
import type { AwardedBadge, BadgeEngine } from './BadgeEngine';
import type { XPLedgerService } from './XPLedgerService';
import type { TaskQueue } from '../jobs/TaskQueue';
import type { LevelTier, RewardKind, UserStore, XPTransaction } from '../types';

export interface RewardEvent {
  userId: string;
  /** Primary XP. 0 runs badge checks and the refresh only. */
  amount: number;
  reason: string;
  reference?: string | null;
  kind: RewardKind;
}

export interface RewardResult {
  userId: string;
  oldXP: number;
  /** Balance after the primary award; badge XP shows up on the next read. */
  newXP: number;
  /** Gap from `newXP` to the next tier. */
  xpToNext: number;
  xpGained: number;
  oldLevel: LevelTier;
  newLevel: LevelTier;
  leveledUp: boolean;
  newBadges: AwardedBadge[];
  transaction: XPTransaction | null;
}

export class RewardDispatcher {
  constructor(
    private readonly users: UserStore,
    private readonly ledger: XPLedgerService,
    private readonly badges: BadgeEngine,
    private readonly tasks: TaskQueue
  ) {}

  async dispatch(event: RewardEvent): Promise<RewardResult> {
    const { userId, amount, reason, kind } = event;

    const user = await withPersistence('User read', () => this.users.get(userId));
    if (!user) {
      throw AppError.notFound('User', userId);
    }

    let oldXP = user.totalXP;
    let newXP = user.totalXP;
    let transaction: XPTransaction | null = null;
    if (amount !== 0) {
      const appended = await this.ledger.append(userId, amount, reason, event.reference ?? null);
      oldXP = appended.previousBalance;
      newXP = appended.balance;
      transaction = appended.transaction;
    }

    const oldLevel = resolveLevel(oldXP);
    const newBadges = await this.badges.checkAndAward(userId, BADGE_CHECKS[kind]);

    let settledXP = newXP;
    for (const awarded of newBadges) {
      settledXP += awarded.xpAwarded;
    }
    const newLevel = resolveLevel(settledXP);
    await this.reconcileLevel(userId);

    this.refreshLeaderboard(userId);

    const leveledUp = isLevelUp(oldLevel, newLevel);
    rewardLogger.info(
      { userId, kind, amount, oldXP, newXP, oldLevel, newLevel, leveledUp, badges: newBadges.length },
      leveledUp ? 'Reward dispatched, level up' : 'Reward dispatched'
    );

    return {
      userId,
      oldXP,
      newXP,
      xpToNext: xpToNext(newXP),
      xpGained: amount,
      oldLevel,
      newLevel,
      leveledUp,
      newBadges,
      transaction,
    };
  }

  /**
   * Leaderboard-only update for events that change a score but earn no XP.
   */
  refreshLeaderboard(userId: string): void {
    this.tasks.submit({ type: 'leaderboard.refresh', userId });
  }

  /**
   * Recompute the stored level from the current balance. The write only lands
   * while that balance is still current; otherwise the event that moved it
   * reconciles after its own append.
   */
  async reconcileLevel(userId: string): Promise<{ level: LevelTier; changed: boolean }> {
    const user = await withPersistence('User read', () => this.users.get(userId));
    if (!user) {
      throw AppError.notFound('User', userId);
    }
    const level = resolveLevel(user.totalXP);
    if (level === user.level) {
      return { level, changed: false };
    }
    const changed = await withPersistence('Level write', () =>
      this.users.setLevel(userId, level, user.totalXP)
    );
    return { level, changed };
  }
}
