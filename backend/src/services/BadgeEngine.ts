/**
 * Badge Engine
 *
 * The badge catalog and the one rule per badge type. `checkAndAward` is
 * idempotent: the award insert is guarded by the (user, badge) unique
 * constraint, and a collision is reported as "already awarded", not an error.
 * Each new award appends the badge's XP to the ledger.
 */

import { AppError, withPersistence } from '../lib/errors';
import { badgeLogger } from '../logger';
import { badgesAwardedTotal } from '../monitoring/metrics';
import { badgeReason } from './RewardRules';
import type { XPLedgerService } from './XPLedgerService';
import type {
  BadgeDefinition,
  BadgeSeed,
  BadgeStore,
  BadgeType,
  EarnedBadge,
  User,
  UserStore,
} from '../types';

// ============================================================================
// BADGE CATALOG
// ============================================================================

export const BADGE_CATALOG: readonly BadgeSeed[] = [
  {
    type: 'first_order',
    name: 'First Order',
    description: 'Placed your first order',
    iconUrl: '/badges/first-order.png',
    xpReward: 50,
  },
  {
    type: 'top_seller',
    name: 'Top Seller',
    description: 'Made 10 successful sales',
    iconUrl: '/badges/top-seller.png',
    xpReward: 200,
  },
  {
    type: 'big_spender',
    name: 'Big Spender',
    description: 'Spent over ₵5000',
    iconUrl: '/badges/big-spender.png',
    xpReward: 300,
  },
  {
    type: 'early_bird',
    name: 'Early Bird',
    description: 'One of the first 100 users',
    iconUrl: '/badges/early-bird.png',
    xpReward: 100,
  },
  {
    type: 'reviewer',
    name: 'Reviewer',
    description: 'Left 10 product reviews',
    iconUrl: '/badges/reviewer.png',
    xpReward: 150,
  },
  {
    type: 'referrer',
    name: 'Referrer',
    description: 'Referred 5 new users',
    iconUrl: '/badges/referrer.png',
    xpReward: 250,
  },
];

// ============================================================================
// RULES
// ============================================================================

export const TOP_SELLER_MIN_SALES = 10;
export const BIG_SPENDER_MIN_SPEND = 5000;

interface RuleContext {
  users: UserStore;
  earlyBirdLimit: number;
}

type BadgeRule = (user: User, ctx: RuleContext) => boolean | Promise<boolean>;

const BADGE_RULES: Record<BadgeType, BadgeRule> = {
  first_order: async (user, ctx) => (await ctx.users.countOrders(user.id)) >= 1,
  top_seller: async (user, ctx) =>
    (await ctx.users.countDeliveredSales(user.id)) >= TOP_SELLER_MIN_SALES,
  big_spender: (user) => user.totalSpent >= BIG_SPENDER_MIN_SPEND,
  // Compares against the user count now, not at the user's signup.
  early_bird: async (_user, ctx) => (await ctx.users.countUsers()) <= ctx.earlyBirdLimit,
  // Review and referral subsystems do not exist yet.
  reviewer: () => false,
  referrer: () => false,
};

// ============================================================================
// ENGINE
// ============================================================================

export interface AwardedBadge {
  badge: BadgeDefinition;
  earnedAt: Date;
  xpAwarded: number;
}

export interface UserBadges {
  earned: EarnedBadge[];
  available: BadgeDefinition[];
}

export interface BadgeEngineOptions {
  earlyBirdLimit: number;
}

export class BadgeEngine {
  private readonly ruleContext: RuleContext;

  constructor(
    private readonly users: UserStore,
    private readonly badges: BadgeStore,
    private readonly ledger: XPLedgerService,
    options: BadgeEngineOptions = { earlyBirdLimit: 100 }
  ) {
    this.ruleContext = { users, earlyBirdLimit: options.earlyBirdLimit };
  }

  /**
   * Badge types from `catalog` the user newly qualifies for. Held badges are
   * skipped; `only` restricts evaluation to the listed types.
   */
  async evaluate(
    user: User,
    catalog: readonly BadgeDefinition[],
    alreadyHeld: readonly BadgeType[],
    only?: readonly BadgeType[]
  ): Promise<BadgeType[]> {
    const qualifying = await this.qualifyingDefinitions(user, catalog, alreadyHeld, only);
    return qualifying.map((badge) => badge.type);
  }

  async checkAndAward(userId: string, only?: readonly BadgeType[]): Promise<AwardedBadge[]> {
    if (only && only.length === 0) {
      return [];
    }

    const user = await withPersistence('User read', () => this.users.get(userId));
    if (!user) {
      throw AppError.notFound('User', userId);
    }

    const [catalog, held] = await withPersistence('Badge read', () =>
      Promise.all([this.badges.allDefinitions(), this.badges.awardsFor(userId)])
    );
    const qualifying = await withPersistence('Badge evaluation', () =>
      this.qualifyingDefinitions(user, catalog, held.map((b) => b.type), only)
    );

    const awarded: AwardedBadge[] = [];
    for (const badge of qualifying) {
      const outcome = await withPersistence('Badge award', () =>
        this.badges.award(userId, badge.id)
      );
      if (outcome.status === 'already_awarded') {
        badgeLogger.debug({ userId, badge: badge.type }, 'Badge already awarded');
        continue;
      }

      if (badge.xpReward !== 0) {
        await this.ledger.append(userId, badge.xpReward, badgeReason(badge.name));
      }

      badgesAwardedTotal.inc({ badge: badge.type });
      badgeLogger.info({ userId, badge: badge.type, xpReward: badge.xpReward }, 'Badge awarded');
      awarded.push({ badge, earnedAt: outcome.award.earnedAt, xpAwarded: badge.xpReward });
    }

    return awarded;
  }

  /**
   * Award a badge regardless of its rule. A second grant fails with
   * AlreadyAwardedError.
   */
  async grant(userId: string, type: BadgeType): Promise<AwardedBadge> {
    const catalog = await withPersistence('Badge read', () => this.badges.allDefinitions());
    const badge = catalog.find((b) => b.type === type);
    if (!badge) {
      throw AppError.notFound('Badge', type);
    }

    const outcome = await withPersistence('Badge award', () => this.badges.award(userId, badge.id));
    if (outcome.status === 'already_awarded') {
      throw AppError.alreadyAwarded(userId, type);
    }
    if (badge.xpReward !== 0) {
      await this.ledger.append(userId, badge.xpReward, badgeReason(badge.name));
    }

    badgesAwardedTotal.inc({ badge: type });
    badgeLogger.info({ userId, badge: type }, 'Badge granted');
    return { badge, earnedAt: outcome.award.earnedAt, xpAwarded: badge.xpReward };
  }

  async userBadges(userId: string): Promise<UserBadges> {
    const [catalog, earned] = await withPersistence('Badge read', () =>
      Promise.all([this.badges.allDefinitions(), this.badges.awardsFor(userId)])
    );
    const held = new Set(earned.map((b) => b.type));
    return {
      earned,
      available: catalog.filter((b) => !held.has(b.type)),
    };
  }

  private async qualifyingDefinitions(
    user: User,
    catalog: readonly BadgeDefinition[],
    alreadyHeld: readonly BadgeType[],
    only?: readonly BadgeType[]
  ): Promise<BadgeDefinition[]> {
    const held = new Set(alreadyHeld);
    const qualifying: BadgeDefinition[] = [];

    for (const badge of catalog) {
      if (held.has(badge.type)) continue;
      if (only && !only.includes(badge.type)) continue;

      if (await BADGE_RULES[badge.type](user, this.ruleContext)) {
        qualifying.push(badge);
      }
    }
    return qualifying;
  }
}
