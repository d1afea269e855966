/**
 * Rewards Engine Type Definitions
 *
 * Domain types and the store seams the services are constructed with.
 * Row shapes match database/schema.sql.
 *
 * @see database/schema.sql
 */

// ============================================================================
// ENUMS (Match CHECK constraints in schema.sql)
// ============================================================================

export type UserRole = 'buyer' | 'seller';

export type LevelTier = 'bronze' | 'silver' | 'gold' | 'platinum';

export type BadgeType =
  | 'first_order'
  | 'top_seller'
  | 'big_spender'
  | 'early_bird'
  | 'reviewer'
  | 'referrer';

export type LeaderboardCategory = 'weekly_buyers' | 'monthly_sellers';

/**
 * What triggered a reward. Decides which badges are re-checked.
 */
export type RewardKind =
  | 'signup'
  | 'order_placed'
  | 'order_completed'
  | 'product_sale'
  | 'payment_completed'
  | 'manual';

// ============================================================================
// ENTITIES
// ============================================================================

export interface User {
  id: string;
  name: string;
  email: string | null;
  role: UserRole;
  totalXP: number;
  level: LevelTier;
  totalSpent: number;
  totalSales: number;
  createdAt: Date;
}

export interface XPTransaction {
  id: string;
  userId: string;
  amount: number;
  reason: string;
  reference: string | null;
  createdAt: Date;
}

export interface BadgeDefinition {
  id: string;
  type: BadgeType;
  name: string;
  description: string;
  iconUrl: string | null;
  xpReward: number;
}

export type BadgeSeed = Omit<BadgeDefinition, 'id'>;

export interface BadgeAward {
  id: string;
  userId: string;
  badgeId: string;
  earnedAt: Date;
}

export interface EarnedBadge extends BadgeDefinition {
  earnedAt: Date;
}

export interface LeaderboardEntry {
  userId: string;
  name: string;
  score: number;
  rank: number;
  level: LevelTier;
  badgeCount: number;
}

/**
 * Denormalized display fields stored beside a leaderboard score.
 * `createdAt` carries the tie-break order.
 */
export interface LeaderboardMetadata {
  name: string;
  level: LevelTier;
  badgeCount: number;
  createdAt: string;
}

export interface LeaderboardCandidate extends LeaderboardMetadata {
  userId: string;
  score: number;
}

// ============================================================================
// STORE SEAMS
// ============================================================================

export interface UserStore {
  get(userId: string): Promise<User | null>;
  /**
   * Storage-side `total_xp = total_xp + delta`, applied only while the
   * result stays non-negative.
   */
  incrementXP(userId: string, delta: number): Promise<XPIncrement>;
  /**
   * Persist a level. With `atBalance`, the write only lands while `total_xp`
   * still equals that balance. Returns whether a row was updated.
   */
  setLevel(userId: string, level: LevelTier, atBalance?: number): Promise<boolean>;
  countUsers(): Promise<number>;
  countOrders(buyerId: string): Promise<number>;
  countDeliveredSales(sellerId: string): Promise<number>;
  badgeCount(userId: string): Promise<number>;
  topByMetric(role: UserRole, limit: number): Promise<LeaderboardCandidate[]>;
}

export interface NewXPTransaction {
  userId: string;
  amount: number;
  reason: string;
  reference: string | null;
}

export type XPIncrement =
  | { status: 'applied'; balance: number }
  | { status: 'insufficient_balance'; balance: number }
  | { status: 'user_not_found' };

export type AppendOutcome =
  | { status: 'appended'; transaction: XPTransaction; balance: number }
  | { status: 'insufficient_balance'; balance: number }
  | { status: 'user_not_found' };

export interface LedgerStore {
  /** Insert the transaction and apply it to the user's counter in one atomic unit. */
  append(entry: NewXPTransaction): Promise<AppendOutcome>;
  sumForUser(userId: string): Promise<number>;
  listForUser(userId: string, limit: number, offset: number): Promise<XPTransaction[]>;
  countForUser(userId: string): Promise<number>;
}

export type AwardOutcome =
  | { status: 'awarded'; award: BadgeAward }
  | { status: 'already_awarded' };

export interface BadgeStore {
  allDefinitions(): Promise<BadgeDefinition[]>;
  awardsFor(userId: string): Promise<EarnedBadge[]>;
  award(userId: string, badgeId: string): Promise<AwardOutcome>;
}
