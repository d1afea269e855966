/**
 * In-memory stores implementing the repository seams.
 *
 * Every operation yields to the event loop before touching state, so
 * concurrent callers interleave the way they would against Postgres. The
 * read-modify-write of a single operation (counter increment, guarded level
 * write, award insert) stays atomic, like the SQL statement it stands for.
 */

import { randomUUID } from 'node:crypto';
import { resolveLevel } from '../../src/services/LevelResolver';
import { BADGE_CATALOG } from '../../src/services/BadgeEngine';
import type {
  AppendOutcome,
  AwardOutcome,
  BadgeAward,
  BadgeDefinition,
  BadgeStore,
  EarnedBadge,
  LeaderboardCandidate,
  LedgerStore,
  LevelTier,
  NewXPTransaction,
  User,
  UserRole,
  UserStore,
  XPIncrement,
  XPTransaction,
} from '../../src/types';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

const BASE_TIME = Date.UTC(2024, 0, 1);

export interface NewUser {
  id?: string;
  name?: string;
  role?: UserRole;
  totalXP?: number;
  level?: LevelTier;
  totalSpent?: number;
  totalSales?: number;
  createdAt?: Date;
}

/**
 * Shared tables behind the three stores.
 */
export class MarketplaceState {
  readonly users = new Map<string, User>();
  readonly transactions: XPTransaction[] = [];
  readonly badges: BadgeDefinition[];
  readonly awards: BadgeAward[] = [];
  readonly orders = new Map<string, number>();
  readonly deliveredSales = new Map<string, number>();
  /** Store methods that reject with a driver-style error. */
  readonly failing = new Set<string>();
  /** Calls per store method. */
  readonly calls = new Map<string, number>();
  private seq = 0;

  constructor() {
    this.badges = BADGE_CATALOG.map((seed) => ({ ...seed, id: randomUUID() }));
  }

  addUser(input: NewUser = {}): User {
    this.seq += 1;
    const totalXP = input.totalXP ?? 0;
    const user: User = {
      id: input.id ?? randomUUID(),
      name: input.name ?? `User ${this.seq}`,
      email: null,
      role: input.role ?? 'buyer',
      totalXP,
      level: input.level ?? resolveLevel(totalXP),
      totalSpent: input.totalSpent ?? 0,
      totalSales: input.totalSales ?? 0,
      createdAt: input.createdAt ?? new Date(BASE_TIME + this.seq * 1000),
    };
    this.users.set(user.id, user);
    if (totalXP !== 0) {
      this.transactions.push({
        id: randomUUID(),
        userId: user.id,
        amount: totalXP,
        reason: 'Opening balance',
        reference: null,
        createdAt: user.createdAt,
      });
    }
    return user;
  }

  user(userId: string): User {
    const user = this.users.get(userId);
    if (!user) {
      throw new Error(`No user ${userId} in fake state`);
    }
    return user;
  }

  /** Collaborator writes: an order row and, optionally, the buyer's spend. */
  placeOrder(buyerId: string, spend = 0): void {
    this.orders.set(buyerId, (this.orders.get(buyerId) ?? 0) + 1);
    const user = this.user(buyerId);
    this.users.set(buyerId, { ...user, totalSpent: user.totalSpent + spend });
  }

  recordSales(sellerId: string, deliveredOrders: number, amount = 0): void {
    this.deliveredSales.set(sellerId, (this.deliveredSales.get(sellerId) ?? 0) + deliveredOrders);
    const user = this.user(sellerId);
    this.users.set(sellerId, { ...user, totalSales: user.totalSales + amount });
  }

  badgeId(type: BadgeDefinition['type']): string {
    const badge = this.badges.find((b) => b.type === type);
    if (!badge) {
      throw new Error(`No badge ${type} in fake catalog`);
    }
    return badge.id;
  }

  /** The guarded counter update `incrementXP` performs in SQL. */
  applyXP(userId: string, delta: number): XPIncrement {
    const user = this.users.get(userId);
    if (!user) return { status: 'user_not_found' };
    const totalXP = user.totalXP + delta;
    if (totalXP < 0) return { status: 'insufficient_balance', balance: user.totalXP };
    this.users.set(userId, { ...user, totalXP });
    return { status: 'applied', balance: totalXP };
  }

  async enter(operation: string): Promise<void> {
    this.calls.set(operation, (this.calls.get(operation) ?? 0) + 1);
    await tick();
    if (this.failing.has(operation)) {
      throw new Error(`connect ECONNREFUSED (${operation})`);
    }
  }
}

export class InMemoryUserStore implements UserStore {
  constructor(private readonly state: MarketplaceState) {}

  async get(userId: string): Promise<User | null> {
    await this.state.enter('users.get');
    const user = this.state.users.get(userId);
    return user ? { ...user } : null;
  }

  async incrementXP(userId: string, delta: number): Promise<XPIncrement> {
    await this.state.enter('users.incrementXP');
    return this.state.applyXP(userId, delta);
  }

  async setLevel(userId: string, level: LevelTier, atBalance?: number): Promise<boolean> {
    await this.state.enter('users.setLevel');
    const user = this.state.users.get(userId);
    if (!user) return false;
    if (atBalance !== undefined && user.totalXP !== atBalance) return false;
    this.state.users.set(userId, { ...user, level });
    return true;
  }

  async countUsers(): Promise<number> {
    await this.state.enter('users.countUsers');
    return this.state.users.size;
  }

  async countOrders(buyerId: string): Promise<number> {
    await this.state.enter('users.countOrders');
    return this.state.orders.get(buyerId) ?? 0;
  }

  async countDeliveredSales(sellerId: string): Promise<number> {
    await this.state.enter('users.countDeliveredSales');
    return this.state.deliveredSales.get(sellerId) ?? 0;
  }

  async badgeCount(userId: string): Promise<number> {
    await this.state.enter('users.badgeCount');
    return this.state.awards.filter((a) => a.userId === userId).length;
  }

  async topByMetric(role: UserRole, limit: number): Promise<LeaderboardCandidate[]> {
    await this.state.enter('users.topByMetric');
    const score = (user: User) => (role === 'seller' ? user.totalSales : user.totalSpent);
    return [...this.state.users.values()]
      .filter((user) => user.role === role)
      .sort((a, b) =>
        score(b) - score(a) ||
        a.createdAt.getTime() - b.createdAt.getTime() ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
      )
      .slice(0, limit)
      .map((user) => ({
        userId: user.id,
        name: user.name,
        level: user.level,
        score: score(user),
        badgeCount: this.state.awards.filter((a) => a.userId === user.id).length,
        createdAt: user.createdAt.toISOString(),
      }));
  }
}

export class InMemoryLedgerStore implements LedgerStore {
  constructor(private readonly state: MarketplaceState) {}

  async append(entry: NewXPTransaction): Promise<AppendOutcome> {
    await this.state.enter('ledger.append');
    const increment = this.state.applyXP(entry.userId, entry.amount);
    if (increment.status !== 'applied') return increment;

    const transaction: XPTransaction = {
      id: randomUUID(),
      userId: entry.userId,
      amount: entry.amount,
      reason: entry.reason,
      reference: entry.reference,
      createdAt: new Date(BASE_TIME + this.state.transactions.length),
    };
    this.state.transactions.push(transaction);
    return { status: 'appended', transaction, balance: increment.balance };
  }

  async sumForUser(userId: string): Promise<number> {
    await this.state.enter('ledger.sumForUser');
    return this.forUser(userId).reduce((sum, tx) => sum + tx.amount, 0);
  }

  async listForUser(userId: string, limit: number, offset: number): Promise<XPTransaction[]> {
    await this.state.enter('ledger.listForUser');
    return this.forUser(userId).reverse().slice(offset, offset + limit);
  }

  async countForUser(userId: string): Promise<number> {
    await this.state.enter('ledger.countForUser');
    return this.forUser(userId).length;
  }

  private forUser(userId: string): XPTransaction[] {
    return this.state.transactions.filter((tx) => tx.userId === userId);
  }
}

export class InMemoryBadgeStore implements BadgeStore {
  constructor(private readonly state: MarketplaceState) {}

  async allDefinitions(): Promise<BadgeDefinition[]> {
    await this.state.enter('badges.allDefinitions');
    return [...this.state.badges].sort((a, b) => (a.type < b.type ? -1 : 1));
  }

  async awardsFor(userId: string): Promise<EarnedBadge[]> {
    await this.state.enter('badges.awardsFor');
    const earned: EarnedBadge[] = [];
    for (const award of this.state.awards) {
      const badge = this.state.badges.find((b) => b.id === award.badgeId);
      if (award.userId === userId && badge) {
        earned.push({ ...badge, earnedAt: award.earnedAt });
      }
    }
    return earned;
  }

  async award(userId: string, badgeId: string): Promise<AwardOutcome> {
    await this.state.enter('badges.award');
    if (this.state.awards.some((a) => a.userId === userId && a.badgeId === badgeId)) {
      return { status: 'already_awarded' };
    }
    const award: BadgeAward = {
      id: randomUUID(),
      userId,
      badgeId,
      earnedAt: new Date(BASE_TIME + this.state.awards.length),
    };
    this.state.awards.push(award);
    return { status: 'awarded', award };
  }
}

export function createFakeStores(state: MarketplaceState = new MarketplaceState()) {
  return {
    state,
    users: new InMemoryUserStore(state),
    ledgerStore: new InMemoryLedgerStore(state),
    badgeStore: new InMemoryBadgeStore(state),
  };
}
