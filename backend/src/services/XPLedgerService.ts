/**
 * XP Ledger Service
 *
 * Append-only record of XP per user. The balance is the materialized
 * `users.total_xp` counter, written in the same transaction as the ledger
 * row; `audit()` checks the two still agree.
 */

import { AppError, withPersistence } from '../lib/errors';
import { ledgerLogger } from '../logger';
import { xpAwardedTotal } from '../monitoring/metrics';
import type { LedgerStore, UserStore, XPTransaction } from '../types';

export interface LedgerAppendResult {
  transaction: XPTransaction;
  previousBalance: number;
  balance: number;
}

export interface LedgerHistory {
  transactions: XPTransaction[];
  total: number;
  limit: number;
  offset: number;
}

export interface LedgerAudit {
  userId: string;
  balance: number;
  ledgerSum: number;
  consistent: boolean;
}

export interface XPLedgerOptions {
  historyDefaultLimit: number;
  historyMaxLimit: number;
}

/** Bounds of the INTEGER columns holding amounts and balances. */
export const MIN_XP_AMOUNT = -2147483648;
export const MAX_XP_AMOUNT = 2147483647;

const DEFAULT_OPTIONS: XPLedgerOptions = {
  historyDefaultLimit: 20,
  historyMaxLimit: 100,
};

export class XPLedgerService {
  private readonly options: XPLedgerOptions;

  constructor(
    private readonly users: UserStore,
    private readonly ledger: LedgerStore,
    options: Partial<XPLedgerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async append(
    userId: string,
    amount: number,
    reason: string,
    reference: string | null = null
  ): Promise<LedgerAppendResult> {
    if (!Number.isSafeInteger(amount) || amount === 0) {
      throw AppError.validation('XP amount must be a non-zero integer');
    }
    if (amount < MIN_XP_AMOUNT || amount > MAX_XP_AMOUNT) {
      throw AppError.validation(`XP amount must be between ${MIN_XP_AMOUNT} and ${MAX_XP_AMOUNT}`);
    }
    if (reason.trim() === '') {
      throw AppError.validation('XP reason is required');
    }

    const result = await withPersistence('XP ledger append', () =>
      this.ledger.append({ userId, amount, reason, reference })
    );
    if (result.status === 'user_not_found') {
      throw AppError.notFound('User', userId);
    }
    if (result.status === 'insufficient_balance') {
      throw AppError.validation(
        `XP balance ${result.balance} cannot cover an adjustment of ${amount}`
      );
    }

    xpAwardedTotal.inc({ direction: amount > 0 ? 'credit' : 'debit' }, Math.abs(amount));
    ledgerLogger.info(
      { userId, amount, reason, reference, balance: result.balance, transactionId: result.transaction.id },
      'XP appended'
    );

    return {
      transaction: result.transaction,
      previousBalance: result.balance - amount,
      balance: result.balance,
    };
  }

  async balance(userId: string): Promise<number> {
    const user = await withPersistence('XP balance read', () => this.users.get(userId));
    if (!user) {
      throw AppError.notFound('User', userId);
    }
    return user.totalXP;
  }

  async ledgerSum(userId: string): Promise<number> {
    return withPersistence('XP ledger sum', () => this.ledger.sumForUser(userId));
  }

  async audit(userId: string): Promise<LedgerAudit> {
    const [balance, ledgerSum] = await Promise.all([
      this.balance(userId),
      this.ledgerSum(userId),
    ]);
    const consistent = balance === ledgerSum;
    if (!consistent) {
      ledgerLogger.error({ userId, balance, ledgerSum }, 'XP counter diverged from ledger');
    }
    return { userId, balance, ledgerSum, consistent };
  }

  async history(
    userId: string,
    page: { limit?: number; offset?: number } = {}
  ): Promise<LedgerHistory> {
    const limit = Math.min(
      Math.max(page.limit ?? this.options.historyDefaultLimit, 1),
      this.options.historyMaxLimit
    );
    const offset = Math.max(page.offset ?? 0, 0);

    const [transactions, total] = await withPersistence('XP history read', () =>
      Promise.all([
        this.ledger.listForUser(userId, limit, offset),
        this.ledger.countForUser(userId),
      ])
    );
    return { transactions, total, limit, offset };
  }
}
