/**
 * XP Transaction Repository
 *
 * Append-only ledger. `append` inserts the row and bumps `users.total_xp`
 * inside one transaction, so the counter always equals SUM(amount).
 */

import { BaseRepository, type RepositoryContext } from './BaseRepository';
import type { Database } from '../db';
import type { UserRepository } from './UserRepository';
import type {
  AppendOutcome,
  LedgerStore,
  NewXPTransaction,
  XPTransaction,
} from '../types';

interface XPTransactionRow {
  id: string;
  user_id: string;
  amount: number;
  reason: string;
  reference: string | null;
  created_at: Date;
}

export class XPTransactionRepository
  extends BaseRepository<XPTransaction, XPTransactionRow>
  implements LedgerStore
{
  protected readonly tableName = 'xp_transactions';

  constructor(db: Database, private readonly users: UserRepository) {
    super(db);
  }

  protected mapRow(row: XPTransactionRow): XPTransaction {
    return {
      id: row.id,
      userId: row.user_id,
      amount: row.amount,
      reason: row.reason,
      reference: row.reference,
      createdAt: row.created_at,
    };
  }

  /**
   * Nothing is written when the user does not exist or the debit would
   * take the balance below zero.
   */
  async append(entry: NewXPTransaction): Promise<AppendOutcome> {
    return this.db.transaction(async (query): Promise<AppendOutcome> => {
      // The UPDATE takes the row lock, serializing appends per user.
      const increment = await this.users.incrementXP(entry.userId, entry.amount, { query });
      if (increment.status !== 'applied') {
        return increment;
      }

      const result = await query<XPTransactionRow>(
        `INSERT INTO xp_transactions (user_id, amount, reason, reference)
         VALUES ($1, $2, $3, $4)
         RETURNING id, user_id, amount, reason, reference, created_at`,
        [entry.userId, entry.amount, entry.reason, entry.reference]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('XP transaction insert returned no row');
      }
      return { status: 'appended', transaction: this.mapRow(row), balance: increment.balance };
    });
  }

  async sumForUser(userId: string, ctx?: RepositoryContext): Promise<number> {
    const query = this.getQuery(ctx);
    const result = await query<{ total: string }>(
      `SELECT COALESCE(SUM(amount), 0)::text AS total FROM xp_transactions WHERE user_id = $1`,
      [userId]
    );
    return Number(result.rows[0]?.total ?? 0);
  }

  async listForUser(
    userId: string,
    limit: number,
    offset: number,
    ctx?: RepositoryContext
  ): Promise<XPTransaction[]> {
    const query = this.getQuery(ctx);
    const result = await query<XPTransactionRow>(
      `SELECT id, user_id, amount, reason, reference, created_at
       FROM xp_transactions
       WHERE user_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2 OFFSET $3`,
      [userId, limit, offset]
    );
    return result.rows.map((row) => this.mapRow(row));
  }

  async countForUser(userId: string, ctx?: RepositoryContext): Promise<number> {
    return this.count('user_id = $1', [userId], ctx);
  }
}
