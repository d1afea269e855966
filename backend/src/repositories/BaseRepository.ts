/**
 * Base Repository Pattern
 *
 * Standard data access over an injected `Database`. Supports transaction
 * injection via QueryFn, and maps snake_case rows to domain objects.
 */

import type { QueryResultRow } from 'pg';
import type { Database, QueryFn } from '../db';

/**
 * Context for repository operations.
 * Pass a transaction-scoped query function to run within a transaction.
 */
export interface RepositoryContext {
  query?: QueryFn;
}

export abstract class BaseRepository<T, Row extends QueryResultRow, ID = string> {
  protected abstract readonly tableName: string;

  constructor(protected readonly db: Database) {}

  protected abstract mapRow(row: Row): T;

  /**
   * Get the query function: uses transaction query if provided, otherwise the pool.
   */
  protected getQuery(ctx?: RepositoryContext): QueryFn {
    return ctx?.query ?? this.db.query;
  }

  /**
   * Find a single record by primary key.
   */
  async findById(id: ID, ctx?: RepositoryContext): Promise<T | null> {
    const query = this.getQuery(ctx);
    const result = await query<Row>(
      `SELECT * FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? this.mapRow(row) : null;
  }

  /**
   * Count all records in the table, optionally with a WHERE clause.
   */
  async count(
    where?: string,
    params?: unknown[],
    ctx?: RepositoryContext
  ): Promise<number> {
    const query = this.getQuery(ctx);
    const sql = where
      ? `SELECT COUNT(*)::int as count FROM ${this.tableName} WHERE ${where}`
      : `SELECT COUNT(*)::int as count FROM ${this.tableName}`;
    const result = await query<{ count: number }>(sql, params);
    return result.rows[0]?.count ?? 0;
  }
}
