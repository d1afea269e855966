/**
 * Database Client
 *
 * PostgreSQL access through a `pg` pool. The pool is created by
 * `createDatabase()` and handed to repositories by the container; nothing
 * in the core reaches for a module-level connection.
 *
 * @see database/schema.sql
 */

import pg from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';
import type { AppConfig } from './config';
import { dbLogger } from './logger';

const { Pool } = pg;

// ============================================================================
// ERROR HANDLING
// ============================================================================

export interface DatabaseError extends Error {
  code?: string;
  constraint?: string;
  detail?: string;
  table?: string;
}

function hasCode(error: unknown): error is DatabaseError {
  return error instanceof Error && typeof Reflect.get(error, 'code') === 'string';
}

/**
 * Check if error is a foreign key violation (SQLSTATE 23503)
 */
export function isForeignKeyViolation(error: unknown): error is DatabaseError {
  return hasCode(error) && error.code === '23503';
}

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export interface QueryResult<T = QueryResultRow> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

export interface Database {
  query: QueryFn;
  /** Run `fn` inside BEGIN/COMMIT; any thrown error rolls back. */
  transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T>;
  healthCheck(): Promise<{ connected: boolean; latencyMs: number }>;
  close(): Promise<void>;
}

function clientQuery(client: PoolClient): QueryFn {
  return async <T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => {
    const result = await client.query<T>(sql, params);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
    };
  };
}

export function createDatabase(cfg: AppConfig['database']): Database {
  const pool = new Pool({
    connectionString: cfg.url,
    max: cfg.maxConnections,
    idleTimeoutMillis: cfg.idleTimeoutMillis,
    connectionTimeoutMillis: cfg.connectionTimeoutMillis,
    statement_timeout: cfg.statementTimeoutMillis,
  });

  pool.on('error', (err) => {
    dbLogger.error({ err }, 'Idle database client error');
  });

  const query: QueryFn = async <T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[]
  ) => {
    const result = await pool.query<T>(sql, params);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
    };
  };

  return {
    query,

    transaction: async <T>(fn: (query: QueryFn) => Promise<T>): Promise<T> => {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(clientQuery(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          dbLogger.error(
            { err: rollbackError, originalError: error },
            'ROLLBACK failed - original error may be lost'
          );
        }
        throw error;
      } finally {
        client.release();
      }
    },

    healthCheck: async () => {
      const start = Date.now();
      try {
        await query('SELECT 1');
        return { connected: true, latencyMs: Date.now() - start };
      } catch (err) {
        dbLogger.warn({ err }, 'Database health check failed');
        return { connected: false, latencyMs: Date.now() - start };
      }
    },

    close: async () => {
      await pool.end();
      dbLogger.info('Database pool closed');
    },
  };
}
