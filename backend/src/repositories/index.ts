/**
 * Repository Layer
 *
 * Postgres implementations of the store seams in `types.ts`. Each repository
 * is constructed with a `Database`; all methods accept an optional
 * RepositoryContext for transaction support.
 *
 * Usage:
 *   const users = new UserRepository(db);
 *   await db.transaction(async (query) => {
 *     await users.incrementXP(userId, 10, { query });
 *   });
 */

import type { Database } from '../db';
import { BadgeRepository } from './BadgeRepository';
import { UserRepository } from './UserRepository';
import { XPTransactionRepository } from './XPTransactionRepository';

export { BaseRepository, type RepositoryContext } from './BaseRepository';
export { UserRepository } from './UserRepository';
export { XPTransactionRepository } from './XPTransactionRepository';
export { BadgeRepository } from './BadgeRepository';

export interface Repositories {
  users: UserRepository;
  ledger: XPTransactionRepository;
  badges: BadgeRepository;
}

export function createRepositories(db: Database): Repositories {
  const users = new UserRepository(db);
  return {
    users,
    ledger: new XPTransactionRepository(db, users),
    badges: new BadgeRepository(db),
  };
}
