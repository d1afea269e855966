/**
 * XP Ledger Service Unit Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { XPLedgerService } from '../../src/services/XPLedgerService';
import { NotFoundError, PersistenceError, ValidationError } from '../../src/lib/errors';
import { createFakeStores, type MarketplaceState } from '../fakes/stores';

describe('XPLedgerService', () => {
  let state: MarketplaceState;
  let ledger: XPLedgerService;

  beforeEach(() => {
    const stores = createFakeStores();
    state = stores.state;
    ledger = new XPLedgerService(stores.users, stores.ledgerStore);
  });

  describe('append', () => {
    it('should record the transaction and return balances around it', async () => {
      const user = state.addUser();

      const result = await ledger.append(user.id, 50, 'First Order', 'order-1');

      expect(result.previousBalance).toBe(0);
      expect(result.balance).toBe(50);
      expect(result.transaction).toMatchObject({
        userId: user.id,
        amount: 50,
        reason: 'First Order',
        reference: 'order-1',
      });
      expect(state.user(user.id).totalXP).toBe(50);
    });

    it('should apply concurrent appends exactly once each', async () => {
      const user = state.addUser();

      await Promise.all(
        Array.from({ length: 20 }, (_, i) => ledger.append(user.id, 5, 'Payment Completed', `p-${i}`))
      );

      expect(await ledger.balance(user.id)).toBe(100);
      expect(await ledger.ledgerSum(user.id)).toBe(100);
      expect(state.transactions).toHaveLength(20);
    });

    it('should accept negative adjustments', async () => {
      const user = state.addUser({ totalXP: 100 });

      const result = await ledger.append(user.id, -30, 'Refund adjustment');

      expect(result.previousBalance).toBe(100);
      expect(result.balance).toBe(70);
    });

    it('should refuse a debit larger than the balance and write nothing', async () => {
      const user = state.addUser({ totalXP: 40 });

      const error = await ledger.append(user.id, -1000, 'Chargeback').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'XP balance 40 cannot cover an adjustment of -1000' });
      expect(state.user(user.id).totalXP).toBe(40);
      expect(await ledger.ledgerSum(user.id)).toBe(40);
    });

    it('should allow a debit down to exactly zero', async () => {
      const user = state.addUser({ totalXP: 40 });

      const result = await ledger.append(user.id, -40, 'Chargeback');

      expect(result.balance).toBe(0);
    });

    it('should reject amounts outside the 32-bit column range', async () => {
      const user = state.addUser();

      await expect(ledger.append(user.id, 2147483648, 'Huge')).rejects.toThrow(
        'XP amount must be between -2147483648 and 2147483647'
      );
      expect(state.transactions).toHaveLength(0);
    });

    it('should reject zero, fractional and unsafe amounts', async () => {
      const user = state.addUser();

      await expect(ledger.append(user.id, 0, 'Nothing')).rejects.toBeInstanceOf(ValidationError);
      await expect(ledger.append(user.id, 1.5, 'Half')).rejects.toBeInstanceOf(ValidationError);
      await expect(ledger.append(user.id, Number.MAX_SAFE_INTEGER + 1, 'Huge')).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(state.transactions).toHaveLength(0);
    });

    it('should require a reason', async () => {
      const user = state.addUser();
      await expect(ledger.append(user.id, 10, '   ')).rejects.toThrow('XP reason is required');
    });

    it('should raise NotFoundError for an unknown user and write nothing', async () => {
      await expect(
        ledger.append('00000000-0000-4000-8000-000000000000', 10, 'Payment Completed')
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(state.transactions).toHaveLength(0);
    });

    it('should surface store failures as PersistenceError', async () => {
      const user = state.addUser();
      state.failing.add('ledger.append');

      const error = await ledger.append(user.id, 10, 'Payment Completed').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ message: 'XP ledger append failed' });
      expect(state.user(user.id).totalXP).toBe(0);
    });
  });

  describe('audit', () => {
    it('should report the counter and ledger sum agreeing', async () => {
      const user = state.addUser({ totalXP: 40 });
      await ledger.append(user.id, 10, 'Payment Completed');

      expect(await ledger.audit(user.id)).toEqual({
        userId: user.id,
        balance: 50,
        ledgerSum: 50,
        consistent: true,
      });
    });

    it('should flag a counter that drifted from the ledger', async () => {
      const user = state.addUser();
      state.users.set(user.id, { ...state.user(user.id), totalXP: 99 });

      const audit = await ledger.audit(user.id);

      expect(audit.consistent).toBe(false);
      expect(audit.balance).toBe(99);
      expect(audit.ledgerSum).toBe(0);
    });
  });

  describe('history', () => {
    it('should page newest first', async () => {
      const user = state.addUser();
      await ledger.append(user.id, 10, 'one');
      await ledger.append(user.id, 20, 'two');
      await ledger.append(user.id, 30, 'three');

      const page = await ledger.history(user.id, { limit: 2 });

      expect(page.transactions.map((tx) => tx.reason)).toEqual(['three', 'two']);
      expect(page.total).toBe(3);
      expect(page.limit).toBe(2);
      expect(page.offset).toBe(0);

      const next = await ledger.history(user.id, { limit: 2, offset: 2 });
      expect(next.transactions.map((tx) => tx.reason)).toEqual(['one']);
    });

    it('should clamp the page size', async () => {
      const user = state.addUser();

      expect((await ledger.history(user.id)).limit).toBe(20);
      expect((await ledger.history(user.id, { limit: 500 })).limit).toBe(100);
      expect((await ledger.history(user.id, { limit: 0 })).limit).toBe(1);
    });
  });
});
