/**
 * Reward Dispatcher Unit Tests
 */
import { describe, it, expect } from 'vitest';
import { NotFoundError, PersistenceError } from '../../src/lib/errors';
import { getLevelInfo } from '../../src/services/LevelResolver';
import { createTestHarness, RecordingTaskQueue } from '../fakes/harness';

const MISSING_USER = '00000000-0000-4000-8000-000000000000';

describe('RewardDispatcher', () => {
  it('should grant first-order XP plus the first_order badge', async () => {
    const { state, services } = createTestHarness();
    const buyer = state.addUser();
    state.placeOrder(buyer.id);

    const result = await services.dispatcher.dispatch({
      userId: buyer.id,
      amount: 50,
      reason: 'First Order',
      kind: 'order_placed',
    });

    expect(result).toMatchObject({
      userId: buyer.id,
      oldXP: 0,
      newXP: 50,
      xpToNext: 450,
      xpGained: 50,
      oldLevel: 'bronze',
      newLevel: 'bronze',
      leveledUp: false,
    });
    expect(result.newBadges.map((b) => b.badge.type)).toEqual(['first_order']);
    expect(result.transaction?.reason).toBe('First Order');

    // Badge XP lands in the same event and shows on the next read.
    const balance = state.user(buyer.id).totalXP;
    expect(balance).toBe(100);
    expect(getLevelInfo(balance).level).toBe('bronze');
  });

  it('should report a level-up when the award crosses a tier', async () => {
    const { state, services } = createTestHarness();
    const user = state.addUser({ totalXP: 490 });

    const result = await services.dispatcher.dispatch({
      userId: user.id,
      amount: 20,
      reason: 'Manual adjustment',
      kind: 'manual',
    });

    expect(result.oldLevel).toBe('bronze');
    expect(result.newLevel).toBe('silver');
    expect(result.leveledUp).toBe(true);
    expect(state.user(user.id).level).toBe('silver');
  });

  it('should treat exactly 500 XP as silver', async () => {
    const { state, services } = createTestHarness();
    const user = state.addUser({ totalXP: 480 });

    const result = await services.dispatcher.dispatch({
      userId: user.id,
      amount: 20,
      reason: 'Manual adjustment',
      kind: 'manual',
    });

    expect(result.newXP).toBe(500);
    expect(result.newLevel).toBe('silver');
    expect(result.leveledUp).toBe(true);
  });

  it('should count badge XP towards the resulting level', async () => {
    const { state, services } = createTestHarness();
    const buyer = state.addUser({ totalXP: 400 });
    state.placeOrder(buyer.id);

    const result = await services.dispatcher.dispatch({
      userId: buyer.id,
      amount: 50,
      reason: 'First Order',
      kind: 'order_placed',
    });

    expect(result.newXP).toBe(450);
    expect(result.newLevel).toBe('silver');
    expect(result.leveledUp).toBe(true);
    expect(state.user(buyer.id)).toMatchObject({ totalXP: 500, level: 'silver' });
  });

  it('should lower the stored level on a negative adjustment without a level-up', async () => {
    const { state, services } = createTestHarness();
    const user = state.addUser({ totalXP: 600 });

    const result = await services.dispatcher.dispatch({
      userId: user.id,
      amount: -200,
      reason: 'Chargeback',
      kind: 'manual',
    });

    expect(result.oldLevel).toBe('silver');
    expect(result.newLevel).toBe('bronze');
    expect(result.leveledUp).toBe(false);
    expect(state.user(user.id).level).toBe('bronze');
  });

  it('should run badge checks only when the amount is zero', async () => {
    const { state, services } = createTestHarness();
    const user = state.addUser();

    const result = await services.dispatcher.dispatch({
      userId: user.id,
      amount: 0,
      reason: 'Signup',
      kind: 'signup',
    });

    expect(result.transaction).toBeNull();
    expect(result.newXP).toBe(0);
    expect(result.newBadges.map((b) => b.badge.type)).toEqual(['early_bird']);
    expect(state.user(user.id).totalXP).toBe(100);
  });

  it('should keep the balance and level consistent under concurrent rewards', async () => {
    const { state, services } = createTestHarness();
    const user = state.addUser();

    await Promise.all(
      Array.from({ length: 10 }, () =>
        services.dispatcher.dispatch({ userId: user.id, amount: 60, reason: 'Bonus', kind: 'manual' })
      )
    );

    expect(state.user(user.id)).toMatchObject({ totalXP: 600, level: 'silver' });
    expect(await services.ledger.audit(user.id)).toMatchObject({ consistent: true, ledgerSum: 600 });
  });

  it('should submit a leaderboard refresh for the user', async () => {
    const tasks = new RecordingTaskQueue();
    const { state, services } = createTestHarness({ tasks });
    const user = state.addUser();

    await services.dispatcher.dispatch({ userId: user.id, amount: 10, reason: 'Payment Completed', kind: 'payment_completed' });

    expect(tasks.submitted).toEqual([{ type: 'leaderboard.refresh', userId: user.id }]);
  });

  it('should raise NotFoundError for an unknown user and write nothing', async () => {
    const { state, services } = createTestHarness();

    await expect(
      services.dispatcher.dispatch({ userId: MISSING_USER, amount: 10, reason: 'Bonus', kind: 'manual' })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(state.transactions).toHaveLength(0);
  });

  it('should surface a failed append and skip the refresh', async () => {
    const tasks = new RecordingTaskQueue();
    const { state, services } = createTestHarness({ tasks });
    const user = state.addUser();
    state.failing.add('ledger.append');

    await expect(
      services.dispatcher.dispatch({ userId: user.id, amount: 10, reason: 'Bonus', kind: 'manual' })
    ).rejects.toBeInstanceOf(PersistenceError);
    expect(tasks.submitted).toEqual([]);
  });

  describe('reconcileLevel', () => {
    it('should repair a stale stored level once', async () => {
      const { state, services } = createTestHarness();
      const user = state.addUser({ totalXP: 2000, level: 'bronze' });

      expect(await services.dispatcher.reconcileLevel(user.id)).toEqual({ level: 'gold', changed: true });
      expect(await services.dispatcher.reconcileLevel(user.id)).toEqual({ level: 'gold', changed: false });
      expect(state.user(user.id).level).toBe('gold');
    });
  });
});
