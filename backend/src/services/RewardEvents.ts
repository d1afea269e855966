/**
 * Reward Events
 *
 * Entry points for the collaborator services. Each handler turns a
 * marketplace event into dispatcher calls using the amounts in RewardRules;
 * no other service computes XP.
 *
 * The collaborators commit their own writes (order rows, spend and sales
 * totals) before calling in. A reward failure surfaces here and never
 * unwinds them.
 */

import Decimal from 'decimal.js';
import { AppError, PartialRewardError, withPersistence, type RecipientFailure } from '../lib/errors';
import { rewardLogger } from '../logger';
import {
  FIRST_ORDER_XP,
  PAYMENT_COMPLETED_XP,
  REWARD_REASONS,
  buyerOrderXP,
  lineTotal,
  sellerSaleXP,
} from './RewardRules';
import type { RewardDispatcher, RewardResult } from './RewardDispatcher';
import type { UserStore } from '../types';

export interface OrderPlacedEvent {
  orderId: string;
  buyerId: string;
}

export interface DeliveredOrderItem {
  sellerId: string;
  price: number | string;
  quantity: number;
}

export interface OrderDeliveredEvent {
  orderId: string;
  buyerId: string;
  totalAmount: number | string;
  items: DeliveredOrderItem[];
}

export interface PaymentCompletedEvent {
  paymentId: string;
  userId: string;
}

export interface OrderDeliveredResult {
  buyer: RewardResult;
  sellers: RewardResult[];
}

export class RewardEvents {
  constructor(
    private readonly users: UserStore,
    private readonly dispatcher: RewardDispatcher
  ) {}

  async onSignup(userId: string): Promise<RewardResult> {
    return this.dispatcher.dispatch({ userId, amount: 0, reason: 'Signup', kind: 'signup' });
  }

  /**
   * First-order XP is granted when this is the buyer's only order. Later
   * orders still change the buyer's spend, so their standing is refreshed.
   */
  async onOrderPlaced(event: OrderPlacedEvent): Promise<RewardResult | null> {
    const orders = await withPersistence('Order count', () => this.users.countOrders(event.buyerId));
    if (orders !== 1) {
      this.dispatcher.refreshLeaderboard(event.buyerId);
      return null;
    }
    return this.dispatcher.dispatch({
      userId: event.buyerId,
      amount: FIRST_ORDER_XP,
      reason: REWARD_REASONS.firstOrder,
      reference: null,
      kind: 'order_placed',
    });
  }

  /**
   * Sellers earn per line sold, summed per seller; the buyer earns on the
   * order total. Each recipient is rewarded on its own: one failing
   * recipient does not hold back the others, and the failures are raised
   * together once every recipient has been tried.
   */
  async onOrderDelivered(event: OrderDeliveredEvent): Promise<OrderDeliveredResult> {
    const salesBySeller = new Map<string, Decimal>();
    for (const item of event.items) {
      const previous = salesBySeller.get(item.sellerId) ?? new Decimal(0);
      salesBySeller.set(item.sellerId, previous.plus(lineTotal(item.price, item.quantity)));
    }

    const sellers: RewardResult[] = [];
    const failures: RecipientFailure[] = [];

    for (const [sellerId, sales] of salesBySeller) {
      try {
        sellers.push(
          await this.dispatcher.dispatch({
            userId: sellerId,
            amount: sellerSaleXP(sales),
            reason: REWARD_REASONS.productSale,
            reference: event.orderId,
            kind: 'product_sale',
          })
        );
      } catch (error) {
        failures.push(recipientFailure(sellerId, 'seller', error));
      }
    }

    let buyer: RewardResult | null = null;
    try {
      buyer = await this.dispatcher.dispatch({
        userId: event.buyerId,
        amount: buyerOrderXP(event.totalAmount),
        reason: REWARD_REASONS.orderCompleted,
        reference: event.orderId,
        kind: 'order_completed',
      });
    } catch (error) {
      failures.push(recipientFailure(event.buyerId, 'buyer', error));
    }

    if (buyer === null || failures.length > 0) {
      rewardLogger.error(
        { orderId: event.orderId, failures, rewarded: sellers.length + (buyer ? 1 : 0) },
        'Delivered order partially rewarded'
      );
      throw new PartialRewardError(
        `Order ${event.orderId}: ${failures.length} recipient(s) not rewarded`,
        failures
      );
    }

    rewardLogger.info(
      { orderId: event.orderId, buyerId: event.buyerId, sellers: sellers.length },
      'Delivered order rewarded'
    );
    return { buyer, sellers };
  }

  async onPaymentCompleted(event: PaymentCompletedEvent): Promise<RewardResult> {
    return this.dispatcher.dispatch({
      userId: event.userId,
      amount: PAYMENT_COMPLETED_XP,
      reason: REWARD_REASONS.paymentCompleted,
      reference: event.paymentId,
      kind: 'payment_completed',
    });
  }
}

function recipientFailure(
  userId: string,
  role: RecipientFailure['role'],
  error: unknown
): RecipientFailure {
  if (error instanceof AppError) {
    return { userId, role, code: error.code, statusCode: error.statusCode, message: error.message };
  }
  return {
    userId,
    role,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    message: error instanceof Error ? error.message : String(error),
  };
}
