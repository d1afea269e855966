/**
 * Reward Rules
 *
 * XP amounts per reward event and which badges each event re-checks.
 * Currency-to-XP conversions use Decimal.js so fractional prices never
 * pick up binary float error before flooring.
 */

import Decimal from 'decimal.js';
import type { BadgeType, RewardKind } from '../types';

export const FIRST_ORDER_XP = 50;
export const PAYMENT_COMPLETED_XP = 10;

/** XP per 100 currency units spent by a buyer on a delivered order. */
export const BUYER_XP_PER_100 = 5;
/** XP per 100 currency units of a seller's delivered sales. */
export const SELLER_XP_PER_100 = 10;

export const REWARD_REASONS = {
  firstOrder: 'First Order',
  orderCompleted: 'Order Completed',
  productSale: 'Product Sale',
  paymentCompleted: 'Payment Completed',
} as const;

export const BADGE_CHECKS: Record<RewardKind, readonly BadgeType[]> = {
  signup: ['early_bird'],
  order_placed: ['first_order'],
  order_completed: ['first_order', 'big_spender', 'top_seller'],
  product_sale: ['top_seller'],
  payment_completed: [],
  manual: [],
};

function xpPer100(amount: Decimal.Value, rate: number): number {
  const xp = new Decimal(amount).div(100).mul(rate).floor();
  return xp.isNegative() ? 0 : xp.toNumber();
}

export function buyerOrderXP(orderTotal: Decimal.Value): number {
  return xpPer100(orderTotal, BUYER_XP_PER_100);
}

export function sellerSaleXP(saleAmount: Decimal.Value): number {
  return xpPer100(saleAmount, SELLER_XP_PER_100);
}

/** Line total (price × quantity) as an exact decimal. */
export function lineTotal(price: Decimal.Value, quantity: number): Decimal {
  return new Decimal(price).mul(quantity);
}

export function badgeReason(badgeName: string): string {
  return `Badge: ${badgeName}`;
}
