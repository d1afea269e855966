/**
 * Rewards Router
 *
 * Called by the order, payment and auth services after they commit.
 */

import { z } from 'zod';
import { router, serviceProcedure, Schemas } from '../trpc';

export const rewardsRouter = router({
  signup: serviceProcedure
    .input(Schemas.userId)
    .mutation(({ ctx, input }) => ctx.services.events.onSignup(input.userId)),

  orderPlaced: serviceProcedure
    .input(z.object({ orderId: Schemas.uuid, buyerId: Schemas.uuid }))
    .mutation(({ ctx, input }) => ctx.services.events.onOrderPlaced(input)),

  orderDelivered: serviceProcedure
    .input(
      z.object({
        orderId: Schemas.uuid,
        buyerId: Schemas.uuid,
        totalAmount: Schemas.money,
        items: z
          .array(
            z.object({
              sellerId: Schemas.uuid,
              price: Schemas.money,
              quantity: z.number().int().positive(),
            })
          )
          .min(1),
      })
    )
    .mutation(({ ctx, input }) => ctx.services.events.onOrderDelivered(input)),

  paymentCompleted: serviceProcedure
    .input(z.object({ paymentId: z.string().min(1).max(255), userId: Schemas.uuid }))
    .mutation(({ ctx, input }) => ctx.services.events.onPaymentCompleted(input)),
});
