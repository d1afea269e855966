/**
 * Gamification Router
 *
 * XP, level and badge reads for any caller; manual XP, badge grants and
 * ledger audits for internal services only.
 */

import { z } from 'zod';
import { router, publicProcedure, serviceProcedure, Schemas } from '../trpc';

export const gamificationRouter = router({
  getUserXP: publicProcedure
    .input(Schemas.userId)
    .query(({ ctx, input }) => ctx.services.gamification.getUserXP(input.userId)),

  getUserLevel: publicProcedure
    .input(Schemas.userId)
    .query(({ ctx, input }) => ctx.services.gamification.getUserLevel(input.userId)),

  getUserBadges: publicProcedure
    .input(Schemas.userId)
    .query(({ ctx, input }) => ctx.services.gamification.getUserBadges(input.userId)),

  profile: publicProcedure
    .input(Schemas.userId)
    .query(({ ctx, input }) => ctx.services.gamification.getProfile(input.userId)),

  xpHistory: publicProcedure
    .input(Schemas.xpHistory)
    .query(({ ctx, input }) =>
      ctx.services.gamification.getXPHistory(input.userId, {
        limit: input.limit,
        offset: input.offset,
      })
    ),

  updateUserLevel: serviceProcedure
    .input(Schemas.userId)
    .mutation(({ ctx, input }) => ctx.services.gamification.updateUserLevel(input.userId)),

  checkBadges: serviceProcedure
    .input(Schemas.userId)
    .mutation(({ ctx, input }) => ctx.services.gamification.checkBadges(input.userId)),

  grantBadge: serviceProcedure
    .input(z.object({ userId: Schemas.uuid, badge: Schemas.badgeType }))
    .mutation(({ ctx, input }) => ctx.services.gamification.grantBadge(input.userId, input.badge)),

  addXP: serviceProcedure
    .input(Schemas.addXP)
    .mutation(({ ctx, input }) =>
      ctx.services.gamification.addXP(input.userId, input.amount, input.reason, input.reference ?? null)
    ),

  auditLedger: serviceProcedure
    .input(Schemas.userId)
    .query(({ ctx, input }) => ctx.services.gamification.auditLedger(input.userId)),
});
