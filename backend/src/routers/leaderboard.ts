/**
 * Leaderboard Router
 */

import { z } from 'zod';
import { router, publicProcedure, serviceProcedure, Schemas } from '../trpc';

// Anything above the cap is clamped by the service, not rejected.
const limitInput = z.object({ limit: z.number().int().positive().optional() });

export const leaderboardRouter = router({
  top: publicProcedure
    .input(z.object({ category: Schemas.category, limit: z.number().int().positive().optional() }))
    .query(({ ctx, input }) => ctx.services.leaderboard.topN(input.category, input.limit)),

  buyers: publicProcedure
    .input(limitInput)
    .query(({ ctx, input }) => ctx.services.leaderboard.topN('weekly_buyers', input.limit)),

  sellers: publicProcedure
    .input(limitInput)
    .query(({ ctx, input }) => ctx.services.leaderboard.topN('monthly_sellers', input.limit)),

  rebuild: serviceProcedure
    .input(z.object({ category: Schemas.category }))
    .mutation(async ({ ctx, input }) => ({
      category: input.category,
      members: await ctx.services.leaderboard.rebuild(input.category),
    })),
});
