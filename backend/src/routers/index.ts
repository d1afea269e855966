/**
 * App Router
 *
 * Main tRPC router combining all domain routers
 */

import { router } from '../trpc';
import { gamificationRouter } from './gamification';
import { leaderboardRouter } from './leaderboard';
import { rewardsRouter } from './rewards';
import { healthRouter } from './health';

export const appRouter = router({
  gamification: gamificationRouter,
  leaderboard: leaderboardRouter,
  rewards: rewardsRouter,
  health: healthRouter,
});

export type AppRouter = typeof appRouter;
