/**
 * Service Container
 *
 * Wires stores, cache and task queue into the reward services. The server
 * and worker build one container per process; tests call `createServices`
 * directly with in-memory stores.
 */

import type Redis from 'ioredis';
import { createDatabase, type Database } from './db';
import { createRepositories, type Repositories } from './repositories';
import { createRedisClient, leaderboardRedis } from './cache/redis';
import {
  DisabledLeaderboardCache,
  RedisLeaderboardCache,
  type LeaderboardCache,
} from './cache/LeaderboardCache';
import { BullMQTaskQueue, InProcessTaskQueue, type TaskQueue } from './jobs/TaskQueue';
import { getQueue } from './jobs/queues';
import { processRewardTask } from './jobs/reward-tasks';
import { XPLedgerService } from './services/XPLedgerService';
import { BadgeEngine } from './services/BadgeEngine';
import { LeaderboardService } from './services/LeaderboardService';
import { RewardDispatcher } from './services/RewardDispatcher';
import { RewardEvents } from './services/RewardEvents';
import { GamificationService } from './services/GamificationService';
import type { AppConfig } from './config';
import type { BadgeStore, LedgerStore, UserStore } from './types';

export interface Services {
  ledger: XPLedgerService;
  badges: BadgeEngine;
  leaderboard: LeaderboardService;
  dispatcher: RewardDispatcher;
  events: RewardEvents;
  gamification: GamificationService;
  tasks: TaskQueue;
}

export interface ServiceDeps {
  users: UserStore;
  ledgerStore: LedgerStore;
  badgeStore: BadgeStore;
  cache: LeaderboardCache;
  /** Defaults to an in-process queue running tasks against these services. */
  tasks?: TaskQueue;
  options: AppConfig['rewards'];
}

export function createServices(deps: ServiceDeps): Services {
  const { users, options } = deps;

  // The in-process queue runs tasks against the leaderboard built below.
  let leaderboard: LeaderboardService | null = null;
  const tasks =
    deps.tasks ??
    new InProcessTaskQueue(async (task) => {
      if (!leaderboard) {
        throw new Error('Leaderboard service not initialized');
      }
      await processRewardTask(task, { leaderboard });
    });

  const ledger = new XPLedgerService(users, deps.ledgerStore, {
    historyDefaultLimit: options.historyDefaultLimit,
    historyMaxLimit: options.historyMaxLimit,
  });
  const badges = new BadgeEngine(users, deps.badgeStore, ledger, {
    earlyBirdLimit: options.earlyBirdLimit,
  });
  leaderboard = new LeaderboardService(users, deps.cache, tasks, {
    defaultLimit: options.leaderboardDefaultLimit,
    maxLimit: options.leaderboardMaxLimit,
  });
  const dispatcher = new RewardDispatcher(users, ledger, badges, tasks);
  const events = new RewardEvents(users, dispatcher);
  const gamification = new GamificationService(users, ledger, badges, dispatcher);

  return { ledger, badges, leaderboard, dispatcher, events, gamification, tasks };
}

export interface Container {
  db: Database;
  redis: Redis | null;
  repositories: Repositories;
  services: Services;
  close(): Promise<void>;
}

/**
 * Build the production graph. In `bullmq` task mode reward tasks go to the
 * `rewards` queue and worker.ts runs them; otherwise they run in this process.
 */
export function createContainer(cfg: AppConfig): Container {
  const db = createDatabase(cfg.database);
  const repositories = createRepositories(db);
  const redis = cfg.redis.url ? createRedisClient(cfg.redis) : null;
  const cache: LeaderboardCache = redis
    ? new RedisLeaderboardCache(leaderboardRedis(redis), cfg.rewards.leaderboardTTL)
    : new DisabledLeaderboardCache();

  const tasks = cfg.rewards.taskMode === 'bullmq' ? new BullMQTaskQueue(getQueue('rewards')) : undefined;

  const services = createServices({
    users: repositories.users,
    ledgerStore: repositories.ledger,
    badgeStore: repositories.badges,
    cache,
    tasks,
    options: cfg.rewards,
  });

  return {
    db,
    redis,
    repositories,
    services,
    async close() {
      await services.tasks.close();
      if (redis) {
        await redis.quit();
      }
      await db.close();
    },
  };
}
