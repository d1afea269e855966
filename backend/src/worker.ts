/**
 * Reward Worker
 *
 * Long-lived process consuming the `rewards` BullMQ queue when the API runs
 * with REWARD_TASK_MODE=bullmq. A failed job is logged and left to expire;
 * nothing is retried.
 *
 * Run with: `tsx backend/src/worker.ts`
 */

import { Sentry } from './sentry';
import type { Job } from 'bullmq';
import { config, validateConfig } from './config';
import { workerLogger } from './logger';
import { createContainer } from './container';
import { createWorker } from './jobs/queues';
import { processRewardTask } from './jobs/reward-tasks';
import { rewardTaskSchema } from './jobs/TaskQueue';
import { rewardTasksTotal } from './monitoring/metrics';
import { gracefulShutdown } from './lib/shutdown';

function startWorker(): void {
  const { valid, errors } = validateConfig();
  if (!valid || !config.redis.url) {
    workerLogger.fatal({ errors }, 'Invalid configuration (REDIS_URL is required for the worker)');
    process.exit(1);
  }

  // Tasks handled here must not be re-enqueued, so the container runs inline.
  const container = createContainer({
    ...config,
    rewards: { ...config.rewards, taskMode: 'inline' },
  });
  const { leaderboard } = container.services;

  const worker = createWorker('rewards', async (job: Job) => {
    const task = rewardTaskSchema.parse(job.data);
    await processRewardTask(task, { leaderboard });
    rewardTasksTotal.inc({ task: task.type, outcome: 'completed' });
  });

  worker.on('failed', (job, err) => {
    rewardTasksTotal.inc({ task: job?.name ?? 'unknown', outcome: 'dropped' });
    workerLogger.warn({ err, jobId: job?.id, task: job?.name }, 'Reward task failed; dropped');
  });

  worker.on('error', (err) => {
    workerLogger.error({ err }, 'Reward worker error');
    Sentry.captureException(err);
  });

  gracefulShutdown.registerDefaults({ bullmqWorkers: [worker], container });
  gracefulShutdown.setup();

  workerLogger.info('Reward worker started');
}

startWorker();
