/**
 * BullMQ Queue Configuration
 *
 * Queue topology:
 * - rewards: leaderboard refreshes and rebuilds after reward events
 *
 * Reward side tasks are best effort: one attempt, no backoff. A failed job is
 * logged by the worker and kept briefly for inspection, never retried.
 */

import { Queue, Worker, type Job, type QueueOptions, type WorkerOptions } from 'bullmq';
import Redis from 'ioredis';
import { config } from '../config';

// ============================================================================
// REDIS CONNECTION
// ============================================================================

/**
 * BullMQ needs its own ioredis connection; workers require
 * `maxRetriesPerRequest: null` so blocking commands are not cut short.
 */
function createRedisConnection(url: string = config.redis.url): Redis {
  if (!url) {
    throw new Error('Redis configuration missing (REDIS_URL required for BullMQ)');
  }

  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

// ============================================================================
// QUEUE DEFINITIONS
// ============================================================================

export type QueueName = 'rewards';

interface QueueConfig {
  name: QueueName;
  defaultJobOptions: QueueOptions['defaultJobOptions'];
  concurrency: number;
}

export const QUEUE_CONFIGS: Record<QueueName, QueueConfig> = {
  rewards: {
    name: 'rewards',
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: {
        age: 60 * 60, // Keep completed jobs for 1 hour
        count: 1000,
      },
      removeOnFail: {
        age: 24 * 60 * 60, // Keep failed jobs for 1 day
      },
    },
    concurrency: 10,
  },
};

// ============================================================================
// QUEUE FACTORY
// ============================================================================

const queueInstances = new Map<QueueName, Queue>();

/**
 * Get or create a BullMQ queue (one instance per name)
 */
export function getQueue(queueName: QueueName): Queue {
  const existing = queueInstances.get(queueName);
  if (existing) {
    return existing;
  }

  const queue = new Queue(queueName, {
    connection: createRedisConnection(),
    defaultJobOptions: QUEUE_CONFIGS[queueName].defaultJobOptions,
  });

  queueInstances.set(queueName, queue);
  return queue;
}

// ============================================================================
// WORKER FACTORY
// ============================================================================

/**
 * Create a BullMQ worker for a queue. Workers run in worker.ts, not the API.
 */
export function createWorker(
  queueName: QueueName,
  processor: (job: Job) => Promise<void>,
  options?: Partial<WorkerOptions>
): Worker {
  return new Worker(queueName, processor, {
    connection: createRedisConnection(),
    concurrency: QUEUE_CONFIGS[queueName].concurrency,
    ...options,
  });
}
