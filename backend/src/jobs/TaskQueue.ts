/**
 * Reward Task Queue
 *
 * Background work spawned by reward events (leaderboard refreshes and
 * rebuilds). Submission never blocks or throws: a task that cannot be
 * enqueued, or that fails while running, is logged and dropped. No retries.
 *
 * Two implementations:
 * - InProcessTaskQueue: runs tasks on the event loop of the submitting process
 * - BullMQTaskQueue: hands tasks to the `rewards` queue for worker.ts
 */

import { z } from 'zod';
import { workerLogger } from '../logger';
import { rewardTasksTotal } from '../monitoring/metrics';

export const rewardTaskSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('leaderboard.refresh'), userId: z.string().min(1) }),
  z.object({
    type: z.literal('leaderboard.rebuild'),
    category: z.enum(['weekly_buyers', 'monthly_sellers']),
  }),
]);

export type RewardTask = z.infer<typeof rewardTaskSchema>;

export type RewardTaskProcessor = (task: RewardTask) => Promise<void>;

export interface TaskQueue {
  submit(task: RewardTask): void;
  /** Wait for everything submitted so far to settle. */
  drain(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Tasks with a key are collapsed while one with the same key is pending.
 * (BullMQ rejects ':' in custom job ids.)
 */
export function dedupeKey(task: RewardTask): string | null {
  return task.type === 'leaderboard.rebuild' ? `${task.type}-${task.category}` : null;
}

function recordDropped(task: RewardTask, err: unknown, stage: 'enqueue' | 'run'): void {
  rewardTasksTotal.inc({ task: task.type, outcome: 'dropped' });
  workerLogger.warn({ err, task, stage }, 'Reward task failed; dropped');
}

// ============================================================================
// IN-PROCESS
// ============================================================================

export class InProcessTaskQueue implements TaskQueue {
  private readonly running = new Set<Promise<void>>();
  private readonly pendingKeys = new Set<string>();

  constructor(private readonly processor: RewardTaskProcessor) {}

  submit(task: RewardTask): void {
    const key = dedupeKey(task);
    if (key !== null) {
      if (this.pendingKeys.has(key)) return;
      this.pendingKeys.add(key);
    }

    const run: Promise<void> = Promise.resolve()
      .then(() => this.processor(task))
      .then(
        () => {
          rewardTasksTotal.inc({ task: task.type, outcome: 'completed' });
        },
        (err: unknown) => recordDropped(task, err, 'run')
      )
      .finally(() => {
        this.running.delete(run);
        if (key !== null) this.pendingKeys.delete(key);
      });

    this.running.add(run);
  }

  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  async close(): Promise<void> {
    await this.drain();
  }
}

// ============================================================================
// BULLMQ
// ============================================================================

/**
 * The part of a BullMQ `Queue` the task queue uses.
 */
export interface JobAddOptions {
  jobId?: string;
  removeOnComplete?: boolean;
  removeOnFail?: boolean;
}

export interface JobQueue {
  add(name: string, data: RewardTask, opts?: JobAddOptions): Promise<{ id?: string }>;
  close(): Promise<void>;
}

/**
 * BullMQ ignores `add()` while any job with the same id exists, finished
 * ones included, so keyed jobs are removed as soon as they settle.
 */
export function jobOptions(task: RewardTask): JobAddOptions | undefined {
  const key = dedupeKey(task);
  if (key === null) return undefined;
  return { jobId: key, removeOnComplete: true, removeOnFail: true };
}

export class BullMQTaskQueue implements TaskQueue {
  private readonly enqueuing = new Set<Promise<void>>();

  constructor(private readonly queue: JobQueue) {}

  submit(task: RewardTask): void {
    const pending: Promise<void> = this.queue
      .add(task.type, task, jobOptions(task))
      .then(
        (job) => {
          workerLogger.debug({ jobId: job.id, task: task.type }, 'Reward task enqueued');
        },
        (err: unknown) => recordDropped(task, err, 'enqueue')
      )
      .finally(() => {
        this.enqueuing.delete(pending);
      });

    this.enqueuing.add(pending);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.enqueuing]);
  }

  async close(): Promise<void> {
    await this.drain();
    await this.queue.close();
  }
}
