/**
 * Reward task processor, shared by the in-process queue and the BullMQ worker.
 */

import type { LeaderboardService } from '../services/LeaderboardService';
import type { RewardTask } from './TaskQueue';

export interface RewardTaskDeps {
  leaderboard: LeaderboardService;
}

export async function processRewardTask(task: RewardTask, deps: RewardTaskDeps): Promise<void> {
  switch (task.type) {
    case 'leaderboard.refresh':
      await deps.leaderboard.refresh(task.userId);
      return;
    case 'leaderboard.rebuild':
      await deps.leaderboard.rebuild(task.category);
      return;
  }
}
