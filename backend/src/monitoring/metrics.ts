import type { Hono, Env } from 'hono';
import { Registry, Histogram, Counter, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [registry],
});

const xpAwardedTotal = new Counter({
  name: 'xp_awarded_total',
  help: 'XP appended to the ledger',
  labelNames: ['direction'],
  registers: [registry],
});

const badgesAwardedTotal = new Counter({
  name: 'badges_awarded_total',
  help: 'Badges newly awarded',
  labelNames: ['badge'],
  registers: [registry],
});

const leaderboardReadsTotal = new Counter({
  name: 'leaderboard_reads_total',
  help: 'Leaderboard reads by serving source',
  labelNames: ['category', 'source'],
  registers: [registry],
});

const rewardTasksTotal = new Counter({
  name: 'reward_tasks_total',
  help: 'Background reward tasks by outcome',
  labelNames: ['task', 'outcome'],
  registers: [registry],
});

function createMetricsEndpoint<E extends Env>(app: Hono<E>): void {
  app.get('/metrics', async (c) => {
    const metrics = await registry.metrics();
    return c.text(metrics, 200, {
      'Content-Type': registry.contentType,
    });
  });
}

export {
  registry,
  httpRequestDuration,
  httpRequestsTotal,
  xpAwardedTotal,
  badgesAwardedTotal,
  leaderboardReadsTotal,
  rewardTasksTotal,
  createMetricsEndpoint,
};
