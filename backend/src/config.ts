/**
 * Rewards Engine Configuration
 *
 * Centralized configuration for the reward ledger, badge engine and
 * leaderboard services. Values come from the environment (see `.env.example`).
 */

import 'dotenv/config';

type TaskMode = 'inline' | 'bullmq';

function parseTaskMode(value: string | undefined): TaskMode {
  return value === 'bullmq' ? 'bullmq' : 'inline';
}

export const config = {
  // PostgreSQL (system of record for users, ledger and badges)
  database: {
    url: process.env.DATABASE_URL || '',
    maxConnections: parseInt(process.env.DATABASE_POOL_SIZE || '10', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statementTimeoutMillis: parseInt(process.env.DATABASE_STATEMENT_TIMEOUT_MS || '5000', 10),
  },

  // Redis (leaderboard sorted sets + BullMQ)
  redis: {
    url: process.env.REDIS_URL || '',
    commandTimeoutMillis: parseInt(process.env.REDIS_COMMAND_TIMEOUT_MS || '1000', 10),
    keyPrefix: process.env.REDIS_KEY_PREFIX || '',
  },

  // Error tracking
  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.1'),
  },

  // Internal callers (order, payment and auth services)
  auth: {
    serviceToken: process.env.REWARDS_SERVICE_TOKEN || '',
  },

  rewards: {
    leaderboardDefaultLimit: 10,
    leaderboardMaxLimit: 50,
    leaderboardTTL: 60 * 60,
    earlyBirdLimit: parseInt(process.env.EARLY_BIRD_LIMIT || '100', 10),
    historyDefaultLimit: 20,
    historyMaxLimit: 100,
    taskMode: parseTaskMode(process.env.REWARD_TASK_MODE),
  },

  // Application
  app: {
    port: parseInt(process.env.PORT || '3000', 10),
    env: process.env.NODE_ENV || 'development',
    isTest: process.env.NODE_ENV === 'test',
    isDevelopment: process.env.NODE_ENV !== 'production',
    isProduction: process.env.NODE_ENV === 'production',
    allowedOrigins: (process.env.ALLOWED_ORIGINS || '')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
  },
} as const;

export type AppConfig = typeof config;

/**
 * Validate required configuration before the server or worker starts.
 */
export function validateConfig(cfg: AppConfig = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!cfg.database.url) {
    errors.push('DATABASE_URL is required');
  }

  if (cfg.rewards.taskMode === 'bullmq' && !cfg.redis.url) {
    errors.push('REDIS_URL is required when REWARD_TASK_MODE=bullmq');
  }

  if (cfg.app.isProduction) {
    if (!cfg.redis.url) {
      errors.push('REDIS_URL is required for the leaderboard cache');
    }
    if (!cfg.auth.serviceToken) {
      errors.push('REWARDS_SERVICE_TOKEN is required');
    }
  }

  return { valid: errors.length === 0, errors };
}

export default config;
