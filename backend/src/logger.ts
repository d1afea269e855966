/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 *
 * Child loggers for subsystems:
 *   const log = logger.child({ module: 'leaderboard-worker' });
 *   log.info({ jobId }, 'Refreshing leaderboard entry');
 */

import pino from 'pino';
import { config } from './config';

const isDev = config.app.isDevelopment && !config.app.isTest;

export const logger = pino({
  level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),

  // Redact sensitive fields from log output
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'req.headers["x-service-token"]',
      'password',
      'token',
      'secret',
      'serviceToken',
    ],
    censor: '[REDACTED]',
  },

  base: {
    service: 'rewards-api',
    env: config.app.env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

/**
 * Pre-built child loggers for major subsystems.
 */
export const ledgerLogger = logger.child({ module: 'ledger' });
export const badgeLogger = logger.child({ module: 'badge' });
export const leaderboardLogger = logger.child({ module: 'leaderboard' });
export const rewardLogger = logger.child({ module: 'reward' });
export const workerLogger = logger.child({ module: 'worker' });
export const dbLogger = logger.child({ module: 'db' });
