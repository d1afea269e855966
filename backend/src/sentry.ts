/**
 * Sentry Error Tracking
 *
 * Initialized only when SENTRY_DSN is set. Import before other modules in
 * server.ts and worker.ts.
 */

import * as Sentry from '@sentry/node';
import { config } from './config';
import { logger } from './logger';

const dsn = config.sentry.dsn;

export const sentryEnabled = Boolean(dsn) && !config.app.isTest;

if (sentryEnabled) {
  Sentry.init({
    dsn,
    environment: config.sentry.environment,
    release: `rewards-api@${process.env.npm_package_version || '1.0.0'}`,
    tracesSampleRate: config.sentry.tracesSampleRate,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['authorization'];
        delete event.request.headers['x-service-token'];
      }
      return event;
    },

    ignoreErrors: ['ECONNRESET', 'EPIPE', 'AbortError'],
  });

  logger.info('Sentry error tracking initialized');
} else {
  logger.debug('Sentry DSN not configured, error tracking disabled');
}

/**
 * Report an unexpected error. No-op when Sentry is not configured.
 */
export function reportError(err: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.captureException(err, context ? { extra: context } : undefined);
}

export { Sentry };
