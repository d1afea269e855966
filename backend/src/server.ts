/**
 * Rewards API Server
 *
 * Entry point: validates configuration, builds the container and serves the
 * Hono app on Node.
 */

// Sentry must be imported first to capture all errors
import { Sentry } from './sentry';
import { serve } from '@hono/node-server';
import { config, validateConfig } from './config';
import { logger } from './logger';
import { createContainer } from './container';
import { createApp } from './app';
import { gracefulShutdown } from './lib/shutdown';

function startServer(): void {
  const { valid, errors } = validateConfig();
  if (!valid) {
    logger.fatal({ errors }, 'Invalid configuration');
    process.exit(1);
  }

  const container = createContainer(config);
  const app = createApp({
    services: container.services,
    serviceToken: config.auth.serviceToken,
    healthCheck: () => container.db.healthCheck(),
  });

  const server = serve({ fetch: app.fetch, port: config.app.port }, (info) => {
    logger.info(
      { port: info.port, env: config.app.env, taskMode: config.rewards.taskMode },
      'Rewards API listening'
    );
  });

  gracefulShutdown.registerDefaults({ httpServer: server, container });
  gracefulShutdown.setup();
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  Sentry.captureException(reason);
});

process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught exception, shutting down');
  Sentry.captureException(error);
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), 2000);
});

startServer();
