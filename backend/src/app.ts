/**
 * HTTP Application
 *
 * Hono app serving the tRPC API at /trpc, Prometheus metrics and health
 * probes. Built from a service graph so tests can mount it over in-memory
 * stores.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { trpcServer } from '@hono/trpc-server';
import { appRouter } from './routers';
import { createContextFactory } from './trpc';
import { config } from './config';
import { logger } from './logger';
import { createHonoErrorHandler } from './lib/errors/error-handler';
import {
  requestIdMiddleware,
  serverTimingMiddleware,
  type RequestIdVariables,
} from './middleware/request-id';
import { httpMetricsMiddleware } from './monitoring/http-metrics';
import { createMetricsEndpoint } from './monitoring/metrics';
import type { Services } from './container';

export interface AppOptions {
  services: Services;
  serviceToken: string;
  healthCheck: () => Promise<{ connected: boolean; latencyMs: number }>;
  allowedOrigins?: readonly string[];
}

export function createApp(options: AppOptions): Hono<{ Variables: RequestIdVariables }> {
  const app = new Hono<{ Variables: RequestIdVariables }>();

  // ==========================================================================
  // MIDDLEWARE
  // ==========================================================================

  app.use('*', bodyLimit({
    maxSize: 1024 * 1024, // 1MB
    onError: (c) => c.json({ error: 'Request body too large', maxSize: '1MB' }, 413),
  }));

  app.use('*', requestIdMiddleware);
  app.use('*', serverTimingMiddleware);

  // Structured request logging, keyed by request id
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    const status = c.res.status;
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    logger[level]({
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status,
      duration,
    }, `${c.req.method} ${c.req.path} → ${status} (${duration}ms)`);
  });

  const allowedOrigins = options.allowedOrigins ?? config.app.allowedOrigins;
  app.use('*', cors({
    origin: (requestOrigin) => (allowedOrigins.includes(requestOrigin) ? requestOrigin : null),
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-Id', 'X-Service-Token'],
    maxAge: 3600,
  }));

  app.use('*', httpMetricsMiddleware());

  // ==========================================================================
  // METRICS & HEALTH
  // ==========================================================================

  createMetricsEndpoint(app);

  app.get('/health', async (c) => {
    const db = await options.healthCheck();
    return c.json({
      status: db.connected ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      environment: config.app.env,
      database: db,
    }, db.connected ? 200 : 503);
  });

  app.get('/health/readiness', async (c) => {
    const db = await options.healthCheck();
    if (!db.connected) {
      return c.json({ ready: false }, 503);
    }
    return c.json({ ready: true, dbLatencyMs: db.latencyMs });
  });

  app.get('/health/liveness', (c) => c.json({ alive: true, uptime: process.uptime() }));

  // ==========================================================================
  // tRPC
  // ==========================================================================

  app.use('/trpc/*', trpcServer({
    router: appRouter,
    createContext: createContextFactory(options.services, options.serviceToken),
  }));

  app.notFound((c) => c.json({ error: { code: 'NOT_FOUND', message: 'Route not found', statusCode: 404 } }, 404));
  app.onError(createHonoErrorHandler());

  return app;
}
