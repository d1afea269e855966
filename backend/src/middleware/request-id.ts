/**
 * Request ID Middleware
 *
 * Reuses the caller's `X-Request-Id` (so a reward can be traced back to the
 * order or payment call that caused it) or generates a ULID, exposes it as
 * `c.get('requestId')` and echoes it on the response.
 */

import type { Context, Next } from 'hono';
import { ulid } from 'ulidx';

export type RequestIdVariables = {
  requestId: string;
};

export async function requestIdMiddleware(
  c: Context<{ Variables: RequestIdVariables }>,
  next: Next
): Promise<void> {
  const requestId = c.req.header('x-request-id') || `req_${ulid()}`;
  c.set('requestId', requestId);
  c.header('X-Request-Id', requestId);
  await next();
}

/**
 * Adds a Server-Timing header with the total handler time.
 */
export async function serverTimingMiddleware(c: Context, next: Next): Promise<void> {
  const start = performance.now();

  await next();

  const duration = (performance.now() - start).toFixed(1);
  c.header('Server-Timing', `total;dur=${duration}`);
}
