import { httpRequestDuration, httpRequestsTotal } from './metrics'
import type { MiddlewareHandler } from 'hono'

const UNTRACKED = new Set(['/health', '/health/readiness', '/health/liveness', '/metrics'])

/**
 * Collapse ids so label cardinality stays bounded. tRPC paths keep their
 * procedure names; batched calls are labelled as a batch.
 */
export function normalizeRoute(path: string): string {
  if (path.startsWith('/trpc/')) {
    const procedures = path.slice('/trpc/'.length)
    return procedures.includes(',') ? '/trpc/:batch' : path
  }
  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, '/:id')
    .replace(/\/\d+/g, '/:id')
}

export function httpMetricsMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const path = c.req.path

    if (UNTRACKED.has(path)) {
      return next()
    }

    const start = performance.now()
    const labels = { method: c.req.method, route: normalizeRoute(path) }

    try {
      await next()
    } catch (err) {
      httpRequestDuration.observe({ ...labels, status_code: '500' }, (performance.now() - start) / 1000)
      httpRequestsTotal.inc({ ...labels, status_code: '500' })
      throw err
    }

    const statusCode = c.res.status.toString()
    httpRequestDuration.observe({ ...labels, status_code: statusCode }, (performance.now() - start) / 1000)
    httpRequestsTotal.inc({ ...labels, status_code: statusCode })
  }
}
