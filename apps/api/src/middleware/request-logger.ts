/**
 * HTTP Request Logger Middleware
 *
 * Logs a single structured entry per request at response finish with
 * request_id, method, route, status code and latency.
 * Event name: http.request.end
 */

import type { Request, Response, NextFunction } from 'express'
import { getRequestContext } from '@partsense/logger'
import { loggers } from '../config/logger'
import { classifyError, formatErrorForLog } from '../lib/errors'

const log = loggers.server

/**
 * Paths to skip logging
 */
const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

/**
 * Matched route pattern (e.g. /api/parts/:partNumber), else the raw path
 */
export function getRoute(req: Request): string {
  const routePath: unknown = req.route?.path
  if (typeof routePath === 'string') {
    return `${req.baseUrl || ''}${routePath}`
  }
  return req.path
}

/**
 * Milliseconds since a process.hrtime.bigint() start, 2 decimal places
 */
export function calculateLatencyMs(startTime: bigint): number {
  const latencyNs = process.hrtime.bigint() - startTime
  return Math.round((Number(latencyNs) / 1_000_000) * 100) / 100
}

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (SKIP_PATHS.has(req.path)) {
    return next()
  }

  const startTime = process.hrtime.bigint()
  res.locals.startTime = startTime
  const requestId = getRequestContext()?.requestId

  res.on('finish', () => {
    const logEntry = {
      event_name: 'http.request.end',
      http: {
        method: req.method,
        route: getRoute(req),
        path: req.path,
        status_code: res.statusCode,
        latency_ms: calculateLatencyMs(startTime),
      },
      request_id: requestId,
    }

    if (res.statusCode >= 500) {
      log.error('Request completed with error', logEntry)
    } else if (res.statusCode >= 400) {
      log.warn('Request completed with client error', logEntry)
    } else {
      log.info('Request completed', logEntry)
    }
  })

  next()
}

/**
 * Logs unhandled errors with their classification, then passes them on
 */
export function errorLoggerMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const startTime: unknown = res.locals.startTime
  const classified = classifyError(err)

  log.error('Unhandled error', {
    event_name: 'http.request.error',
    http: {
      method: req.method,
      route: getRoute(req),
      path: req.path,
      latency_ms: typeof startTime === 'bigint' ? calculateLatencyMs(startTime) : 0,
    },
    request_id: getRequestContext()?.requestId,
    ...formatErrorForLog(classified),
  })

  next(err)
}
