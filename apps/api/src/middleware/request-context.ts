/**
 * Request Context Middleware
 *
 * Provides request correlation via AsyncLocalStorage.
 * All log entries within a request will include the requestId.
 *
 * - X-Request-ID header is used if present (for distributed tracing)
 * - Otherwise, a new UUID is generated
 * - The requestId is echoed on the response
 */

import type { Request, Response, NextFunction } from 'express'
import { randomUUID } from 'crypto'
import { withRequestContext } from '@partsense/logger'

const MAX_REQUEST_ID_LENGTH = 128

function incomingRequestId(req: Request): string | undefined {
  const header = req.headers['x-request-id']
  const value = Array.isArray(header) ? header[0] : header
  const trimmed = value?.trim()
  return trimmed && trimmed.length <= MAX_REQUEST_ID_LENGTH ? trimmed : undefined
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = incomingRequestId(req) ?? randomUUID()

  res.setHeader('X-Request-ID', requestId)

  withRequestContext({ requestId }, () => {
    next()
  })
}
