/**
 * Shared route helpers: caller identity and error responses
 */

import type { Request, Response } from 'express'
import { z } from 'zod'
import type { ILogger } from '@partsense/logger'
import { classifyError, formatErrorForLog, getSafeMessage } from '../lib/errors'

export const ANONYMOUS_USER = 'anonymous'

const userIdSchema = z.string().trim().max(128)

/**
 * Caller identity from X-User-Id; blank or missing means anonymous.
 * Throws ZodError for an oversized header.
 */
export function resolveUserId(req: Request): string {
  const userId = userIdSchema.parse(req.get('x-user-id') ?? '')
  return userId || ANONYMOUS_USER
}

/**
 * Classify an error and answer with { error, code, details? }.
 * 5xx responses carry the user-safe message only.
 */
export function sendError(res: Response, error: unknown, log: ILogger): Response {
  const classified = classifyError(error)

  if (classified.statusCode >= 500) {
    log.error('Request failed', formatErrorForLog(classified))
  }

  return res.status(classified.statusCode).json({
    error: classified.statusCode >= 500 ? getSafeMessage(classified) : classified.message,
    code: classified.code,
    ...(classified.category === 'validation' && classified.details && { details: classified.details }),
  })
}
