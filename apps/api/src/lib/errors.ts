/**
 * Error Classification and Structured Error Handling
 *
 * Provides consistent error categorization for logging and HTTP responses.
 *
 * Two error classes are raised on purpose inside the API:
 * - InvalidInputError: request-level input problems. The only error the
 *   search core lets reach its caller.
 * - CollaboratorUnavailableError: catalog or AI provider failures. Adapters
 *   throw it; the core converts it into a fallback at each call site.
 */

import { ZodError } from 'zod'

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'validation' // Client sent invalid data (4xx)
  | 'auth' // Authentication/authorization failure (401, 403)
  | 'not_found' // Resource not found (404)
  | 'rate_limit' // Rate limit exceeded (429)
  | 'external' // External service failures (catalog, AI provider, network)
  | 'internal' // Unexpected internal errors (500)
  | 'timeout' // Operation timeout
  | 'conflict' // Resource conflict (409)

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  statusCode: number
  isOperational: boolean // Expected errors vs bugs
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

/**
 * Known error codes by category
 */
export const ERROR_CODES = {
  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_INPUT: 'INVALID_INPUT',

  // Auth
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',

  // Not Found
  NOT_FOUND: 'NOT_FOUND',
  PART_NOT_FOUND: 'PART_NOT_FOUND',

  // Rate Limit
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',

  // External
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  EXTERNAL_UNAVAILABLE: 'EXTERNAL_UNAVAILABLE',
  NETWORK_ERROR: 'NETWORK_ERROR',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',

  // Timeout
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',

  // Conflict
  CONFLICT: 'CONFLICT',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Rejected input (blank query, bad limit, threshold out of range)
 */
export class InvalidInputError extends Error {
  readonly status = 400

  constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

export type Collaborator = 'catalog' | 'query-enhancer' | 'recommendation-generator' | 'project-planner' | 'compatibility'

/**
 * Transport, auth, rate-limit or payload failure from an external provider
 */
export class CollaboratorUnavailableError extends Error {
  readonly collaborator: Collaborator
  readonly status: number
  readonly timedOut: boolean

  constructor(
    collaborator: Collaborator,
    message: string,
    options: { status?: number; timedOut?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'CollaboratorUnavailableError'
    this.collaborator = collaborator
    this.status = options.status ?? 503
    this.timedOut = options.timedOut ?? false
  }
}

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  // Already classified
  if (isClassifiedError(error)) {
    return error
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof CollaboratorUnavailableError) {
    return {
      category: error.timedOut ? 'timeout' : 'external',
      code: error.timedOut ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.EXTERNAL_UNAVAILABLE,
      message: error.message,
      statusCode: error.timedOut ? 504 : 503,
      isOperational: true,
      isRetryable: true,
      details: { collaborator: error.collaborator, upstreamStatus: error.status },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    const classified = classifyByErrorProperties(error) ?? classifyNetworkError(error)
    if (classified) {
      return classified
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      statusCode: 500,
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  // Non-Error thrown values
  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    statusCode: 500,
    isOperational: false,
    isRetryable: false,
  }
}

/**
 * Type guard for ClassifiedError
 */
function isClassifiedError(error: unknown): error is ClassifiedError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'category' in error &&
    'code' in error &&
    'statusCode' in error
  )
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key)
  return typeof value === 'number' ? value : undefined
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key)
  return typeof value === 'string' ? value : undefined
}

const STATUS_CLASSIFICATION: Record<number, Pick<ClassifiedError, 'category' | 'code' | 'isRetryable'>> = {
  400: { category: 'validation', code: ERROR_CODES.INVALID_INPUT, isRetryable: false },
  401: { category: 'auth', code: ERROR_CODES.UNAUTHORIZED, isRetryable: false },
  403: { category: 'auth', code: ERROR_CODES.FORBIDDEN, isRetryable: false },
  404: { category: 'not_found', code: ERROR_CODES.NOT_FOUND, isRetryable: false },
  409: { category: 'conflict', code: ERROR_CODES.CONFLICT, isRetryable: false },
  429: { category: 'rate_limit', code: ERROR_CODES.RATE_LIMIT_EXCEEDED, isRetryable: true },
  502: { category: 'external', code: ERROR_CODES.EXTERNAL_SERVICE_ERROR, isRetryable: true },
  503: { category: 'external', code: ERROR_CODES.EXTERNAL_UNAVAILABLE, isRetryable: true },
}

/**
 * Classify based on an HTTP status embedded in the error
 */
function classifyByErrorProperties(error: Error): ClassifiedError | null {
  const status = readNumber(error, 'status') ?? readNumber(error, 'statusCode')
  if (status === undefined) return null

  const known = STATUS_CLASSIFICATION[status]
  if (!known) return null

  return {
    ...known,
    message: error.message,
    statusCode: status,
    isOperational: true,
    originalError: error,
  }
}

// Node.js network error codes
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
])

/**
 * Classify network and timeout errors
 */
function classifyNetworkError(error: Error): ClassifiedError | null {
  const code = readString(error, 'code')

  if (code && NETWORK_ERROR_CODES.has(code)) {
    const isTimeout = code === 'ETIMEDOUT'
    return {
      category: isTimeout ? 'timeout' : 'external',
      code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
      message: `Network error: ${code}`,
      statusCode: 503,
      isOperational: true,
      isRetryable: true,
      details: { errorCode: code },
      originalError: error,
    }
  }

  const message = error.message.toLowerCase()
  if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
    return {
      category: 'timeout',
      code: ERROR_CODES.OPERATION_TIMEOUT,
      message: error.message,
      statusCode: 504,
      isOperational: true,
      isRetryable: true,
      originalError: error,
    }
  }

  return null
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_status_code: classified.statusCode,
    error_is_operational: classified.isOperational,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}

/**
 * User-safe error messages (never expose internal details)
 */
const SAFE_MESSAGES: Record<string, string> = {
  VALIDATION_FAILED: 'Please check your input and try again',
  INVALID_INPUT: 'Invalid input provided',

  UNAUTHORIZED: 'Please sign in to continue',
  FORBIDDEN: "You don't have permission for this action",

  NOT_FOUND: 'The requested resource was not found',
  PART_NOT_FOUND: 'Part not found',

  RATE_LIMIT_EXCEEDED: 'Too many requests. Please wait a moment',

  EXTERNAL_SERVICE_ERROR: 'An external service error occurred',
  EXTERNAL_TIMEOUT: 'Request timed out. Please try again',
  EXTERNAL_UNAVAILABLE: 'Service temporarily unavailable',
  NETWORK_ERROR: 'Network error occurred. Please try again',

  UNEXPECTED_ERROR: 'An unexpected error occurred',

  OPERATION_TIMEOUT: 'Operation timed out. Please try again',

  CONFLICT: 'A conflict occurred. Please refresh and try again',
}

/**
 * Get a user-safe message for an error code (never expose internal details)
 */
export function getSafeMessage(classified: ClassifiedError): string {
  return SAFE_MESSAGES[classified.code] || 'An error occurred'
}

/**
 * Message text for logging an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
