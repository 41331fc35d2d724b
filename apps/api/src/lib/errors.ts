/**
 * Error Classification and Structured Error Handling
 *
 * Maps thrown values to a category, HTTP status and safe client message.
 * Collector errors keep their own codes; everything unknown is internal.
 */

import { ZodError } from 'zod'
import { CampusWatchError } from '@campuswatch/collector'

export type ErrorCategory =
  | 'validation' // Client sent invalid data (400)
  | 'not_found' // Resource not found (404)
  | 'conflict' // Resource conflict (409)
  | 'db' // Database connectivity or query errors
  | 'external' // Upstream fetch failures
  | 'internal' // Unexpected internal errors (500)

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

export const ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_JSON: 'INVALID_JSON',
  NOT_FOUND: 'NOT_FOUND',
  RUN_IN_PROGRESS: 'RUN_IN_PROGRESS',
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  DB_QUERY_ERROR: 'DB_QUERY_ERROR',
  FETCH_FAILED: 'FETCH_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const

// Node socket errors seen when Postgres is unreachable
const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EHOSTUNREACH'])

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
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

  if (error instanceof CampusWatchError) {
    const isFetch = error.code === 'FETCH_FAILED'
    return {
      category: isFetch ? 'external' : 'internal',
      code: error.code,
      message: error.message,
      statusCode: isFetch ? 502 : 500,
      isOperational: isFetch,
      isRetryable: error.isRetryable,
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return classifyByErrorProperties(error) ?? {
      category: 'internal',
      code: ERROR_CODES.INTERNAL_ERROR,
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
    code: ERROR_CODES.INTERNAL_ERROR,
    message: String(error),
    statusCode: 500,
    isOperational: false,
    isRetryable: false,
  }
}

/**
 * Body-parser failures carry `type` and `status`; pg and socket errors carry `code`.
 */
function classifyByErrorProperties(error: Error): ClassifiedError | null {
  const type = readStringProperty(error, 'type')
  const code = readStringProperty(error, 'code')

  if (type === 'entity.parse.failed') {
    return {
      category: 'validation',
      code: ERROR_CODES.INVALID_JSON,
      message: 'Request body is not valid JSON',
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      originalError: error,
    }
  }

  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'))) {
    return {
      category: 'db',
      code: ERROR_CODES.DB_CONNECTION_ERROR,
      message: 'Database connection error',
      statusCode: 503,
      isOperational: true,
      isRetryable: true,
      details: { errorCode: code },
      originalError: error,
    }
  }

  // Five-character SQLSTATE from pg
  if (code && /^[0-9A-Z]{5}$/.test(code)) {
    return {
      category: 'db',
      code: ERROR_CODES.DB_QUERY_ERROR,
      message: 'Database query error',
      statusCode: 500,
      isOperational: true,
      isRetryable: false,
      details: { sqlState: code },
      originalError: error,
    }
  }

  return null
}

function readStringProperty(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'string' ? value : undefined
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
  VALIDATION_FAILED: 'Invalid request parameters',
  INVALID_JSON: 'Request body is not valid JSON',
  NOT_FOUND: 'The requested resource was not found',
  RUN_IN_PROGRESS: 'A pipeline run is already in progress',
  DB_CONNECTION_ERROR: 'Service temporarily unavailable',
  FETCH_FAILED: 'Upstream fetch failed',
}

/**
 * Get a user-safe message for an error code
 */
export function getSafeMessage(classified: ClassifiedError): string {
  return SAFE_MESSAGES[classified.code] ?? 'Internal server error'
}

/**
 * Create a custom operational error
 */
export function createOperationalError(
  category: ErrorCategory,
  code: string,
  message: string,
  statusCode: number,
  details?: Record<string, unknown>
): ClassifiedError {
  return {
    category,
    code,
    message,
    statusCode,
    isOperational: true,
    isRetryable: category === 'external' || category === 'db',
    details,
  }
}

/**
 * Response body for a classified error
 */
export function toErrorResponse(classified: ClassifiedError): Record<string, unknown> {
  const body: Record<string, unknown> = {
    error: getSafeMessage(classified),
    code: classified.code,
  }
  // Zod issues carry field paths and codes only
  if (classified.code === ERROR_CODES.VALIDATION_FAILED && classified.details?.issues) {
    body.validationErrors = classified.details.issues
  }
  return body
}
