import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { ConfigurationError, FetchError } from '@campuswatch/collector'
import {
  classifyError,
  createOperationalError,
  formatErrorForLog,
  getSafeMessage,
  toErrorResponse,
  ERROR_CODES,
} from '../errors.js'

describe('classifyError', () => {
  it('classifies ZodError as validation with field paths', () => {
    const parsed = z.object({ limit: z.number().min(1) }).safeParse({ limit: 0 })
    expect(parsed.success).toBe(false)
    if (parsed.success) return

    const classified = classifyError(parsed.error)
    expect(classified.category).toBe('validation')
    expect(classified.code).toBe(ERROR_CODES.VALIDATION_FAILED)
    expect(classified.statusCode).toBe(400)
    expect(classified.details?.issues).toEqual([
      { path: 'limit', message: 'Number must be greater than or equal to 1', code: 'too_small' },
    ])
  })

  it('maps FetchError to an external, retryable failure', () => {
    const error = new FetchError('HTTP 503: Service Unavailable', {
      url: 'https://example.edu',
      reason: 'http',
      statusCode: 503,
      attempts: 3,
    })
    const classified = classifyError(error)
    expect(classified).toMatchObject({
      category: 'external',
      code: 'FETCH_FAILED',
      statusCode: 502,
      isRetryable: true,
    })
  })

  it('maps ConfigurationError to internal', () => {
    const classified = classifyError(new ConfigurationError('Invalid settings'))
    expect(classified.code).toBe('CONFIGURATION_ERROR')
    expect(classified.statusCode).toBe(500)
    expect(classified.isOperational).toBe(false)
  })

  it('maps socket errors to database connection errors', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' })
    const classified = classifyError(error)
    expect(classified.code).toBe(ERROR_CODES.DB_CONNECTION_ERROR)
    expect(classified.statusCode).toBe(503)
    expect(classified.isRetryable).toBe(true)
  })

  it('maps pg SQLSTATE codes to query errors', () => {
    const error = Object.assign(new Error('relation "x" does not exist'), { code: '42P01' })
    const classified = classifyError(error)
    expect(classified.code).toBe(ERROR_CODES.DB_QUERY_ERROR)
    expect(classified.details).toEqual({ sqlState: '42P01' })
  })

  it('treats pg connection-class SQLSTATE as a connection error', () => {
    const error = Object.assign(new Error('connection failure'), { code: '08006' })
    expect(classifyError(error).code).toBe(ERROR_CODES.DB_CONNECTION_ERROR)
  })

  it('falls back to internal for plain errors and thrown values', () => {
    expect(classifyError(new Error('boom'))).toMatchObject({
      category: 'internal',
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'boom',
      statusCode: 500,
    })
    expect(classifyError('just a string')).toMatchObject({ code: ERROR_CODES.INTERNAL_ERROR, message: 'just a string' })
  })
})

describe('toErrorResponse', () => {
  it('never exposes internal messages', () => {
    const body = toErrorResponse(classifyError(new Error('password authentication failed for user')))
    expect(body).toEqual({ error: 'Internal server error', code: ERROR_CODES.INTERNAL_ERROR })
  })

  it('includes validation issues for validation errors', () => {
    const parsed = z.object({ limit: z.coerce.number().int() }).safeParse({ limit: 'abc' })
    if (parsed.success) throw new Error('expected a validation failure')

    const body = toErrorResponse(classifyError(parsed.error))
    expect(body.code).toBe('VALIDATION_FAILED')
    expect(body.error).toBe('Invalid request parameters')
    expect(body.validationErrors).toEqual([{ path: 'limit', message: 'Expected number, received nan', code: 'invalid_type' }])
  })
})

describe('createOperationalError', () => {
  it('builds a classified error with the safe message for its code', () => {
    const classified = createOperationalError('not_found', ERROR_CODES.NOT_FOUND, 'Unknown university', 404)
    expect(classified.isOperational).toBe(true)
    expect(classified.isRetryable).toBe(false)
    expect(getSafeMessage(classified)).toBe('The requested resource was not found')
  })
})

describe('formatErrorForLog', () => {
  it('flattens the classification with error_ prefixes', () => {
    const error = new Error('boom')
    const formatted = formatErrorForLog(classifyError(error))
    expect(formatted).toMatchObject({
      error_category: 'internal',
      error_code: 'INTERNAL_ERROR',
      error_message: 'boom',
      error_status_code: 500,
      error_is_operational: false,
      error_is_retryable: false,
      error_name: 'Error',
    })
    expect(formatted.error_stack).toBe(error.stack)
  })
})
