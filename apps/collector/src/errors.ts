/**
 * Error taxonomy for the collector.
 *
 * Per-source failures (FetchError) are folded into the run report by the pipeline.
 * ConfigurationError is fatal at startup. Duplicate content is not an error at all:
 * the store reports it as an insert result.
 */

export type ErrorCode = 'FETCH_FAILED' | 'CONFIGURATION_ERROR' | 'INTERNAL_ERROR'

export abstract class CampusWatchError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly isRetryable: boolean

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export type FetchFailureReason = 'http' | 'timeout' | 'network' | 'aborted'

export class FetchError extends CampusWatchError {
  readonly code = 'FETCH_FAILED' as const
  readonly url: string
  readonly reason: FetchFailureReason
  readonly statusCode?: number
  readonly attempts: number
  readonly isRetryable: boolean

  constructor(
    message: string,
    details: { url: string; reason: FetchFailureReason; statusCode?: number; attempts: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause })
    this.url = details.url
    this.reason = details.reason
    this.statusCode = details.statusCode
    this.attempts = details.attempts
    this.isRetryable = details.reason !== 'aborted'
  }
}

export interface ConfigurationIssue {
  path: string
  message: string
}

export class ConfigurationError extends CampusWatchError {
  readonly code = 'CONFIGURATION_ERROR' as const
  readonly isRetryable = false
  readonly issues: ConfigurationIssue[]

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    const detail = issues.map((issue) => `${issue.path}: ${issue.message}`).join(', ')
    super(detail ? `${message}: ${detail}` : message)
    this.issues = issues
  }
}

export interface ClassifiedError {
  code: ErrorCode
  message: string
  isRetryable: boolean
}

/**
 * Reduce any thrown value to the fields logs and API responses carry.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof CampusWatchError) {
    return { code: error.code, message: error.message, isRetryable: error.isRetryable }
  }
  if (error instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: error.message, isRetryable: false }
  }
  return { code: 'INTERNAL_ERROR', message: String(error), isRetryable: false }
}
