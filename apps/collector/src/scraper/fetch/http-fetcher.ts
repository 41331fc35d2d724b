/**
 * HTTP Fetcher Implementation
 *
 * Native fetch with a per-request timeout, shared rate limiting before every
 * attempt, and exponential backoff between retries. Resolves with the page or
 * rejects with FetchError.
 */

import type { ILogger } from '@campuswatch/logger'
import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import { DEFAULT_USER_AGENT } from '../../config/settings.js'
import { FetchError } from '../../errors.js'
import type { FetchedPage, Fetcher, FetchOptions, RateLimiter, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_RETRY_POLICY } from '../types.js'
import { sleep as defaultSleep } from '../utils/sleep.js'
import type { Sleep } from '../utils/sleep.js'

export const DEFAULT_TIMEOUT_MS = 25000

export interface HttpFetcherOptions {
  /** Shared across every fetcher in the process */
  rateLimiter: RateLimiter

  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  timeoutMs?: number
  userAgent?: string
  logger?: ILogger

  /** Backoff sleep, for tests */
  sleep?: Sleep
}

export class HttpFetcher implements Fetcher {
  private readonly rateLimiter: RateLimiter
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly userAgent: string
  private readonly log: ILogger
  private readonly sleep: Sleep

  constructor(options: HttpFetcherOptions) {
    this.rateLimiter = options.rateLimiter
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.log = options.logger ?? loggers.fetch
    this.sleep = options.sleep ?? defaultSleep
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    const { signal } = options
    const startTime = Date.now()
    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts)

    for (let attempt = 1; ; attempt++) {
      await this.waitForTurn(url, attempt - 1, signal)

      try {
        return await this.fetchOnce(url, attempt, signal, startTime)
      } catch (error) {
        if (!(error instanceof FetchError) || !this.shouldRetry(error) || attempt >= maxAttempts) {
          throw error
        }

        const delayMs = this.backoffDelay(attempt)
        this.log.warn('Fetch attempt failed, retrying', {
          ...sanitizeUrl(url),
          attempt,
          maxAttempts,
          reason: error.reason,
          statusCode: error.statusCode,
          delayMs,
        })

        try {
          await this.sleep(delayMs, signal)
        } catch (sleepError) {
          throw this.abortedError(url, attempt, sleepError)
        }
      }
    }
  }

  /**
   * Delay before attempt n+1: min(initial × multiplier^(n-1), max).
   */
  backoffDelay(attempt: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.retryPolicy
    return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs)
  }

  private shouldRetry(error: FetchError): boolean {
    switch (error.reason) {
      case 'timeout':
      case 'network':
        return true
      case 'http':
        return error.statusCode !== undefined && this.retryPolicy.retryableStatusCodes.includes(error.statusCode)
      case 'aborted':
        return false
    }
  }

  private async waitForTurn(url: string, attemptsSoFar: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.rateLimiter.acquire(signal)
    } catch (error) {
      if (signal?.aborted) {
        throw this.abortedError(url, attemptsSoFar, error)
      }
      throw error
    }
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    attempt: number,
    signal: AbortSignal | undefined,
    startTime: number
  ): Promise<FetchedPage> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)
    const onCallerAbort = () => controller.abort()
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { ...DEFAULT_FETCH_HEADERS, 'User-Agent': this.userAgent },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, {
          url,
          reason: 'http',
          statusCode: response.status,
          attempts: attempt,
        })
      }

      const html = await response.text()

      return {
        url,
        finalUrl: response.url || url,
        statusCode: response.status,
        html,
        attempts: attempt,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof FetchError) throw error

      if (signal?.aborted) {
        throw this.abortedError(url, attempt, error)
      }
      if (controller.signal.aborted) {
        throw new FetchError(`Request timed out after ${this.timeoutMs}ms`, {
          url,
          reason: 'timeout',
          attempts: attempt,
          cause: error,
        })
      }

      const message = error instanceof Error ? error.message : String(error)
      throw new FetchError(`Network error: ${message}`, { url, reason: 'network', attempts: attempt, cause: error })
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private abortedError(url: string, attempts: number, cause: unknown): FetchError {
    return new FetchError('Fetch aborted', { url, reason: 'aborted', attempts, cause })
  }
}
