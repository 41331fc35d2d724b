/**
 * Scraper Module
 *
 * Fetch, fingerprint, extract and persist university pages.
 */

export * from './types.js'
export { fingerprint, normalizeDocument } from './fingerprint.js'
export { EXTRACTORS, extractByType } from './extractors/index.js'
export { HttpFetcher, DEFAULT_TIMEOUT_MS } from './fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './fetch/http-fetcher.js'
export { IntervalRateLimiter } from './fetch/rate-limiter.js'
export type { IntervalRateLimiterOptions } from './fetch/rate-limiter.js'
export { ScrapePipeline, DEFAULT_CONCURRENCY } from './pipeline.js'
export type { ScrapePipelineOptions, RunOptions } from './pipeline.js'
export { decodePayload, encodePayload } from './process/payload.js'
export type { DecodedPayload } from './process/payload.js'
export { trimUniversity } from './process/retention.js'
