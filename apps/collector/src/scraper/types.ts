/**
 * Collector Core Types
 *
 * Sources, fetched pages, extraction records, and the interfaces the pipeline is
 * assembled from (Fetcher, RateLimiter, RetryPolicy).
 */

import type { PageType } from '@campuswatch/db'

export type { PageType }

// ═══════════════════════════════════════════════════════════════════════════════
// Sources
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One monitored page. Defined by the source registry, consumed by value.
 */
export interface Source {
  university: string
  pageType: PageType
  url: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Records
// ═══════════════════════════════════════════════════════════════════════════════

export interface FeeSummary {
  tuition: string | null
  fees: string | null
  housing: string | null
  food: string | null
  books: string | null
  travel: string | null
  personal: string | null
}

export type FeeCategory = keyof FeeSummary

/** A table as rows of non-empty cell texts */
export type TextTable = string[][]

export interface FeesRecord {
  kind: 'fees'
  summary: FeeSummary
  /** Naive sum of the resolved categories; only present when at least 3 resolved */
  estimatedTotal: { amount: string; disclaimer: string } | null
  tables: TextTable[]
  note: string
}

export interface AdmissionsRecord {
  kind: 'admissions'
  headings: string[]
  requirements: string[]
  note: string
}

export interface DeadlinesRecord {
  kind: 'deadlines'
  highlights: string[]
  dateLines: string[]
  /** Keyword co-occurrence hints, not parsed dates */
  inferred: { early: string | null; regular: string | null }
  note: string
}

export interface ProgramsRecord {
  kind: 'programs'
  programs: string[]
  countEstimate: number
  note: string
}

export interface AidRecord {
  kind: 'aid'
  summary: string[]
  note: string
}

export interface AboutRecord {
  kind: 'about'
  overview: string[]
  note: string
}

export interface PreviewRecord {
  kind: 'preview'
  textPreview: string
  note: string
}

export type ExtractionRecord =
  | FeesRecord
  | AdmissionsRecord
  | DeadlinesRecord
  | ProgramsRecord
  | AidRecord
  | AboutRecord
  | PreviewRecord

/**
 * Extractors must be total: any string in, a well-formed record out.
 */
export type Extractor<R extends ExtractionRecord = ExtractionRecord> = (html: string) => R

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchOptions {
  /** Aborts the wait for the rate limiter, the request, and any pending retry */
  signal?: AbortSignal
}

export interface FetchedPage {
  /** Requested URL */
  url: string
  /** URL after redirects */
  finalUrl: string
  statusCode: number
  html: string
  attempts: number
  durationMs: number
}

/**
 * Resolves with the page body or rejects with FetchError once retries are spent.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchedPage>
}

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 8000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiter
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Shared dispatch gate. One instance per process, passed to every fetch call site.
 */
export interface RateLimiter {
  /** Resolves when the caller may dispatch a request. */
  acquire(signal?: AbortSignal): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Reports
// ═══════════════════════════════════════════════════════════════════════════════

export type SourceOutcomeStatus = 'saved' | 'duplicate' | 'error'

export interface SourceOutcome {
  university: string
  pageType: PageType
  url: string
  status: SourceOutcomeStatus
  /** Set when saved */
  snapshotId?: string
  /** Set once the page was fetched */
  contentHash?: string
  /** Set when status is 'error' */
  error?: { code: string; message: string }
  durationMs: number
}

export interface RetentionResult {
  university: string
  kept: number
  deleted: number
}

export interface PipelineRunReport {
  runId: string
  startedAt: Date
  finishedAt: Date
  /** The caller aborted; unfinished sources count as errors and retention was skipped */
  cancelled: boolean
  totalSources: number
  savedNewRecords: number
  skippedDuplicates: number
  errors: number
  outcomes: SourceOutcome[]
  retention: RetentionResult[]
}

export interface UniversityRunReport {
  university: string
  savedNewRecords: number
  skippedDuplicates: number
  errors: number
}
