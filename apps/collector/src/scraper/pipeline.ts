/**
 * Scrape Pipeline
 *
 * Drives source → fetch → fingerprint + extract → insert for a batch of sources,
 * then trims each university's history to the retention cap.
 *
 * Failure model:
 * - Fetch and extraction failures are per source: logged, counted, batch continues.
 * - Unchanged content is an insert result (`duplicate`), counted as a skip.
 * - Storage failures are fatal: remaining sources are cancelled and the error
 *   propagates to the caller.
 */

import { randomUUID } from 'node:crypto'
import pLimit from 'p-limit'
import type { LimitFunction } from 'p-limit'
import type { SnapshotStore } from '@campuswatch/db'
import type { ILogger } from '@campuswatch/logger'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { ConfigurationError, FetchError, classifyError } from '../errors.js'
import { listUniversities, sourcesForUniversity } from '../sources.js'
import { extractByType } from './extractors/index.js'
import { fingerprint } from './fingerprint.js'
import { trimUniversity } from './process/retention.js'
import { writeSnapshot } from './process/writer.js'
import type {
  ExtractionRecord,
  FetchedPage,
  Fetcher,
  PipelineRunReport,
  RetentionResult,
  Source,
  SourceOutcome,
  UniversityRunReport,
} from './types.js'

export const DEFAULT_CONCURRENCY = 4

export interface ScrapePipelineOptions {
  fetcher: Fetcher
  store: SnapshotStore
  /** Snapshots kept per university; an integer >= 1, else ConfigurationError */
  maxRecordsPerUniversity: number
  /** Sources in flight at once (default: 4) */
  concurrency?: number
  logger?: ILogger
  /** Clock for extractedAt and report timestamps */
  now?: () => Date
  createRunId?: () => string
  extract?: (pageType: string, html: string) => ExtractionRecord
}

export interface RunOptions {
  signal?: AbortSignal
}

export class ScrapePipeline {
  private readonly fetcher: Fetcher
  private readonly store: SnapshotStore
  private readonly maxRecordsPerUniversity: number
  private readonly concurrency: number
  private readonly log: ILogger
  private readonly now: () => Date
  private readonly createRunId: () => string
  private readonly extract: (pageType: string, html: string) => ExtractionRecord

  /** Inserts and deletes from this pipeline never interleave */
  private readonly writeQueue: LimitFunction = pLimit(1)

  constructor(options: ScrapePipelineOptions) {
    this.fetcher = options.fetcher
    this.store = options.store
    if (!Number.isInteger(options.maxRecordsPerUniversity) || options.maxRecordsPerUniversity < 1) {
      throw new ConfigurationError('Invalid retention cap', [
        { path: 'maxRecordsPerUniversity', message: `Expected an integer >= 1, got ${options.maxRecordsPerUniversity}` },
      ])
    }
    this.maxRecordsPerUniversity = options.maxRecordsPerUniversity
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY)
    this.log = options.logger ?? loggers.pipeline
    this.now = options.now ?? (() => new Date())
    this.createRunId = options.createRunId ?? randomUUID
    this.extract = options.extract ?? extractByType
  }

  /**
   * Run every source once, then enforce retention for the universities in the batch.
   */
  async run(sources: Source[], options: RunOptions = {}): Promise<PipelineRunReport> {
    const runId = this.createRunId()
    const startedAt = this.now()
    const log = this.log.child({ runId })

    // Aborted by the caller, or internally after a fatal storage error
    const runController = new AbortController()
    const onCallerAbort = () => runController.abort()
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })
    if (options.signal?.aborted) runController.abort()

    log.info('Pipeline run started', { totalSources: sources.length, concurrency: this.concurrency })

    let fatalError: unknown = null
    const limit = pLimit(this.concurrency)

    try {
      const outcomes = await Promise.all(
        sources.map((source) =>
          limit(async () => {
            try {
              return await this.processSource(source, runController.signal, log)
            } catch (error) {
              fatalError ??= error
              runController.abort()
              return this.errorOutcome(source, error, 0)
            }
          })
        )
      )

      if (fatalError !== null) {
        log.error('Pipeline run failed on a storage error', { totalSources: sources.length }, fatalError)
        throw fatalError
      }

      const cancelled = options.signal?.aborted ?? false
      let retention: RetentionResult[] = []
      if (cancelled) {
        log.warn('Pipeline run cancelled, retention skipped')
      } else {
        retention = await this.enforceRetention(listUniversities(sources), log)
      }

      const report: PipelineRunReport = {
        runId,
        startedAt,
        finishedAt: this.now(),
        cancelled,
        totalSources: sources.length,
        savedNewRecords: countStatus(outcomes, 'saved'),
        skippedDuplicates: countStatus(outcomes, 'duplicate'),
        errors: countStatus(outcomes, 'error'),
        outcomes,
        retention,
      }

      log.info('Pipeline run finished', {
        totalSources: report.totalSources,
        savedNewRecords: report.savedNewRecords,
        skippedDuplicates: report.skippedDuplicates,
        errors: report.errors,
        cancelled,
        durationMs: report.finishedAt.getTime() - startedAt.getTime(),
      })

      return report
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  /**
   * Fetch, extract and persist one source. No retention.
   * Storage failures propagate.
   */
  async runOne(source: Source, options: RunOptions = {}): Promise<SourceOutcome> {
    return this.processSource(source, options.signal, this.log)
  }

  /**
   * Sources matching the name (case-insensitive), one at a time. No retention.
   */
  async runUniversity(name: string, sources: Source[]): Promise<UniversityRunReport> {
    const matching = sourcesForUniversity(sources, name)

    const report: UniversityRunReport = {
      university: matching[0]?.university ?? name,
      savedNewRecords: 0,
      skippedDuplicates: 0,
      errors: 0,
    }

    for (const source of matching) {
      const outcome = await this.runOne(source)
      if (outcome.status === 'saved') report.savedNewRecords++
      else if (outcome.status === 'duplicate') report.skippedDuplicates++
      else report.errors++
    }

    return report
  }

  /**
   * Keep the newest `maxRecordsPerUniversity` snapshots per university.
   */
  async enforceRetention(universities: string[], log: ILogger = this.log): Promise<RetentionResult[]> {
    const results: RetentionResult[] = []
    for (const university of universities) {
      results.push(
        await this.writeQueue(() =>
          trimUniversity(this.store, university, this.maxRecordsPerUniversity, log.child('retention'))
        )
      )
    }
    return results
  }

  private async processSource(source: Source, signal: AbortSignal | undefined, log: ILogger): Promise<SourceOutcome> {
    const startTime = Date.now()

    if (signal?.aborted) {
      const error = new FetchError('Fetch aborted', { url: source.url, reason: 'aborted', attempts: 0 })
      return this.errorOutcome(source, error, 0)
    }

    let page: FetchedPage
    try {
      page = await this.fetcher.fetch(source.url, { signal })
    } catch (error) {
      log.warn(
        'Source fetch failed',
        { university: source.university, pageType: source.pageType, ...sanitizeUrl(source.url) },
        error
      )
      return this.errorOutcome(source, error, Date.now() - startTime)
    }

    let contentHash: string
    let record: ExtractionRecord
    try {
      contentHash = fingerprint(page.html)
      record = this.extract(source.pageType, page.html)
    } catch (error) {
      log.warn(
        'Source extraction failed',
        { university: source.university, pageType: source.pageType, ...sanitizeUrl(source.url) },
        error
      )
      return this.errorOutcome(source, error, Date.now() - startTime)
    }

    const extractedAt = this.now()
    const result = await this.writeQueue(() =>
      writeSnapshot(this.store, { source, contentHash, record, extractedAt }, log)
    )

    return {
      university: source.university,
      pageType: source.pageType,
      url: source.url,
      status: result.status === 'inserted' ? 'saved' : 'duplicate',
      snapshotId: result.status === 'inserted' ? result.id : undefined,
      contentHash,
      durationMs: Date.now() - startTime,
    }
  }

  private errorOutcome(source: Source, error: unknown, durationMs: number): SourceOutcome {
    const { code, message } = classifyError(error)
    return {
      university: source.university,
      pageType: source.pageType,
      url: source.url,
      status: 'error',
      error: { code, message },
      durationMs,
    }
  }
}

function countStatus(outcomes: SourceOutcome[], status: SourceOutcome['status']): number {
  return outcomes.filter((outcome) => outcome.status === status).length
}
