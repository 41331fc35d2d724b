/**
 * Collector runtime assembly
 *
 * Builds the store, the shared rate limiter, the fetcher and the pipeline from
 * settings. Used by the worker and by the API process.
 */

import { MemorySnapshotStore, PgSnapshotStore, createPool, ensureSchema } from '@campuswatch/db'
import type { Queryable, SnapshotStore } from '@campuswatch/db'
import type { ILogger } from '@campuswatch/logger'
import { logger as rootLogger } from './config/logger.js'
import type { Settings } from './config/settings.js'
import { HttpFetcher } from './scraper/fetch/http-fetcher.js'
import { IntervalRateLimiter } from './scraper/fetch/rate-limiter.js'
import { ScrapePipeline } from './scraper/pipeline.js'
import type { Source } from './scraper/types.js'
import { sleep as defaultSleep } from './scraper/utils/sleep.js'
import type { Sleep } from './scraper/utils/sleep.js'
import { loadSources } from './sources.js'

export interface StoreHandle {
  store: SnapshotStore
  kind: 'postgres' | 'memory'
  close: () => Promise<void>
}

export interface CollectorRuntime {
  settings: Settings
  sources: Source[]
  store: SnapshotStore
  pipeline: ScrapePipeline
  close: () => Promise<void>
}

/**
 * Warm up database connection with retries
 */
export async function warmupDatabase(
  db: Queryable,
  log: ILogger,
  maxAttempts = 5,
  sleep: Sleep = defaultSleep
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await db.query('SELECT 1')
      log.info('Database connection established', { attempt })
      return true
    } catch (error) {
      log.warn('Database connection failed', { attempt, maxAttempts }, error)
      if (attempt < maxAttempts) {
        await sleep(Math.min(2000 * Math.pow(2, attempt - 1), 30000))
      }
    }
  }
  return false
}

/**
 * Postgres when DATABASE_URL is set (schema applied on startup), in-memory otherwise.
 */
export async function createStore(settings: Settings, log: ILogger = rootLogger.child('store')): Promise<StoreHandle> {
  if (!settings.databaseUrl) {
    log.warn('DATABASE_URL not set, using the in-memory store; snapshots are lost on exit')
    return { store: new MemorySnapshotStore(), kind: 'memory', close: async () => {} }
  }

  const pool = createPool(settings.databaseUrl)
  if (!(await warmupDatabase(pool, log))) {
    await pool.end()
    throw new Error('Database unreachable after all connection attempts')
  }
  await ensureSchema(pool)

  return { store: new PgSnapshotStore(pool), kind: 'postgres', close: () => pool.end() }
}

export function createPipeline(settings: Settings, store: SnapshotStore): ScrapePipeline {
  const rateLimiter = new IntervalRateLimiter({ minDelayMs: settings.requestDelaySeconds * 1000 })
  const fetcher = new HttpFetcher({
    rateLimiter,
    timeoutMs: settings.requestTimeoutMs,
    userAgent: settings.userAgent,
  })

  return new ScrapePipeline({
    fetcher,
    store,
    maxRecordsPerUniversity: settings.maxRecordsPerUniversity,
    concurrency: settings.fetchConcurrency,
  })
}

export async function createCollector(settings: Settings): Promise<CollectorRuntime> {
  const sources = await loadSources(settings.sourcesPath)
  const handle = await createStore(settings)

  return {
    settings,
    sources,
    store: handle.store,
    pipeline: createPipeline(settings, handle.store),
    close: handle.close,
  }
}
