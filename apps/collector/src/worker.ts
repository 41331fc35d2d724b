#!/usr/bin/env node

/**
 * Collector Worker
 *
 * Loads settings and sources, opens the store, and runs the pipeline on a
 * schedule. `--once` runs a single pass and exits.
 */

// Load environment variables first, before any other imports
import './env.js'

import { loggers } from './config/logger.js'
import { loadSettings } from './config/settings.js'
import { classifyError } from './errors.js'
import { createCollector } from './runtime.js'
import { startRunScheduler, stopRunScheduler } from './scheduler.js'
import type { PipelineRunReport } from './scraper/types.js'

const log = loggers.worker

async function main(): Promise<void> {
  const settings = loadSettings()
  const once = process.argv.slice(2).includes('--once')
  const collector = await createCollector(settings)

  log.info('Collector starting', {
    sources: collector.sources.length,
    scheduleMinutes: settings.scheduleMinutes,
    fetchConcurrency: settings.fetchConcurrency,
    requestDelaySeconds: settings.requestDelaySeconds,
    mode: once ? 'once' : 'scheduled',
  })

  let activeRun: { controller: AbortController; done: Promise<PipelineRunReport> } | null = null

  const runPipeline = async (): Promise<PipelineRunReport> => {
    const controller = new AbortController()
    const done = collector.pipeline.run(collector.sources, { signal: controller.signal })
    activeRun = { controller, done }
    try {
      return await done
    } finally {
      activeRun = null
    }
  }

  // Track if shutdown is in progress to prevent double-shutdown
  let isShuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      log.info('Shutdown already in progress')
      return
    }
    isShuttingDown = true
    log.info('Received signal, shutting down', { signal })

    try {
      stopRunScheduler()

      const run = activeRun
      if (run) {
        log.info('Cancelling in-flight run')
        run.controller.abort()
        await run.done.catch((error: unknown) => {
          log.warn('In-flight run ended with an error', { ...classifyError(error) }, error)
        })
      }

      await collector.close()
      log.info('Shutdown complete')
      process.exit(0)
    } catch (error) {
      log.error('Error during shutdown', {}, error)
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))

  if (once) {
    const report = await runPipeline()
    log.info('Single run complete', {
      savedNewRecords: report.savedNewRecords,
      skippedDuplicates: report.skippedDuplicates,
      errors: report.errors,
      totalSources: report.totalSources,
    })
    await collector.close()
    return
  }

  startRunScheduler({ intervalMs: settings.scheduleMinutes * 60_000, run: runPipeline })
}

main().catch((error: unknown) => {
  log.fatal('Collector stopped', { ...classifyError(error) }, error)
  process.exit(1)
})
