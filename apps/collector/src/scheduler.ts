/**
 * Run Scheduler
 *
 * Runs the pipeline once on start, then every interval. A tick that fires while
 * the previous run is still going is skipped, so at most one run is in flight.
 *
 * Singleton pattern - only one scheduler instance per process.
 */

import { loggers } from './config/logger.js'

const log = loggers.scheduler

/** Scheduler state */
let schedulerInterval: NodeJS.Timeout | null = null
let runInProgress = false

export interface RunSchedulerConfig {
  intervalMs: number
  run: () => Promise<unknown>
}

async function tick(run: RunSchedulerConfig['run']): Promise<void> {
  if (runInProgress) {
    log.warn('Previous run still in progress, skipping tick')
    return
  }

  runInProgress = true
  try {
    await run()
  } finally {
    runInProgress = false
  }
}

/**
 * Start the run scheduler.
 */
export function startRunScheduler(config: RunSchedulerConfig): void {
  if (schedulerInterval) {
    log.warn('Scheduler already running')
    return
  }

  log.info('Starting run scheduler', { intervalMs: config.intervalMs })

  // Run immediately on start
  tick(config.run).catch((err: unknown) => {
    log.error('Initial scheduler tick failed', {}, err)
  })

  schedulerInterval = setInterval(() => {
    tick(config.run).catch((err: unknown) => {
      log.error('Scheduler tick failed', {}, err)
    })
  }, config.intervalMs)
}

/**
 * Stop the run scheduler. A run already in flight is not interrupted.
 */
export function stopRunScheduler(): void {
  if (schedulerInterval) {
    log.info('Stopping run scheduler')
    clearInterval(schedulerInterval)
    schedulerInterval = null
  }
}

export function isRunSchedulerRunning(): boolean {
  return schedulerInterval !== null
}

export function isRunInProgress(): boolean {
  return runInProgress
}
