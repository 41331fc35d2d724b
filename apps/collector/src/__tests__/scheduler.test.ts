import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const logMock = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}))

vi.mock('../config/logger.js', () => ({
  loggers: { scheduler: logMock },
}))

import { isRunInProgress, isRunSchedulerRunning, startRunScheduler, stopRunScheduler } from '../scheduler.js'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('run scheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.clearAllMocks()
  })

  afterEach(() => {
    stopRunScheduler()
    vi.useRealTimers()
  })

  it('runs immediately and then on every interval', async () => {
    const run = vi.fn().mockResolvedValue(undefined)

    startRunScheduler({ intervalMs: 60_000, run })
    expect(run).toHaveBeenCalledTimes(1)
    expect(isRunSchedulerRunning()).toBe(true)

    await vi.advanceTimersByTimeAsync(60_000)
    expect(run).toHaveBeenCalledTimes(2)

    await vi.advanceTimersByTimeAsync(120_000)
    expect(run).toHaveBeenCalledTimes(4)
  })

  it('skips a tick while the previous run is in progress', async () => {
    const pending = deferred()
    const run = vi.fn(() => pending.promise)

    startRunScheduler({ intervalMs: 1_000, run })
    await vi.advanceTimersByTimeAsync(1_000)

    expect(run).toHaveBeenCalledTimes(1)
    expect(isRunInProgress()).toBe(true)
    expect(logMock.warn).toHaveBeenCalledWith('Previous run still in progress, skipping tick')

    pending.resolve()
    await pending.promise
    expect(isRunInProgress()).toBe(false)

    await vi.advanceTimersByTimeAsync(1_000)
    expect(run).toHaveBeenCalledTimes(2)
  })

  it('logs a failed run and keeps scheduling', async () => {
    const run = vi.fn().mockRejectedValueOnce(new Error('database down')).mockResolvedValue(undefined)

    startRunScheduler({ intervalMs: 1_000, run })
    await vi.advanceTimersByTimeAsync(0)

    expect(logMock.error).toHaveBeenCalledWith('Initial scheduler tick failed', {}, expect.any(Error))

    await vi.advanceTimersByTimeAsync(1_000)
    expect(run).toHaveBeenCalledTimes(2)
  })

  it('ignores a second start and stops cleanly', async () => {
    const run = vi.fn().mockResolvedValue(undefined)

    startRunScheduler({ intervalMs: 1_000, run })
    startRunScheduler({ intervalMs: 1_000, run })
    expect(logMock.warn).toHaveBeenCalledWith('Scheduler already running')

    stopRunScheduler()
    expect(isRunSchedulerRunning()).toBe(false)

    await vi.advanceTimersByTimeAsync(5_000)
    expect(run).toHaveBeenCalledTimes(1)
  })
})
