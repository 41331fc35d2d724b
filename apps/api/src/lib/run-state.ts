/**
 * In-process record of full pipeline runs triggered through the API.
 * Not shared with the worker process.
 */

import type { PipelineRunReport } from '@campuswatch/collector'

export interface RunSummary {
  run_id: string
  started_at: string
  finished_at: string
  cancelled: boolean
  total_sources: number
  saved_new_records: number
  skipped_duplicates: number
  errors: number
}

export function toRunSummary(report: PipelineRunReport): RunSummary {
  return {
    run_id: report.runId,
    started_at: report.startedAt.toISOString(),
    finished_at: report.finishedAt.toISOString(),
    cancelled: report.cancelled,
    total_sources: report.totalSources,
    saved_new_records: report.savedNewRecords,
    skipped_duplicates: report.skippedDuplicates,
    errors: report.errors,
  }
}

export class RunState {
  private lastRun: RunSummary | null = null
  private inProgress = false

  /** False when a run is already in progress. */
  tryBegin(): boolean {
    if (this.inProgress) return false
    this.inProgress = true
    return true
  }

  complete(report: PipelineRunReport): RunSummary {
    this.lastRun = toRunSummary(report)
    this.inProgress = false
    return this.lastRun
  }

  /** Ends a run that threw; the last summary is left as it was. */
  fail(): void {
    this.inProgress = false
  }

  isRunning(): boolean {
    return this.inProgress
  }

  getLastRun(): RunSummary | null {
    return this.lastRun
  }
}
