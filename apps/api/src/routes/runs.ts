/**
 * Run API Routes
 *
 * Routes:
 * - POST /            — run every source once, record the summary
 * - POST /:university — run one university's sources (no retention)
 * - GET  /last        — summary of the last full run, or null
 */

import { Router } from 'express'
import type { Request, Response } from 'express'
import { sourcesForUniversity } from '@campuswatch/collector'
import { loggers } from '../config/logger.js'
import { ERROR_CODES, createOperationalError, toErrorResponse } from '../lib/errors.js'
import type { AppDependencies } from './deps.js'

const log = loggers.runs

export function createRunsRouter(deps: AppDependencies): Router {
  const router = Router()

  router.get('/last', (_req: Request, res: Response) => {
    return res.json({ last_run: deps.runState.getLastRun() })
  })

  router.post('/', async (_req: Request, res: Response) => {
    if (!deps.runState.tryBegin()) {
      return res
        .status(409)
        .json(toErrorResponse(createOperationalError('conflict', ERROR_CODES.RUN_IN_PROGRESS, 'Run in progress', 409)))
    }

    try {
      const report = await deps.pipeline.run(deps.sources)
      const summary = deps.runState.complete(report)
      log.info('Run triggered via API completed', {
        runId: report.runId,
        savedNewRecords: report.savedNewRecords,
        errors: report.errors,
      })
      return res.json({
        ...summary,
        retention: report.retention,
      })
    } catch (error) {
      deps.runState.fail()
      log.error('Run triggered via API failed', { totalSources: deps.sources.length }, error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  router.post('/:university', async (req: Request<{ university: string }>, res: Response) => {
    const { university } = req.params
    if (sourcesForUniversity(deps.sources, university).length === 0) {
      return res
        .status(404)
        .json(toErrorResponse(createOperationalError('not_found', ERROR_CODES.NOT_FOUND, 'Unknown university', 404)))
    }

    try {
      const report = await deps.pipeline.runUniversity(university, deps.sources)
      return res.json({
        university: report.university,
        saved_new_records: report.savedNewRecords,
        errors: report.errors,
        skipped_duplicates: report.skippedDuplicates,
      })
    } catch (error) {
      log.error('University run failed', { university }, error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  return router
}
