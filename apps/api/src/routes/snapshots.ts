/**
 * Snapshot API Routes
 *
 * Routes:
 * - GET /latest?limit=N — newest snapshots across universities (1..500, default 80)
 */

import { Router } from 'express'
import type { Request, Response } from 'express'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { classifyError, toErrorResponse } from '../lib/errors.js'
import { toSnapshotView } from '../lib/serializers.js'
import type { AppDependencies } from './deps.js'

const log = loggers.snapshots

const latestQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(80),
})

export function createSnapshotsRouter(deps: Pick<AppDependencies, 'store'>): Router {
  const router = Router()

  router.get('/latest', async (req: Request, res: Response) => {
    const parsed = latestQuerySchema.safeParse(req.query)
    if (!parsed.success) {
      return res.status(400).json(toErrorResponse(classifyError(parsed.error)))
    }

    try {
      const rows = await deps.store.listLatest(parsed.data.limit)
      return res.json({
        limit: parsed.data.limit,
        snapshots: rows.map(toSnapshotView),
      })
    } catch (error) {
      log.error('Failed to list latest snapshots', { limit: parsed.data.limit }, error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  return router
}
