/**
 * University API Routes
 *
 * Routes:
 * - GET /       — every registered university with last update and counts per page type
 * - GET /:name  — newest snapshot per page type plus recent history
 */

import { Router } from 'express'
import type { Request, Response } from 'express'
import { PAGE_TYPES } from '@campuswatch/db'
import type { PageType, Snapshot } from '@campuswatch/db'
import { listUniversities, sourcesForUniversity } from '@campuswatch/collector'
import { loggers } from '../config/logger.js'
import { ERROR_CODES, createOperationalError, toErrorResponse } from '../lib/errors.js'
import { toSnapshotView } from '../lib/serializers.js'
import type { SnapshotView } from '../lib/serializers.js'
import type { AppDependencies } from './deps.js'

const log = loggers.snapshots

/** Rows considered for the detail view */
export const DETAIL_WINDOW = 80
/** Rows returned as history */
export const HISTORY_LIMIT = 25

export function createUniversitiesRouter(deps: Pick<AppDependencies, 'store' | 'sources'>): Router {
  const router = Router()

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const universities = await Promise.all(
        listUniversities(deps.sources).map(async (name) => {
          const [newest] = await deps.store.listByUniversity(name)
          const counts: Partial<Record<PageType, number>> = {}
          for (const pageType of PAGE_TYPES) {
            counts[pageType] = await deps.store.count({ university: name, pageType })
          }
          return {
            name,
            last_updated: newest ? newest.extractedAt.toISOString() : null,
            counts,
          }
        })
      )

      return res.json({
        universities,
        source_count: deps.sources.length,
        record_count: await deps.store.count(),
      })
    } catch (error) {
      log.error('Failed to list universities', {}, error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  router.get('/:name', async (req: Request<{ name: string }>, res: Response) => {
    const matching = sourcesForUniversity(deps.sources, req.params.name)
    const [first] = matching
    if (!first) {
      return res
        .status(404)
        .json(toErrorResponse(createOperationalError('not_found', ERROR_CODES.NOT_FOUND, 'Unknown university', 404)))
    }

    try {
      const rows = (await deps.store.listByUniversity(first.university)).slice(0, DETAIL_WINDOW)

      const latestByType: Partial<Record<PageType, SnapshotView | null>> = {}
      for (const pageType of PAGE_TYPES) {
        const newest = rows.find((row: Snapshot) => row.pageType === pageType)
        latestByType[pageType] = newest ? toSnapshotView(newest) : null
      }

      return res.json({
        university: first.university,
        sources: matching.map((source) => ({ page_type: source.pageType, url: source.url })),
        latest_by_type: latestByType,
        history: rows.slice(0, HISTORY_LIMIT).map(toSnapshotView),
      })
    } catch (error) {
      log.error('Failed to load university snapshots', { university: first.university }, error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  return router
}
