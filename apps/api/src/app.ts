/**
 * Express App Configuration (without server startup)
 *
 * `createApp` is used by index.ts and by the supertest suites. The listen()
 * call lives in index.ts.
 */

import express from 'express'
import type { Express, Request, Response, NextFunction } from 'express'
import helmet from 'helmet'
import { classifyError, toErrorResponse } from './lib/errors.js'
import { RunState } from './lib/run-state.js'
import { requestLoggerMiddleware, errorLoggerMiddleware } from './middleware/request-logger.js'
import type { AppDependencies } from './routes/deps.js'
import { createRunsRouter } from './routes/runs.js'
import { createSnapshotsRouter } from './routes/snapshots.js'
import { createUniversitiesRouter } from './routes/universities.js'

export type { AppDependencies }
export { RunState }

export function createApp(deps: Omit<AppDependencies, 'runState'> & { runState?: RunState }): Express {
  const resolved: AppDependencies = { ...deps, runState: deps.runState ?? new RunState() }
  const app = express()

  app.use(helmet())

  // One log per request at response finish
  app.use(requestLoggerMiddleware)

  app.use(express.json())

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.use('/api/universities', createUniversitiesRouter(resolved))
  app.use('/api/snapshots', createSnapshotsRouter(resolved))
  app.use('/api/runs', createRunsRouter(resolved))

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' })
  })

  app.use(errorLoggerMiddleware)

  // Final error handler - safe response only, never err.message or stack
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const classified = classifyError(err)
    res.status(classified.statusCode).json(toErrorResponse(classified))
  })

  return app
}
