/**
 * HTTP Request Logger Middleware
 *
 * ONE structured log per request, at response finish (event http.request.end),
 * with request_id, method, route, status code and latency.
 */

import { randomUUID } from 'node:crypto'
import type { Request, Response, NextFunction } from 'express'
import { loggers } from '../config/logger.js'
import { classifyError, formatErrorForLog } from '../lib/errors.js'

const log = loggers.server

declare global {
  namespace Express {
    interface Request {
      _startTime?: bigint
      requestId?: string
    }
  }
}

const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

/**
 * Matched route pattern (e.g. /api/universities/:name), or the raw path
 */
function getRoute(req: Request): string {
  const routePath: unknown = req.route?.path
  if (typeof routePath === 'string') {
    return `${req.baseUrl}${routePath}`
  }
  return requestPath(req)
}

// req.path is relative to the mounting router by the time the response finishes
function requestPath(req: Request): string {
  return req.originalUrl.split('?')[0] ?? req.originalUrl
}

function calculateLatencyMs(startTime: bigint): number {
  const latencyNs = process.hrtime.bigint() - startTime
  return Math.round((Number(latencyNs) / 1_000_000) * 100) / 100
}

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  req.requestId = req.get('x-request-id') ?? randomUUID()
  res.setHeader('x-request-id', req.requestId)

  if (SKIP_PATHS.has(req.path)) {
    return next()
  }

  req._startTime = process.hrtime.bigint()

  res.on('finish', () => {
    const logEntry = {
      event_name: 'http.request.end',
      http: {
        method: req.method,
        route: getRoute(req),
        path: requestPath(req),
        status_code: res.statusCode,
        latency_ms: req._startTime ? calculateLatencyMs(req._startTime) : 0,
      },
      request_id: req.requestId,
    }

    if (res.statusCode >= 500) {
      log.error('Request completed with error', logEntry)
    } else if (res.statusCode >= 400) {
      log.warn('Request completed with client error', logEntry)
    } else {
      log.info('Request completed', logEntry)
    }
  })

  next()
}

/**
 * Logs unhandled errors with classification, then passes them on
 */
export function errorLoggerMiddleware(err: unknown, req: Request, _res: Response, next: NextFunction): void {
  const classified = classifyError(err)

  const meta = {
    event_name: 'http.request.error',
    http: {
      method: req.method,
      route: getRoute(req),
      path: requestPath(req),
      latency_ms: req._startTime ? calculateLatencyMs(req._startTime) : 0,
    },
    request_id: req.requestId,
    ...formatErrorForLog(classified),
  }

  if (classified.isOperational) {
    log.warn('Request failed', meta)
  } else {
    log.error('Unhandled error', meta)
  }

  next(err)
}
