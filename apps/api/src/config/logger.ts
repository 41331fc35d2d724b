/**
 * API Logger Configuration
 *
 * Pre-configured loggers for API components
 */

import { createLogger } from '@campuswatch/logger'

// Root logger for API service
export const logger = createLogger('api')

export const loggers = {
  server: logger.child('server'),
  runs: logger.child('runs'),
  snapshots: logger.child('snapshots'),
}
