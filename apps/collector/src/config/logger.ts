/**
 * Collector logger configuration
 */

import { createLogger } from '@campuswatch/logger'

export const logger = createLogger('collector')

export const loggers = {
  worker: logger.child('worker'),
  scheduler: logger.child('scheduler'),
  pipeline: logger.child('pipeline'),
  fetch: logger.child('fetch'),
}
