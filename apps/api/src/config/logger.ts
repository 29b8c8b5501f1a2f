/**
 * API Logger Configuration
 *
 * Pre-configured loggers for API components
 */

import { createLogger } from '@partsense/logger'

// Root logger for API service
export const logger = createLogger('api')

// Pre-configured child loggers for common components
export const loggers = {
  server: logger.child('server'),
  search: logger.child('search'),
  catalog: logger.child('catalog'),
  ai: logger.child('ai'),
  personalization: logger.child('personalization'),
}
