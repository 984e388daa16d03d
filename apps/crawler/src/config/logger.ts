/**
 * Crawler loggers, one child per component.
 */

import { configureLogging, createLogger } from '@papercode/logger'
import type { CrawlerConfig } from './index.js'

export const logger = createLogger('crawler')

export const loggers = {
  cli: logger.child('cli'),
  fetch: logger.child('fetch'),
  pipeline: logger.child('pipeline'),
  checkpoint: logger.child('checkpoint'),
  sources: logger.child('sources'),
  arxiv: logger.child('arxiv'),
  report: logger.child('report'),
}

export function applyLoggingConfig(config: Pick<CrawlerConfig, 'logLevel' | 'logFormat'>): void {
  configureLogging({ level: config.logLevel, format: config.logFormat })
}
