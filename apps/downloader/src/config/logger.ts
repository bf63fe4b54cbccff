/**
 * Downloader Logger Configuration
 *
 * Pre-configured loggers for downloader components
 */

import { createLogger } from '@cardledger/logger'

export const logger = createLogger('downloader')

export const loggers = {
  run: logger.child('run'),
  fetcher: logger.child('fetcher'),
  governor: logger.child('rate-governor'),
  pool: logger.child('proxy-pool'),
  controlPlane: logger.child('control-plane'),
  checkpoint: logger.child('checkpoint'),
  sink: logger.child('sink'),
  cli: logger.child('cli'),
}
