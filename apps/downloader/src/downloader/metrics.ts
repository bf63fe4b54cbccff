/**
 * Download run metrics
 *
 * Structured log events only; no metrics backend.
 */

import { loggers } from '../config/logger.js'
import type { RunMode, RunSummary } from './types.js'

const log = loggers.run

const DEFAULT_FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_NODES_FOR_ALERT = 20
const MAX_LISTED_NODES = 50

export function recordRunStarted(payload: {
  runId: string
  mode: RunMode
  concurrency: number
  categoryIds?: string[]
  checkpoint: string
}): void {
  log.info('DOWNLOAD_RUN_STARTED', {
    event_name: 'DOWNLOAD_RUN_STARTED',
    ...payload,
  })
}

export function failureRate(summary: RunSummary): number {
  const attempted = summary.processed + summary.failed + summary.pending
  return attempted === 0 ? 0 : summary.failed / attempted
}

export function recordRunCompleted(
  runId: string,
  summary: RunSummary,
  alertThreshold = DEFAULT_FAILURE_RATE_ALERT_THRESHOLD
): void {
  const rate = failureRate(summary)
  const {
    completedNodes: _completed,
    skippedNodes: _skipped,
    failedNodes,
    pendingNodes,
    carriedFailedNodes,
    ...counts
  } = summary

  log.info('DOWNLOAD_RUN_COMPLETED', {
    event_name: 'DOWNLOAD_RUN_COMPLETED',
    runId,
    ...counts,
    failureRate: rate,
    failedNodes: failedNodes.slice(0, MAX_LISTED_NODES),
    pendingNodes: pendingNodes.slice(0, MAX_LISTED_NODES),
    carriedFailedNodes: carriedFailedNodes.slice(0, MAX_LISTED_NODES),
  })

  const attempted = summary.processed + summary.failed + summary.pending
  if (attempted >= MIN_NODES_FOR_ALERT && rate > alertThreshold) {
    log.warn('DOWNLOAD_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'DOWNLOAD_ALERT_HIGH_FAILURE_RATE',
      runId,
      failureRate: rate,
      attempted,
      threshold: alertThreshold,
    })
  }
}
