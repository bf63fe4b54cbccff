/**
 * Error Classification
 *
 * Node-level errors (throttle, server, client) are contained by the fetcher
 * and end up in the run summary. Run-level errors (checkpoint persistence,
 * sink flush, configuration) propagate and stop the run.
 */

import { ZodError } from 'zod'
import type { RequestOutcome } from './fetch/types.js'

export type ErrorCategory =
  | 'transient_throttle' // 403/429: back off, rotate route, leave node pending
  | 'transient_server' // 5xx, timeouts, resets: bounded local retry
  | 'permanent_client' // 404, malformed payload: node failed, not retried automatically
  | 'persistence' // checkpoint write failed: abort the run
  | 'sink' // warehouse flush failed after retries: abort the run
  | 'config' // invalid configuration or operator input
  | 'cancelled' // operator interrupt or deadline
  | 'internal'

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isRetryable: boolean
  /** Stops the whole run rather than one node */
  isFatal: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  RATE_LIMITED: 'RATE_LIMITED',
  SERVER_ERROR: 'SERVER_ERROR',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  CLIENT_ERROR: 'CLIENT_ERROR',
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
  CHECKPOINT_WRITE_FAILED: 'CHECKPOINT_WRITE_FAILED',
  CHECKPOINT_CONFLICT: 'CHECKPOINT_CONFLICT',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  SINK_FLUSH_FAILED: 'SINK_FLUSH_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CANCELLED: 'CANCELLED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export class CheckpointPersistenceError extends Error {
  readonly name = 'CheckpointPersistenceError'

  constructor(
    readonly nodeId: string | null,
    cause: unknown
  ) {
    super(
      `Checkpoint write failed${nodeId ? ` for node ${nodeId}` : ''}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
  }
}

/** A second claim on a node that is already in progress */
export class CheckpointConflictError extends Error {
  readonly name = 'CheckpointConflictError'

  constructor(readonly nodeId: string) {
    super(`Node ${nodeId} is already in progress`)
  }
}

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError'

  constructor(
    readonly nodeId: string,
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid transition for node ${nodeId}: ${from} -> ${to}`)
  }
}

export class SinkFlushError extends Error {
  readonly name = 'SinkFlushError'

  constructor(
    readonly recordCount: number,
    readonly attempts: number,
    readonly backupPath: string | null,
    cause: unknown
  ) {
    super(
      `Sink flush of ${recordCount} records failed after ${attempts} attempts` +
        (backupPath ? ` (records saved to ${backupPath})` : ''),
      { cause }
    )
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError'

  constructor(
    message: string,
    readonly keys: string[] = []
  ) {
    super(message)
  }
}

export class CancelledError extends Error {
  readonly name = 'CancelledError'

  constructor(message = 'Operation cancelled') {
    super(message)
  }
}

/** The request did not complete within its own timeout (not an operator cancel) */
export class TransportTimeoutError extends Error {
  readonly name = 'TransportTimeoutError'

  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`)
  }
}

/** The proxy controller rejected or failed a call */
export class ControlPlaneError extends Error {
  readonly name = 'ControlPlaneError'

  constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message)
  }
}

export function isCancellation(error: unknown): boolean {
  return (
    error instanceof CancelledError ||
    (error instanceof Error && (error.name === 'AbortError' || error.name === 'CancelledError'))
  )
}

/** Category of an unsuccessful request outcome; these stay node-level */
export function outcomeCategory(outcome: Exclude<RequestOutcome, 'ok'> | 'transport_error'): ErrorCategory {
  switch (outcome) {
    case 'rate_limited':
      return 'transient_throttle'
    case 'server_error':
    case 'transport_error':
      return 'transient_server'
    case 'client_error':
      return 'permanent_client'
  }
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof CheckpointPersistenceError) {
    return {
      category: 'persistence',
      code: ERROR_CODES.CHECKPOINT_WRITE_FAILED,
      message: error.message,
      isRetryable: false,
      isFatal: true,
      details: error.nodeId ? { nodeId: error.nodeId } : undefined,
      originalError: error,
    }
  }

  if (error instanceof CheckpointConflictError || error instanceof InvalidTransitionError) {
    return {
      category: 'persistence',
      code:
        error instanceof CheckpointConflictError ? ERROR_CODES.CHECKPOINT_CONFLICT : ERROR_CODES.INVALID_TRANSITION,
      message: error.message,
      isRetryable: false,
      isFatal: true,
      details: { nodeId: error.nodeId },
      originalError: error,
    }
  }

  if (error instanceof SinkFlushError) {
    return {
      category: 'sink',
      code: ERROR_CODES.SINK_FLUSH_FAILED,
      message: error.message,
      isRetryable: false,
      isFatal: true,
      details: { recordCount: error.recordCount, backupPath: error.backupPath },
      originalError: error,
    }
  }

  if (error instanceof ConfigError || error instanceof ZodError) {
    return {
      category: 'config',
      code: ERROR_CODES.CONFIGURATION_ERROR,
      message: error instanceof ZodError ? 'Invalid configuration' : error.message,
      isRetryable: false,
      isFatal: true,
      details:
        error instanceof ZodError
          ? { issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) }
          : { keys: error.keys },
      originalError: error,
    }
  }

  if (isCancellation(error)) {
    return {
      category: 'cancelled',
      code: ERROR_CODES.CANCELLED,
      message: error instanceof Error ? error.message : 'Operation cancelled',
      isRetryable: true,
      isFatal: false,
      originalError: error instanceof Error ? error : undefined,
    }
  }

  // Anything else thrown while issuing a request is a transport failure
  // (timeout, reset, refused); callers outside the request path treat it as internal.
  const err = error instanceof Error ? error : new Error(String(error))
  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: err.message,
    isRetryable: false,
    isFatal: true,
    originalError: err,
  }
}
