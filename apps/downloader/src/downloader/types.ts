import type { HierarchyNode } from '../catalog/types.js'

export type RunMode = 'fresh' | 'resume' | 'retry-failed' | 'single-category'

export const RUN_MODES: readonly RunMode[] = ['fresh', 'resume', 'retry-failed', 'single-category']

export interface RunOptions {
  mode: RunMode
  /** Category nodes to start from; the category list is fetched when omitted */
  roots?: HierarchyNode[]
  /** External category ids, required for single-category */
  categoryIds?: string[]
  /** Group workers per category */
  concurrency?: number
  signal?: AbortSignal
}

export interface RunSummary {
  /** Nodes completed by this run */
  processed: number
  /** Nodes already completed before this run */
  skipped: number
  /** Nodes that ended this run failed */
  failed: number
  /** Nodes this run attempted and left pending */
  pending: number
  /** Nodes that were already failed before this run and still are */
  carriedFailed: number
  totalRecords: number
  requests: number
  completedNodes: string[]
  skippedNodes: string[]
  failedNodes: string[]
  pendingNodes: string[]
  carriedFailedNodes: string[]
  /** Stopped early (interrupt or unavailable category list) */
  aborted: boolean
  abortReason?: string
  /** The checkpoint still has unresolved nodes */
  resumable: boolean
  durationMs: number
}

export interface FetcherPolicy {
  /** Attempts per node for server errors and transport failures */
  maxAttempts: number
  /** Local retries per node after throttling, per run */
  maxThrottleRetries: number
  /** Cumulative throttles after which a node is marked failed; unset = never */
  failAfterThrottles?: number
}

export const DEFAULT_FETCHER_POLICY: FetcherPolicy = {
  maxAttempts: 3,
  maxThrottleRetries: 3,
}
