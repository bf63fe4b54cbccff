/**
 * Checkpoint Store
 *
 * Durable per-node state for one catalog walk. Every transition goes
 * through `mark()` (or `claim()`/`requeueFailed()`), runs one at a time,
 * and is persisted before the call resolves. If the write fails the
 * in-memory state is rolled back and CheckpointPersistenceError is thrown.
 *
 *   pending     -> in_progress | completed | failed | pending
 *   in_progress -> completed | failed | pending
 *   failed      -> pending            (explicit retry only)
 *   completed   -> (terminal)
 */

import pLimit from 'p-limit'
import type { ILogger } from '@cardledger/logger'
import { CheckpointConflictError, CheckpointPersistenceError, InvalidTransitionError } from '../errors.js'
import type { NodeKind } from '../catalog/types.js'
import { NODE_STATES } from './types.js'
import type { CheckpointBackend, CheckpointDocument, CheckpointStatus, NodeEntry, NodeState } from './types.js'

export interface NodeRegistration {
  id: string
  kind: NodeKind
  parentId: string | null
}

export interface MarkDetail {
  error?: string
  /** Records delivered by this node */
  records?: number
  /** Count this transition as one more attempt */
  attempt?: boolean
  /** Count one more throttle against the node */
  throttled?: boolean
  /** Required to move a failed node back to pending */
  retry?: boolean
}

export interface CheckpointStoreOptions {
  backend: CheckpointBackend
  now?: () => Date
  logger?: ILogger
}

const ALLOWED: Record<NodeState, readonly NodeState[]> = {
  pending: ['in_progress', 'completed', 'failed', 'pending'],
  in_progress: ['completed', 'failed', 'pending'],
  failed: ['pending'],
  completed: [],
}

export class CheckpointStore {
  private document: CheckpointDocument
  private readonly writeQueue = pLimit(1)
  private readonly backend: CheckpointBackend
  private readonly now: () => Date
  private readonly logger?: ILogger

  constructor(options: CheckpointStoreOptions) {
    this.backend = options.backend
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger
    this.document = this.emptyDocument()
  }

  /**
   * Read the saved checkpoint. Nodes left in_progress by an interrupted
   * run are released to pending.
   */
  async load(): Promise<CheckpointStatus> {
    const saved = await this.backend.read()
    this.document = saved ?? this.emptyDocument()

    let released = 0
    for (const entry of Object.values(this.document.nodes)) {
      if (entry.state === 'in_progress') {
        entry.state = 'pending'
        released++
      }
    }

    this.logger?.info('Checkpoint loaded', {
      backend: this.backend.describe(),
      found: saved !== null,
      nodes: Object.keys(this.document.nodes).length,
      released,
    })
    return this.status()
  }

  /** Count a new run against the checkpoint and persist it */
  beginRun(): Promise<void> {
    return this.writeQueue(async () => {
      const previous = this.document.runs
      this.document.runs++
      await this.persist(null, () => {
        this.document.runs = previous
      })
    })
  }

  /**
   * Add nodes that are not known yet as pending. Known nodes keep their state.
   */
  register(nodes: readonly NodeRegistration[]): Promise<number> {
    return this.writeQueue(async () => {
      const added: string[] = []
      const timestamp = this.now().toISOString()

      for (const node of nodes) {
        if (this.document.nodes[node.id]) continue
        this.document.nodes[node.id] = {
          kind: node.kind,
          parentId: node.parentId,
          state: 'pending',
          attempts: 0,
          throttles: 0,
          records: 0,
          updatedAt: timestamp,
        }
        added.push(node.id)
      }

      if (added.length > 0) {
        await this.persist(null, () => {
          for (const id of added) delete this.document.nodes[id]
        })
      }
      return added.length
    })
  }

  mark(nodeId: string, state: NodeState, detail: MarkDetail = {}): Promise<void> {
    return this.writeQueue(async () => {
      const entry = this.document.nodes[nodeId]
      if (!entry) {
        throw new Error(`Unknown checkpoint node: ${nodeId}`)
      }
      this.assertTransition(nodeId, entry, state, detail)

      const previous: NodeEntry = { ...entry }
      entry.state = state
      entry.updatedAt = this.now().toISOString()
      if (detail.attempt) entry.attempts++
      if (detail.throttled) entry.throttles++
      if (detail.records !== undefined) entry.records = detail.records
      if (state === 'failed') {
        entry.error = detail.error ?? entry.error
      } else {
        delete entry.error
      }

      await this.persist(nodeId, () => {
        this.document.nodes[nodeId] = previous
      })
    })
  }

  /** pending -> in_progress, counted as an attempt; a second claim is rejected */
  claim(nodeId: string): Promise<void> {
    return this.mark(nodeId, 'in_progress', { attempt: true })
  }

  /**
   * Move failed nodes (all, or the given ids) back to pending in one write.
   * Ids that are not failed are ignored. Resolves with the ids moved.
   */
  requeueFailed(ids?: readonly string[]): Promise<string[]> {
    return this.writeQueue(async () => {
      const wanted = ids ? new Set(ids) : null
      const previous = new Map<string, NodeEntry>()
      const timestamp = this.now().toISOString()

      for (const [id, entry] of Object.entries(this.document.nodes)) {
        if (entry.state !== 'failed' || (wanted && !wanted.has(id))) continue
        previous.set(id, { ...entry })
        entry.state = 'pending'
        entry.updatedAt = timestamp
        delete entry.error
      }

      if (previous.size > 0) {
        await this.persist(null, () => {
          for (const [id, entry] of previous) this.document.nodes[id] = entry
        })
      }
      return [...previous.keys()]
    })
  }

  /** Discard all progress and persist an empty checkpoint */
  reset(): Promise<void> {
    return this.writeQueue(async () => {
      const previous = this.document
      this.document = this.emptyDocument()
      await this.persist(null, () => {
        this.document = previous
      })
      this.logger?.info('Checkpoint reset', { backend: this.backend.describe() })
    })
  }

  /** Wait for queued writes to land */
  flush(): Promise<void> {
    return this.writeQueue(async () => undefined)
  }

  entry(nodeId: string): NodeEntry | undefined {
    const entry = this.document.nodes[nodeId]
    return entry ? { ...entry } : undefined
  }

  state(nodeId: string): NodeState | undefined {
    return this.document.nodes[nodeId]?.state
  }

  isCompleted(nodeId: string): boolean {
    return this.state(nodeId) === 'completed'
  }

  isFailed(nodeId: string): boolean {
    return this.state(nodeId) === 'failed'
  }

  /** Direct children of `parentId` (null for categories) */
  children(parentId: string | null): string[] {
    return Object.entries(this.document.nodes)
      .filter(([, entry]) => entry.parentId === parentId)
      .map(([id]) => id)
  }

  /**
   * Children of `parentId` that still need work: pending ones, plus failed
   * ones when `retryFailed` is set. Completed and in-progress nodes are never returned.
   */
  pendingNodes(parentId: string | null, options: { retryFailed?: boolean } = {}): string[] {
    return Object.entries(this.document.nodes)
      .filter(
        ([, entry]) =>
          entry.parentId === parentId &&
          (entry.state === 'pending' || (options.retryFailed === true && entry.state === 'failed'))
      )
      .map(([id]) => id)
  }

  failedNodes(): Array<{ id: string; error?: string }> {
    return Object.entries(this.document.nodes)
      .filter(([, entry]) => entry.state === 'failed')
      .map(([id, entry]) => ({ id, error: entry.error }))
  }

  status(): CheckpointStatus {
    const counts: Record<NodeState, number> = { pending: 0, in_progress: 0, completed: 0, failed: 0 }
    const countsByKind: Record<NodeKind, number> = { category: 0, group: 0, item: 0 }
    let totalRecords = 0

    for (const entry of Object.values(this.document.nodes)) {
      counts[entry.state]++
      countsByKind[entry.kind]++
      totalRecords += entry.records
    }

    const unresolved = NODE_STATES.filter(state => state !== 'completed').reduce(
      (sum, state) => sum + counts[state],
      0
    )

    return {
      counts,
      countsByKind,
      startedAt: this.document.startedAt,
      updatedAt: this.document.updatedAt,
      runs: this.document.runs,
      totalRecords,
      canResume: unresolved > 0,
      failed: this.failedNodes(),
    }
  }

  private assertTransition(nodeId: string, entry: NodeEntry, to: NodeState, detail: MarkDetail): void {
    if (entry.state === 'in_progress' && to === 'in_progress') {
      throw new CheckpointConflictError(nodeId)
    }
    if (!ALLOWED[entry.state].includes(to)) {
      throw new InvalidTransitionError(nodeId, entry.state, to)
    }
    if (entry.state === 'failed' && !detail.retry) {
      throw new InvalidTransitionError(nodeId, entry.state, to)
    }
  }

  private async persist(nodeId: string | null, rollback: () => void): Promise<void> {
    const document = this.document
    const previousUpdatedAt = document.updatedAt
    document.updatedAt = this.now().toISOString()

    try {
      await this.backend.write(document)
    } catch (error) {
      document.updatedAt = previousUpdatedAt
      rollback()
      this.logger?.error('Checkpoint write failed', { nodeId, backend: this.backend.describe() }, error)
      throw new CheckpointPersistenceError(nodeId, error)
    }
  }

  private emptyDocument(): CheckpointDocument {
    const timestamp = this.now().toISOString()
    return { version: 1, startedAt: timestamp, updatedAt: timestamp, runs: 0, nodes: {} }
  }
}
