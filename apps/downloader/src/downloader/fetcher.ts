/**
 * Hierarchical Fetcher
 *
 * Walks categories -> groups -> items. Per request:
 *
 *   governor.acquire -> pool.ensureFresh + selectRoute -> request -> classify
 *
 * and per outcome:
 *   ok            items flattened into the sink, node completed
 *   rate_limited  node back to pending, governor and route penalised, local retry
 *   server_error  same, bounded by maxAttempts, then left pending
 *   client_error  node failed, no rate penalty
 *   transport     counted as server_error, bounded by maxAttempts, then failed
 *
 * One bad node never stops the walk. Checkpoint and sink failures do, after
 * the sink has been drained. Interrupted nodes are released to pending.
 */

import { randomUUID } from 'crypto'
import pLimit from 'p-limit'
import type { ILogger } from '@cardledger/logger'
import type { CatalogClient, CatalogResponse } from '../catalog/client.js'
import { flattenRecord, toUpdateDate } from '../catalog/records.js'
import { categoryNode, groupNode } from '../catalog/types.js'
import type { HierarchyNode } from '../catalog/types.js'
import type { CheckpointStore } from '../checkpoint/store.js'
import { CancelledError, ConfigError, isCancellation, outcomeCategory } from '../errors.js'
import type { ProxyPool } from '../fetch/proxy-pool.js'
import type { RateGovernor } from '../fetch/rate-governor.js'
import type { RequestOutcome, Route } from '../fetch/types.js'
import type { BatchSink } from '../sink/batch-sink.js'
import { throwIfAborted } from '../utils/sleep.js'
import { recordRunCompleted, recordRunStarted } from './metrics.js'
import { DEFAULT_FETCHER_POLICY } from './types.js'
import type { FetcherPolicy, RunOptions, RunSummary } from './types.js'

export interface HierarchicalFetcherOptions {
  client: CatalogClient
  governor: RateGovernor
  pool: ProxyPool
  checkpoint: CheckpointStore
  sink: BatchSink
  policy?: Partial<FetcherPolicy>
  /** failed/attempted ratio that raises DOWNLOAD_ALERT_HIGH_FAILURE_RATE */
  alertFailureRate?: number
  now?: () => Date
  logger?: ILogger
}

type RequestCall<T> = (route: Route, signal: AbortSignal) => Promise<CatalogResponse<T>>

type AttemptResult<T> =
  | { outcome: 'ok'; results: T[] }
  | { outcome: Exclude<RequestOutcome, 'ok'> | 'transport_error'; error: string }

type Disposition<T> =
  | { kind: 'ok'; results: T[] }
  | { kind: 'pending'; error: string }
  | { kind: 'failed'; error: string }

class RunTally {
  readonly completed: string[] = []
  readonly skipped: string[] = []
  readonly failed: string[] = []
  readonly pending: string[] = []
  records = 0
  requests = 0
}

export class HierarchicalFetcher {
  private readonly policy: FetcherPolicy
  private readonly now: () => Date
  private readonly logger?: ILogger

  constructor(private readonly options: HierarchicalFetcherOptions) {
    this.policy = { ...DEFAULT_FETCHER_POLICY, ...options.policy }
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger
  }

  async run(options: RunOptions): Promise<RunSummary> {
    const { checkpoint, sink } = this.options
    const startedAt = Date.now()
    const runId = randomUUID()
    const concurrency = Math.max(1, options.concurrency ?? 1)
    const updateDate = toUpdateDate(this.now())
    const tally = new RunTally()

    if (options.mode === 'single-category' && (!options.categoryIds || options.categoryIds.length === 0)) {
      throw new ConfigError('single-category mode requires at least one category id', ['category'])
    }

    // Internal controller: a fatal error in one worker stops the others
    const controller = new AbortController()
    const onAbort = () => controller.abort()
    options.signal?.addEventListener('abort', onAbort, { once: true })
    const signal = controller.signal
    if (options.signal?.aborted) controller.abort()

    let aborted = false
    let abortReason: string | undefined
    let fatal: unknown = null

    try {
      if (options.mode === 'fresh') {
        await checkpoint.reset()
      } else {
        await checkpoint.load()
      }
      await checkpoint.beginRun()

      let retrySet: Set<string> | null = null
      if (options.mode === 'retry-failed') {
        retrySet = new Set(await checkpoint.requeueFailed())
        this.logger?.info('Failed nodes requeued', { count: retrySet.size })
      }

      recordRunStarted({
        runId,
        mode: options.mode,
        concurrency,
        categoryIds: options.categoryIds,
        checkpoint: checkpoint.status().canResume ? 'resuming' : 'new',
      })

      const roots = await this.resolveRoots(options, tally, signal)
      if (roots === null) {
        aborted = true
        abortReason = 'category list unavailable'
      } else {
        await checkpoint.register(roots.map(root => ({ id: root.id, kind: 'category', parentId: null })))

        for (const category of roots) {
          throwIfAborted(signal)

          if (retrySet && !this.touchesRetrySet(category.id, retrySet)) {
            continue
          }
          if (checkpoint.isCompleted(category.id)) {
            tally.skipped.push(category.id)
            continue
          }
          if (checkpoint.isFailed(category.id)) {
            // Only retry-failed moves failed nodes back; reported as carried over
            continue
          }

          await this.processCategory(category, {
            concurrency,
            updateDate,
            retrySet,
            tally,
            signal,
            controller,
          })
        }
      }
    } catch (error) {
      if (isCancellation(error)) {
        aborted = true
        abortReason = 'cancelled'
        this.logger?.warn('Run interrupted, progress saved')
      } else {
        fatal = error
        aborted = true
        abortReason = error instanceof Error ? error.message : String(error)
      }
    } finally {
      options.signal?.removeEventListener('abort', onAbort)
      try {
        await sink.drainOnShutdown()
      } catch (drainError) {
        if (fatal === null) {
          fatal = drainError
          aborted = true
          abortReason = drainError instanceof Error ? drainError.message : String(drainError)
        } else {
          this.logger?.error('Sink drain failed after fatal error', {}, drainError)
        }
      }
    }

    const failedThisRun = new Set(tally.failed)
    const carriedFailed = checkpoint
      .failedNodes()
      .map(node => node.id)
      .filter(id => !failedThisRun.has(id))

    const summary: RunSummary = {
      processed: tally.completed.length,
      skipped: tally.skipped.length,
      failed: tally.failed.length,
      pending: tally.pending.length,
      carriedFailed: carriedFailed.length,
      totalRecords: tally.records,
      requests: tally.requests,
      completedNodes: tally.completed,
      skippedNodes: tally.skipped,
      failedNodes: tally.failed,
      pendingNodes: tally.pending,
      carriedFailedNodes: carriedFailed,
      aborted,
      abortReason,
      resumable: checkpoint.status().canResume,
      durationMs: Date.now() - startedAt,
    }

    recordRunCompleted(runId, summary, this.options.alertFailureRate)

    if (fatal !== null) {
      throw fatal
    }
    return summary
  }

  /**
   * Supplied roots, or the category list (one request with the usual retry
   * policy). null when the list could not be fetched.
   */
  private async resolveRoots(
    options: RunOptions,
    tally: RunTally,
    signal: AbortSignal
  ): Promise<HierarchyNode[] | null> {
    let roots: HierarchyNode[]

    if (options.roots) {
      roots = options.roots
    } else {
      const result = await this.fetchNode(
        null,
        'categories',
        (route, s) => this.options.client.fetchCategories(route, s),
        tally,
        signal
      )
      if (result.kind !== 'ok') {
        this.logger?.error('Category list unavailable', { error: result.error })
        return null
      }
      roots = result.results.map(categoryNode)
    }

    if (options.mode === 'single-category' && options.categoryIds) {
      const wanted = new Set(options.categoryIds)
      const selected = roots.filter(root => wanted.has(root.externalId))
      const missing = options.categoryIds.filter(id => !selected.some(root => root.externalId === id))
      if (missing.length > 0) {
        this.logger?.warn('Requested categories not in catalog', { categoryIds: missing })
      }
      return selected
    }

    return roots
  }

  private touchesRetrySet(categoryId: string, retrySet: Set<string>): boolean {
    if (retrySet.has(categoryId)) return true
    return this.options.checkpoint.children(categoryId).some(id => retrySet.has(id))
  }

  private async processCategory(
    category: HierarchyNode,
    context: {
      concurrency: number
      updateDate: string
      retrySet: Set<string> | null
      tally: RunTally
      signal: AbortSignal
      controller: AbortController
    }
  ): Promise<void> {
    const { checkpoint } = this.options
    const { tally, signal } = context
    const log = this.logger?.child({ categoryId: category.externalId })

    const listing = await this.fetchNode(
      category.id,
      `groups of ${category.id}`,
      (route, s) => this.options.client.fetchGroups(category.externalId, route, s),
      tally,
      signal
    )
    if (listing.kind !== 'ok') {
      this.settle(category.id, listing, tally)
      return
    }

    const groups = listing.results.map(group => groupNode(category, group))
    await checkpoint.register(groups.map(group => ({ id: group.id, kind: 'group', parentId: category.id })))

    const listed = new Map(groups.map(group => [group.id, group]))
    for (const id of checkpoint.children(category.id)) {
      if (listed.has(id) || checkpoint.state(id) !== 'pending') continue
      // Registered by an earlier run but gone from the listing now
      await checkpoint.mark(id, 'failed', { error: 'Group no longer listed upstream' })
      tally.failed.push(id)
    }

    for (const group of groups) {
      if (checkpoint.isCompleted(group.id)) tally.skipped.push(group.id)
    }

    let targets = checkpoint.pendingNodes(category.id)
    if (context.retrySet && !context.retrySet.has(category.id)) {
      const retrySet = context.retrySet
      targets = targets.filter(id => retrySet.has(id))
    }

    log?.info('Category listed', { groups: groups.length, toFetch: targets.length })

    const limit = pLimit(context.concurrency)
    const outcomes = await Promise.allSettled(
      targets.map(id =>
        limit(async () => {
          const group = listed.get(id)
          if (!group) return
          try {
            await this.processGroup(category, group, context.updateDate, tally, signal)
          } catch (error) {
            // Stop the other workers at their next suspension point
            context.controller.abort()
            throw error
          }
        })
      )
    )

    const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected')
    if (failure) {
      const reason = this.preferFatal(outcomes, failure.reason)
      if (isCancellation(reason)) await this.release(category.id)
      throw reason
    }

    const allDone = checkpoint.children(category.id).every(id => checkpoint.isCompleted(id))
    if (allDone) {
      await checkpoint.mark(category.id, 'completed')
      tally.completed.push(category.id)
      log?.info('Category completed', { groups: groups.length })
    } else {
      await checkpoint.mark(category.id, 'pending')
      tally.pending.push(category.id)
      log?.info('Category left pending', {
        remaining: checkpoint.children(category.id).filter(id => !checkpoint.isCompleted(id)).length,
      })
    }
  }

  private async processGroup(
    category: HierarchyNode,
    group: HierarchyNode,
    updateDate: string,
    tally: RunTally,
    signal: AbortSignal
  ): Promise<void> {
    const result = await this.fetchNode(
      group.id,
      `items of ${group.id}`,
      (route, s) => this.options.client.fetchItems(category.externalId, group.externalId, route, s),
      tally,
      signal
    )

    if (result.kind !== 'ok') {
      this.settle(group.id, result, tally)
      return
    }

    const records = result.results.map(item => flattenRecord(category.data, group.data, item, updateDate))
    await this.options.sink.push(records)
    await this.options.checkpoint.mark(group.id, 'completed', { records: records.length })

    tally.completed.push(group.id)
    tally.records += records.length
    this.logger?.debug('Group completed', { nodeId: group.id, records: records.length })
  }

  /**
   * Issue a request for a node until it succeeds or the retry policy gives up.
   * With a nodeId the checkpoint follows every step: claimed before each
   * attempt, released (or failed) after each unsuccessful one. On `ok` the
   * node is left in_progress for the caller to complete.
   */
  private async fetchNode<T>(
    nodeId: string | null,
    label: string,
    call: RequestCall<T>,
    tally: RunTally,
    signal: AbortSignal
  ): Promise<Disposition<T>> {
    const { checkpoint } = this.options
    const { maxAttempts, maxThrottleRetries, failAfterThrottles } = this.policy
    let throttles = 0
    let serverErrors = 0
    let transportErrors = 0

    for (;;) {
      throwIfAborted(signal)
      if (nodeId) await checkpoint.claim(nodeId)

      let result: AttemptResult<T>
      try {
        result = await this.attempt(call, tally, signal)
      } catch (error) {
        if (nodeId) await this.release(nodeId)
        throw error
      }

      if (result.outcome === 'ok') {
        return { kind: 'ok', results: result.results }
      }

      const log = { node: label, outcome: result.outcome, category: outcomeCategory(result.outcome), error: result.error }

      if (result.outcome === 'client_error') {
        if (nodeId) await checkpoint.mark(nodeId, 'failed', { error: result.error })
        this.logger?.warn('Node failed', log)
        return { kind: 'failed', error: result.error }
      }

      if (result.outcome === 'rate_limited') {
        throttles++
        if (nodeId) await checkpoint.mark(nodeId, 'pending', { throttled: true })
        const cumulative = nodeId ? (checkpoint.entry(nodeId)?.throttles ?? throttles) : throttles

        if (failAfterThrottles !== undefined && cumulative >= failAfterThrottles) {
          const error = `Throttled ${cumulative} times`
          if (nodeId) await checkpoint.mark(nodeId, 'failed', { error })
          this.logger?.warn('Node failed after repeated throttling', { ...log, throttles: cumulative })
          return { kind: 'failed', error }
        }
        if (throttles > maxThrottleRetries) {
          this.logger?.warn('Node left pending after throttling', { ...log, throttles })
          return { kind: 'pending', error: result.error }
        }
        continue
      }

      if (nodeId) await checkpoint.mark(nodeId, 'pending')

      if (result.outcome === 'server_error') {
        serverErrors++
        if (serverErrors >= maxAttempts) {
          this.logger?.warn('Node left pending after server errors', { ...log, attempts: serverErrors })
          return { kind: 'pending', error: result.error }
        }
        continue
      }

      transportErrors++
      if (transportErrors >= maxAttempts) {
        if (nodeId) await checkpoint.mark(nodeId, 'failed', { error: result.error })
        this.logger?.warn('Node failed after transport errors', { ...log, attempts: transportErrors })
        return { kind: 'failed', error: result.error }
      }
    }
  }

  /** One request: pace, pick a route, send, classify, report */
  private async attempt<T>(call: RequestCall<T>, tally: RunTally, signal: AbortSignal): Promise<AttemptResult<T>> {
    const { governor, pool } = this.options

    await governor.acquire(signal)
    await pool.ensureFresh()
    throwIfAborted(signal)
    const routeId = pool.selectRoute()

    tally.requests++
    let response: CatalogResponse<T>
    try {
      response = await call(pool.route(routeId), signal)
    } catch (error) {
      if (isCancellation(error) || signal.aborted) {
        throw new CancelledError()
      }
      governor.recordOutcome('server_error')
      pool.report(routeId, 'server_error')
      return {
        outcome: 'transport_error',
        error: error instanceof Error ? error.message : String(error),
      }
    }

    governor.recordOutcome(response.outcome)
    pool.report(routeId, response.outcome)

    if (response.outcome === 'ok') {
      return { outcome: 'ok', results: response.results }
    }
    return { outcome: response.outcome, error: response.error }
  }

  private settle(nodeId: string, disposition: Disposition<unknown>, tally: RunTally): void {
    if (disposition.kind === 'failed') {
      tally.failed.push(nodeId)
    } else if (disposition.kind === 'pending') {
      tally.pending.push(nodeId)
    }
  }

  /** in_progress -> pending after an interrupt; a no-op for nodes in other states */
  private async release(nodeId: string): Promise<void> {
    if (this.options.checkpoint.state(nodeId) === 'in_progress') {
      await this.options.checkpoint.mark(nodeId, 'pending')
    }
  }

  /** A run-level failure wins over the cancellations it caused in other workers */
  private preferFatal(outcomes: PromiseSettledResult<void>[], fallback: unknown): unknown {
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected' && !isCancellation(outcome.reason)) {
        return outcome.reason
      }
    }
    return fallback
  }
}
