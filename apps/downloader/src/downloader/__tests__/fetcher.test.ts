import { describe, expect, it } from 'vitest'
import { MemoryCheckpointBackend } from '../../checkpoint/__tests__/memory-backend.js'
import { CheckpointPersistenceError, ConfigError, SinkFlushError } from '../../errors.js'
import { FIXTURE, createHarness } from './fake-upstream.js'
import type { CatalogFixture } from './fake-upstream.js'

describe('HierarchicalFetcher', () => {
  it('walks every category and group on a fresh run', async () => {
    const { fetcher, upstream, checkpoint, loaded } = createHarness()

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(upstream.paths()).toEqual([
      '/categories',
      '/3/groups',
      '/3/10/products',
      '/3/11/products',
      '/71/groups',
      '/71/20/products',
    ])
    expect(summary).toMatchObject({
      processed: 5,
      skipped: 0,
      failed: 0,
      pending: 0,
      totalRecords: 6,
      requests: 6,
      completedNodes: ['3:10', '3:11', '3', '71:20', '71'],
      aborted: false,
      resumable: false,
    })
    expect(loaded).toHaveLength(6)
    expect(loaded[0]).toMatchObject({
      category_categoryId: 3,
      group_groupId: 10,
      product_productId: 1001,
      product_subTypeName: 'Normal',
      update_date: '2026-10-18',
    })
    expect(checkpoint.entry('71:20')).toMatchObject({ state: 'completed', records: 3, attempts: 1 })
  })

  it('retries a throttled node and completes it', async () => {
    const { fetcher, upstream, checkpoint, governor } = createHarness()
    upstream.script('/3/10/products', { status: 429 })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary).toMatchObject({ processed: 5, failed: 0, pending: 0, requests: 7 })
    expect(checkpoint.entry('3:10')).toMatchObject({ state: 'completed', attempts: 2, throttles: 1 })
    expect(governor.snapshot().consecutiveFailures).toBe(0)
  })

  it('marks a node failed on a client error and keeps going', async () => {
    const { fetcher, upstream, checkpoint } = createHarness()
    upstream.script('/3/11/products', { status: 404, body: 'Not Found' })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary).toMatchObject({
      processed: 3,
      failed: 1,
      pending: 1,
      completedNodes: ['3:10', '71:20', '71'],
      failedNodes: ['3:11'],
      pendingNodes: ['3'],
      resumable: true,
    })
    expect(checkpoint.entry('3:11')).toMatchObject({ state: 'failed', error: 'HTTP 404', attempts: 1 })
  })

  it('fails a node whose payload is malformed', async () => {
    const { fetcher, upstream, checkpoint } = createHarness()
    upstream.script('/71/20/products', { status: 200, body: '{"oops":1}' })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary.failedNodes).toEqual(['71:20'])
    expect(checkpoint.entry('71:20')?.error).toBe('Malformed payload: missing results array')
  })

  it('fails a node after repeated transport errors', async () => {
    const { fetcher, upstream, checkpoint } = createHarness()
    const reset = { error: new Error('read ECONNRESET') }
    upstream.script('/71/20/products', reset, reset, reset)

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary.failedNodes).toEqual(['71:20'])
    expect(checkpoint.entry('71:20')).toMatchObject({ state: 'failed', attempts: 3, error: 'read ECONNRESET' })
  })

  it('leaves a node pending after repeated server errors', async () => {
    const { fetcher, upstream, checkpoint } = createHarness()
    upstream.script('/3/11/products', { status: 503 }, { status: 503 }, { status: 503 })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary.pendingNodes).toEqual(['3:11', '3'])
    expect(summary.requests).toBe(8)
    expect(checkpoint.entry('3:11')).toMatchObject({ state: 'pending', attempts: 3 })
  })

  it('leaves a node pending once its throttle retries are used up', async () => {
    const { fetcher, upstream, checkpoint } = createHarness({ policy: { maxThrottleRetries: 1 } })
    upstream.script('/3/10/products', { status: 429 }, { status: 429 })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary.pendingNodes).toEqual(['3:10', '3'])
    expect(checkpoint.entry('3:10')).toMatchObject({ state: 'pending', throttles: 2 })
  })

  it('fails a node after the configured number of throttles', async () => {
    const { fetcher, upstream, checkpoint } = createHarness({ policy: { failAfterThrottles: 2 } })
    upstream.script('/3/10/products', { status: 429 }, { status: 429 })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary.failedNodes).toEqual(['3:10'])
    expect(checkpoint.entry('3:10')).toMatchObject({ state: 'failed', error: 'Throttled 2 times' })
  })

  it('reports an aborted run when the category list is unavailable', async () => {
    const { fetcher, upstream } = createHarness()
    upstream.script('/categories', { status: 503 }, { status: 503 }, { status: 503 })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary).toMatchObject({
      aborted: true,
      abortReason: 'category list unavailable',
      processed: 0,
      requests: 3,
    })
  })

  it('makes no requests for completed nodes on resume', async () => {
    const backend = new MemoryCheckpointBackend()
    await createHarness({ backend }).fetcher.run({ mode: 'fresh' })

    const second = createHarness({ backend })
    const summary = await second.fetcher.run({ mode: 'resume' })

    expect(second.upstream.paths()).toEqual(['/categories'])
    expect(summary).toMatchObject({ processed: 0, skippedNodes: ['3', '71'], requests: 1 })
    expect(second.loaded).toEqual([])
  })

  it('resumes only the unresolved nodes', async () => {
    const backend = new MemoryCheckpointBackend()
    const first = createHarness({ backend })
    first.upstream.script('/3/11/products', { status: 503 }, { status: 503 }, { status: 503 })
    await first.fetcher.run({ mode: 'fresh' })

    const second = createHarness({ backend })
    const summary = await second.fetcher.run({ mode: 'resume' })

    expect(second.upstream.paths()).toEqual(['/categories', '/3/groups', '/3/11/products'])
    expect(summary).toMatchObject({
      completedNodes: ['3:11', '3'],
      skippedNodes: ['3:10', '71'],
      totalRecords: 1,
      resumable: false,
    })
  })

  it('retries only failed nodes in retry-failed mode', async () => {
    const backend = new MemoryCheckpointBackend()
    const first = createHarness({ backend })
    first.upstream.script('/3/11/products', { status: 404 })
    await first.fetcher.run({ mode: 'fresh' })

    const second = createHarness({ backend })
    const summary = await second.fetcher.run({ mode: 'retry-failed' })

    expect(second.upstream.paths()).toEqual(['/categories', '/3/groups', '/3/11/products'])
    expect(summary).toMatchObject({ completedNodes: ['3:11', '3'], failed: 0 })
    expect(second.checkpoint.status().canResume).toBe(false)
  })

  it('marks groups that left the listing as failed', async () => {
    const backend = new MemoryCheckpointBackend()
    const first = createHarness({ backend })
    first.upstream.script('/3/11/products', { status: 503 }, { status: 503 }, { status: 503 })
    await first.fetcher.run({ mode: 'fresh' })

    const fixture: CatalogFixture = { ...FIXTURE, groups: { ...FIXTURE.groups, '3': [{ groupId: 10, name: 'Base Set' }] } }
    const second = createHarness({ backend, fixture })
    const summary = await second.fetcher.run({ mode: 'resume' })

    expect(summary).toMatchObject({ failedNodes: ['3:11'], pendingNodes: ['3'] })
    expect(second.checkpoint.entry('3:11')?.error).toBe('Group no longer listed upstream')
  })

  it('reports failures carried over from earlier runs on resume', async () => {
    const backend = new MemoryCheckpointBackend()
    const first = createHarness({ backend })
    first.upstream.script('/71/groups', { status: 404, body: 'Not Found' })
    await first.fetcher.run({ mode: 'fresh' })

    const second = createHarness({ backend })
    const summary = await second.fetcher.run({ mode: 'resume' })

    expect(second.upstream.paths()).toEqual(['/categories'])
    expect(summary).toMatchObject({
      processed: 0,
      failed: 0,
      pending: 0,
      carriedFailed: 1,
      carriedFailedNodes: ['71'],
      skippedNodes: ['3'],
      resumable: true,
    })
  })

  it('moves a throttled request to another proxy route', async () => {
    const { fetcher, upstream, pool } = createHarness({
      routes: [
        { id: 'hk-01', proxyUrl: 'http://127.0.0.1:7891' },
        { id: 'jp-02', proxyUrl: 'http://127.0.0.1:7892' },
      ],
    })
    upstream.script('/3/10/products', { status: 429 })

    const summary = await fetcher.run({ mode: 'fresh' })

    expect(summary).toMatchObject({ processed: 5, failed: 0, pending: 0 })
    expect(upstream.paths().slice(2, 4)).toEqual(['/3/10/products', '/3/10/products'])
    expect(upstream.routeIds).toEqual(['hk-01', 'hk-01', 'hk-01', 'jp-02', 'jp-02', 'jp-02', 'jp-02'])
    expect(pool.stats().find(record => record.id === 'hk-01')).toMatchObject({ attempts: 3, rateLimited: 1 })
  })

  it('waits out the cooldown before retrying a throttled node', async () => {
    const { fetcher, upstream, clock, governor } = createHarness({
      governor: { baseDelayMs: 1000, backoffFactor: 2, maxDelayMs: 8000, cooldownMs: 5000 },
    })
    upstream.script('/3/10/products', { status: 429 })

    await fetcher.run({ mode: 'fresh' })

    // pacing 1000 between requests; the throttle at t=2000 holds the retry until t=7000
    expect(clock.sleeps).toEqual([1000, 1000, 5000, 1000, 1000, 1000])
    expect(governor.snapshot()).toMatchObject({ consecutiveFailures: 0, currentDelayMs: 1000, cooldownUntil: 7000 })
  })

  it('resumes a partial download through throttling and a missing group', async () => {
    const fixture: CatalogFixture = {
      ...FIXTURE,
      groups: {
        ...FIXTURE.groups,
        '71': [
          { groupId: 20, name: 'The First Chapter' },
          { groupId: 21, name: 'Rise of the Floodborn' },
        ],
      },
    }
    const backend = new MemoryCheckpointBackend()
    const first = createHarness({ backend, fixture })
    first.upstream.script('/71/groups', { status: 503 }, { status: 503 }, { status: 503 })
    const before = await first.fetcher.run({ mode: 'fresh' })
    expect(before).toMatchObject({ completedNodes: ['3:10', '3:11', '3'], pendingNodes: ['71'] })

    const second = createHarness({
      backend,
      fixture,
      governor: { baseDelayMs: 1000, backoffFactor: 2, maxDelayMs: 8000, cooldownMs: 5000 },
    })
    second.upstream.script('/71/20/products', { status: 429 })
    const summary = await second.fetcher.run({ mode: 'resume' })

    expect(second.upstream.paths()).toEqual([
      '/categories',
      '/71/groups',
      '/71/20/products',
      '/71/20/products',
      '/71/21/products',
    ])
    expect(second.clock.sleeps).toEqual([1000, 1000, 5000, 1000])
    expect(summary).toMatchObject({
      skippedNodes: ['3'],
      completedNodes: ['71:20'],
      failedNodes: ['71:21'],
      pendingNodes: ['71'],
      carriedFailed: 0,
      totalRecords: 3,
      requests: 5,
      resumable: true,
    })
    expect(second.checkpoint.entry('71:20')).toMatchObject({ state: 'completed', throttles: 1, records: 3 })
    expect(second.checkpoint.entry('71:21')).toMatchObject({ state: 'failed', error: 'HTTP 404' })
    expect(second.loaded.map(record => record.product_productId)).toEqual([2001, 2002, 2003])
  })

  it('downloads only the requested categories', async () => {
    const { fetcher, upstream, checkpoint } = createHarness()

    const summary = await fetcher.run({ mode: 'single-category', categoryIds: ['71'] })

    expect(upstream.paths()).toEqual(['/categories', '/71/groups', '/71/20/products'])
    expect(summary.completedNodes).toEqual(['71:20', '71'])
    expect(checkpoint.state('3')).toBeUndefined()
  })

  it('requires category ids for a single-category run', async () => {
    const { fetcher, upstream } = createHarness()

    await expect(fetcher.run({ mode: 'single-category' })).rejects.toBeInstanceOf(ConfigError)
    expect(upstream.requests).toEqual([])
  })

  it('starts from supplied roots without listing categories', async () => {
    const { fetcher, upstream } = createHarness()

    const summary = await fetcher.run({
      mode: 'fresh',
      roots: [
        {
          id: '71',
          kind: 'category',
          externalId: '71',
          parentIds: [],
          data: { categoryId: 71, name: 'Lorcana' },
        },
      ],
    })

    expect(upstream.paths()).toEqual(['/71/groups', '/71/20/products'])
    expect(summary.processed).toBe(2)
  })

  it('stops after a checkpoint write failure and still drains the sink', async () => {
    const { fetcher, upstream, backend, loaded } = createHarness()
    upstream.onRequest('/3/11/products', () => {
      backend.failWrites = 1
    })

    const error = await fetcher.run({ mode: 'fresh' }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CheckpointPersistenceError)
    expect(loaded.map(record => record.product_productId)).toEqual([1001, 1002, 1101])
    expect(upstream.paths()).not.toContain('/71/groups')
    expect(backend.snapshot()?.nodes['3:11']?.state).toBe('in_progress')
  })

  it('stops when the sink cannot deliver a batch', async () => {
    const { fetcher, checkpoint } = createHarness({
      maxBatchSize: 1,
      loader: {
        load: async () => {
          throw new Error('warehouse unavailable')
        },
      },
    })

    await expect(fetcher.run({ mode: 'fresh' })).rejects.toBeInstanceOf(SinkFlushError)
    expect(checkpoint.isCompleted('3:10')).toBe(false)
  })

  it('releases in-flight work to pending when cancelled', async () => {
    const { fetcher, upstream, checkpoint, loaded } = createHarness()
    const controller = new AbortController()
    upstream.onRequest('/3/11/products', () => controller.abort())

    const summary = await fetcher.run({ mode: 'fresh', signal: controller.signal })

    expect(summary).toMatchObject({
      aborted: true,
      abortReason: 'cancelled',
      completedNodes: ['3:10'],
      resumable: true,
    })
    expect(upstream.paths()).toEqual(['/categories', '/3/groups', '/3/10/products', '/3/11/products'])
    expect(checkpoint.state('3:11')).toBe('pending')
    expect(checkpoint.state('3')).toBe('pending')
    expect(checkpoint.state('71')).toBe('pending')
    expect(loaded).toHaveLength(2)
  })

  it('runs group workers concurrently up to the limit', async () => {
    const groups = Array.from({ length: 6 }, (_, i) => ({ groupId: 100 + i }))
    const items = Object.fromEntries(groups.map(group => [`5/${group.groupId}`, [{ productId: group.groupId * 10 }]]))
    const fixture: CatalogFixture = { categories: [{ categoryId: 5 }], groups: { '5': groups }, items }
    const { fetcher, upstream } = createHarness({ fixture })
    upstream.latencyMs = 5

    const summary = await fetcher.run({ mode: 'fresh', concurrency: 3 })

    expect(summary).toMatchObject({ processed: 7, totalRecords: 6, failed: 0 })
    expect(upstream.maxInFlight).toBeGreaterThan(1)
    expect(upstream.maxInFlight).toBeLessThanOrEqual(3)
  })
})
