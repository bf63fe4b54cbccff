/**
 * Runtime wiring
 *
 * Builds the downloader's components from a validated config. Every
 * external resource opened here is released by `close()`.
 */

import { createPool, PgWarehouseLoader } from '@cardledger/warehouse'
import type { WarehouseLoader } from '@cardledger/warehouse'
import { CatalogClient } from './catalog/client.js'
import { FileCheckpointBackend, RedisCheckpointBackend } from './checkpoint/backends.js'
import { CheckpointStore } from './checkpoint/store.js'
import type { CheckpointBackend } from './checkpoint/types.js'
import { loggers } from './config/logger.js'
import { createRedisClient } from './config/redis.js'
import { healthProbeUrl } from './config/settings.js'
import type { DownloaderConfig } from './config/settings.js'
import { HierarchicalFetcher } from './downloader/fetcher.js'
import { ConfigError } from './errors.js'
import { ControlPlaneClient, ControlPlaneTransport } from './fetch/control-plane.js'
import { ProxyPool } from './fetch/proxy-pool.js'
import { RateGovernor } from './fetch/rate-governor.js'
import { UndiciRouteTransport } from './fetch/transport.js'
import type { Route, RouteTransport } from './fetch/types.js'
import { BatchSink } from './sink/batch-sink.js'
import { NdjsonFileLoader } from './sink/ndjson.js'

type Closer = () => Promise<unknown>

export interface CheckpointHandle {
  store: CheckpointStore
  close(): Promise<void>
}

export interface RoutingHandle {
  pool: ProxyPool
  transport: RouteTransport
  close(): Promise<void>
}

export interface DownloaderRuntime {
  fetcher: HierarchicalFetcher
  pool: ProxyPool
  checkpoint: CheckpointStore
  sink: BatchSink
  close(): Promise<void>
}

async function closeAll(closers: Closer[]): Promise<void> {
  const results = await Promise.allSettled(closers.map(close => close()))
  for (const result of results) {
    if (result.status === 'rejected') {
      loggers.run.warn('Resource did not close cleanly', {}, result.reason)
    }
  }
}

export function openCheckpoint(config: DownloaderConfig): CheckpointHandle {
  let backend: CheckpointBackend
  const closers: Closer[] = []

  if (config.checkpoint.backend === 'redis') {
    if (!config.checkpoint.redisUrl) {
      throw new ConfigError('REDIS_URL is required for the redis checkpoint backend', ['REDIS_URL'])
    }
    const redis = createRedisClient(config.checkpoint.redisUrl)
    closers.push(() => redis.quit())
    backend = new RedisCheckpointBackend(redis, config.checkpoint.key)
  } else {
    backend = new FileCheckpointBackend(config.checkpoint.path)
  }

  return {
    store: new CheckpointStore({ backend, logger: loggers.checkpoint }),
    close: () => closeAll(closers),
  }
}

/**
 * Proxy pool over configured routes, or over routes discovered from the
 * control plane when CONTROL_PLANE_URL is set.
 */
export async function openRouting(config: DownloaderConfig): Promise<RoutingHandle> {
  const direct = new UndiciRouteTransport()
  let transport: RouteTransport = direct
  let routes: Route[] = config.proxy.routes

  if (config.controlPlane) {
    const client = new ControlPlaneClient({ url: config.controlPlane.url, secret: config.controlPlane.secret })
    routes = await client.listRoutes()
    transport = new ControlPlaneTransport({
      client,
      group: config.controlPlane.group,
      gatewayUrl: config.controlPlane.gatewayUrl,
      inner: direct,
      logger: loggers.controlPlane,
    })
    loggers.controlPlane.info('Routes discovered', {
      routes: routes.length,
      group: config.controlPlane.group,
      selected: await client.currentRoute(config.controlPlane.group),
    })
  }

  const pool = new ProxyPool({
    routes,
    transport,
    config: {
      freshnessMs: config.proxy.freshnessMs,
      refreshIntervalMs: config.proxy.refreshIntervalMs,
      unhealthyAfter: config.proxy.unhealthyAfter,
      probeUrl: healthProbeUrl(config),
      probeTimeoutMs: config.proxy.healthProbeTimeoutMs,
    },
    logger: loggers.pool,
  })

  return { pool, transport, close: () => transport.close() }
}

function openLoader(config: DownloaderConfig, closers: Closer[]): { loader: WarehouseLoader; ready: () => Promise<void> } {
  if (config.sink.dryRun) {
    const loader = new NdjsonFileLoader(config.sink.outputPath)
    loggers.sink.info('Dry run: records go to a local file', { path: loader.path })
    return { loader, ready: async () => undefined }
  }

  if (!config.warehouse.databaseUrl) {
    throw new ConfigError('DATABASE_URL is required unless --dry-run is set', ['DATABASE_URL'])
  }

  const pool = createPool(config.warehouse.databaseUrl)
  closers.push(() => pool.end())
  const loader = new PgWarehouseLoader(pool, { table: config.warehouse.table, logger: loggers.sink })
  return { loader, ready: () => loader.ensureTable() }
}

export async function createRuntime(config: DownloaderConfig): Promise<DownloaderRuntime> {
  const closers: Closer[] = []

  try {
    const { loader, ready } = openLoader(config, closers)

    const checkpoint = openCheckpoint(config)
    closers.push(() => checkpoint.close())

    const routing = await openRouting(config)
    closers.push(() => routing.close())

    await ready()

    const sink = new BatchSink({
      loader,
      maxBatchSize: config.sink.maxBatchSize,
      maxBatchBytes: config.sink.maxBatchBytes,
      maxFlushAttempts: config.sink.maxFlushAttempts,
      retryDelayMs: config.sink.retryDelayMs,
      backupDir: config.sink.backupDir,
      logger: loggers.sink,
    })

    const governor = new RateGovernor({ config: config.rate, logger: loggers.governor })

    const client = new CatalogClient({
      baseUrl: config.catalog.baseUrl,
      itemEndpoint: config.catalog.itemEndpoint,
      userAgent: config.catalog.userAgent,
      timeoutMs: config.catalog.requestTimeoutMs,
      transport: routing.transport,
    })

    const fetcher = new HierarchicalFetcher({
      client,
      governor,
      pool: routing.pool,
      checkpoint: checkpoint.store,
      sink,
      policy: config.retry,
      alertFailureRate: config.alertFailureRate,
      logger: loggers.fetcher,
    })

    return {
      fetcher,
      pool: routing.pool,
      checkpoint: checkpoint.store,
      sink,
      close: () => closeAll(closers),
    }
  } catch (error) {
    await closeAll(closers)
    throw error
  }
}
