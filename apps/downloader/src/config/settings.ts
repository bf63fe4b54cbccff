/**
 * Downloader configuration
 *
 * Read from the environment (`.env` via dotenv) and validated with zod.
 * CLI flags arrive as overrides and win over the environment.
 *
 * Environment variables (all optional unless noted):
 * - CATALOG_BASE_URL            upstream API base (default: https://tcgcsv.com/tcgplayer)
 * - CATALOG_ITEM_ENDPOINT       products | prices (default: products)
 * - CATALOG_USER_AGENT          User-Agent header
 * - REQUEST_TIMEOUT_MS          per-request timeout (default: 30000)
 * - RATE_BASE_DELAY_MS          pacing floor (default: 1200)
 * - RATE_BACKOFF_FACTOR         backoff multiplier (default: 2)
 * - RATE_MAX_DELAY_MS           pacing ceiling (default: 60000)
 * - RATE_COOLDOWN_MS            cooldown after the first throttle (default: 5000)
 * - RATE_SERVER_ERROR_THRESHOLD consecutive 5xx counted as a throttle (default: 2)
 * - MAX_ATTEMPTS                server/transport retries per node (default: 3)
 * - MAX_THROTTLE_RETRIES        throttle retries per node per run (default: 3)
 * - FAIL_AFTER_THROTTLES        mark a node failed after this many throttles overall (default: never)
 * - CONCURRENCY                 group workers (default: 1)
 * - CHECKPOINT_BACKEND          file | redis (default: file)
 * - CHECKPOINT_PATH             file backend location (default: ./checkpoint/catalog.json)
 * - CHECKPOINT_KEY              redis backend key (default: cardledger:checkpoint:catalog)
 * - REDIS_URL                   required for the redis backend
 * - DATABASE_URL                warehouse connection (required unless --dry-run)
 * - WAREHOUSE_TABLE             target table (default: catalog_records)
 * - BATCH_MAX_SIZE              records per flush (default: 1000)
 * - BATCH_MAX_BYTES             byte bound per flush (default: none)
 * - SINK_MAX_FLUSH_ATTEMPTS     attempts before backing up a batch (default: 3)
 * - SINK_RETRY_DELAY_MS         first flush retry delay (default: 1000)
 * - BACKUP_DIR                  where failed batches are written (default: ./backups)
 * - PROXY_ROUTES                comma-separated `id=proxyUrl` entries
 * - PROXY_FRESHNESS_MS          how long a passing probe counts (default: 600000)
 * - HEALTH_CHECK_INTERVAL_MS    minimum age before re-probing (default: 600000)
 * - PROXY_UNHEALTHY_AFTER       consecutive probe failures before exclusion (default: 2)
 * - HEALTH_PROBE_URL            probe target (default: `${CATALOG_BASE_URL}/categories`)
 * - HEALTH_PROBE_TIMEOUT_MS     probe timeout (default: 10000)
 * - CONTROL_PLANE_URL           proxy controller API, enables control-plane routing
 * - CONTROL_PLANE_SECRET        bearer secret for the controller
 * - CONTROL_PLANE_GROUP         selector group to switch (default: manual-select)
 * - CONTROL_PLANE_GATEWAY       mixed-port proxy traffic goes through (default: http://127.0.0.1:7890)
 * - ALERT_FAILURE_RATE          failed/attempted ratio that triggers an alert (default: 0.5)
 */

import 'dotenv/config'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import { DIRECT_ROUTE_ID } from '../fetch/types.js'

export const DEFAULT_BASE_URL = 'https://tcgcsv.com/tcgplayer'
export const DEFAULT_USER_AGENT = 'cardledger-downloader/0.1 (+catalog bulk export)'

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()

const ProxyRouteSchema = z.object({
  id: z
    .string()
    .min(1)
    .refine(id => id !== DIRECT_ROUTE_ID, { message: `"${DIRECT_ROUTE_ID}" is reserved for the default route` }),
  proxyUrl: z.string().url(),
})

export type ProxyRouteConfig = z.infer<typeof ProxyRouteSchema>

const ConfigSchema = z
  .object({
    catalog: z.object({
      baseUrl: z.string().url().default(DEFAULT_BASE_URL),
      itemEndpoint: z.enum(['products', 'prices']).default('products'),
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      requestTimeoutMs: positiveInt.default(30000),
    }),
    rate: z
      .object({
        baseDelayMs: nonNegativeInt.default(1200),
        backoffFactor: z.coerce.number().min(1).default(2),
        maxDelayMs: positiveInt.default(60000),
        cooldownMs: nonNegativeInt.default(5000),
        serverErrorThreshold: positiveInt.default(2),
      })
      .refine(rate => rate.maxDelayMs >= rate.baseDelayMs, {
        message: 'maxDelayMs must not be below baseDelayMs',
        path: ['maxDelayMs'],
      }),
    retry: z.object({
      maxAttempts: positiveInt.default(3),
      maxThrottleRetries: nonNegativeInt.default(3),
      failAfterThrottles: positiveInt.optional(),
    }),
    concurrency: positiveInt.max(32).default(1),
    checkpoint: z.object({
      backend: z.enum(['file', 'redis']).default('file'),
      path: z.string().min(1).default('./checkpoint/catalog.json'),
      key: z.string().min(1).default('cardledger:checkpoint:catalog'),
      redisUrl: z.string().url().optional(),
    }),
    warehouse: z.object({
      databaseUrl: z.string().min(1).optional(),
      table: z.string().min(1).default('catalog_records'),
    }),
    sink: z.object({
      maxBatchSize: positiveInt.default(1000),
      maxBatchBytes: positiveInt.optional(),
      maxFlushAttempts: positiveInt.default(3),
      retryDelayMs: nonNegativeInt.default(1000),
      backupDir: z.string().min(1).default('./backups'),
      dryRun: z.boolean().default(false),
      outputPath: z.string().min(1).default('./output/catalog.ndjson'),
    }),
    proxy: z.object({
      routes: z.array(ProxyRouteSchema).default([]),
      freshnessMs: positiveInt.default(600000),
      refreshIntervalMs: positiveInt.default(600000),
      unhealthyAfter: positiveInt.default(2),
      healthProbeUrl: z.string().url().optional(),
      healthProbeTimeoutMs: positiveInt.default(10000),
    }),
    controlPlane: z
      .object({
        url: z.string().url(),
        secret: z.string().optional(),
        group: z.string().min(1).default('manual-select'),
        gatewayUrl: z.string().url().default('http://127.0.0.1:7890'),
      })
      .optional(),
    alertFailureRate: z.coerce.number().min(0).max(1).default(0.5),
  })
  .superRefine((config, ctx) => {
    if (config.checkpoint.backend === 'redis' && !config.checkpoint.redisUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'REDIS_URL is required for the redis checkpoint backend',
        path: ['checkpoint', 'redisUrl'],
      })
    }
  })

export type DownloaderConfig = z.infer<typeof ConfigSchema>

/** Flag values the CLI can override */
export interface ConfigOverrides {
  concurrency?: number
  baseDelayMs?: number
  backoffFactor?: number
  maxDelayMs?: number
  dryRun?: boolean
  outputPath?: string
  checkpointPath?: string
}

/** Maps config paths back to the variable that sets them, for error messages */
const ENV_KEYS: Record<string, string> = {
  'catalog.baseUrl': 'CATALOG_BASE_URL',
  'catalog.itemEndpoint': 'CATALOG_ITEM_ENDPOINT',
  'catalog.userAgent': 'CATALOG_USER_AGENT',
  'catalog.requestTimeoutMs': 'REQUEST_TIMEOUT_MS',
  'rate.baseDelayMs': 'RATE_BASE_DELAY_MS',
  'rate.backoffFactor': 'RATE_BACKOFF_FACTOR',
  'rate.maxDelayMs': 'RATE_MAX_DELAY_MS',
  'rate.cooldownMs': 'RATE_COOLDOWN_MS',
  'rate.serverErrorThreshold': 'RATE_SERVER_ERROR_THRESHOLD',
  'retry.maxAttempts': 'MAX_ATTEMPTS',
  'retry.maxThrottleRetries': 'MAX_THROTTLE_RETRIES',
  'retry.failAfterThrottles': 'FAIL_AFTER_THROTTLES',
  concurrency: 'CONCURRENCY',
  'checkpoint.backend': 'CHECKPOINT_BACKEND',
  'checkpoint.path': 'CHECKPOINT_PATH',
  'checkpoint.key': 'CHECKPOINT_KEY',
  'checkpoint.redisUrl': 'REDIS_URL',
  'warehouse.databaseUrl': 'DATABASE_URL',
  'warehouse.table': 'WAREHOUSE_TABLE',
  'sink.maxBatchSize': 'BATCH_MAX_SIZE',
  'sink.maxBatchBytes': 'BATCH_MAX_BYTES',
  'sink.maxFlushAttempts': 'SINK_MAX_FLUSH_ATTEMPTS',
  'sink.retryDelayMs': 'SINK_RETRY_DELAY_MS',
  'sink.backupDir': 'BACKUP_DIR',
  'proxy.routes': 'PROXY_ROUTES',
  'proxy.freshnessMs': 'PROXY_FRESHNESS_MS',
  'proxy.refreshIntervalMs': 'HEALTH_CHECK_INTERVAL_MS',
  'proxy.unhealthyAfter': 'PROXY_UNHEALTHY_AFTER',
  'proxy.healthProbeUrl': 'HEALTH_PROBE_URL',
  'proxy.healthProbeTimeoutMs': 'HEALTH_PROBE_TIMEOUT_MS',
  'controlPlane.url': 'CONTROL_PLANE_URL',
  'controlPlane.secret': 'CONTROL_PLANE_SECRET',
  'controlPlane.group': 'CONTROL_PLANE_GROUP',
  'controlPlane.gatewayUrl': 'CONTROL_PLANE_GATEWAY',
  alertFailureRate: 'ALERT_FAILURE_RATE',
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

/**
 * Parse `hk-01=http://127.0.0.1:7891,jp-02=http://127.0.0.1:7892`.
 * Entries without `=` are kept so the schema reports them.
 */
export function parseProxyRoutes(value: string | undefined): Array<{ id: string; proxyUrl: string }> {
  if (!value) return []

  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      const separator = entry.indexOf('=')
      if (separator === -1) {
        return { id: entry, proxyUrl: '' }
      }
      return { id: entry.slice(0, separator).trim(), proxyUrl: entry.slice(separator + 1).trim() }
    })
}

function issueKey(path: ReadonlyArray<string | number>): string {
  const segments = path.filter((segment): segment is string => typeof segment === 'string')
  // Longest known prefix: proxy.routes.0.proxyUrl -> PROXY_ROUTES
  for (let length = segments.length; length > 0; length--) {
    const key = ENV_KEYS[segments.slice(0, length).join('.')]
    if (key) return key
  }
  return segments.join('.')
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): DownloaderConfig {
  const controlPlaneUrl = read(env, 'CONTROL_PLANE_URL')

  const input = {
    catalog: {
      baseUrl: read(env, 'CATALOG_BASE_URL')?.replace(/\/+$/, ''),
      itemEndpoint: read(env, 'CATALOG_ITEM_ENDPOINT'),
      userAgent: read(env, 'CATALOG_USER_AGENT'),
      requestTimeoutMs: read(env, 'REQUEST_TIMEOUT_MS'),
    },
    rate: {
      baseDelayMs: overrides.baseDelayMs ?? read(env, 'RATE_BASE_DELAY_MS'),
      backoffFactor: overrides.backoffFactor ?? read(env, 'RATE_BACKOFF_FACTOR'),
      maxDelayMs: overrides.maxDelayMs ?? read(env, 'RATE_MAX_DELAY_MS'),
      cooldownMs: read(env, 'RATE_COOLDOWN_MS'),
      serverErrorThreshold: read(env, 'RATE_SERVER_ERROR_THRESHOLD'),
    },
    retry: {
      maxAttempts: read(env, 'MAX_ATTEMPTS'),
      maxThrottleRetries: read(env, 'MAX_THROTTLE_RETRIES'),
      failAfterThrottles: read(env, 'FAIL_AFTER_THROTTLES'),
    },
    concurrency: overrides.concurrency ?? read(env, 'CONCURRENCY'),
    checkpoint: {
      backend: read(env, 'CHECKPOINT_BACKEND'),
      path: overrides.checkpointPath ?? read(env, 'CHECKPOINT_PATH'),
      key: read(env, 'CHECKPOINT_KEY'),
      redisUrl: read(env, 'REDIS_URL'),
    },
    warehouse: {
      databaseUrl: read(env, 'DATABASE_URL'),
      table: read(env, 'WAREHOUSE_TABLE'),
    },
    sink: {
      maxBatchSize: read(env, 'BATCH_MAX_SIZE'),
      maxBatchBytes: read(env, 'BATCH_MAX_BYTES'),
      maxFlushAttempts: read(env, 'SINK_MAX_FLUSH_ATTEMPTS'),
      retryDelayMs: read(env, 'SINK_RETRY_DELAY_MS'),
      backupDir: read(env, 'BACKUP_DIR'),
      dryRun: overrides.dryRun,
      outputPath: overrides.outputPath,
    },
    proxy: {
      routes: parseProxyRoutes(read(env, 'PROXY_ROUTES')),
      freshnessMs: read(env, 'PROXY_FRESHNESS_MS'),
      refreshIntervalMs: read(env, 'HEALTH_CHECK_INTERVAL_MS'),
      unhealthyAfter: read(env, 'PROXY_UNHEALTHY_AFTER'),
      healthProbeUrl: read(env, 'HEALTH_PROBE_URL'),
      healthProbeTimeoutMs: read(env, 'HEALTH_PROBE_TIMEOUT_MS'),
    },
    controlPlane: controlPlaneUrl
      ? {
          url: controlPlaneUrl.replace(/\/+$/, ''),
          secret: read(env, 'CONTROL_PLANE_SECRET'),
          group: read(env, 'CONTROL_PLANE_GROUP'),
          gatewayUrl: read(env, 'CONTROL_PLANE_GATEWAY'),
        }
      : undefined,
    alertFailureRate: read(env, 'ALERT_FAILURE_RATE'),
  }

  const result = ConfigSchema.safeParse(input)
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map(issue => issueKey(issue.path)))]
    const details = result.error.issues.map(issue => `${issueKey(issue.path)}: ${issue.message}`).join('; ')
    throw new ConfigError(`Invalid configuration (${details})`, keys)
  }

  return result.data
}

/** The probe target, defaulting to the category listing of the catalog */
export function healthProbeUrl(config: DownloaderConfig): string {
  return config.proxy.healthProbeUrl ?? `${config.catalog.baseUrl}/categories`
}
