import 'dotenv/config'
import pg from 'pg'
import type { PoolConfig } from 'pg'

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 4)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: cardledger-downloader)
 *
 * The downloader is a single-writer batch job, so the pool stays small.
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,

    max: parseInt(env.DB_POOL_MAX || '4', 10),
    min: parseInt(env.DB_POOL_MIN || '0', 10),

    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,

    // Long backfills outlive DNS and credential rotations
    maxLifetimeSeconds: 1800,

    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'cardledger-downloader',
  }
}

/**
 * Creates a pool for the warehouse database.
 * Throws when no connection string is configured.
 */
export function createPool(connectionString = process.env.DATABASE_URL): pg.Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  return new pg.Pool(getPoolConfig(connectionString))
}
