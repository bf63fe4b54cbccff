import { Redis } from 'ioredis'
import type { RedisOptions } from 'ioredis'
import { redactUrlCredentials } from '@cardledger/logger'
import { loggers } from './logger.js'

const log = loggers.checkpoint

/** Reconnect attempts after which reconnect logging drops to once a minute */
const CIRCUIT_BREAKER_ATTEMPTS = 20

export function getRedisOptions(): RedisOptions {
  let lastCircuitBreakerLog = 0

  return {
    // Checkpoint writes must not be silently dropped; fail the command instead
    maxRetriesPerRequest: 3,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    enableOfflineQueue: true,
    retryStrategy(times: number) {
      if (times > CIRCUIT_BREAKER_ATTEMPTS) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Redis circuit breaker: prolonged outage', { attempts: times })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting to Redis', { attempt: times, delayMs: delay })
      return delay
    },
    reconnectOnError(err: Error) {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED']
      if (targetErrors.some(e => err.message.includes(e))) {
        log.warn('Reconnecting due to error', { error: err.message })
        return true
      }
      return false
    },
  }
}

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, getRedisOptions())
  client.on('error', (err: Error) => {
    log.error('Redis connection error', { connection: redactUrlCredentials(url) }, err)
  })
  return client
}
