/**
 * Failure-driven Rate Governor
 *
 * One governor per run, shared by every worker. Pacing starts at the
 * floor and only grows when the upstream pushes back:
 *
 * - rate_limited: exponential delay increase plus a global cooldown
 * - server_error: ignored until `serverErrorThreshold` in a row, then a throttle
 * - client_error: no penalty
 * - ok: decays one step towards the floor
 *
 * `acquire()` callers are served FIFO, one at a time.
 */

import pLimit from 'p-limit'
import type { ILogger } from '@cardledger/logger'
import { sleep as defaultSleep, throwIfAborted } from '../utils/sleep.js'
import type { Sleep } from '../utils/sleep.js'
import type { RequestOutcome } from './types.js'

export interface RateGovernorConfig {
  /** Pacing floor between consecutive requests */
  baseDelayMs: number
  backoffFactor: number
  /** Pacing and cooldown ceiling */
  maxDelayMs: number
  /** Cooldown after the first throttle; grows by backoffFactor per further throttle */
  cooldownMs: number
  /** Consecutive 5xx responses that count as a throttle */
  serverErrorThreshold: number
}

export const DEFAULT_RATE_GOVERNOR_CONFIG: RateGovernorConfig = {
  baseDelayMs: 1200,
  backoffFactor: 2,
  maxDelayMs: 60000,
  cooldownMs: 5000,
  serverErrorThreshold: 2,
}

export interface RateState {
  consecutiveFailures: number
  consecutiveServerErrors: number
  currentDelayMs: number
  /** Epoch ms; 0 when no cooldown was ever set */
  cooldownUntil: number
  lastRequestAt: number | null
}

export interface RateGovernorOptions {
  config?: Partial<RateGovernorConfig>
  now?: () => number
  sleep?: Sleep
  logger?: ILogger
}

export class RateGovernor {
  readonly config: RateGovernorConfig
  private state: RateState
  private readonly queue = pLimit(1)
  private readonly now: () => number
  private readonly sleep: Sleep
  private readonly logger?: ILogger

  constructor(options: RateGovernorOptions = {}) {
    this.config = { ...DEFAULT_RATE_GOVERNOR_CONFIG, ...options.config }
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.logger = options.logger
    this.state = this.initialState()
  }

  /**
   * Milliseconds a request issued now would have to wait.
   */
  delayBeforeNextRequest(): number {
    const now = this.now()
    const pacing = this.state.lastRequestAt === null ? 0 : this.state.lastRequestAt + this.state.currentDelayMs - now
    const cooldown = this.state.cooldownUntil - now
    return Math.max(pacing, cooldown, 0)
  }

  /**
   * Wait for the pacing interval and any cooldown, then claim the slot.
   * Resolves with the time spent waiting.
   */
  acquire(signal?: AbortSignal): Promise<number> {
    return this.queue(async () => {
      let waited = 0

      // Loop: a throttle reported while we sleep can push the cooldown further out
      for (;;) {
        throwIfAborted(signal)
        const delay = this.delayBeforeNextRequest()
        if (delay <= 0) break
        await this.sleep(delay, signal)
        waited += delay
      }

      this.state.lastRequestAt = this.now()
      return waited
    })
  }

  recordOutcome(outcome: RequestOutcome): void {
    switch (outcome) {
      case 'rate_limited':
        this.throttle(outcome)
        break

      case 'server_error':
        this.state.consecutiveServerErrors++
        if (this.state.consecutiveServerErrors >= this.config.serverErrorThreshold) {
          this.throttle(outcome)
        }
        break

      case 'client_error':
        this.state.consecutiveServerErrors = 0
        break

      case 'ok': {
        const wasBackedOff = this.state.consecutiveFailures > 0
        this.state.consecutiveFailures = Math.max(0, this.state.consecutiveFailures - 1)
        this.state.consecutiveServerErrors = 0
        this.state.currentDelayMs = this.delayFor(this.state.consecutiveFailures)
        if (wasBackedOff && this.state.consecutiveFailures === 0) {
          this.logger?.info('Pacing back at floor', { delayMs: this.state.currentDelayMs })
        }
        break
      }
    }
  }

  snapshot(): RateState {
    return { ...this.state }
  }

  reset(): void {
    this.state = this.initialState()
  }

  private throttle(reason: RequestOutcome): void {
    const { backoffFactor, cooldownMs, maxDelayMs } = this.config

    this.state.consecutiveFailures++
    const failures = this.state.consecutiveFailures
    this.state.currentDelayMs = this.delayFor(failures)

    const cooldown = Math.min(maxDelayMs, cooldownMs * Math.pow(backoffFactor, failures - 1))
    this.state.cooldownUntil = Math.max(this.state.cooldownUntil, this.now() + cooldown)

    this.logger?.warn('Upstream throttling, backing off', {
      reason,
      consecutiveFailures: failures,
      delayMs: this.state.currentDelayMs,
      cooldownMs: cooldown,
    })
  }

  private delayFor(consecutiveFailures: number): number {
    const { baseDelayMs, backoffFactor, maxDelayMs } = this.config
    if (consecutiveFailures === 0) {
      return baseDelayMs
    }
    return Math.min(maxDelayMs, baseDelayMs * Math.pow(backoffFactor, consecutiveFailures))
  }

  private initialState(): RateState {
    return {
      consecutiveFailures: 0,
      consecutiveServerErrors: 0,
      currentDelayMs: this.config.baseDelayMs,
      cooldownUntil: 0,
      lastRequestAt: null,
    }
  }
}
