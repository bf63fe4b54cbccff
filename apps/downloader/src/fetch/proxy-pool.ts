/**
 * Proxy Pool
 *
 * Keeps a ledger per route (attempts, successes, throttles, probe health)
 * and picks the route the next request should use.
 *
 * Selection rules:
 * - only routes whose last probe passed within `freshnessMs` are eligible
 * - highest success ratio wins, then fewest attempts, then declaration order
 * - the chosen route stays active until it is throttled or fails a probe
 * - with nothing eligible, traffic goes through the default (direct) route
 *
 * Routes are never removed; an unhealthy route rejoins on its next passing probe.
 */

import type { ILogger } from '@cardledger/logger'
import { DIRECT_ROUTE_ID } from './types.js'
import type { RequestOutcome, Route, RouteTransport } from './types.js'

export interface ProxyRecord {
  id: string
  proxyUrl?: string
  attempts: number
  successes: number
  rateLimited: number
  serverErrors: number
  /** Tracked separately; a 4xx says nothing about the route */
  clientErrors: number
  /** null until the first probe */
  healthy: boolean | null
  lastCheckedAt: number | null
  consecutiveProbeFailures: number
}

export interface ProxyPoolConfig {
  freshnessMs: number
  refreshIntervalMs: number
  unhealthyAfter: number
  probeUrl: string
  probeTimeoutMs: number
}

export const DEFAULT_PROXY_POOL_CONFIG: Omit<ProxyPoolConfig, 'probeUrl'> = {
  freshnessMs: 10 * 60 * 1000,
  refreshIntervalMs: 10 * 60 * 1000,
  unhealthyAfter: 2,
  probeTimeoutMs: 10000,
}

export interface ProxyPoolOptions {
  routes: Route[]
  transport: RouteTransport
  config: Partial<ProxyPoolConfig> & Pick<ProxyPoolConfig, 'probeUrl'>
  defaultRouteId?: string
  now?: () => number
  logger?: ILogger
}

export function successRatio(record: ProxyRecord): number {
  return record.attempts === 0 ? 1 : record.successes / record.attempts
}

export class ProxyPool {
  readonly defaultRouteId: string
  private readonly config: ProxyPoolConfig
  private readonly records = new Map<string, ProxyRecord>()
  private readonly transport: RouteTransport
  private readonly now: () => number
  private readonly logger?: ILogger

  private activeRouteId: string | null = null
  private needsReselect = true
  private excludedRouteId: string | null = null
  private lastHealthCheckAt: number | null = null
  private inFlightCheck: Promise<Map<string, boolean>> | null = null

  constructor(options: ProxyPoolOptions) {
    this.config = { ...DEFAULT_PROXY_POOL_CONFIG, ...options.config }
    this.transport = options.transport
    this.defaultRouteId = options.defaultRouteId ?? DIRECT_ROUTE_ID
    this.now = options.now ?? Date.now
    this.logger = options.logger

    this.addRoutes([{ id: this.defaultRouteId }, ...options.routes])
  }

  /**
   * Register routes discovered after construction (e.g. from a control plane).
   * Known ids are left untouched.
   */
  addRoutes(routes: Route[]): number {
    let added = 0
    for (const route of routes) {
      if (this.records.has(route.id)) continue
      this.records.set(route.id, {
        id: route.id,
        proxyUrl: route.proxyUrl,
        attempts: 0,
        successes: 0,
        rateLimited: 0,
        serverErrors: 0,
        clientErrors: 0,
        healthy: null,
        lastCheckedAt: null,
        consecutiveProbeFailures: 0,
      })
      added++
    }
    return added
  }

  route(id: string): Route {
    const record = this.records.get(id)
    if (!record) {
      throw new Error(`Unknown route: ${id}`)
    }
    return record.proxyUrl ? { id: record.id, proxyUrl: record.proxyUrl } : { id: record.id }
  }

  selectRoute(): string {
    const active = this.activeRouteId ? this.records.get(this.activeRouteId) : undefined
    if (
      active &&
      !this.needsReselect &&
      active.id !== this.defaultRouteId &&
      this.isEligible(active)
    ) {
      return active.id
    }

    let candidates = this.candidates().filter(record => this.isEligible(record))
    if (this.excludedRouteId && candidates.length > 1) {
      candidates = candidates.filter(record => record.id !== this.excludedRouteId)
    }

    const order = [...this.records.keys()]
    candidates.sort(
      (a, b) =>
        successRatio(b) - successRatio(a) ||
        a.attempts - b.attempts ||
        order.indexOf(a.id) - order.indexOf(b.id)
    )

    const selected = candidates[0]?.id ?? this.defaultRouteId
    if (selected !== this.activeRouteId) {
      this.logger?.info('Route selected', {
        routeId: selected,
        previousRouteId: this.activeRouteId,
        eligible: candidates.length,
      })
    }

    this.activeRouteId = selected
    this.needsReselect = false
    this.excludedRouteId = null
    return selected
  }

  report(routeId: string, outcome: RequestOutcome): void {
    const record = this.records.get(routeId)
    if (!record) return

    if (outcome === 'client_error') {
      record.clientErrors++
      return
    }

    record.attempts++
    if (outcome === 'ok') {
      record.successes++
      return
    }

    if (outcome === 'rate_limited') {
      record.rateLimited++
    } else {
      record.serverErrors++
    }

    if (routeId === this.activeRouteId) {
      this.needsReselect = true
      this.excludedRouteId = routeId
      this.logger?.debug('Active route penalised', { routeId, outcome, successRatio: successRatio(record) })
    }
  }

  /**
   * Probe every route concurrently. Only health flags and check times change.
   */
  async healthCheckAll(): Promise<Map<string, boolean>> {
    const records = [...this.records.values()]

    const results = await Promise.all(
      records.map(async record => {
        try {
          const passed = await this.transport.probe(this.route(record.id), this.config.probeUrl, this.config.probeTimeoutMs)
          return [record.id, passed] as const
        } catch (error) {
          this.logger?.debug('Probe threw', {
            routeId: record.id,
            error: error instanceof Error ? error.message : String(error),
          })
          return [record.id, false] as const
        }
      })
    )

    const checkedAt = this.now()
    for (const [id, passed] of results) {
      const record = this.records.get(id)
      if (record) this.applyProbe(record, passed, checkedAt)
    }
    this.lastHealthCheckAt = checkedAt

    const healthy = results.filter(([, passed]) => passed).length
    this.logger?.info('Health check complete', { routes: results.length, passing: healthy })

    return new Map(results)
  }

  /**
   * Re-probe when the last check is older than `refreshIntervalMs`.
   * Concurrent callers share one in-flight check. No-op without proxy routes.
   */
  async ensureFresh(): Promise<void> {
    if (this.candidates().length === 0) return

    if (this.lastHealthCheckAt !== null && this.now() - this.lastHealthCheckAt < this.config.refreshIntervalMs) {
      return
    }

    if (!this.inFlightCheck) {
      this.inFlightCheck = this.healthCheckAll().finally(() => {
        this.inFlightCheck = null
      })
    }
    await this.inFlightCheck
  }

  stats(): ProxyRecord[] {
    return [...this.records.values()].map(record => ({ ...record }))
  }

  get activeRoute(): string | null {
    return this.activeRouteId
  }

  private applyProbe(record: ProxyRecord, passed: boolean, checkedAt: number): void {
    record.lastCheckedAt = checkedAt

    if (passed) {
      if (record.healthy === false) {
        this.logger?.info('Route healthy again', { routeId: record.id })
      }
      record.consecutiveProbeFailures = 0
      record.healthy = true
      return
    }

    record.consecutiveProbeFailures++
    if (record.consecutiveProbeFailures >= this.config.unhealthyAfter && record.healthy !== false) {
      record.healthy = false
      this.logger?.warn('Route flagged unhealthy', {
        routeId: record.id,
        consecutiveProbeFailures: record.consecutiveProbeFailures,
      })
      if (record.id === this.activeRouteId) {
        this.needsReselect = true
      }
    }
  }

  private candidates(): ProxyRecord[] {
    return [...this.records.values()].filter(record => record.id !== this.defaultRouteId)
  }

  private isEligible(record: ProxyRecord): boolean {
    return (
      record.healthy === true &&
      record.lastCheckedAt !== null &&
      this.now() - record.lastCheckedAt <= this.config.freshnessMs
    )
  }
}
