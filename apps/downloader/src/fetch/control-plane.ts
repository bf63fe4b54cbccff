/**
 * Proxy Control Plane
 *
 * Client for a Mihomo/Clash-compatible controller API, and a transport
 * that routes every request through the controller's gateway port after
 * switching its selector group to the requested route.
 *
 *   GET  /proxies           list nodes (built-ins and group types skipped)
 *   GET  /proxies/{group}   current selection (`now`)
 *   PUT  /proxies/{group}   select a node: { name }
 */

import pLimit from 'p-limit'
import { z } from 'zod'
import type { ILogger } from '@cardledger/logger'
import { ControlPlaneError } from '../errors.js'
import { DIRECT_ROUTE_ID } from './types.js'
import type { Route, RouteTransport, TransportRequestOptions, TransportResponse } from './types.js'

/** Built-in pseudo proxies that are never routes */
const BUILT_IN_NAMES = new Set(['DIRECT', 'REJECT', 'GLOBAL', 'COMPATIBLE', 'PASS', 'REJECT-DROP'])

/** Proxy types that are groups of other proxies rather than egress nodes */
const GROUP_TYPES = new Set(['Selector', 'URLTest', 'Fallback', 'LoadBalance', 'Relay', 'Direct', 'Reject', 'Compatible', 'Pass'])

const ProxyEntrySchema = z
  .object({
    type: z.string().optional(),
    name: z.string().optional(),
    now: z.string().optional(),
    all: z.array(z.string()).optional(),
  })
  .passthrough()

const ProxyListSchema = z.object({
  proxies: z.record(ProxyEntrySchema),
})

export interface ControlPlaneClientOptions {
  /** Controller base URL, e.g. http://127.0.0.1:9090 */
  url: string
  secret?: string
  timeoutMs?: number
}

export class ControlPlaneClient {
  private readonly baseUrl: string
  private readonly secret?: string
  private readonly timeoutMs: number

  constructor(options: ControlPlaneClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '')
    this.secret = options.secret
    this.timeoutMs = options.timeoutMs ?? 10000
  }

  /** Egress nodes known to the controller, in controller order */
  async listRoutes(): Promise<Route[]> {
    const payload = ProxyListSchema.safeParse(await this.call('GET', '/proxies'))
    if (!payload.success) {
      throw new ControlPlaneError('Unexpected /proxies payload')
    }

    return Object.entries(payload.data.proxies)
      .filter(([name, entry]) => !BUILT_IN_NAMES.has(name) && !(entry.type && GROUP_TYPES.has(entry.type)))
      .map(([name]) => ({ id: name }))
  }

  async currentRoute(group: string): Promise<string | null> {
    const payload = ProxyEntrySchema.safeParse(await this.call('GET', `/proxies/${encodeURIComponent(group)}`))
    return payload.success ? (payload.data.now ?? null) : null
  }

  async selectRoute(group: string, name: string): Promise<void> {
    await this.call('PUT', `/proxies/${encodeURIComponent(group)}`, { name })
  }

  private async call(method: 'GET' | 'PUT', path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.secret) {
      headers.Authorization = `Bearer ${this.secret}`
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })

      if (!response.ok) {
        throw new ControlPlaneError(`${method} ${path} failed: HTTP ${response.status}`, response.status)
      }

      // PUT answers 204 No Content
      const text = await response.text()
      return text ? JSON.parse(text) : null
    } catch (error) {
      if (error instanceof ControlPlaneError) throw error
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ControlPlaneError(`${method} ${path} timed out after ${this.timeoutMs}ms`)
      }
      throw new ControlPlaneError(
        `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`
      )
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

export interface ControlPlaneTransportOptions {
  client: ControlPlaneClient
  /** Selector group switched before each request */
  group: string
  /** Mixed/HTTP port of the controller's proxy */
  gatewayUrl: string
  /** Transport that actually sends requests (through the gateway) */
  inner: RouteTransport
  logger?: ILogger
}

/**
 * All proxied traffic shares one gateway, so switch + request runs one at a
 * time: concurrent workers never see a selection they did not ask for.
 * The default route bypasses the gateway.
 */
export class ControlPlaneTransport implements RouteTransport {
  private readonly lock = pLimit(1)
  private readonly gateway: Route
  private selected: string | null = null

  constructor(private readonly options: ControlPlaneTransportOptions) {
    this.gateway = { id: 'gateway', proxyUrl: options.gatewayUrl }
  }

  request(route: Route, url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    if (route.id === DIRECT_ROUTE_ID) {
      return this.options.inner.request(route, url, options)
    }

    return this.lock(async () => {
      await this.switchTo(route.id)
      return this.options.inner.request(this.gateway, url, options)
    })
  }

  probe(route: Route, url: string, timeoutMs: number): Promise<boolean> {
    if (route.id === DIRECT_ROUTE_ID) {
      return this.options.inner.probe(route, url, timeoutMs)
    }

    return this.lock(async () => {
      try {
        await this.switchTo(route.id)
      } catch (error) {
        this.options.logger?.warn('Could not select route for probe', { routeId: route.id }, error)
        return false
      }
      return this.options.inner.probe(this.gateway, url, timeoutMs)
    })
  }

  close(): Promise<void> {
    return this.options.inner.close()
  }

  private async switchTo(routeId: string): Promise<void> {
    if (this.selected === routeId) return

    await this.options.client.selectRoute(this.options.group, routeId)
    this.options.logger?.info('Control plane switched', {
      group: this.options.group,
      routeId,
      previousRouteId: this.selected,
    })
    this.selected = routeId
  }
}
