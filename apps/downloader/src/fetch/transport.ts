/**
 * Route Transport (undici)
 *
 * Issues GET requests either directly or through a per-route HTTP proxy.
 * One dispatcher per proxy URL is created lazily and reused for the run.
 *
 * Timeouts use an AbortController per attempt. An operator abort (the
 * caller's signal) surfaces as CancelledError; our own timeout surfaces
 * as TransportTimeoutError so the fetcher can retry it.
 */

import { Agent, ProxyAgent, request } from 'undici'
import type { Dispatcher } from 'undici'
import { CancelledError, TransportTimeoutError } from '../errors.js'
import type { Route, RouteTransport, TransportRequestOptions, TransportResponse } from './types.js'

export interface UndiciRouteTransportOptions {
  /** Headers sent with every request unless overridden per call */
  defaultHeaders?: Record<string, string>
}

export class UndiciRouteTransport implements RouteTransport {
  private readonly dispatchers = new Map<string, Dispatcher>()
  private readonly defaultHeaders: Record<string, string>

  constructor(options: UndiciRouteTransportOptions = {}) {
    this.defaultHeaders = options.defaultHeaders ?? {}
  }

  async request(route: Route, url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    const startTime = Date.now()

    return this.withTimeout(url, options.timeoutMs, options.signal, async signal => {
      const response = await request(url, {
        method: 'GET',
        headers: { ...this.defaultHeaders, ...(options.headers ?? {}) },
        dispatcher: this.dispatcherFor(route),
        signal,
      })
      const body = await response.body.text()

      return {
        statusCode: response.statusCode,
        body,
        durationMs: Date.now() - startTime,
      }
    })
  }

  async probe(route: Route, url: string, timeoutMs: number): Promise<boolean> {
    try {
      return await this.withTimeout(url, timeoutMs, undefined, async signal => {
        const response = await request(url, {
          method: 'GET',
          headers: this.defaultHeaders,
          dispatcher: this.dispatcherFor(route),
          signal,
        })
        await response.body.dump()
        return response.statusCode >= 200 && response.statusCode < 300
      })
    } catch {
      // Any transport failure is a failed probe
      return false
    }
  }

  async close(): Promise<void> {
    const dispatchers = [...this.dispatchers.values()]
    this.dispatchers.clear()
    await Promise.all(dispatchers.map(dispatcher => dispatcher.close()))
  }

  private dispatcherFor(route: Route): Dispatcher {
    const key = route.proxyUrl ?? 'direct'
    let dispatcher = this.dispatchers.get(key)
    if (!dispatcher) {
      dispatcher = route.proxyUrl ? new ProxyAgent(route.proxyUrl) : new Agent()
      this.dispatchers.set(key, dispatcher)
    }
    return dispatcher
  }

  private async withTimeout<T>(
    url: string,
    timeoutMs: number,
    outerSignal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    if (outerSignal?.aborted) {
      throw new CancelledError()
    }

    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = () => controller.abort()
    outerSignal?.addEventListener('abort', onAbort, { once: true })

    try {
      return await fn(controller.signal)
    } catch (error) {
      if (outerSignal?.aborted) {
        throw new CancelledError()
      }
      if (timedOut) {
        throw new TransportTimeoutError(url, timeoutMs)
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
      outerSignal?.removeEventListener('abort', onAbort)
    }
  }
}
