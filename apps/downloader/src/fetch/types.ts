/**
 * Fetch layer types
 *
 * Shared by the governor, the proxy pool and the transports.
 */

/** Id of the always-present default route (no proxy) */
export const DIRECT_ROUTE_ID = 'direct'

/** Classified result of one upstream request */
export type RequestOutcome = 'ok' | 'rate_limited' | 'server_error' | 'client_error'

/**
 * An egress path for requests.
 * `proxyUrl` is absent for the direct route and for control-plane routes,
 * which all share the gateway.
 */
export interface Route {
  id: string
  proxyUrl?: string
}

export interface TransportRequestOptions {
  timeoutMs: number
  headers?: Record<string, string>
  signal?: AbortSignal
}

export interface TransportResponse {
  statusCode: number
  body: string
  durationMs: number
}

/**
 * Issues requests through a route.
 * `request` throws for transport failures (timeout, reset, refused);
 * any HTTP status, including 4xx/5xx, resolves.
 */
export interface RouteTransport {
  request(route: Route, url: string, options: TransportRequestOptions): Promise<TransportResponse>
  /** true when a GET through the route answers 2xx within the timeout */
  probe(route: Route, url: string, timeoutMs: number): Promise<boolean>
  close(): Promise<void>
}
