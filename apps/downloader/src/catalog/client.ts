/**
 * Catalog API client
 *
 *   GET {base}/categories
 *   GET {base}/{categoryId}/groups
 *   GET {base}/{categoryId}/{groupId}/products   (or /prices)
 *
 * Every response is classified into a RequestOutcome. Only `ok` carries
 * results. Transport failures are not caught here: they propagate to the
 * fetcher, which decides how to retry them.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { safeJsonParse } from '../utils/json.js'
import type { RequestOutcome, Route, RouteTransport } from '../fetch/types.js'
import { CategorySchema, EnvelopeSchema, GroupSchema, ItemSchema } from './types.js'
import type { CatalogCategory, CatalogGroup, CatalogItem } from './types.js'

export type ItemEndpoint = 'products' | 'prices'

export interface CatalogClientOptions {
  baseUrl: string
  transport: RouteTransport
  itemEndpoint?: ItemEndpoint
  userAgent: string
  timeoutMs: number
}

export type CatalogResponse<T> =
  | { outcome: 'ok'; statusCode: number; results: T[]; durationMs: number }
  | {
      outcome: Exclude<RequestOutcome, 'ok'>
      statusCode: number
      error: string
      durationMs: number
    }

export type Classification<T> =
  | { outcome: 'ok'; results: T[] }
  | { outcome: Exclude<RequestOutcome, 'ok'>; error: string }

/**
 * Map a status code and body to an outcome.
 * 403 and 429 are throttling, 5xx is a server problem, everything else
 * outside 2xx, or a 2xx we cannot parse, is a client error.
 */
export function classifyResponse<T>(
  statusCode: number,
  body: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Classification<T> {
  if (statusCode === 403 || statusCode === 429) {
    return { outcome: 'rate_limited', error: `HTTP ${statusCode}` }
  }
  if (statusCode >= 500) {
    return { outcome: 'server_error', error: `HTTP ${statusCode}` }
  }
  if (statusCode < 200 || statusCode >= 300) {
    return { outcome: 'client_error', error: `HTTP ${statusCode}` }
  }

  const parsed = safeJsonParse(body)
  if (!parsed.ok) {
    return { outcome: 'client_error', error: `Malformed payload: ${parsed.error}` }
  }

  const envelope = EnvelopeSchema.safeParse(parsed.value)
  if (!envelope.success) {
    return { outcome: 'client_error', error: 'Malformed payload: missing results array' }
  }
  if (envelope.data.success === false) {
    const errors = (envelope.data.errors ?? []).map(String).join('; ')
    return { outcome: 'client_error', error: `Upstream reported failure${errors ? `: ${errors}` : ''}` }
  }

  const results: T[] = []
  for (const [index, raw] of envelope.data.results.entries()) {
    const item = schema.safeParse(raw)
    if (!item.success) {
      const issue = item.error.issues[0]
      return {
        outcome: 'client_error',
        error: `Malformed payload: results[${index}]${issue ? ` ${issue.path.join('.')} ${issue.message}` : ''}`,
      }
    }
    results.push(item.data)
  }

  return { outcome: 'ok', results }
}

export class CatalogClient {
  readonly baseUrl: string
  readonly itemEndpoint: ItemEndpoint
  private readonly transport: RouteTransport
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number

  constructor(options: CatalogClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.itemEndpoint = options.itemEndpoint ?? 'products'
    this.transport = options.transport
    this.timeoutMs = options.timeoutMs
    this.headers = {
      'User-Agent': options.userAgent,
      Accept: 'application/json',
    }
  }

  categoriesUrl(): string {
    return `${this.baseUrl}/categories`
  }

  groupsUrl(categoryId: string): string {
    return `${this.baseUrl}/${encodeURIComponent(categoryId)}/groups`
  }

  itemsUrl(categoryId: string, groupId: string): string {
    return `${this.baseUrl}/${encodeURIComponent(categoryId)}/${encodeURIComponent(groupId)}/${this.itemEndpoint}`
  }

  fetchCategories(route: Route, signal?: AbortSignal): Promise<CatalogResponse<CatalogCategory>> {
    return this.get(this.categoriesUrl(), CategorySchema, route, signal)
  }

  fetchGroups(categoryId: string, route: Route, signal?: AbortSignal): Promise<CatalogResponse<CatalogGroup>> {
    return this.get(this.groupsUrl(categoryId), GroupSchema, route, signal)
  }

  fetchItems(
    categoryId: string,
    groupId: string,
    route: Route,
    signal?: AbortSignal
  ): Promise<CatalogResponse<CatalogItem>> {
    return this.get(this.itemsUrl(categoryId, groupId), ItemSchema, route, signal)
  }

  private async get<T>(
    url: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    route: Route,
    signal?: AbortSignal
  ): Promise<CatalogResponse<T>> {
    const response = await this.transport.request(route, url, {
      timeoutMs: this.timeoutMs,
      headers: this.headers,
      signal,
    })

    const classified = classifyResponse(response.statusCode, response.body, schema)
    if (classified.outcome === 'ok') {
      return {
        outcome: 'ok',
        statusCode: response.statusCode,
        results: classified.results,
        durationMs: response.durationMs,
      }
    }

    return {
      outcome: classified.outcome,
      statusCode: response.statusCode,
      error: classified.error,
      durationMs: response.durationMs,
    }
  }
}
