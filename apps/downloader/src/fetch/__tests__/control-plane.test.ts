import { afterEach, describe, expect, it, vi } from 'vitest'
import { ControlPlaneError } from '../../errors.js'
import { ControlPlaneClient, ControlPlaneTransport } from '../control-plane.js'
import type { Route, RouteTransport } from '../types.js'

const PROXIES = {
  proxies: {
    DIRECT: { type: 'Direct', name: 'DIRECT' },
    REJECT: { type: 'Reject', name: 'REJECT' },
    GLOBAL: { type: 'Selector', name: 'GLOBAL', now: 'manual-select', all: ['manual-select'] },
    'manual-select': { type: 'Selector', name: 'manual-select', now: 'hk-01', all: ['hk-01', 'jp-02'] },
    'auto-test': { type: 'URLTest', name: 'auto-test', now: 'jp-02' },
    'hk-01': { type: 'Shadowsocks', name: 'hk-01' },
    'jp-02': { type: 'Vmess', name: 'jp-02' },
  },
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('ControlPlaneClient', () => {
  const originalFetch = globalThis.fetch

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('lists egress nodes and skips built-ins and groups', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(jsonResponse(PROXIES))
    globalThis.fetch = fetchSpy
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090/', secret: 'test-secret' })

    const routes = await client.listRoutes()

    expect(routes).toEqual([{ id: 'hk-01' }, { id: 'jp-02' }])
    const [url, init] = fetchSpy.mock.calls[0]
    expect(url).toBe('http://127.0.0.1:9090/proxies')
    expect(init.headers.Authorization).toBe('Bearer test-secret')
  })

  it('reads the current selection of a group', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse(PROXIES.proxies['manual-select']))
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090' })

    await expect(client.currentRoute('manual-select')).resolves.toBe('hk-01')
  })

  it('selects a node with a PUT and accepts an empty 204', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response(null, { status: 204 }))
    globalThis.fetch = fetchSpy
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090' })

    await client.selectRoute('manual-select', 'jp-02')

    const [url, init] = fetchSpy.mock.calls[0]
    expect(url).toBe('http://127.0.0.1:9090/proxies/manual-select')
    expect(init.method).toBe('PUT')
    expect(init.body).toBe('{"name":"jp-02"}')
    expect(init.headers.Authorization).toBeUndefined()
  })

  it('raises ControlPlaneError with the status on a non-2xx answer', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({ message: 'Unauthorized' }, 401))
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090', secret: 'wrong-secret' })

    const error = await client.listRoutes().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ControlPlaneError)
    expect(error).toMatchObject({ statusCode: 401, message: 'GET /proxies failed: HTTP 401' })
  })

  it('wraps connection failures', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'))
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090' })

    await expect(client.listRoutes()).rejects.toThrow('GET /proxies failed: fetch failed')
  })

  it('rejects a payload without a proxies map', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({ nodes: [] }))
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090' })

    await expect(client.listRoutes()).rejects.toThrow('Unexpected /proxies payload')
  })
})

describe('ControlPlaneTransport', () => {
  function createTransport() {
    const client = new ControlPlaneClient({ url: 'http://127.0.0.1:9090' })
    const selectRoute = vi.spyOn(client, 'selectRoute').mockResolvedValue(undefined)
    const seen: Array<{ route: Route; url: string }> = []
    const inner: RouteTransport = {
      request: vi.fn(async (route: Route, url: string) => {
        seen.push({ route, url })
        return { statusCode: 200, body: '{}', durationMs: 1 }
      }),
      probe: vi.fn(async () => true),
      close: vi.fn(async () => undefined),
    }
    const transport = new ControlPlaneTransport({
      client,
      group: 'manual-select',
      gatewayUrl: 'http://127.0.0.1:7890',
      inner,
    })
    return { transport, selectRoute, inner, seen }
  }

  it('switches the group once per route change and sends through the gateway', async () => {
    const { transport, selectRoute, seen } = createTransport()

    await transport.request({ id: 'hk-01' }, 'https://catalog.test/a', { timeoutMs: 1000 })
    await transport.request({ id: 'hk-01' }, 'https://catalog.test/b', { timeoutMs: 1000 })
    await transport.request({ id: 'jp-02' }, 'https://catalog.test/c', { timeoutMs: 1000 })

    expect(selectRoute.mock.calls).toEqual([
      ['manual-select', 'hk-01'],
      ['manual-select', 'jp-02'],
    ])
    expect(seen.map(entry => entry.route)).toEqual([
      { id: 'gateway', proxyUrl: 'http://127.0.0.1:7890' },
      { id: 'gateway', proxyUrl: 'http://127.0.0.1:7890' },
      { id: 'gateway', proxyUrl: 'http://127.0.0.1:7890' },
    ])
  })

  it('sends the direct route straight through without switching', async () => {
    const { transport, selectRoute, seen } = createTransport()

    await transport.request({ id: 'direct' }, 'https://catalog.test/a', { timeoutMs: 1000 })

    expect(selectRoute).not.toHaveBeenCalled()
    expect(seen[0].route).toEqual({ id: 'direct' })
  })

  it('fails the probe when the route cannot be selected', async () => {
    const { transport, selectRoute, inner } = createTransport()
    selectRoute.mockRejectedValueOnce(new ControlPlaneError('PUT /proxies/manual-select failed: HTTP 404', 404))

    await expect(transport.probe({ id: 'gone' }, 'https://catalog.test/categories', 1000)).resolves.toBe(false)
    expect(inner.probe).not.toHaveBeenCalled()

    await expect(transport.probe({ id: 'hk-01' }, 'https://catalog.test/categories', 1000)).resolves.toBe(true)
  })
})
