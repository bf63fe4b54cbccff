import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const fsync = vi.hoisted(() => {
  const paths: string[] = []
  return { paths }
})

vi.mock('node:fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs/promises')>()
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args)
      const sync = handle.sync.bind(handle)
      handle.sync = async () => {
        fsync.paths.push(String(args[0]))
        await sync()
      }
      return handle
    },
  }
})

import { FileCheckpointBackend, RedisCheckpointBackend } from '../backends.js'
import type { CheckpointDocument } from '../types.js'

const DOCUMENT: CheckpointDocument = {
  version: 1,
  startedAt: '2026-10-18T08:00:00.000Z',
  updatedAt: '2026-10-18T08:05:00.000Z',
  runs: 2,
  nodes: {
    '3': { kind: 'category', parentId: null, state: 'pending', attempts: 1, throttles: 0, records: 0, updatedAt: '2026-10-18T08:05:00.000Z' },
    '3:10': {
      kind: 'group',
      parentId: '3',
      state: 'failed',
      attempts: 1,
      throttles: 0,
      records: 0,
      error: 'HTTP 404',
      updatedAt: '2026-10-18T08:04:00.000Z',
    },
  },
}

describe('FileCheckpointBackend', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoint-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads null when no checkpoint exists', async () => {
    const backend = new FileCheckpointBackend(join(dir, 'catalog.json'))
    await expect(backend.read()).resolves.toBeNull()
  })

  it('writes through a temp file and reads the document back', async () => {
    const backend = new FileCheckpointBackend(join(dir, 'nested', 'catalog.json'))

    await backend.write(DOCUMENT)

    await expect(backend.read()).resolves.toEqual(DOCUMENT)
    expect(await readdir(join(dir, 'nested'))).toEqual(['catalog.json'])
    expect(backend.describe()).toBe(`file:${join(dir, 'nested', 'catalog.json')}`)
  })

  it('writes compact JSON and fsyncs the file and then its directory', async () => {
    const path = join(dir, 'catalog.json')
    const backend = new FileCheckpointBackend(path)
    fsync.paths.length = 0

    await backend.write(DOCUMENT)

    expect(await readFile(path, 'utf8')).toBe(JSON.stringify(DOCUMENT))
    expect(fsync.paths).toEqual([`${path}.${process.pid}.tmp`, dir])
  })

  it('replaces the previous document', async () => {
    const path = join(dir, 'catalog.json')
    const backend = new FileCheckpointBackend(path)
    await backend.write(DOCUMENT)

    await backend.write({ ...DOCUMENT, runs: 3 })

    expect(JSON.parse(await readFile(path, 'utf8')).runs).toBe(3)
  })

  it('rejects a corrupt checkpoint', async () => {
    const path = join(dir, 'catalog.json')
    await writeFile(path, '{"version":1,', 'utf8')

    await expect(new FileCheckpointBackend(path).read()).rejects.toThrow(`Checkpoint at ${path} is not valid JSON`)
  })

  it('rejects a checkpoint of another shape', async () => {
    const path = join(dir, 'catalog.json')
    await writeFile(path, JSON.stringify({ ...DOCUMENT, version: 2 }), 'utf8')

    await expect(new FileCheckpointBackend(path).read()).rejects.toThrow(
      `Checkpoint at ${path} has an unexpected shape: version`
    )
  })
})

describe('RedisCheckpointBackend', () => {
  it('stores the document as one string value', async () => {
    const client = {
      get: vi.fn().mockResolvedValue(null),
      set: vi.fn().mockResolvedValue('OK'),
    }
    const backend = new RedisCheckpointBackend(client, 'test:checkpoint')

    await expect(backend.read()).resolves.toBeNull()
    await backend.write(DOCUMENT)

    expect(client.set).toHaveBeenCalledWith('test:checkpoint', JSON.stringify(DOCUMENT))
    expect(backend.describe()).toBe('redis:test:checkpoint')
  })

  it('parses a stored document', async () => {
    const client = {
      get: vi.fn().mockResolvedValue(JSON.stringify(DOCUMENT)),
      set: vi.fn(),
    }
    const backend = new RedisCheckpointBackend(client, 'test:checkpoint')

    await expect(backend.read()).resolves.toEqual(DOCUMENT)
    expect(client.get).toHaveBeenCalledWith('test:checkpoint')
  })

  it('surfaces write failures', async () => {
    const client = {
      get: vi.fn(),
      set: vi.fn().mockRejectedValue(new Error('READONLY You can\'t write against a read only replica.')),
    }
    const backend = new RedisCheckpointBackend(client, 'test:checkpoint')

    await expect(backend.write(DOCUMENT)).rejects.toThrow('READONLY')
  })
})
