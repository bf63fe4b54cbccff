/**
 * Checkpoint backends
 *
 * File: the document is written compact to a sibling temp file, fsynced,
 * then renamed over the committed file, and the directory is fsynced so the
 * rename is durable. A crash mid-write leaves the previous checkpoint intact.
 *
 * Redis: the whole document is one string value written with a single SET.
 */

import { mkdir, open, readFile, rename } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { safeJsonParse } from '../utils/json.js'
import { CheckpointDocumentSchema } from './types.js'
import type { CheckpointBackend, CheckpointDocument } from './types.js'

function parseDocument(raw: string, source: string): CheckpointDocument {
  const json = safeJsonParse(raw)
  if (!json.ok) {
    throw new Error(`Checkpoint at ${source} is not valid JSON: ${json.error}`)
  }
  const parsed = CheckpointDocumentSchema.safeParse(json.value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(
      `Checkpoint at ${source} has an unexpected shape${issue ? `: ${issue.path.join('.')} ${issue.message}` : ''}`
    )
  }
  return parsed.data
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class FileCheckpointBackend implements CheckpointBackend {
  readonly path: string

  constructor(path: string) {
    this.path = resolve(path)
  }

  async read(): Promise<CheckpointDocument | null> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }
    return parseDocument(raw, this.path)
  }

  async write(document: CheckpointDocument): Promise<void> {
    const directory = dirname(this.path)
    await mkdir(directory, { recursive: true })

    const tempPath = `${this.path}.${process.pid}.tmp`
    const handle = await open(tempPath, 'w')
    try {
      // Rewritten on every transition; no indentation
      await handle.writeFile(JSON.stringify(document), 'utf8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await rename(tempPath, this.path)

    const dirHandle = await open(directory, 'r')
    try {
      await dirHandle.sync()
    } finally {
      await dirHandle.close()
    }
  }

  describe(): string {
    return `file:${this.path}`
  }
}

/** The subset of an ioredis client the backend uses */
export interface RedisStringClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
}

export class RedisCheckpointBackend implements CheckpointBackend {
  constructor(
    private readonly client: RedisStringClient,
    private readonly key: string
  ) {}

  async read(): Promise<CheckpointDocument | null> {
    const raw = await this.client.get(this.key)
    return raw === null ? null : parseDocument(raw, this.describe())
  }

  async write(document: CheckpointDocument): Promise<void> {
    await this.client.set(this.key, JSON.stringify(document))
  }

  describe(): string {
    return `redis:${this.key}`
  }
}
