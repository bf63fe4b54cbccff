import { appendFile, mkdir, writeFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import type { FlatRecord, WarehouseLoader } from '@cardledger/warehouse'

export function toNdjson(records: readonly FlatRecord[]): string {
  return records.map(record => JSON.stringify(record)).join('\n') + '\n'
}

/**
 * Write records to a new file under `dir`. Resolves with the file path.
 */
export async function writeNdjsonBackup(dir: string, records: readonly FlatRecord[], now: Date): Promise<string> {
  const directory = resolve(dir)
  await mkdir(directory, { recursive: true })

  const stamp = now.toISOString().replace(/[:.]/g, '-')
  const suffix = Math.random().toString(36).slice(2, 8)
  const path = join(directory, `failed-batch-${stamp}-${suffix}.ndjson`)
  await writeFile(path, toNdjson(records), 'utf8')
  return path
}

/**
 * Loader that appends batches to a local NDJSON file (`--dry-run`).
 */
export class NdjsonFileLoader implements WarehouseLoader {
  readonly path: string

  constructor(path: string) {
    this.path = resolve(path)
  }

  async load(records: readonly FlatRecord[]): Promise<number> {
    if (records.length === 0) return 0
    await mkdir(dirname(this.path), { recursive: true })
    await appendFile(this.path, toNdjson(records), 'utf8')
    return records.length
  }
}
