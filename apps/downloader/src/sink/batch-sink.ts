/**
 * Batch Sink
 *
 * Buffers flat records and hands them to the warehouse loader in bounded
 * batches. A push that brings the buffer to a bound flushes before it
 * resolves, so a slow warehouse slows the producers down.
 *
 * A batch the loader keeps rejecting is retried with exponential backoff,
 * then written to an NDJSON backup file and reported as SinkFlushError.
 */

import pLimit from 'p-limit'
import type { ILogger } from '@cardledger/logger'
import type { FlatRecord, WarehouseLoader } from '@cardledger/warehouse'
import { SinkFlushError } from '../errors.js'
import { sleep as defaultSleep } from '../utils/sleep.js'
import type { Sleep } from '../utils/sleep.js'
import { writeNdjsonBackup } from './ndjson.js'

export interface BatchSinkOptions {
  loader: WarehouseLoader
  maxBatchSize: number
  /** Optional byte bound (JSON size estimate) per batch */
  maxBatchBytes?: number
  maxFlushAttempts?: number
  retryDelayMs?: number
  backoffFactor?: number
  backupDir: string
  sleep?: Sleep
  now?: () => Date
  /** Replaces the NDJSON backup writer (tests) */
  writeBackup?: (records: readonly FlatRecord[]) => Promise<string>
  logger?: ILogger
}

export interface BatchSinkStats {
  buffered: number
  bufferedBytes: number
  pushed: number
  flushedRecords: number
  insertedRecords: number
  batches: number
  failedBatches: number
  backups: string[]
}

export function estimateBytes(record: FlatRecord): number {
  return Buffer.byteLength(JSON.stringify(record), 'utf8')
}

export class BatchSink {
  private buffer: Array<{ record: FlatRecord; bytes: number }> = []
  private bufferedBytes = 0
  private readonly queue = pLimit(1)
  private readonly counters = {
    pushed: 0,
    flushedRecords: 0,
    insertedRecords: 0,
    batches: 0,
    failedBatches: 0,
  }
  private readonly backups: string[] = []

  private readonly maxFlushAttempts: number
  private readonly retryDelayMs: number
  private readonly backoffFactor: number
  private readonly sleep: Sleep
  private readonly now: () => Date

  constructor(private readonly options: BatchSinkOptions) {
    if (options.maxBatchSize < 1) {
      throw new Error('maxBatchSize must be at least 1')
    }
    this.maxFlushAttempts = options.maxFlushAttempts ?? 3
    this.retryDelayMs = options.retryDelayMs ?? 1000
    this.backoffFactor = options.backoffFactor ?? 2
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Buffer records; sends one bounded batch at a time while the buffer is at a bound.
   */
  push(records: readonly FlatRecord[]): Promise<void> {
    return this.queue(async () => {
      for (const record of records) {
        const bytes = estimateBytes(record)
        this.buffer.push({ record, bytes })
        this.bufferedBytes += bytes
      }
      this.counters.pushed += records.length

      while (this.atBound()) {
        await this.send(this.takeBatch())
      }
    })
  }

  /** Send everything buffered, in bounded batches */
  flush(): Promise<void> {
    return this.queue(() => this.sendAll())
  }

  /**
   * Final flush at the end of a run. If a batch cannot be loaded, everything
   * still buffered is written to backup files before the error is raised.
   */
  drainOnShutdown(): Promise<void> {
    return this.queue(async () => {
      if (this.buffer.length > 0) {
        this.options.logger?.info('Draining sink', { records: this.buffer.length })
      }

      try {
        await this.sendAll()
      } catch (error) {
        const rest = this.buffer.map(entry => entry.record)
        this.buffer = []
        this.bufferedBytes = 0
        if (rest.length > 0) {
          try {
            await this.backup(rest)
          } catch (backupError) {
            this.options.logger?.error('Backup write failed, records lost', { records: rest.length }, backupError)
          }
        }
        throw error
      }
    })
  }

  stats(): BatchSinkStats {
    return {
      buffered: this.buffer.length,
      bufferedBytes: this.bufferedBytes,
      ...this.counters,
      backups: [...this.backups],
    }
  }

  private async sendAll(): Promise<void> {
    while (this.buffer.length > 0) {
      await this.send(this.takeBatch())
    }
  }

  private atBound(): boolean {
    if (this.buffer.length >= this.options.maxBatchSize) return true
    const { maxBatchBytes } = this.options
    return maxBatchBytes !== undefined && this.buffer.length > 0 && this.bufferedBytes >= maxBatchBytes
  }

  /** Head of the buffer within both bounds; always at least one record */
  private takeBatch(): FlatRecord[] {
    const { maxBatchSize, maxBatchBytes } = this.options
    let count = 0
    let bytes = 0

    while (count < this.buffer.length && count < maxBatchSize) {
      const next = this.buffer[count].bytes
      if (maxBatchBytes !== undefined && count > 0 && bytes + next > maxBatchBytes) break
      bytes += next
      count++
    }

    const taken = this.buffer.splice(0, count)
    this.bufferedBytes -= bytes
    return taken.map(entry => entry.record)
  }

  private async send(batch: FlatRecord[]): Promise<void> {
    let lastError: unknown

    for (let attempt = 1; attempt <= this.maxFlushAttempts; attempt++) {
      try {
        const inserted = await this.options.loader.load(batch)
        this.counters.batches++
        this.counters.flushedRecords += batch.length
        this.counters.insertedRecords += inserted
        this.options.logger?.debug('Batch flushed', { records: batch.length, inserted, attempt })
        return
      } catch (error) {
        lastError = error
        this.options.logger?.warn('Batch flush failed', { records: batch.length, attempt }, error)

        if (attempt < this.maxFlushAttempts) {
          await this.sleep(this.retryDelayMs * Math.pow(this.backoffFactor, attempt - 1))
        }
      }
    }

    this.counters.failedBatches++
    let backupPath: string | null = null
    try {
      backupPath = await this.backup(batch)
    } catch (backupError) {
      this.options.logger?.error('Backup write failed, batch lost', { records: batch.length }, backupError)
    }

    throw new SinkFlushError(batch.length, this.maxFlushAttempts, backupPath, lastError)
  }

  private async backup(records: readonly FlatRecord[]): Promise<string> {
    const path = this.options.writeBackup
      ? await this.options.writeBackup(records)
      : await writeNdjsonBackup(this.options.backupDir, records, this.now())
    this.backups.push(path)
    this.options.logger?.warn('Batch written to backup', { records: records.length, path })
    return path
  }
}
