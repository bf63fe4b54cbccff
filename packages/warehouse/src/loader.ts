/**
 * Append-only bulk loader for flat catalog records.
 *
 * One row per record. The full record is kept as JSONB next to a few
 * extracted key columns; `record_key` is unique so a re-delivered batch
 * (the downloader is at-least-once) does not add rows twice.
 */

import type { ILogger } from '@cardledger/logger'

export type FlatValue = string | number | null
export type FlatRecord = Record<string, FlatValue>

/** Anything that can run a parameterized query (pg.Pool, pg.Client, fakes) */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>
}

export interface WarehouseLoader {
  /** Load a batch; resolves with the number of rows actually inserted */
  load(records: readonly FlatRecord[]): Promise<number>
}

export interface PgWarehouseLoaderOptions {
  /** Target table, optionally schema-qualified (default: catalog_records) */
  table?: string
  logger?: ILogger
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/i

export const DEFAULT_TABLE = 'catalog_records'

/**
 * Validate a (schema-qualified) table name before interpolating it into SQL.
 */
export function assertTableName(table: string): string {
  if (!IDENTIFIER.test(table)) {
    throw new Error(`Invalid warehouse table name: ${table}`)
  }
  return table
}

export class PgWarehouseLoader implements WarehouseLoader {
  private readonly table: string
  private readonly logger?: ILogger

  constructor(
    private readonly db: Queryable,
    options: PgWarehouseLoaderOptions = {}
  ) {
    this.table = assertTableName(options.table ?? DEFAULT_TABLE)
    this.logger = options.logger
  }

  async ensureTable(): Promise<void> {
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        record_key TEXT PRIMARY KEY,
        category_id TEXT,
        group_id TEXT,
        product_id TEXT,
        update_date DATE NOT NULL,
        record JSONB NOT NULL,
        loaded_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`
    )
    this.logger?.info('Warehouse table ready', { table: this.table })
  }

  async load(records: readonly FlatRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0
    }

    const result = await this.db.query(
      `INSERT INTO ${this.table} (record_key, category_id, group_id, product_id, update_date, record)
       SELECT r->>'record_key', r->>'category_categoryId', r->>'group_groupId', r->>'product_productId',
              (r->>'update_date')::date, r
       FROM jsonb_array_elements($1::jsonb) AS r
       ON CONFLICT (record_key) DO NOTHING`,
      [JSON.stringify(records)]
    )

    const inserted = result.rowCount ?? 0
    this.logger?.debug('Warehouse batch loaded', {
      table: this.table,
      received: records.length,
      inserted,
    })
    return inserted
  }
}
