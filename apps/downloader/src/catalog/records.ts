/**
 * Flat warehouse records
 *
 * One record per item: category, group and item fields side by side,
 * prefixed `category_`, `group_` and `product_`, plus the load date and a
 * stable `record_key`.
 */

import type { FlatRecord, FlatValue } from '@cardledger/warehouse'
import { shortHash } from '../utils/hash.js'
import type { CatalogObject } from './types.js'

export function flatValue(value: unknown): FlatValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value)
  if (typeof value === 'string') return value
  if (typeof value === 'bigint') return value.toString()
  return JSON.stringify(value)
}

function prefixed(prefix: string, data: CatalogObject, into: FlatRecord): void {
  for (const [key, value] of Object.entries(data)) {
    into[`${prefix}_${key}`] = flatValue(value)
  }
}

/**
 * `update_date` is the UTC calendar date of the run (YYYY-MM-DD).
 */
export function toUpdateDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function recordKey(
  category: CatalogObject,
  group: CatalogObject,
  item: CatalogObject,
  updateDate: string
): string {
  return shortHash([
    flatValue(category.categoryId),
    flatValue(group.groupId),
    flatValue(item.productId),
    flatValue(item.subTypeName),
    updateDate,
  ])
}

export function flattenRecord(
  category: CatalogObject,
  group: CatalogObject,
  item: CatalogObject,
  updateDate: string
): FlatRecord {
  const record: FlatRecord = {}
  prefixed('category', category, record)
  prefixed('group', group, record)
  prefixed('product', item, record)
  record.update_date = updateDate
  record.record_key = recordKey(category, group, item, updateDate)
  return record
}
