import { createHash } from 'crypto'

/**
 * Truncated sha256 (first 32 hex chars) of the joined parts.
 */
export function shortHash(parts: ReadonlyArray<string | number | null | undefined>): string {
  const input = parts.map(part => (part === null || part === undefined ? '' : String(part))).join(':')
  return createHash('sha256').update(input).digest('hex').slice(0, 32)
}
