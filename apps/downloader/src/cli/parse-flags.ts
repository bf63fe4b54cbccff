export type Flags = Record<string, string | boolean>

/**
 * Flags after the command:
 *   --key value words  -> { key: 'value words' }
 *   --key=value        -> { key: 'value' }
 *   --no-key           -> { key: false }
 *   --key              -> { key: true }
 * Words before the first flag are ignored.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}
  let key: string | null = null
  let words: string[] = []

  // Trailing `--` closes the last flag
  for (const token of [...argv, '--']) {
    if (!token.startsWith('--')) {
      if (key !== null) words.push(token)
      continue
    }

    if (key !== null) {
      flags[key] = words.length > 0 ? words.join(' ') : true
    }
    key = null
    words = []

    const body = token.slice(2)
    const equals = body.indexOf('=')
    if (equals > 0) {
      flags[body.slice(0, equals)] = body.slice(equals + 1)
    } else if (body.startsWith('no-') && body.length > 3) {
      flags[body.slice(3)] = false
    } else if (body.length > 0) {
      key = body
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

export function asNumber(value: string | boolean | undefined): number | undefined {
  if (typeof value !== 'string') {
    return undefined
  }
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/** `3,71` or `3 71` */
export function asList(value: string | boolean | undefined): string[] {
  return asString(value)
    .split(/[\s,]+/)
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
}
