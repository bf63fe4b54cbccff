import { describe, expect, it } from 'vitest'
import { asList, asNumber, asString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('joins value tokens and marks bare flags true', () => {
    expect(parseFlags(['--mode', 'fresh', '--dry-run', '--category', '3', '71', '--verbose'])).toEqual({
      mode: 'fresh',
      'dry-run': true,
      category: '3 71',
      verbose: true,
    })
  })

  it('reads inline values and negated flags', () => {
    expect(parseFlags(['--concurrency=4', '--output=./out/a=b.ndjson', '--no-dry-run', '--json'])).toEqual({
      concurrency: '4',
      output: './out/a=b.ndjson',
      'dry-run': false,
      json: true,
    })
  })

  it('ignores tokens before the first flag', () => {
    expect(parseFlags(['stray', '--json'])).toEqual({ json: true })
  })
})

describe('flag readers', () => {
  it('reads strings', () => {
    expect(asString('fresh')).toBe('fresh')
    expect(asString(true)).toBe('')
    expect(asString(undefined)).toBe('')
  })

  it('reads finite numbers only', () => {
    expect(asNumber('4')).toBe(4)
    expect(asNumber('1.5')).toBe(1.5)
    expect(asNumber('fast')).toBeUndefined()
    expect(asNumber(true)).toBeUndefined()
    expect(asNumber(undefined)).toBeUndefined()
  })

  it('splits lists on commas and spaces', () => {
    expect(asList('3,71')).toEqual(['3', '71'])
    expect(asList('3, 71 1200')).toEqual(['3', '71', '1200'])
    expect(asList(true)).toEqual([])
  })
})
