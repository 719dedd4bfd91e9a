import { describe, it, expect, vi } from 'vitest'
import { encodeTimestampBase62, generatePrefixedId, randomBase62 } from './id'

describe('encodeTimestampBase62', () => {
  it('pads to six characters', () => {
    expect(encodeTimestampBase62(0)).toBe('000000')
    expect(encodeTimestampBase62(61)).toBe('00000z')
    expect(encodeTimestampBase62(62)).toBe('000010')
  })

  it('sorts lexicographically in time order', () => {
    const earlier = encodeTimestampBase62(1_704_067_200)
    const later = encodeTimestampBase62(1_704_067_261)

    expect(earlier < later).toBe(true)
  })
})

describe('randomBase62', () => {
  it('returns the requested length from the alphabet', () => {
    expect(randomBase62(32)).toMatch(/^[0-9A-Za-z]{32}$/)
  })
})

describe('generatePrefixedId', () => {
  it('prefixes a timestamp and random suffix', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date(0))

    expect(generatePrefixedId('run')).toMatch(/^run_000000[0-9A-Za-z]{14}$/)
  })
})
