import { describe, it, expect } from 'vitest'
import { DAY_SECONDS, containsTimestamp, formatInterval, generateIntervals } from './intervals'

describe('generateIntervals', () => {
  it('partitions a range into day-wide intervals', () => {
    expect(generateIntervals(0, 3 * DAY_SECONDS)).toEqual([
      { start: 0, end: 86400 },
      { start: 86400, end: 172800 },
      { start: 172800, end: 259200 },
    ])
  })

  it('shortens the last interval to the range end', () => {
    expect(generateIntervals(0, 100_000)).toEqual([
      { start: 0, end: 86400 },
      { start: 86400, end: 100_000 },
    ])
  })

  it('covers the range without gaps or overlaps', () => {
    const start = 1_704_067_200
    const end = start + 40 * DAY_SECONDS + 12_345
    const intervals = generateIntervals(start, end)

    expect(intervals[0].start).toBe(start)
    expect(intervals[intervals.length - 1].end).toBe(end)
    for (let i = 1; i < intervals.length; i++) {
      expect(intervals[i].start).toBe(intervals[i - 1].end)
    }
    expect(intervals).toHaveLength(41)
  })

  it('returns nothing when start >= end', () => {
    expect(generateIntervals(500, 500)).toEqual([])
    expect(generateIntervals(600, 500)).toEqual([])
  })

  it('accepts a custom width', () => {
    expect(generateIntervals(0, 25, 10)).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 20 },
      { start: 20, end: 25 },
    ])
  })

  it('rejects fractional bounds and non-positive widths', () => {
    expect(() => generateIntervals(0.5, 10)).toThrow(RangeError)
    expect(() => generateIntervals(0, 10, 0)).toThrow(RangeError)
    expect(() => generateIntervals(0, 10, -1)).toThrow(RangeError)
  })
})

describe('containsTimestamp', () => {
  const interval = { start: 100, end: 200 }

  it('is half-open', () => {
    expect(containsTimestamp(interval, 100)).toBe(true)
    expect(containsTimestamp(interval, 199)).toBe(true)
    expect(containsTimestamp(interval, 200)).toBe(false)
    expect(containsTimestamp(interval, 99)).toBe(false)
  })
})

describe('formatInterval', () => {
  it('renders ISO bounds', () => {
    expect(formatInterval({ start: 0, end: DAY_SECONDS })).toBe(
      '[1970-01-01T00:00:00.000Z, 1970-01-02T00:00:00.000Z)',
    )
  })
})
