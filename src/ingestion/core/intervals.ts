/**
 * Interval generation.
 *
 * History is fetched one day at a time so that no single paginated query
 * goes deep enough into the upstream offset to hit stale pages.
 */

import type { Interval } from './types'

export const DAY_SECONDS = 86_400

/**
 * Partition [start, end) into consecutive half-open intervals of
 * widthSeconds, ascending. The last interval may be shorter.
 *
 * @returns An empty array when start >= end
 */
export function generateIntervals(
  start: number,
  end: number,
  widthSeconds: number = DAY_SECONDS,
): Interval[] {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new RangeError(`Interval bounds must be integer seconds, got [${start}, ${end})`)
  }
  if (!Number.isSafeInteger(widthSeconds) || widthSeconds <= 0) {
    throw new RangeError(`Interval width must be a positive integer, got ${widthSeconds}`)
  }

  const intervals: Interval[] = []
  for (let cursor = start; cursor < end; cursor += widthSeconds) {
    intervals.push({ start: cursor, end: Math.min(cursor + widthSeconds, end) })
  }
  return intervals
}

export function containsTimestamp(interval: Interval, timestamp: number): boolean {
  return timestamp >= interval.start && timestamp < interval.end
}

export function formatInterval(interval: Interval): string {
  return `[${new Date(interval.start * 1000).toISOString()}, ${new Date(interval.end * 1000).toISOString()})`
}
