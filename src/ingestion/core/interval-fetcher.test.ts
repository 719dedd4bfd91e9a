/**
 * Tests for per-interval pagination
 */

import { describe, it, expect } from 'vitest'
import {
  DAY,
  FakeUpstream,
  HISTORY_START,
  TEST_MARKET_ID,
  createHistory,
} from '@/test/utils/fake-upstream'
import { HttpStatusError, NetworkError } from './errors'
import { IntervalFetcher } from './interval-fetcher'
import { RateLimiter, RetryingTransport } from './rate-limit'
import { computeTradeSignature } from './signature'
import type { Interval } from './types'

// ============================================================================
// Test Fixtures
// ============================================================================

function createTransport(): RetryingTransport {
  return new RetryingTransport(new RateLimiter({ requestsPerSecond: 1000 }), {
    maxAttempts: 3,
    initialBackoffMs: 1,
    maxBackoffMs: 5,
  })
}

function day(index: number): Interval {
  return { start: HISTORY_START + index * DAY, end: HISTORY_START + (index + 1) * DAY }
}

function createFetcher(
  upstream: FakeUpstream,
  config = { pageSize: 500, maxPagesPerInterval: 2 },
): IntervalFetcher {
  return new IntervalFetcher(upstream, createTransport(), config)
}

// ============================================================================
// Pagination
// ============================================================================

describe('IntervalFetcher', () => {
  it('stops after a short page', async () => {
    const upstream = new FakeUpstream(createHistory(300, 1))

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(0))

    expect(result).toMatchObject({
      pages: 1,
      truncated: false,
      failed: false,
      error: null,
      outOfWindow: 0,
      invalid: 0,
    })
    expect(result.records).toHaveLength(300)
    expect(upstream.queries).toEqual([
      { marketId: TEST_MARKET_ID, window: day(0), offset: 0, limit: 500 },
    ])
  })

  it('returns an empty result for an empty interval', async () => {
    const upstream = new FakeUpstream(createHistory(300, 1))

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(5))

    expect(result.records).toEqual([])
    expect(result.pages).toBe(1)
    expect(result.truncated).toBe(false)
  })

  it('flags truncation when the page depth cap is reached on a full page', async () => {
    const upstream = new FakeUpstream(createHistory(1200, 1))

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(0))

    expect(result.truncated).toBe(true)
    expect(result.pages).toBe(2)
    expect(result.records).toHaveLength(1000)
    expect(upstream.queries.map((query) => query.offset)).toEqual([0, 500])
  })

  it('does not flag truncation when the last page is short', async () => {
    const upstream = new FakeUpstream(createHistory(700, 1))

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(0))

    expect(result.truncated).toBe(false)
    expect(result.records).toHaveLength(700)
  })

  it('filters records outside the window when the source ignores it', async () => {
    const upstream = new FakeUpstream(createHistory(300, 3), { supportsTimeWindow: false })

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(1))

    expect(result.records).toHaveLength(100)
    expect(result.outOfWindow).toBe(200)
    for (const record of result.records) {
      expect(record.timestamp).toBeGreaterThanOrEqual(day(1).start)
      expect(record.timestamp).toBeLessThan(day(1).end)
    }
  })

  it('stops paging once a newest-first page reaches before the window', async () => {
    const upstream = new FakeUpstream(createHistory(900, 3), { supportsTimeWindow: false })

    const result = await createFetcher(upstream, { pageSize: 200, maxPagesPerInterval: 5 }).fetch(
      TEST_MARKET_ID,
      day(2),
    )

    expect(result.pages).toBe(2)
    expect(result.records).toHaveLength(300)
    expect(result.outOfWindow).toBe(100)
    expect(result.truncated).toBe(false)
  })

  it('cannot recover deep history through one wide window', async () => {
    // Offsets past 1000 serve the first page again
    const upstream = new FakeUpstream(createHistory(3427, 40))
    const wide = { start: HISTORY_START, end: HISTORY_START + 40 * DAY }

    const result = await createFetcher(upstream, { pageSize: 500, maxPagesPerInterval: 8 }).fetch(
      TEST_MARKET_ID,
      wide,
    )

    const distinct = new Set(result.records.map((record) => computeTradeSignature(record)))
    expect(distinct.size).toBe(1000)
    expect(result.truncated).toBe(true)
  })
})

// ============================================================================
// Failures
// ============================================================================

describe('IntervalFetcher failures', () => {
  it('retries transient page failures', async () => {
    const upstream = new FakeUpstream(createHistory(300, 1), {
      failWhen: (_query, call) => (call === 1 ? new NetworkError('http://fake.test', 'reset') : null),
    })

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(0))

    expect(result.failed).toBe(false)
    expect(result.records).toHaveLength(300)
    expect(upstream.calls).toBe(2)
  })

  it('marks the interval failed and keeps the pages already fetched', async () => {
    const upstream = new FakeUpstream(createHistory(800, 1), {
      failWhen: (query) =>
        query.offset === 500 ? new HttpStatusError('http://fake.test/trades', 400) : null,
    })

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(0))

    expect(result.failed).toBe(true)
    expect(result.error).toBe('HTTP 400 from http://fake.test/trades')
    expect(result.pages).toBe(2)
    expect(result.records).toHaveLength(500)
    expect(result.truncated).toBe(false)
  })

  it('marks the interval failed after exhausting retries', async () => {
    const upstream = new FakeUpstream(createHistory(10, 1), {
      failWhen: () => new HttpStatusError('http://fake.test/trades', 503),
    })

    const result = await createFetcher(upstream).fetch(TEST_MARKET_ID, day(0))

    expect(result.failed).toBe(true)
    expect(result.records).toEqual([])
    expect(upstream.calls).toBe(3)
  })
})

// ============================================================================
// Fallback Source
// ============================================================================

describe('IntervalFetcher fallback', () => {
  const config = { pageSize: 500, maxPagesPerInterval: 2 }

  it('refetches a failed interval from the fallback, starting at the first page', async () => {
    const history = createHistory(800, 1)
    const primary = new FakeUpstream(history, {
      failWhen: (query) =>
        query.offset === 500 ? new HttpStatusError('http://primary.test/trades', 400) : null,
    })
    const fallback = new FakeUpstream(history)

    const result = await new IntervalFetcher(primary, createTransport(), config, fallback).fetch(
      TEST_MARKET_ID,
      day(0),
    )

    expect(result.failed).toBe(false)
    expect(result.error).toBeNull()
    expect(result.records).toHaveLength(800)
    expect(result.pages).toBe(4)
    expect(fallback.queries.map((query) => query.offset)).toEqual([0, 500])
  })

  it('leaves the fallback unused while the primary source works', async () => {
    const fallback = new FakeUpstream(createHistory(300, 1))

    const result = await new IntervalFetcher(
      new FakeUpstream(createHistory(300, 1)),
      createTransport(),
      config,
      fallback,
    ).fetch(TEST_MARKET_ID, day(0))

    expect(result.records).toHaveLength(300)
    expect(fallback.calls).toBe(0)
  })

  it('reports the fallback failure when both sources fail', async () => {
    const primary = new FakeUpstream(createHistory(10, 1), {
      failWhen: () => new HttpStatusError('http://primary.test/trades', 400),
    })
    const fallback = new FakeUpstream(createHistory(10, 1), {
      failWhen: () => new HttpStatusError('http://fallback.test/trades', 400),
    })

    const result = await new IntervalFetcher(primary, createTransport(), config, fallback).fetch(
      TEST_MARKET_ID,
      day(0),
    )

    expect(result.failed).toBe(true)
    expect(result.error).toBe('HTTP 400 from http://fallback.test/trades')
    expect(result.records).toEqual([])
    expect(result.pages).toBe(2)
  })
})
