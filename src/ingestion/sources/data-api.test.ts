/**
 * Tests for the REST trade source
 */

import { describe, it, expect, vi } from 'vitest'
import {
  HttpStatusError,
  NetworkError,
  ResponseValidationError,
} from '../core/errors'
import { DataApiTradeSource, parseDataApiTrade } from './data-api'
import type { TradePageQuery } from './types'

// ============================================================================
// Test Fixtures
// ============================================================================

const BASE_URL = 'https://data.test'
const MARKET = '0xmarket'

const QUERY: TradePageQuery = {
  marketId: MARKET,
  window: { start: 1_704_067_200, end: 1_704_153_600 },
  offset: 500,
  limit: 500,
}

function createRawTrade(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    proxyWallet: '0xwallet-1',
    side: 'BUY',
    conditionId: MARKET,
    size: 12.5,
    price: 0.47,
    timestamp: 1_704_070_800,
    outcomeIndex: 1,
    transactionHash: '0xhash-1',
    ...overrides,
  }
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  })
}

function stubFetch(respond: () => Promise<Response>) {
  const fetchMock = vi.fn((_input: string | URL | Request, _init?: RequestInit) => respond())
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

// ============================================================================
// parseDataApiTrade
// ============================================================================

describe('parseDataApiTrade', () => {
  it('maps REST fields onto a trade record', () => {
    const raw = createRawTrade()

    expect(parseDataApiTrade(raw, MARKET)).toEqual({
      marketId: MARKET,
      timestamp: 1_704_070_800,
      price: '0.47',
      size: '12.5',
      traderId: '0xwallet-1',
      side: 'buy',
      outcomeIndex: 1,
      sourceId: '0xhash-1',
      raw,
    })
  })

  it('rejects a trade without wallet', () => {
    expect(parseDataApiTrade(createRawTrade({ proxyWallet: '' }), MARKET)).toBeNull()
  })
})

// ============================================================================
// DataApiTradeSource
// ============================================================================

describe('DataApiTradeSource', () => {
  it('requests one page with market, paging and window parameters', async () => {
    const fetchMock = stubFetch(async () => jsonResponse([createRawTrade()]))
    const source = new DataApiTradeSource({ baseUrl: BASE_URL })

    await source.fetchTradePage(QUERY)

    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://data.test/trades?market=0xmarket&limit=500&offset=500&start=1704067200&end=1704153600',
    )
  })

  it('omits the window when disabled', async () => {
    const fetchMock = stubFetch(async () => jsonResponse([]))
    const source = new DataApiTradeSource({ baseUrl: BASE_URL, sendTimeWindow: false })

    await source.fetchTradePage(QUERY)

    expect(source.supportsTimeWindow).toBe(false)
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://data.test/trades?market=0xmarket&limit=500&offset=500',
    )
  })

  it('counts rejected records as received and invalid', async () => {
    stubFetch(async () =>
      jsonResponse([
        createRawTrade(),
        createRawTrade({ proxyWallet: '', transactionHash: '0xhash-2' }),
        createRawTrade({ timestamp: 0, transactionHash: '0xhash-3' }),
      ]),
    )

    const page = await new DataApiTradeSource({ baseUrl: BASE_URL }).fetchTradePage(QUERY)

    expect(page.received).toBe(3)
    expect(page.invalid).toBe(2)
    expect(page.records.map((record) => record.sourceId)).toEqual(['0xhash-1'])
  })

  it('accepts a response wrapped in data', async () => {
    stubFetch(async () => jsonResponse({ data: [createRawTrade(), createRawTrade({ proxyWallet: '0xwallet-2' })] }))

    const page = await new DataApiTradeSource({ baseUrl: BASE_URL }).fetchTradePage(QUERY)

    expect(page.records.map((record) => record.traderId)).toEqual(['0xwallet-1', '0xwallet-2'])
  })

  it('throws HttpStatusError with Retry-After on non-2xx', async () => {
    stubFetch(async () => jsonResponse({ error: 'slow down' }, { status: 429, headers: { 'Retry-After': '7' } }))

    const error = await new DataApiTradeSource({ baseUrl: BASE_URL })
      .fetchTradePage(QUERY)
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(HttpStatusError)
    expect(error).toMatchObject({ status: 429, retryAfter: '7' })
  })

  it('throws NetworkError when the request does not complete', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed')
    })

    await expect(
      new DataApiTradeSource({ baseUrl: BASE_URL }).fetchTradePage(QUERY),
    ).rejects.toBeInstanceOf(NetworkError)
  })

  it('throws ResponseValidationError on an unexpected payload', async () => {
    stubFetch(async () => jsonResponse({ trades: 'none' }))

    await expect(
      new DataApiTradeSource({ baseUrl: BASE_URL }).fetchTradePage(QUERY),
    ).rejects.toBeInstanceOf(ResponseValidationError)
  })

  it('throws ResponseValidationError on a non-JSON body', async () => {
    stubFetch(async () => new Response('<html>maintenance</html>', { status: 200 }))

    await expect(
      new DataApiTradeSource({ baseUrl: BASE_URL }).fetchTradePage(QUERY),
    ).rejects.toBeInstanceOf(ResponseValidationError)
  })
})
