/**
 * REST trade history endpoint: GET {baseUrl}/trades
 *
 * Offset pagination, newest first. The response is either a bare array or
 * wrapped in { data: [...] }. Past roughly 1000-1500 records of offset the
 * endpoint starts serving stale pages, which is why the pipeline never
 * pages deep within one interval.
 */

import { z } from 'zod'
import { normalizeTrade } from '../core/normalize'
import type { TradeRecord } from '../core/types'
import { buildUrl, requestJson } from './http'
import type { TradePage, TradePageQuery, TradeSource } from './types'

const rawTradeSchema = z.record(z.unknown())

const tradesResponseSchema = z.union([
  z.array(rawTradeSchema),
  z.object({ data: z.array(rawTradeSchema) }).transform((body) => body.data),
])

export interface DataApiSourceOptions {
  baseUrl: string
  /**
   * Send start/end query parameters. Client-side filtering still applies,
   * so an endpoint that ignores them only costs extra pages.
   */
  sendTimeWindow?: boolean
  timeoutMs?: number
}

/**
 * Map one REST record onto a TradeRecord.
 * Field names: proxyWallet, size, price, timestamp, side, outcomeIndex,
 * transactionHash.
 */
export function parseDataApiTrade(
  raw: Record<string, unknown>,
  marketId: string,
): TradeRecord | null {
  return normalizeTrade(
    {
      id: raw.id ?? raw.transactionHash,
      timestamp: raw.timestamp,
      price: raw.price,
      size: raw.size ?? raw.amount,
      trader: raw.proxyWallet ?? raw.user,
      side: raw.side,
      outcomeIndex: raw.outcomeIndex,
      raw,
    },
    marketId,
  )
}

export class DataApiTradeSource implements TradeSource {
  readonly name = 'data-api'
  readonly supportsTimeWindow: boolean
  readonly newestFirst = true

  constructor(private readonly options: DataApiSourceOptions) {
    this.supportsTimeWindow = options.sendTimeWindow ?? true
  }

  async fetchTradePage(query: TradePageQuery): Promise<TradePage> {
    const url = buildUrl(this.options.baseUrl, 'trades', {
      market: query.marketId,
      limit: query.limit,
      offset: query.offset,
      start: this.supportsTimeWindow ? query.window.start : undefined,
      end: this.supportsTimeWindow ? query.window.end : undefined,
    })

    const rawTrades = await requestJson(url, tradesResponseSchema, {
      timeoutMs: this.options.timeoutMs,
    })

    const records: TradeRecord[] = []
    for (const raw of rawTrades) {
      const record = parseDataApiTrade(raw, query.marketId)
      if (record) records.push(record)
    }

    return { records, received: rawTrades.length, invalid: rawTrades.length - records.length }
  }
}
