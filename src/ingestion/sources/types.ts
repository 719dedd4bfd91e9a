/**
 * Upstream interfaces consumed by the pipeline.
 */

import type { Interval, TradeRecord } from '../core/types'

export interface TradePageQuery {
  /** Market condition id */
  marketId: string
  /** Requested time window; sources without server-side filtering ignore it */
  window: Interval
  /** Records to skip */
  offset: number
  /** Page size */
  limit: number
}

export interface TradePage {
  /** Normalized records, in source order */
  records: TradeRecord[]
  /** Raw records received, rejected ones included; drives page-fullness */
  received: number
  /** Raw records rejected by normalization */
  invalid: number
}

/**
 * Paginated trade history endpoint.
 *
 * fetchTradePage throws the typed errors from core/errors; retries are the
 * transport's job.
 */
export interface TradeSource {
  readonly name: string
  /** Whether window is applied server-side */
  readonly supportsTimeWindow: boolean
  /** Whether pages are ordered by timestamp, newest first */
  readonly newestFirst: boolean
  fetchTradePage(query: TradePageQuery): Promise<TradePage>
}

/**
 * Market description lookup.
 */
export interface MarketMetadataSource {
  /**
   * @returns The raw market description, or null when the market is unknown
   */
  fetchMarketMetadata(marketId: string): Promise<Record<string, unknown> | null>
}
