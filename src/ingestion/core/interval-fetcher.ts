/**
 * Interval Fetcher
 *
 * Retrieves every trade of one interval by paging through the source.
 * Records are always filtered client-side to the interval window: past a
 * cumulative offset of roughly 1000-1500 the upstream serves stale pages,
 * and some sources ignore the window entirely.
 *
 * With a fallback source configured, an interval the primary source could
 * not deliver is fetched again from the fallback, starting at offset 0:
 * offsets of one source say nothing about the other.
 */

import type { IngestionConfig } from '@/config/schemas'
import { createLogger } from '@/utils/logger'
import type { TradeSource } from '../sources/types'
import { containsTimestamp, formatInterval } from './intervals'
import type { RetryingTransport } from './rate-limit'
import type { Interval, IntervalFetchResult, TradeRecord } from './types'

const log = createLogger('ingest')

export type IntervalFetcherConfig = Pick<IngestionConfig, 'pageSize' | 'maxPagesPerInterval'>

export class IntervalFetcher {
  constructor(
    private readonly source: TradeSource,
    private readonly transport: RetryingTransport,
    private readonly config: IntervalFetcherConfig,
    private readonly fallback: TradeSource | null = null,
  ) {}

  async fetch(marketId: string, interval: Interval): Promise<IntervalFetchResult> {
    const primary = await this.fetchFrom(this.source, marketId, interval)
    if (!primary.failed || !this.fallback) {
      return primary
    }

    log.warn('Primary source failed, fetching interval from fallback', {
      marketId,
      interval: formatInterval(interval),
      primary: this.source.name,
      fallback: this.fallback.name,
      discarded: primary.records.length,
      reason: primary.error,
    })
    const secondary = await this.fetchFrom(this.fallback, marketId, interval)
    return { ...secondary, pages: primary.pages + secondary.pages }
  }

  private async fetchFrom(
    source: TradeSource,
    marketId: string,
    interval: Interval,
  ): Promise<IntervalFetchResult> {
    const { pageSize, maxPagesPerInterval } = this.config
    const records: TradeRecord[] = []
    let outOfWindow = 0
    let invalid = 0
    let pages = 0
    let lastPageFull = false

    for (let page = 0; page < maxPagesPerInterval; page++) {
      const offset = page * pageSize
      pages++

      const result = await this.transport.execute(`${source.name} trades`, () =>
        source.fetchTradePage({ marketId, window: interval, offset, limit: pageSize }),
      )

      if (!result.ok) {
        log.warn('Interval page failed, interval may be incomplete', {
          marketId,
          source: source.name,
          interval: formatInterval(interval),
          offset,
          attempts: result.attempts,
          reason: result.error.message,
        })
        return {
          interval,
          records,
          pages,
          truncated: false,
          failed: true,
          error: result.error.message,
          outOfWindow,
          invalid,
        }
      }

      const { records: pageRecords, received } = result.value
      invalid += result.value.invalid

      let oldestOnPage = Number.POSITIVE_INFINITY
      for (const record of pageRecords) {
        oldestOnPage = Math.min(oldestOnPage, record.timestamp)
        if (containsTimestamp(interval, record.timestamp)) {
          records.push(record)
        } else {
          outOfWindow++
        }
      }

      lastPageFull = received >= pageSize
      if (!lastPageFull) break

      // Newest-first pages that already reach before the window hold nothing further
      if (source.newestFirst && oldestOnPage < interval.start) {
        lastPageFull = false
        break
      }
    }

    const truncated = lastPageFull && pages >= maxPagesPerInterval
    if (truncated) {
      log.warn('Page depth cap reached, interval possibly truncated', {
        marketId,
        interval: formatInterval(interval),
        pages,
        pageSize,
        records: records.length,
      })
    }

    log.debug('Fetched interval', {
      marketId,
      source: source.name,
      interval: formatInterval(interval),
      pages,
      records: records.length,
      outOfWindow,
      invalid,
    })

    return { interval, records, pages, truncated, failed: false, error: null, outOfWindow, invalid }
  }
}
