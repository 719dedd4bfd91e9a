/**
 * Trades CLI Commands
 *
 * Inspect stored history and market ids.
 *
 * Usage:
 *   npm run ingest -- count <marketId>
 *   npm run ingest -- view <marketId> --limit 50
 *   npm run ingest -- resolve <marketId>
 */

import { getAppEnv, loadIngestionConfig } from '@/config/ingestionConfig'
import type { Trade } from '@/db/schema'
import { measureTime } from '@/utils/logger'
import { extractStartTimestamp } from '../core/boundary'
import { RateLimiter, RetryingTransport, toRateLimitConfig } from '../core/rate-limit'
import { openTradeStore } from '../pipeline'
import { createMetadataSource, resolveConditionId } from '../sources'

/**
 * Format a timestamp (seconds) for display.
 */
function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace('T', ' ').slice(0, 19)
}

export function formatTradeRow(trade: Trade): string {
  return [
    formatTimestamp(trade.timestamp),
    trade.side.padEnd(7),
    trade.price.padStart(8),
    trade.size.padStart(14),
    trade.traderId,
  ].join('  ')
}

export async function countCommand(marketId: string, options: { db?: string }): Promise<number> {
  const env = getAppEnv()
  const { store, close } = await openTradeStore(options.db ?? env.DATABASE_PATH)
  try {
    const total = await store.countTrades(marketId)
    console.log(`${marketId}: ${total} trade(s)`)
    return 0
  } finally {
    close()
  }
}

export async function viewCommand(
  marketId: string,
  options: { db?: string; limit: number; oldest: boolean },
): Promise<number> {
  const env = getAppEnv()
  const { store, close } = await openTradeStore(options.db ?? env.DATABASE_PATH)
  try {
    const rows = await store.listTrades(marketId, {
      limit: options.limit,
      order: options.oldest ? 'asc' : 'desc',
    })
    if (rows.length === 0) {
      console.log(`No trades stored for ${marketId}`)
      return 0
    }

    console.log(
      ['Time (UTC)         ', 'Side   ', '   Price', '          Size', 'Trader'].join('  '),
    )
    console.log('-'.repeat(80))
    for (const row of rows) {
      console.log(formatTradeRow(row))
    }
    console.log('')
    console.log(`Showing ${rows.length} of ${await store.countTrades(marketId)} trade(s)`)
    return 0
  } finally {
    close()
  }
}

export async function resolveCommand(marketId: string): Promise<number> {
  const env = getAppEnv()
  const config = loadIngestionConfig(env)
  const transport = new RetryingTransport(
    new RateLimiter(toRateLimitConfig(config)),
    toRateLimitConfig(config),
  )
  const metadata = createMetadataSource(env)

  const { result: resolution, duration } = await measureTime(() =>
    resolveConditionId(marketId, metadata, transport),
  )
  console.log(`Market id:     ${marketId}`)
  console.log(`Condition id:  ${resolution.conditionId}${resolution.resolved ? '' : ' (unchanged)'}`)
  if (resolution.reason) {
    console.log(`Note:          ${resolution.reason}`)
  }

  const lookup = await transport.execute('market metadata', () =>
    metadata.fetchMarketMetadata(resolution.conditionId),
  )
  if (lookup.ok && lookup.value) {
    const start = extractStartTimestamp(lookup.value)
    console.log(`Start date:    ${start === null ? '(none in metadata)' : formatTimestamp(start)}`)
  } else {
    console.log('Start date:    (metadata unavailable)')
  }
  console.log(`Lookup took:   ${duration}ms`)
  return 0
}
