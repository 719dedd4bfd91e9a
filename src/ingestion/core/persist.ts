/**
 * Persist Module for Ingestion Pipeline
 *
 * SQLite-backed TradeStore. The unique index on (market_id, signature) makes
 * every insert a no-op for trades already stored, so a batch can be
 * retried or replayed without creating duplicates.
 */

import { asc, count, desc, eq, min } from 'drizzle-orm'
import type { Database } from '@/db'
import { trades, type NewTrade, type Trade } from '@/db/schema'
import { createLogger } from '@/utils/logger'
import { computeTradeSignature } from './signature'
import { chunkRows, computeBatchSize } from './sql'
import type { TradeRecord, TradeStore } from './types'

const log = createLogger('db')

// Bound parameters per inserted row (id and ingested_at come from defaults)
const INSERT_COLUMNS = 10
const ROWS_PER_STATEMENT = computeBatchSize(INSERT_COLUMNS)

// ============================================================================
// Row Mapping
// ============================================================================

/**
 * Map a normalized trade to its table row.
 */
export function toTradeRow(marketId: string, record: TradeRecord): NewTrade {
  return {
    marketId,
    timestamp: record.timestamp,
    price: record.price,
    size: record.size,
    traderId: record.traderId,
    side: record.side,
    outcomeIndex: record.outcomeIndex,
    sourceId: record.sourceId,
    signature: computeTradeSignature(record),
    rawData: JSON.stringify(record.raw),
  }
}

// ============================================================================
// Trade Store
// ============================================================================

export interface ListTradesOptions {
  /** Maximum rows returned (default: 20) */
  limit?: number
  /** Sort by timestamp (default: newest first) */
  order?: 'asc' | 'desc'
}

export class SqliteTradeStore implements TradeStore {
  constructor(private readonly db: Database) {}

  /**
   * Insert a batch as one drizzle batch, which libsql runs inside a single
   * transaction. Either every chunk of the batch is written or none is.
   *
   * @returns Rows actually inserted (conflicting signatures are skipped)
   */
  async insertBatch(marketId: string, records: readonly TradeRecord[]): Promise<number> {
    if (records.length === 0) return 0

    const rows = records.map((record) => toTradeRow(marketId, record))
    const [first, ...rest] = chunkRows(rows, ROWS_PER_STATEMENT).map((chunk) =>
      this.db.insert(trades).values(chunk).onConflictDoNothing(),
    )
    const results = await this.db.batch([first, ...rest])
    const inserted = results.reduce((sum, result) => sum + result.rowsAffected, 0)

    if (inserted < records.length) {
      log.debug('Skipped already stored trades', {
        marketId,
        batch: records.length,
        inserted,
      })
    }
    return inserted
  }

  async getExistingSignatures(marketId: string): Promise<Set<string>> {
    const rows = await this.db
      .select({ signature: trades.signature })
      .from(trades)
      .where(eq(trades.marketId, marketId))
      .all()
    return new Set(rows.map((row) => row.signature))
  }

  async getOldestTimestamp(marketId: string): Promise<number | null> {
    const row = await this.db
      .select({ oldest: min(trades.timestamp) })
      .from(trades)
      .where(eq(trades.marketId, marketId))
      .get()
    return row?.oldest ?? null
  }

  async countTrades(marketId: string): Promise<number> {
    const row = await this.db
      .select({ value: count() })
      .from(trades)
      .where(eq(trades.marketId, marketId))
      .get()
    return row?.value ?? 0
  }

  async listTrades(marketId: string, options: ListTradesOptions = {}): Promise<Trade[]> {
    const { limit = 20, order = 'desc' } = options
    return this.db
      .select()
      .from(trades)
      .where(eq(trades.marketId, marketId))
      .orderBy(order === 'asc' ? asc(trades.timestamp) : desc(trades.timestamp), asc(trades.id))
      .limit(limit)
      .all()
  }
}
