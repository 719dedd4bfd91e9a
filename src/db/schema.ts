import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core'
import { sql } from 'drizzle-orm'

// Trade history, one row per distinct (market, signature)
export const trades = sqliteTable(
  'trades',
  {
    id: integer({ mode: 'number' }).primaryKey({
      autoIncrement: true,
    }),
    marketId: text('market_id').notNull(),
    timestamp: integer('timestamp', { mode: 'number' }).notNull(),
    // Canonical decimal strings, as used in the signature
    price: text('price').notNull(),
    size: text('size').notNull(),
    traderId: text('trader_id').notNull(),
    side: text('side', { enum: ['buy', 'sell', 'unknown'] }).notNull(),
    outcomeIndex: integer('outcome_index', { mode: 'number' }),
    sourceId: text('source_id'),
    signature: text('signature').notNull(),
    rawData: text('raw_data').notNull(),
    ingestedAt: integer('ingested_at', { mode: 'timestamp' })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => [
    uniqueIndex('trades_market_signature_idx').on(table.marketId, table.signature),
    index('trades_market_timestamp_idx').on(table.marketId, table.timestamp),
  ],
)

export type Trade = typeof trades.$inferSelect
export type NewTrade = typeof trades.$inferInsert
