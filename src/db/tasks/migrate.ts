import { sql } from "drizzle-orm";
import type { Database } from "@/db";

export async function up(db: Database): Promise<void> {
	await db.run(sql`
    CREATE TABLE IF NOT EXISTS trades (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      market_id TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      price TEXT NOT NULL,
      size TEXT NOT NULL,
      trader_id TEXT NOT NULL,
      side TEXT NOT NULL,
      outcome_index INTEGER,
      source_id TEXT,
      signature TEXT NOT NULL,
      raw_data TEXT NOT NULL,
      ingested_at INTEGER NOT NULL DEFAULT (unixepoch()),

      CONSTRAINT trades_side_check CHECK (side IN ('buy', 'sell', 'unknown'))
    )
  `);

	await db.run(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS trades_market_signature_idx
    ON trades(market_id, signature)
  `);

	await db.run(sql`
    CREATE INDEX IF NOT EXISTS trades_market_timestamp_idx
    ON trades(market_id, timestamp)
  `);
}
