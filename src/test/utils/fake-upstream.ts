/**
 * In-process upstream for pipeline tests.
 *
 * Serves a fixed trade history newest first with offset pagination and
 * reproduces the offset defect of the real endpoint: once the requested
 * offset reaches staleOffset, the first page of the query is served again.
 */

import { openDatabase, type Database } from "@/db";
import { up as migrate } from "@/db/tasks/migrate";
import { containsTimestamp } from "@/ingestion/core/intervals";
import { SqliteTradeStore } from "@/ingestion/core/persist";
import type { TradeRecord } from "@/ingestion/core/types";
import type {
	MarketMetadataSource,
	TradePage,
	TradePageQuery,
	TradeSource,
} from "@/ingestion/sources/types";

export const TEST_MARKET_ID = "0xtest-market";

// 2024-01-01T00:00:00Z
export const HISTORY_START = 1_704_067_200;
export const DAY = 86_400;

export interface FakeUpstreamOptions {
	/** Apply the query window server-side (default: true) */
	supportsTimeWindow?: boolean;
	/** Offset from which stale pages are served (default: 1000) */
	staleOffset?: number;
	/** Return an error for a call instead of a page */
	failWhen?: (query: TradePageQuery, call: number) => Error | null;
}

export class FakeUpstream implements TradeSource {
	readonly name = "fake";
	readonly newestFirst = true;
	readonly supportsTimeWindow: boolean;
	readonly queries: TradePageQuery[] = [];

	private readonly trades: TradeRecord[];
	private readonly staleOffset: number;
	private readonly failWhen: FakeUpstreamOptions["failWhen"];

	constructor(trades: TradeRecord[], options: FakeUpstreamOptions = {}) {
		this.trades = [...trades].sort((a, b) => b.timestamp - a.timestamp);
		this.supportsTimeWindow = options.supportsTimeWindow ?? true;
		this.staleOffset = options.staleOffset ?? 1000;
		this.failWhen = options.failWhen;
	}

	get calls(): number {
		return this.queries.length;
	}

	async fetchTradePage(query: TradePageQuery): Promise<TradePage> {
		this.queries.push(query);

		const error = this.failWhen?.(query, this.queries.length);
		if (error) throw error;

		const pool = this.supportsTimeWindow
			? this.trades.filter((trade) => containsTimestamp(query.window, trade.timestamp))
			: this.trades;

		const offset = query.offset >= this.staleOffset ? 0 : query.offset;
		const records = pool.slice(offset, offset + query.limit);
		return { records, received: records.length, invalid: 0 };
	}
}

/**
 * Build one normalized trade.
 */
export function createTestTrade(overrides: Partial<TradeRecord> = {}): TradeRecord {
	return {
		marketId: TEST_MARKET_ID,
		timestamp: HISTORY_START + 3600,
		price: "0.55",
		size: "100",
		traderId: "0xtrader-1",
		side: "buy",
		outcomeIndex: 0,
		sourceId: null,
		raw: {},
		...overrides,
	};
}

/**
 * Generate count distinct trades spread evenly over [start, start + days * DAY).
 */
export function createHistory(count: number, days: number, start = HISTORY_START): TradeRecord[] {
	const span = days * DAY;
	return Array.from({ length: count }, (_, i) =>
		createTestTrade({
			timestamp: start + Math.floor((i * span) / count),
			traderId: `0xtrader-${i}`,
			price: String(((i % 99) + 1) / 100),
			size: String(10 + (i % 7)),
			side: i % 2 === 0 ? "buy" : "sell",
		}),
	);
}

export class StaticMetadata implements MarketMetadataSource {
	calls = 0;

	constructor(private readonly metadata: Record<string, unknown> | null) {}

	async fetchMarketMetadata(): Promise<Record<string, unknown> | null> {
		this.calls++;
		return this.metadata;
	}
}

/**
 * Fresh in-memory SQLite store with the schema applied.
 */
export async function createTestStore(): Promise<{
	store: SqliteTradeStore;
	db: Database;
	close: () => void;
}> {
	const { db, client } = await openDatabase(":memory:");
	await migrate(db);
	return { store: new SqliteTradeStore(db), db, close: () => client.close() };
}
