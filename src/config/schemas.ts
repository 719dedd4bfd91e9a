import { z } from "zod";

const DAY_SECONDS = 86_400;

/**
 * Tunables for one ingestion run. Every component receives the parsed
 * object (or the slice it needs) at construction time.
 */
export const ingestionConfigSchema = z.object({
	/** Sustained request budget shared by every request of the run */
	requestsPerSecond: z.number().positive().max(1000).default(10),
	/** Attempts per request, first attempt included */
	maxAttempts: z.number().int().min(1).max(10).default(3),
	/** First retry delay; doubles on every further attempt */
	retryBaseDelayMs: z.number().int().min(0).default(1000),
	/** Upper bound for a single backoff delay */
	maxBackoffMs: z.number().int().min(0).default(30_000),
	/** Records buffered before a batch is flushed to the store */
	batchSize: z.number().int().min(1).max(10_000).default(500),
	/** Records requested per upstream page */
	pageSize: z.number().int().min(1).max(1000).default(500),
	/**
	 * Page depth cap per interval. The upstream offset pagination serves
	 * stale pages somewhere past 1000-1500 records of offset, so
	 * pageSize * maxPagesPerInterval should stay below that.
	 */
	maxPagesPerInterval: z.number().int().min(1).default(2),
	/** Start of history when neither metadata nor the store knows better */
	fallbackStartDate: z.string().datetime({ offset: true }).default("2020-06-01T00:00:00Z"),
	/** Margin subtracted from the oldest stored trade when resuming */
	boundarySafetyMarginSeconds: z.number().int().min(0).default(DAY_SECONDS),
});

export type IngestionConfig = z.infer<typeof ingestionConfigSchema>;
export type IngestionConfigInput = z.input<typeof ingestionConfigSchema>;

export const tradeSourceKindSchema = z.enum(["data-api", "subgraph"]);
export type TradeSourceKind = z.infer<typeof tradeSourceKindSchema>;

export const appEnvSchema = z.object({
	DATABASE_PATH: z.string().min(1).default("./data/trades.db"),
	/** Defaults to subgraph when SUBGRAPH_URL is set, data-api otherwise */
	TRADE_SOURCE: tradeSourceKindSchema.optional(),
	DATA_API_URL: z.string().url().default("https://data-api.polymarket.com"),
	GAMMA_API_URL: z.string().url().default("https://gamma-api.polymarket.com"),
	SUBGRAPH_URL: z.string().url().optional(),
	INGEST_RATE_LIMIT_RPS: z.coerce.number().optional(),
	INGEST_MAX_ATTEMPTS: z.coerce.number().int().optional(),
	INGEST_RETRY_BASE_DELAY_MS: z.coerce.number().int().optional(),
	INGEST_BATCH_SIZE: z.coerce.number().int().optional(),
	INGEST_PAGE_SIZE: z.coerce.number().int().optional(),
	INGEST_MAX_PAGES_PER_INTERVAL: z.coerce.number().int().optional(),
	INGEST_FALLBACK_START_DATE: z.string().optional(),
});

export type AppEnv = z.infer<typeof appEnvSchema>;
