/**
 * Ingestion Core Types
 *
 * Shared interfaces for the trade history ingestion pipeline.
 * Used by the orchestrator, the upstream sources and the CLI.
 */

// ============================================================================
// Trade Record - Output of the normalization stage
// ============================================================================

export type TradeSide = 'buy' | 'sell' | 'unknown'

/**
 * One historical trade after normalization.
 */
export interface TradeRecord {
  /** Market the trade belongs to (condition id) */
  readonly marketId: string
  /** Seconds since epoch */
  readonly timestamp: number
  /** Canonical decimal string, e.g. "0.55" */
  readonly price: string
  /** Canonical decimal string */
  readonly size: string
  /** Opaque trader identifier (wallet address upstream) */
  readonly traderId: string
  readonly side: TradeSide
  readonly outcomeIndex: number | null
  /** Upstream record id, when the source provides one */
  readonly sourceId: string | null
  /** Upstream payload, passed through unchanged */
  readonly raw: Readonly<Record<string, unknown>>
}

// ============================================================================
// Intervals
// ============================================================================

/**
 * Half-open time window [start, end) in seconds.
 */
export interface Interval {
  readonly start: number
  readonly end: number
}

// ============================================================================
// Boundary Resolution
// ============================================================================

export type BoundarySource = 'metadata' | 'store' | 'fallback'

export interface BoundaryResolution {
  /** Earliest timestamp (seconds) ingestion starts from */
  timestamp: number
  /** Which strategy produced the timestamp */
  source: BoundarySource
}

// ============================================================================
// Interval Fetch
// ============================================================================

export interface IntervalFetchResult {
  interval: Interval
  /** Records inside the interval window */
  records: TradeRecord[]
  /** Pages requested, failed attempts included */
  pages: number
  /** Page depth cap was reached on a full page */
  truncated: boolean
  /** A page request failed after retries; records may be incomplete */
  failed: boolean
  /** Failure message when failed */
  error: string | null
  /** Records returned by the source but outside the window */
  outOfWindow: number
  /** Upstream records rejected by normalization */
  invalid: number
}

// ============================================================================
// Orchestration
// ============================================================================

export type OrchestratorState =
  | 'IDLE'
  | 'RESOLVING_BOUNDARY'
  | 'GENERATING_INTERVALS'
  | 'FETCHING'
  | 'DONE'
  | 'FAILED'

export type RunStatus = 'completed' | 'partial' | 'failed'

/**
 * Progress notification, emitted after each interval.
 */
export interface IngestionProgress {
  /** Zero-based index of the interval just processed */
  intervalIndex: number
  totalIntervals: number
  interval: Interval
  /** New records accepted so far in this run */
  newCount: number
  /** Duplicates seen so far in this run */
  duplicateCount: number
}

/**
 * Synchronous hook. Must not perform network calls.
 */
export type ProgressCallback = (progress: IngestionProgress) => void

export interface RunOptions {
  /** Cooperative cancellation, checked between intervals */
  signal?: AbortSignal
  onProgress?: ProgressCallback
}

export interface RunResult {
  runId: string
  marketId: string
  status: RunStatus
  /**
   * True only when every interval was processed and persisted. Failed
   * intervals clear it; truncated ones stay a flag.
   */
  completed: boolean
  /** Records accepted as new, flushed or not */
  newCount: number
  /** Rows the store reported as written */
  persistedCount: number
  duplicateCount: number
  invalidCount: number
  truncatedIntervals: Interval[]
  failedIntervals: Interval[]
  /** Intervals not processed because the run was cancelled or failed */
  pendingIntervals: Interval[]
  totalIntervals: number
  processedIntervals: number
  batchesFlushed: number
  boundary: BoundaryResolution | null
  durationMs: number
  error?: string
}

// ============================================================================
// Durable Store
// ============================================================================

/**
 * Durable trade store, scoped by market.
 */
export interface TradeStore {
  /**
   * Persist a batch atomically (all or nothing).
   * @returns Number of rows actually written
   */
  insertBatch(marketId: string, records: readonly TradeRecord[]): Promise<number>

  /**
   * Signatures of every trade already stored for the market.
   */
  getExistingSignatures(marketId: string): Promise<Set<string>>

  /**
   * Oldest stored trade timestamp for the market, or null when empty.
   */
  getOldestTimestamp(marketId: string): Promise<number | null>
}
