/**
 * Ingestion Orchestrator
 *
 * Drives one market's run end to end:
 *
 *   RESOLVING_BOUNDARY -> GENERATING_INTERVALS -> FETCHING -> DONE
 *
 * Intervals are processed oldest first, one at a time, so an interrupted run
 * still leaves a contiguous prefix of history in the store and deduplication
 * is deterministic. New trades are buffered and flushed in batches of at most
 * batchSize records. A failed interval is logged and skipped; only a store
 * failure ends the run early (state FAILED).
 */

import type { IngestionConfig } from '@/config/schemas'
import { generatePrefixedId } from '@/utils/id'
import { createLogger } from '@/utils/logger'
import { runWithContext } from '@/utils/run-context'
import type { MarketMetadataSource, TradeSource } from '../sources/types'
import { StartBoundaryResolver } from './boundary'
import { PersistenceError, toErrorMessage } from './errors'
import { IntervalFetcher } from './interval-fetcher'
import { formatInterval, generateIntervals } from './intervals'
import { RateLimiter, RetryingTransport, toRateLimitConfig } from './rate-limit'
import { RunStats } from './run-stats'
import { SignatureStore, computeTradeSignature } from './signature'
import type {
  BoundaryResolution,
  Interval,
  IngestionProgress,
  OrchestratorState,
  RunOptions,
  RunResult,
  RunStatus,
  TradeRecord,
  TradeStore,
} from './types'

const log = createLogger('ingest')

export interface OrchestratorDeps {
  source: TradeSource
  /** Refetches intervals the primary source failed to deliver */
  fallbackSource?: TradeSource | null
  /** Null when no metadata endpoint is available */
  metadata: MarketMetadataSource | null
  store: TradeStore
  /** Share one limiter to keep several orchestrators under a common budget */
  rateLimiter?: RateLimiter
  /** Current time in epoch seconds */
  now?: () => number
}

const ACTIVE_STATES: ReadonlySet<OrchestratorState> = new Set([
  'RESOLVING_BOUNDARY',
  'GENERATING_INTERVALS',
  'FETCHING',
])

export class IngestionOrchestrator {
  readonly transport: RetryingTransport

  private state: OrchestratorState = 'IDLE'
  private readonly resolver: StartBoundaryResolver
  private readonly fetcher: IntervalFetcher
  private readonly now: () => number

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly config: IngestionConfig,
  ) {
    const rateLimitConfig = toRateLimitConfig(config)
    const rateLimiter = deps.rateLimiter ?? new RateLimiter(rateLimitConfig)

    this.transport = new RetryingTransport(rateLimiter, rateLimitConfig)
    this.resolver = new StartBoundaryResolver(
      { metadata: deps.metadata, store: deps.store, transport: this.transport },
      config,
    )
    this.fetcher = new IntervalFetcher(
      deps.source,
      this.transport,
      config,
      deps.fallbackSource ?? null,
    )
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000))
  }

  getState(): OrchestratorState {
    return this.state
  }

  /**
   * Ingest the full history of one market.
   * Always resolves with a RunResult; store failures yield status "failed".
   */
  async run(marketId: string, options: RunOptions = {}): Promise<RunResult> {
    if (ACTIVE_STATES.has(this.state)) {
      throw new Error(`Orchestrator is busy (${this.state}); create one per concurrent run`)
    }

    const runId = generatePrefixedId('run')
    return runWithContext({ runId, marketId }, () => this.execute(runId, marketId, options))
  }

  private async execute(runId: string, marketId: string, options: RunOptions): Promise<RunResult> {
    const stats = new RunStats()
    const signatures = new SignatureStore()
    const { store } = this.deps
    let batch: TradeRecord[] = []
    let boundary: BoundaryResolution | null = null
    let intervals: Interval[] = []

    const finish = (status: RunStatus, pendingIntervals: Interval[], error?: string): RunResult => {
      this.transition(status === 'failed' ? 'FAILED' : 'DONE')
      const result = stats.toResult({
        runId,
        marketId,
        status,
        boundary,
        totalIntervals: intervals.length,
        pendingIntervals,
        error,
      })

      const summary = {
        status,
        newCount: result.newCount,
        persistedCount: result.persistedCount,
        duplicateCount: result.duplicateCount,
        invalidCount: result.invalidCount,
        outOfWindow: stats.outOfWindowCount,
        intervals: `${result.processedIntervals}/${result.totalIntervals}`,
        truncatedIntervals: result.truncatedIntervals.length,
        failedIntervals: result.failedIntervals.length,
        pendingIntervals: pendingIntervals.length,
        pages: stats.pages,
        batchesFlushed: result.batchesFlushed,
        ...this.transport.stats,
        duration: result.durationMs,
      }
      if (status === 'failed') {
        log.error('Ingestion run failed', { ...summary, error })
      } else if (result.truncatedIntervals.length > 0 || result.failedIntervals.length > 0) {
        log.warn('Ingestion run finished with incomplete intervals', summary)
      } else {
        log.info('Ingestion run finished', summary)
      }
      return result
    }

    const flush = async (): Promise<void> => {
      if (batch.length === 0) return
      const records = batch
      batch = []
      let written: number
      try {
        written = await store.insertBatch(marketId, records)
      } catch (error) {
        throw new PersistenceError('insertBatch', error)
      }
      stats.recordFlush(written)
      log.debug('Flushed batch', { records: records.length, written })
    }

    // RESOLVING_BOUNDARY
    this.transition('RESOLVING_BOUNDARY')
    try {
      const [resolved, existing] = await Promise.all([
        this.resolver.resolve(marketId),
        this.loadSignatures(marketId),
      ])
      boundary = resolved
      signatures.seed(existing)
      log.info('Seeded signatures from store', { marketId, signatures: signatures.size })
    } catch (error) {
      return finish('failed', [], toErrorMessage(error))
    }

    // GENERATING_INTERVALS
    this.transition('GENERATING_INTERVALS')
    intervals = generateIntervals(boundary.timestamp, this.now())
    if (intervals.length === 0) {
      log.info('Nothing to ingest: boundary is not in the past', { boundary })
      return finish('completed', [])
    }
    log.info('Generated intervals', {
      count: intervals.length,
      first: formatInterval(intervals[0]),
      last: formatInterval(intervals[intervals.length - 1]),
    })

    // FETCHING
    this.transition('FETCHING')
    for (const [index, interval] of intervals.entries()) {
      if (options.signal?.aborted) {
        const pending = intervals.slice(index)
        log.warn('Run cancelled between intervals', { processed: index, pending: pending.length })
        try {
          await flush()
        } catch (error) {
          return finish('failed', pending, toErrorMessage(error))
        }
        return finish('partial', pending)
      }

      const result = await this.fetcher.fetch(marketId, interval)

      if (result.failed) {
        // A failed fetch means "unknown", not "empty": keep nothing from it
        log.warn('Interval fetch failed, counting zero new records', {
          interval: formatInterval(interval),
          discarded: result.records.length,
          error: result.error,
        })
      } else {
        try {
          for (const record of result.records) {
            if (!signatures.tryAdd(computeTradeSignature(record))) {
              stats.duplicateCount++
              continue
            }
            batch.push(record)
            stats.newCount++
            if (batch.length >= this.config.batchSize) {
              await flush()
            }
          }
        } catch (error) {
          return finish('failed', intervals.slice(index), toErrorMessage(error))
        }
      }

      stats.recordInterval(result)
      this.notifyProgress(options, {
        intervalIndex: index,
        totalIntervals: intervals.length,
        interval,
        newCount: stats.newCount,
        duplicateCount: stats.duplicateCount,
      })
    }

    // DONE
    try {
      await flush()
    } catch (error) {
      return finish('failed', [], toErrorMessage(error))
    }
    return finish('completed', [])
  }

  private async loadSignatures(marketId: string): Promise<Set<string>> {
    try {
      return await this.deps.store.getExistingSignatures(marketId)
    } catch (error) {
      throw new PersistenceError('getExistingSignatures', error)
    }
  }

  private notifyProgress(options: RunOptions, progress: IngestionProgress): void {
    if (!options.onProgress) return
    try {
      options.onProgress(progress)
    } catch (error) {
      log.warn('Progress callback threw', { intervalIndex: progress.intervalIndex }, error)
    }
  }

  private transition(next: OrchestratorState): void {
    log.debug('State transition', { from: this.state, to: next })
    this.state = next
  }
}
