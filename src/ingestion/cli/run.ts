/**
 * Run CLI Command - Full History Ingestion
 *
 * Resolves the market's condition id, then runs the pipeline:
 * boundary -> intervals -> fetch -> dedup -> persist
 *
 * Ctrl-C once cancels after the current interval (status "partial");
 * a second Ctrl-C exits immediately.
 */

import { loadIngestionConfig, getAppEnv } from '@/config/ingestionConfig'
import { tradeSourceKindSchema, type AppEnv, type IngestionConfigInput } from '@/config/schemas'
import { createLogger } from '@/utils/logger'
import { formatInterval } from '../core/intervals'
import { RateLimiter, RetryingTransport, toRateLimitConfig } from '../core/rate-limit'
import type { IngestionProgress, RunResult } from '../core/types'
import { createPipelineDeps, runIngestion } from '../pipeline'
import { resolveConditionId } from '../sources'

const log = createLogger('cli')

// ============================================================================
// Types
// ============================================================================

export interface RunCommandOptions {
  rps?: number
  batchSize?: number
  pageSize?: number
  maxPages?: number
  maxAttempts?: number
  fallbackStart?: string
  source?: string
  db?: string
  /** --no-resolve skips the numeric id lookup */
  resolve: boolean
  progress: boolean
}

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_INCOMPLETE = 2
export const EXIT_CANCELLED = 130

// ============================================================================
// Output
// ============================================================================

function printProgress(progress: IngestionProgress): void {
  const position = `[${progress.intervalIndex + 1}/${progress.totalIntervals}]`
  console.log(
    `${position} ${formatInterval(progress.interval)} new=${progress.newCount} dup=${progress.duplicateCount}`,
  )
}

/**
 * Print run summary.
 */
export function printSummary(result: RunResult): void {
  console.log('')
  console.log('='.repeat(60))
  console.log(`Run ${result.runId}: ${result.status.toUpperCase()}`)
  console.log('='.repeat(60))
  console.log(`  Market:           ${result.marketId}`)
  if (result.boundary) {
    const start = new Date(result.boundary.timestamp * 1000).toISOString()
    console.log(`  Start boundary:   ${start} (${result.boundary.source})`)
  }
  console.log(`  Intervals:        ${result.processedIntervals}/${result.totalIntervals}`)
  console.log(`  New trades:       ${result.newCount}`)
  console.log(`  Rows written:     ${result.persistedCount}`)
  console.log(`  Duplicates:       ${result.duplicateCount}`)
  console.log(`  Invalid records:  ${result.invalidCount}`)
  console.log(`  Batches flushed:  ${result.batchesFlushed}`)
  console.log(`  Duration:         ${(result.durationMs / 1000).toFixed(1)}s`)

  const sections: Array<[string, RunResult['failedIntervals']]> = [
    ['Failed intervals', result.failedIntervals],
    ['Truncated intervals', result.truncatedIntervals],
    ['Pending intervals', result.pendingIntervals],
  ]
  for (const [title, intervals] of sections) {
    if (intervals.length === 0) continue
    console.log('')
    console.log(`${title} (${intervals.length}):`)
    for (const interval of intervals.slice(0, 10)) {
      console.log(`  - ${formatInterval(interval)}`)
    }
    if (intervals.length > 10) {
      console.log(`  ... and ${intervals.length - 10} more`)
    }
  }

  if (result.error) {
    console.log('')
    console.log(`Error: ${result.error}`)
  }
  console.log('')
}

/**
 * Map a run result onto the process exit code.
 */
export function exitCodeFor(result: RunResult): number {
  switch (result.status) {
    case 'failed':
      return EXIT_FAILED
    case 'partial':
      return EXIT_CANCELLED
    case 'completed':
      return result.failedIntervals.length > 0 || result.truncatedIntervals.length > 0
        ? EXIT_INCOMPLETE
        : EXIT_OK
  }
}

// ============================================================================
// Command
// ============================================================================

export async function runCommand(marketId: string, options: RunCommandOptions): Promise<number> {
  const baseEnv = getAppEnv()
  const env: AppEnv = {
    ...baseEnv,
    TRADE_SOURCE: options.source ? tradeSourceKindSchema.parse(options.source) : baseEnv.TRADE_SOURCE,
    DATABASE_PATH: options.db ?? baseEnv.DATABASE_PATH,
  }

  const overrides: IngestionConfigInput = {
    requestsPerSecond: options.rps,
    batchSize: options.batchSize,
    pageSize: options.pageSize,
    maxPagesPerInterval: options.maxPages,
    maxAttempts: options.maxAttempts,
    fallbackStartDate: options.fallbackStart,
  }
  const config = loadIngestionConfig(env, overrides)
  const deps = await createPipelineDeps(env)
  // One limiter for the id lookup and the run itself
  const rateLimiter = new RateLimiter(toRateLimitConfig(config))

  const controller = new AbortController()
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      console.error('Aborting immediately.')
      process.exit(EXIT_CANCELLED)
    }
    console.error('Cancelling after the current interval (Ctrl-C again to abort)...')
    controller.abort()
  }
  process.on('SIGINT', onSigint)

  try {
    let conditionId = marketId
    if (options.resolve && deps.metadata) {
      const transport = new RetryingTransport(rateLimiter, toRateLimitConfig(config))
      const resolution = await resolveConditionId(marketId, deps.metadata, transport)
      conditionId = resolution.conditionId
      if (resolution.resolved) {
        log.info('Resolved condition id', { marketId, conditionId })
      } else if (resolution.reason) {
        log.warn('Could not resolve condition id, using input as is', {
          marketId,
          reason: resolution.reason,
        })
      }
    }

    const sources = deps.fallbackSource
      ? `${deps.source.name} (fallback ${deps.fallbackSource.name})`
      : deps.source.name
    console.log(`Ingesting ${conditionId} from ${sources} into ${env.DATABASE_PATH}`)

    const result = await runIngestion(
      conditionId,
      config,
      { ...deps, rateLimiter },
      {
        signal: controller.signal,
        onProgress: options.progress ? printProgress : undefined,
      },
    )

    printSummary(result)
    return exitCodeFor(result)
  } finally {
    process.off('SIGINT', onSigint)
    deps.close()
  }
}
