/**
 * Start Boundary Resolution
 *
 * Decides how far back a run starts. Strategies are tried in order and the
 * first one returning a timestamp wins:
 *   1. creation/start date from market metadata
 *   2. oldest stored trade minus a safety margin
 *   3. configured fallback date
 */

import type { IngestionConfig } from '@/config/schemas'
import { createLogger } from '@/utils/logger'
import type { MarketMetadataSource } from '../sources/types'
import { toErrorMessage } from './errors'
import { parseTimestampValue } from './normalize'
import type { RetryingTransport } from './rate-limit'
import type { BoundaryResolution, BoundarySource, TradeStore } from './types'

const log = createLogger('ingest')

/**
 * Metadata fields that may hold the market creation/start date, in
 * precedence order.
 */
export const METADATA_START_FIELDS = [
  'createdAt',
  'created_at',
  'startDate',
  'start_date',
  'created',
  'creationDate',
] as const

/**
 * Read the first recognized, parseable start field.
 *
 * @returns Epoch seconds, or null if no field is usable
 */
export function extractStartTimestamp(metadata: Record<string, unknown>): number | null {
  for (const field of METADATA_START_FIELDS) {
    if (!(field in metadata)) continue

    const timestamp = parseTimestampValue(metadata[field])
    if (timestamp !== null) {
      return timestamp
    }
    log.debug('Ignoring unparseable metadata start field', { field, value: metadata[field] })
  }
  return null
}

interface BoundaryStrategy {
  source: BoundarySource
  resolve(marketId: string): Promise<number | null>
}

export interface BoundaryResolverDeps {
  /** Null when the deployment has no metadata endpoint */
  metadata: MarketMetadataSource | null
  store: Pick<TradeStore, 'getOldestTimestamp'>
  transport: RetryingTransport
}

export type BoundaryResolverConfig = Pick<
  IngestionConfig,
  'fallbackStartDate' | 'boundarySafetyMarginSeconds'
>

export class StartBoundaryResolver {
  private readonly strategies: BoundaryStrategy[]
  private readonly fallbackTimestamp: number

  constructor(
    private readonly deps: BoundaryResolverDeps,
    private readonly config: BoundaryResolverConfig,
  ) {
    const fallback = parseTimestampValue(config.fallbackStartDate)
    if (fallback === null) {
      throw new RangeError(`Invalid fallback start date: ${config.fallbackStartDate}`)
    }
    this.fallbackTimestamp = fallback

    this.strategies = [
      { source: 'metadata', resolve: (marketId) => this.fromMetadata(marketId) },
      { source: 'store', resolve: (marketId) => this.fromStore(marketId) },
    ]
  }

  /**
   * Resolve the earliest timestamp to ingest from. Never fails.
   */
  async resolve(marketId: string): Promise<BoundaryResolution> {
    for (const strategy of this.strategies) {
      const timestamp = await strategy.resolve(marketId)
      if (timestamp !== null) {
        log.info('Resolved start boundary', { marketId, source: strategy.source, timestamp })
        return { timestamp, source: strategy.source }
      }
    }

    log.info('Using fallback start boundary', {
      marketId,
      timestamp: this.fallbackTimestamp,
      fallbackStartDate: this.config.fallbackStartDate,
    })
    return { timestamp: this.fallbackTimestamp, source: 'fallback' }
  }

  private async fromMetadata(marketId: string): Promise<number | null> {
    const { metadata, transport } = this.deps
    if (!metadata) return null

    const result = await transport.execute('market metadata', () =>
      metadata.fetchMarketMetadata(marketId),
    )

    if (!result.ok) {
      log.warn('Market metadata unavailable', { marketId, reason: result.error.message })
      return null
    }
    if (!result.value) {
      log.warn('Market not found in metadata', { marketId })
      return null
    }

    const timestamp = extractStartTimestamp(result.value)
    if (timestamp === null) {
      log.warn('Market metadata has no recognized start field', {
        marketId,
        fields: Object.keys(result.value),
      })
    }
    return timestamp
  }

  private async fromStore(marketId: string): Promise<number | null> {
    try {
      const oldest = await this.deps.store.getOldestTimestamp(marketId)
      return oldest === null ? null : oldest - this.config.boundarySafetyMarginSeconds
    } catch (error) {
      log.warn('Could not read oldest stored trade', { marketId, reason: toErrorMessage(error) })
      return null
    }
  }
}
