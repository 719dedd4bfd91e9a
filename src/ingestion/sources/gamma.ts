/**
 * Market metadata lookup (gamma API).
 *
 * Numeric ids are looked up by path, condition ids ("0x...") through the
 * condition_ids filter.
 */

import { z } from 'zod'
import { HttpStatusError } from '../core/errors'
import type { RetryingTransport } from '../core/rate-limit'
import { buildUrl, requestJson } from './http'
import type { MarketMetadataSource } from './types'

const marketSchema = z.record(z.unknown())
const marketListSchema = z.array(marketSchema)

const NUMERIC_ID = /^\d+$/

export function isNumericMarketId(marketId: string): boolean {
  return NUMERIC_ID.test(marketId)
}

export interface GammaSourceOptions {
  baseUrl: string
  timeoutMs?: number
}

export class GammaMetadataSource implements MarketMetadataSource {
  constructor(private readonly options: GammaSourceOptions) {}

  async fetchMarketMetadata(marketId: string): Promise<Record<string, unknown> | null> {
    const { baseUrl, timeoutMs } = this.options

    if (isNumericMarketId(marketId)) {
      const url = buildUrl(baseUrl, `markets/${marketId}`)
      try {
        return await requestJson(url, marketSchema, { timeoutMs })
      } catch (error) {
        if (error instanceof HttpStatusError && error.status === 404) {
          return null
        }
        throw error
      }
    }

    const url = buildUrl(baseUrl, 'markets', { condition_ids: marketId })
    const markets = await requestJson(url, marketListSchema, { timeoutMs })
    return markets[0] ?? null
  }
}

/**
 * Resolve the condition id trades are keyed by.
 *
 * Numeric ids are looked up; anything else is assumed to already be a
 * condition id. When the lookup fails the input is used unchanged.
 */
export async function resolveConditionId(
  marketId: string,
  metadata: MarketMetadataSource,
  transport: RetryingTransport,
): Promise<{ conditionId: string; resolved: boolean; reason?: string }> {
  if (!isNumericMarketId(marketId)) {
    return { conditionId: marketId, resolved: false }
  }

  const result = await transport.execute('market metadata', () =>
    metadata.fetchMarketMetadata(marketId),
  )
  if (!result.ok) {
    return { conditionId: marketId, resolved: false, reason: result.error.message }
  }

  const conditionId = result.value?.conditionId
  if (typeof conditionId !== 'string' || conditionId === '') {
    return { conditionId: marketId, resolved: false, reason: 'conditionId not found' }
  }
  return { conditionId, resolved: true }
}
