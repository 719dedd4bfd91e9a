/**
 * Upstream sources
 */

import type { AppEnv, TradeSourceKind } from '@/config/schemas'
import { DataApiTradeSource } from './data-api'
import { GammaMetadataSource } from './gamma'
import { SubgraphTradeSource } from './subgraph'
import type { MarketMetadataSource, TradeSource } from './types'

export * from './data-api'
export * from './gamma'
export * from './http'
export * from './subgraph'
export * from './types'

export interface TradeSources {
  source: TradeSource
  /** Used for intervals the primary source failed to deliver */
  fallbackSource: TradeSource | null
}

/**
 * TRADE_SOURCE when set, otherwise subgraph if SUBGRAPH_URL is configured.
 */
export function resolveTradeSourceKind(env: AppEnv): TradeSourceKind {
  return env.TRADE_SOURCE ?? (env.SUBGRAPH_URL ? 'subgraph' : 'data-api')
}

/**
 * Build the primary trade source and its fallback.
 *
 * The subgraph indexes the complete history; the REST endpoint backs it up
 * when the subgraph is degraded or rejects a query.
 */
export function createTradeSources(env: AppEnv): TradeSources {
  const dataApi = new DataApiTradeSource({ baseUrl: env.DATA_API_URL })

  switch (resolveTradeSourceKind(env)) {
    case 'data-api':
      return { source: dataApi, fallbackSource: null }
    case 'subgraph':
      if (!env.SUBGRAPH_URL) {
        throw new Error('TRADE_SOURCE=subgraph requires SUBGRAPH_URL')
      }
      return { source: new SubgraphTradeSource({ url: env.SUBGRAPH_URL }), fallbackSource: dataApi }
  }
}

export function createMetadataSource(env: AppEnv): MarketMetadataSource {
  return new GammaMetadataSource({ baseUrl: env.GAMMA_API_URL })
}
