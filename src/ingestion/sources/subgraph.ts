/**
 * GraphQL trade history (subgraph gateway).
 *
 * Gateways answer 200 with an `errors` array when indexers lag or the
 * deployment is briefly unavailable; those are classified as degraded and
 * retried. Any other body error means the query itself is wrong.
 */

import { z } from 'zod'
import { SourceDegradedError, SourceQueryError } from '../core/errors'
import { normalizeTrade } from '../core/normalize'
import type { TradeRecord } from '../core/types'
import { requestJson } from './http'
import type { TradePage, TradePageQuery, TradeSource } from './types'

export const TRADES_QUERY = `
  query GetTrades($market: String!, $first: Int!, $skip: Int!, $start: BigInt!, $end: BigInt!) {
    trades(
      first: $first
      skip: $skip
      where: { market: $market, timestamp_gte: $start, timestamp_lt: $end }
      orderBy: timestamp
      orderDirection: desc
    ) {
      id
      outcomeIndex
      price
      amount
      timestamp
      user {
        id
      }
      side
    }
  }
`

const DEGRADED_PATTERNS = [
  'bad indexers',
  'unavailable',
  'too far behind',
  'no field',
  'unknown field',
] as const

const graphqlResponseSchema = z.object({
  data: z
    .object({ trades: z.array(z.record(z.unknown())).nullable().optional() })
    .nullable()
    .optional(),
  errors: z
    .array(z.object({ message: z.string() }).passthrough())
    .optional(),
})

/**
 * Decide whether GraphQL body errors are transient.
 */
export function classifyGraphqlErrors(messages: string[]): SourceDegradedError | SourceQueryError {
  const summary = messages.join('; ')
  const lower = summary.toLowerCase()
  if (DEGRADED_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new SourceDegradedError(`Subgraph degraded: ${summary}`, messages)
  }
  return new SourceQueryError(`Subgraph rejected query: ${summary}`, messages)
}

export function parseSubgraphTrade(
  raw: Record<string, unknown>,
  marketId: string,
): TradeRecord | null {
  const user = raw.user
  const trader =
    typeof user === 'object' && user !== null && 'id' in user ? user.id : user

  return normalizeTrade(
    {
      id: raw.id,
      timestamp: raw.timestamp,
      price: raw.price,
      size: raw.amount,
      trader,
      side: raw.side,
      outcomeIndex: raw.outcomeIndex,
      raw,
    },
    marketId,
  )
}

export interface SubgraphSourceOptions {
  url: string
  timeoutMs?: number
}

export class SubgraphTradeSource implements TradeSource {
  readonly name = 'subgraph'
  readonly supportsTimeWindow = true
  readonly newestFirst = true

  constructor(private readonly options: SubgraphSourceOptions) {}

  async fetchTradePage(query: TradePageQuery): Promise<TradePage> {
    const body = await requestJson(this.options.url, graphqlResponseSchema, {
      method: 'POST',
      body: {
        query: TRADES_QUERY,
        variables: {
          market: query.marketId,
          first: query.limit,
          skip: query.offset,
          start: String(query.window.start),
          end: String(query.window.end),
        },
      },
      timeoutMs: this.options.timeoutMs,
    })

    if (body.errors && body.errors.length > 0) {
      throw classifyGraphqlErrors(body.errors.map((error) => error.message))
    }

    const rawTrades = body.data?.trades
    if (!rawTrades) {
      throw new SourceDegradedError('Subgraph returned no trades field')
    }

    const records: TradeRecord[] = []
    for (const raw of rawTrades) {
      const record = parseSubgraphTrade(raw, query.marketId)
      if (record) records.push(record)
    }

    return { records, received: rawTrades.length, invalid: rawTrades.length - records.length }
  }
}
