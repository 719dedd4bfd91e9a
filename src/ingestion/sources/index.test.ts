import { describe, it, expect } from 'vitest'
import { getAppEnv } from '@/config/ingestionConfig'
import { DataApiTradeSource } from './data-api'
import { createTradeSources, resolveTradeSourceKind } from './index'
import { SubgraphTradeSource } from './subgraph'

const SUBGRAPH_URL = 'https://subgraph.test/trades'

describe('resolveTradeSourceKind', () => {
  it('prefers the subgraph when its URL is configured', () => {
    expect(resolveTradeSourceKind(getAppEnv({ SUBGRAPH_URL }))).toBe('subgraph')
  })

  it('uses the REST endpoint otherwise', () => {
    expect(resolveTradeSourceKind(getAppEnv({}))).toBe('data-api')
  })

  it('follows an explicit TRADE_SOURCE', () => {
    expect(resolveTradeSourceKind(getAppEnv({ TRADE_SOURCE: 'data-api', SUBGRAPH_URL }))).toBe(
      'data-api',
    )
  })
})

describe('createTradeSources', () => {
  it('backs the subgraph with the REST endpoint', () => {
    const { source, fallbackSource } = createTradeSources(getAppEnv({ SUBGRAPH_URL }))

    expect(source).toBeInstanceOf(SubgraphTradeSource)
    expect(fallbackSource).toBeInstanceOf(DataApiTradeSource)
  })

  it('uses the REST endpoint alone without a subgraph', () => {
    const { source, fallbackSource } = createTradeSources(getAppEnv({}))

    expect(source).toBeInstanceOf(DataApiTradeSource)
    expect(fallbackSource).toBeNull()
  })

  it('rejects a subgraph source without URL', () => {
    expect(() => createTradeSources(getAppEnv({ TRADE_SOURCE: 'subgraph' }))).toThrow(
      'TRADE_SOURCE=subgraph requires SUBGRAPH_URL',
    )
  })
})
