/**
 * Normalization Utilities
 *
 * Turns upstream trade payloads (strings or numbers, mixed field names)
 * into immutable TradeRecords with canonical values, so that the same trade
 * served by different pages or sources yields the same signature.
 */

import type { TradeRecord, TradeSide } from './types'

// ============================================================================
// Decimal Normalization
// ============================================================================

const DECIMAL_PATTERN = /^\d+(\.\d+)?([eE][-+]?\d+)?$/

/**
 * Normalizes a non-negative decimal to its canonical string form.
 * - "0.5500" → "0.55"
 * - 12 → "12"
 * - "1e3" → "1000"
 *
 * @returns The canonical string, or null if invalid or negative
 */
export function normalizeDecimal(value: unknown): string | null {
  let parsed: number

  if (typeof value === 'number') {
    parsed = value
  } else if (typeof value === 'string') {
    const trimmed = value.trim()
    if (!DECIMAL_PATTERN.test(trimmed)) return null
    parsed = Number(trimmed)
  } else {
    return null
  }

  if (!Number.isFinite(parsed) || parsed < 0) return null
  return String(parsed)
}

// ============================================================================
// Timestamp Parsing
// ============================================================================

/** Numeric epochs above this are milliseconds */
const EPOCH_MS_THRESHOLD = 1e12

/**
 * Parses an epoch (seconds or milliseconds, number or numeric string) or an
 * ISO-8601 string into integer epoch seconds.
 *
 * @returns Seconds since epoch, or null if the value is not a usable timestamp
 */
export function parseTimestampValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return epochToSeconds(value)
  }

  if (typeof value !== 'string') return null

  const trimmed = value.trim()
  if (trimmed === '') return null

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return epochToSeconds(Number(trimmed))
  }

  const ms = Date.parse(trimmed)
  if (Number.isNaN(ms)) return null
  return epochToSeconds(ms)
}

function epochToSeconds(value: number): number | null {
  if (!Number.isFinite(value) || value <= 0) return null
  const seconds = value > EPOCH_MS_THRESHOLD ? value / 1000 : value
  return Math.floor(seconds)
}

// ============================================================================
// Trade Normalization
// ============================================================================

/**
 * Source-agnostic view of one upstream trade, before validation.
 */
export interface UpstreamTradeFields {
  id?: unknown
  timestamp: unknown
  price: unknown
  size: unknown
  trader: unknown
  side?: unknown
  outcomeIndex?: unknown
  raw: Record<string, unknown>
}

export function normalizeSide(value: unknown): TradeSide {
  if (typeof value !== 'string') return 'unknown'
  const lower = value.trim().toLowerCase()
  return lower === 'buy' || lower === 'sell' ? lower : 'unknown'
}

function normalizeOutcomeIndex(value: unknown): number | null {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= 0 ? parsed : null
}

/**
 * Validate and normalize one upstream trade.
 * Trades without a trader or with a non-positive timestamp are rejected.
 *
 * @returns The normalized record, or null if the trade is unusable
 */
export function normalizeTrade(fields: UpstreamTradeFields, marketId: string): TradeRecord | null {
  const timestamp = parseTimestampValue(fields.timestamp)
  const price = normalizeDecimal(fields.price)
  const size = normalizeDecimal(fields.size)
  const traderId = typeof fields.trader === 'string' ? fields.trader.trim() : ''

  if (timestamp === null || price === null || size === null || traderId === '') {
    return null
  }

  const sourceId =
    typeof fields.id === 'string' && fields.id !== ''
      ? fields.id
      : typeof fields.id === 'number'
        ? String(fields.id)
        : null

  return Object.freeze({
    marketId,
    timestamp,
    price,
    size,
    traderId,
    side: normalizeSide(fields.side),
    outcomeIndex: normalizeOutcomeIndex(fields.outcomeIndex),
    sourceId,
    raw: fields.raw,
  })
}
