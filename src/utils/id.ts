/**
 * ID Generation Utilities
 *
 * Time-sortable, prefixed IDs for ingestion runs, e.g. `run_0CL2Kw8kJ2mN4pQ6rS0t`.
 */

import { getRandomValues } from 'node:crypto'

/** Base62 alphabet: 0-9, A-Z, a-z */
const BASE62_ALPHABET =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'

/**
 * Encode a Unix timestamp (seconds) as a 6-character base62 string.
 * Lexicographic order of the output follows numeric order of the input.
 */
export function encodeTimestampBase62(timestampSeconds: number): string {
  let n = Math.floor(timestampSeconds)
  let result = ''
  for (let i = 0; i < 6; i++) {
    result = BASE62_ALPHABET[n % 62] + result
    n = Math.floor(n / 62)
  }
  return result
}

/**
 * Random base62 string. Bytes >= 248 are rejected so every character
 * is uniformly distributed.
 */
export function randomBase62(length: number): string {
  let result = ''
  while (result.length < length) {
    const bytes = new Uint8Array(length * 2)
    getRandomValues(bytes)
    for (const byte of bytes) {
      if (byte < 248 && result.length < length) {
        result += BASE62_ALPHABET[byte % 62]
      }
    }
  }
  return result
}

/**
 * Generate a prefixed, time-sortable ID.
 *
 * @example
 * generatePrefixedId('run') // "run_0CL2Kw8kJ2mN4pQ6rS0tU3vW"
 */
export function generatePrefixedId(prefix: string, randomLength = 14): string {
  const timestamp = encodeTimestampBase62(Math.floor(Date.now() / 1000))
  return `${prefix}_${timestamp}${randomBase62(randomLength)}`
}
