/**
 * Trade Signatures
 *
 * A signature is the heuristic identity of a trade: timestamp, price, size
 * and trader joined with "|". Upstream records carry no id that is stable
 * across endpoints, so two distinct trades agreeing on all four fields are
 * treated as one. That collision is accepted, not guarded against.
 */

import type { TradeRecord } from './types'

type SignatureFields = Pick<TradeRecord, 'timestamp' | 'price' | 'size' | 'traderId'>

/**
 * Compute the deduplication key of a trade.
 * Inputs must already be normalized (see normalizeTrade).
 */
export function computeTradeSignature(trade: SignatureFields): string {
  return `${trade.timestamp}|${trade.price}|${trade.size}|${trade.traderId}`
}

/**
 * In-memory set of signatures already accepted for one market.
 *
 * Seeded from the durable store at the start of a run and grown as new
 * trades are accepted. Never written anywhere: the next run rebuilds it
 * from the store.
 *
 * tryAdd is the check-then-add used by the pipeline. It is synchronous, so
 * no other task can run between the check and the add.
 */
export class SignatureStore {
  private readonly signatures = new Set<string>()

  get size(): number {
    return this.signatures.size
  }

  seed(existing: Iterable<string>): void {
    for (const signature of existing) {
      this.signatures.add(signature)
    }
  }

  contains(signature: string): boolean {
    return this.signatures.has(signature)
  }

  add(signature: string): void {
    this.signatures.add(signature)
  }

  /**
   * Add the signature unless present.
   * @returns true if the signature was new
   */
  tryAdd(signature: string): boolean {
    if (this.signatures.has(signature)) {
      return false
    }
    this.signatures.add(signature)
    return true
  }
}
