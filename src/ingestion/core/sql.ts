/**
 * SQL Batching Utilities
 *
 * SQLite rejects statements with more bound parameters than its host
 * parameter limit. Multi-row inserts are split into chunks that stay under it.
 */

// Historical SQLITE_MAX_VARIABLE_NUMBER; newer builds allow more
const SQLITE_MAX_PARAMS = 999

/**
 * Compute how many rows fit in one statement.
 *
 * @param columnsPerRow - Bound parameters per row
 * @returns Maximum rows per statement, at least 1
 */
export function computeBatchSize(columnsPerRow: number): number {
  return Math.max(1, Math.floor(SQLITE_MAX_PARAMS / columnsPerRow))
}

/**
 * Split rows into consecutive chunks of at most size rows.
 */
export function chunkRows<T>(rows: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`)
  }
  const chunks: T[][] = []
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size))
  }
  return chunks
}
