/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Retryable: NetworkError, HttpStatusError (429 and 5xx), SourceDegradedError.
 * Everything else fails a request on the first attempt.
 */

/**
 * Transport-level failure: DNS, connection reset, timeout.
 */
export class NetworkError extends Error {
  readonly url: string

  constructor(url: string, cause: unknown) {
    super(`Network error requesting ${url}: ${toErrorMessage(cause)}`, { cause })
    this.name = 'NetworkError'
    this.url = url
  }
}

/**
 * Non-2xx HTTP response.
 */
export class HttpStatusError extends Error {
  readonly url: string
  readonly status: number
  /** Raw Retry-After header value, if present */
  readonly retryAfter: string | null

  constructor(url: string, status: number, retryAfter: string | null = null) {
    super(`HTTP ${status} from ${url}`)
    this.name = 'HttpStatusError'
    this.url = url
    this.status = status
    this.retryAfter = retryAfter
  }
}

/**
 * The source answered 200 but reported a partial outage in the body
 * (lagging or unavailable indexers, schema temporarily missing).
 */
export class SourceDegradedError extends Error {
  readonly details: string[]

  constructor(message: string, details: string[] = []) {
    super(message)
    this.name = 'SourceDegradedError'
    this.details = details
  }
}

/**
 * The source rejected the query itself. Retrying will not help.
 */
export class SourceQueryError extends Error {
  readonly details: string[]

  constructor(message: string, details: string[] = []) {
    super(message)
    this.name = 'SourceQueryError'
    this.details = details
  }
}

/**
 * Payload did not match the expected shape.
 */
export class ResponseValidationError extends Error {
  readonly url: string

  constructor(url: string, issues: string) {
    super(`Unexpected response from ${url}: ${issues}`)
    this.name = 'ResponseValidationError'
    this.url = url
  }
}

/**
 * The durable store failed. Fatal for the current run.
 */
export class PersistenceError extends Error {
  readonly operation: string

  constructor(operation: string, cause: unknown) {
    super(`Persistence failed during ${operation}: ${toErrorMessage(cause)}`, { cause })
    this.name = 'PersistenceError'
    this.operation = operation
  }
}

/**
 * Check if an HTTP status code is retryable.
 *
 * Retryable status codes:
 * - 429: Too Many Requests (rate limited)
 * - 500-599: server side failures
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600)
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof NetworkError || error instanceof SourceDegradedError) {
    return true
  }
  if (error instanceof HttpStatusError) {
    return isRetryableStatus(error.status)
  }
  return false
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
