/**
 * JSON over HTTP for upstream sources.
 *
 * Every failure is mapped onto the ingestion error taxonomy so that the
 * RetryingTransport can decide whether to try again.
 */

import type { z } from 'zod'
import { createLogger } from '@/utils/logger'
import {
  HttpStatusError,
  NetworkError,
  ResponseValidationError,
  toErrorMessage,
} from '../core/errors'

const log = createLogger('http')

const DEFAULT_TIMEOUT_MS = 30_000
const USER_AGENT = 'trade-history-ingest/0.1'

export interface RequestJsonOptions {
  method?: 'GET' | 'POST'
  /** Serialized as JSON */
  body?: unknown
  timeoutMs?: number
}

/**
 * Fetch a URL and validate the JSON payload.
 *
 * @throws NetworkError when no response arrives
 * @throws HttpStatusError for non-2xx responses (Retry-After preserved)
 * @throws ResponseValidationError when the body is not JSON or fails the schema
 */
export async function requestJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestJsonOptions = {},
): Promise<T> {
  const { method = 'GET', body, timeoutMs = DEFAULT_TIMEOUT_MS } = options
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
  }
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  const startedAt = Date.now()
  let response: Response
  try {
    response = await fetch(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    throw new NetworkError(url, error)
  }

  log.debug('HTTP response', {
    method,
    url,
    status: response.status,
    duration: Date.now() - startedAt,
  })

  if (!response.ok) {
    throw new HttpStatusError(url, response.status, response.headers.get('retry-after'))
  }

  let payload: unknown
  try {
    payload = await response.json()
  } catch (error) {
    throw new ResponseValidationError(url, `invalid JSON (${toErrorMessage(error)})`)
  }

  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ResponseValidationError(url, issues)
  }
  return parsed.data
}

/**
 * Append query parameters, skipping undefined values.
 */
export function buildUrl(
  base: string,
  path: string,
  params: Record<string, string | number | undefined> = {},
): string {
  const url = new URL(path, base.endsWith('/') ? base : `${base}/`)
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value))
    }
  }
  return url.toString()
}
