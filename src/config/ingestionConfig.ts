import {
  appEnvSchema,
  ingestionConfigSchema,
  type AppEnv,
  type IngestionConfig,
  type IngestionConfigInput,
} from './schemas'

let cachedEnv: AppEnv | null = null

/**
 * Validate the process environment once and cache the result.
 */
export function getAppEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  if (cachedEnv) {
    return cachedEnv
  }

  const result = appEnvSchema.safeParse(source)

  if (!result.success) {
    throw new Error(`Environment validation failed: ${result.error.message}`)
  }

  cachedEnv = result.data
  return cachedEnv
}

/**
 * Reset cached environment (useful for testing)
 */
export function resetAppEnv(): void {
  cachedEnv = null
}

/**
 * Build the ingestion config from environment overrides, then explicit
 * overrides (CLI flags), then schema defaults.
 */
export function loadIngestionConfig(
  env: AppEnv,
  overrides: IngestionConfigInput = {},
): IngestionConfig {
  const fromEnv: IngestionConfigInput = {
    requestsPerSecond: env.INGEST_RATE_LIMIT_RPS,
    maxAttempts: env.INGEST_MAX_ATTEMPTS,
    retryBaseDelayMs: env.INGEST_RETRY_BASE_DELAY_MS,
    batchSize: env.INGEST_BATCH_SIZE,
    pageSize: env.INGEST_PAGE_SIZE,
    maxPagesPerInterval: env.INGEST_MAX_PAGES_PER_INTERVAL,
    fallbackStartDate: env.INGEST_FALLBACK_START_DATE,
  }

  const result = ingestionConfigSchema.safeParse({
    ...withoutUndefined(fromEnv),
    ...withoutUndefined(overrides),
  })

  if (!result.success) {
    throw new Error(`Ingestion config validation failed: ${result.error.message}`)
  }

  return result.data
}

function withoutUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, v]) => v !== undefined),
  )
}
