/**
 * Pipeline entry points
 *
 * runIngestion is the programmatic surface: one market, one run, one
 * RunResult. createPipelineDeps wires the production sources and the
 * SQLite store from the validated environment.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { AppEnv, IngestionConfig } from '@/config/schemas'
import { openDatabase, toDatabaseUrl } from '@/db'
import { up as migrate } from '@/db/tasks/migrate'
import { logger } from '@/utils/logger'
import { IngestionOrchestrator, type OrchestratorDeps } from './core/orchestrator'
import { SqliteTradeStore } from './core/persist'
import type { RunOptions, RunResult } from './core/types'
import { createMetadataSource, createTradeSources } from './sources'

/**
 * Ingest the complete trade history of one market.
 *
 * Resolves with status "completed", "partial" (cancelled through
 * options.signal) or "failed" (store failure). Never rejects for upstream
 * failures; those surface as failedIntervals.
 */
export async function runIngestion(
  marketId: string,
  config: IngestionConfig,
  deps: OrchestratorDeps,
  options: RunOptions = {},
): Promise<RunResult> {
  const orchestrator = new IngestionOrchestrator(deps, config)
  return orchestrator.run(marketId, options)
}

export interface OpenedTradeStore {
  store: SqliteTradeStore
  close: () => void
}

/**
 * Open the SQLite store, creating the file and schema when missing.
 */
export async function openTradeStore(databasePath: string): Promise<OpenedTradeStore> {
  // Plain filesystem paths get their directory created; URLs are used as is
  if (toDatabaseUrl(databasePath) !== databasePath) {
    mkdirSync(dirname(databasePath), { recursive: true })
  }
  const { db, client } = await openDatabase(databasePath)
  try {
    await migrate(db)
  } catch (error) {
    client.close()
    throw error
  }
  logger.debug('Opened trade store', { databasePath })

  return {
    store: new SqliteTradeStore(db),
    close: () => client.close(),
  }
}

/**
 * Production dependencies: configured trade sources, metadata lookup and
 * the SQLite store at DATABASE_PATH. Sources are built before the store is
 * opened.
 */
export async function createPipelineDeps(
  env: AppEnv,
): Promise<OrchestratorDeps & { close: () => void }> {
  const { source, fallbackSource } = createTradeSources(env)
  const metadata = createMetadataSource(env)
  const { store, close } = await openTradeStore(env.DATABASE_PATH)
  return { source, fallbackSource, metadata, store, close }
}
