/**
 * Ingestion Pipeline
 *
 * Incremental, duplicate-safe historical trade ingestion.
 * Usable from the CLI or programmatically through runIngestion.
 */

export * from './core'
export * from './sources'
export { createPipelineDeps, openTradeStore, runIngestion, type OpenedTradeStore } from './pipeline'
