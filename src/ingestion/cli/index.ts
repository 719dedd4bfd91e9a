#!/usr/bin/env -S npx tsx

/**
 * Ingestion CLI Entry Point
 *
 * Usage:
 *   npm run ingest -- <command> [options]
 *
 * Commands:
 *   run       Ingest the full trade history of a market
 *   count     Count stored trades of a market
 *   view      Show stored trades of a market
 *   resolve   Resolve a numeric market id to its condition id
 */

import { Command, InvalidArgumentError } from 'commander'
import { createLogger } from '@/utils/logger'
import { toErrorMessage } from '../core/errors'
import { runCommand, type RunCommandOptions } from './run'
import { countCommand, resolveCommand, viewCommand } from './trades'

const log = createLogger('cli')

function parsePositiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.')
  }
  return parsed
}

function parsePositiveInt(value: string): number {
  const parsed = parsePositiveNumber(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

/**
 * Run a command and exit with its code. Unexpected errors exit with 1.
 */
async function execute(command: () => Promise<number>): Promise<void> {
  try {
    process.exit(await command())
  } catch (error) {
    log.error('Command failed', {}, error)
    console.error(`Error: ${toErrorMessage(error)}`)
    process.exit(1)
  }
}

const program = new Command()

program.name('ingest').description('Historical trade ingestion CLI').version('0.1.0')

program
  .command('run')
  .description('Ingest the full trade history of a market (resumable, duplicate-safe)')
  .argument('<marketId>', 'Condition id, or numeric market id to resolve first')
  .option('--rps <n>', 'Requests per second', parsePositiveNumber)
  .option('--batch-size <n>', 'Records per flushed batch', parsePositiveInt)
  .option('--page-size <n>', 'Records per upstream page', parsePositiveInt)
  .option('--max-pages <n>', 'Page depth cap per interval', parsePositiveInt)
  .option('--max-attempts <n>', 'Attempts per request', parsePositiveInt)
  .option('--fallback-start <date>', 'ISO-8601 start when nothing better is known')
  .option('--source <kind>', 'Trade source (data-api, subgraph)')
  .option('--db <path>', 'SQLite database path')
  .option('--no-resolve', 'Do not resolve numeric market ids')
  .option('--no-progress', 'Do not print per-interval progress')
  .action(async (marketId: string, options: RunCommandOptions) => {
    await execute(() => runCommand(marketId, options))
  })

program
  .command('count')
  .description('Count stored trades of a market')
  .argument('<marketId>', 'Condition id')
  .option('--db <path>', 'SQLite database path')
  .action(async (marketId: string, options: { db?: string }) => {
    await execute(() => countCommand(marketId, options))
  })

program
  .command('view')
  .description('Show stored trades of a market, newest first')
  .argument('<marketId>', 'Condition id')
  .option('--db <path>', 'SQLite database path')
  .option('-l, --limit <n>', 'Rows to show', parsePositiveInt, 20)
  .option('--oldest', 'Show oldest first', false)
  .action(async (marketId: string, options: { db?: string; limit: number; oldest: boolean }) => {
    await execute(() => viewCommand(marketId, options))
  })

program
  .command('resolve')
  .description('Resolve a numeric market id to its condition id')
  .argument('<marketId>', 'Numeric market id or condition id')
  .action(async (marketId: string) => {
    await execute(() => resolveCommand(marketId))
  })

program.parseAsync().catch((error: unknown) => {
  console.error('Unexpected error:', error)
  process.exit(1)
})
