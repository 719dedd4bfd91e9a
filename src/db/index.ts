import { createClient, type Client } from '@libsql/client'
import { drizzle } from 'drizzle-orm/libsql'
import * as schema from './schema'

export type Database = ReturnType<typeof createDb>

export function createDb(client: Client) {
  return drizzle(client, { schema })
}

/**
 * Turn a filesystem path into a libsql URL. ":memory:" and URLs pass through.
 */
export function toDatabaseUrl(path: string): string {
  if (path === ':memory:' || /^(file|libsql|https?|wss?):/.test(path)) {
    return path
  }
  return `file:${path}`
}

/**
 * Open (or create) a SQLite file and wrap it with drizzle.
 * Use ":memory:" for a throwaway database.
 */
export async function openDatabase(path: string): Promise<{ db: Database; client: Client }> {
  const client = createClient({ url: toDatabaseUrl(path) })
  if (path !== ':memory:') {
    await client.execute('PRAGMA journal_mode = WAL')
  }
  return { db: createDb(client), client }
}

// Re-export schema for convenience
export * from './schema'
