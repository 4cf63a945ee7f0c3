import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'

// Common utilities
export * from './id'
export * from './schema/_common'
export * from './schema/enums'

// Schema exports
export * from './schema/participants'
export * from './schema/complaints'

import * as enumsSchema from './schema/enums'
import * as participantsSchema from './schema/participants'
import * as complaintsSchema from './schema/complaints'

/**
 * Unified active Drizzle schema registry.
 */
export const schema = {
  ...enumsSchema,
  ...participantsSchema,
  ...complaintsSchema,
}

export type Database = NodePgDatabase<typeof schema>

export type DatabaseHandle = {
  db: Database
  pool: Pool
}

/**
 * Opens a pool for `connectionString`. Nothing connects at import time, so
 * the table definitions can be used without a database.
 */
export function createDatabase(connectionString: string | undefined = process.env.DATABASE_URL): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to initialize @campus-voice/db')
  }

  const pool = new Pool({ connectionString })
  return { pool, db: drizzle(pool, { schema }) }
}

export async function checkDatabaseConnection(pool: Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}

const dbPackage = {
  createDatabase,
  checkDatabaseConnection,
  participants: participantsSchema.participants,
  complaints: complaintsSchema.complaints,
  complaintSubmissionMeta: complaintsSchema.complaintSubmissionMeta,
  votes: complaintsSchema.votes,
  statusChanges: complaintsSchema.statusChanges,
}

export default dbPackage
