/**
 * Lending Hub - Database Migration Runner
 * Applies schema.sql in one transaction, then checks every hub table exists
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../config';
import { closePool, listTables, missingTables, openPool } from './connection';

// schema.sql is not copied by tsc, so resolve it from the sources
const SCHEMA_PATH = path.resolve(process.cwd(), 'src', 'database', 'schema.sql');

async function migrate(): Promise<void> {
  const { DATABASE_URL } = loadConfig();
  if (!DATABASE_URL) {
    throw new Error('[Migrate] DATABASE_URL is required');
  }

  const db = openPool(DATABASE_URL);
  try {
    const schema = fs.readFileSync(SCHEMA_PATH, 'utf-8');
    const client = await db.connect();
    try {
      await client.query('BEGIN');
      await client.query(schema);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }

    const missing = missingTables(await listTables(db));
    if (missing.length > 0) {
      throw new Error(`[Migrate] Schema applied but tables are missing: ${missing.join(', ')}`);
    }
  } finally {
    await closePool();
  }

  console.log('[Migrate] Migration complete');
}

migrate().catch((error) => {
  console.error('[Migrate] Migration failed:', error);
  process.exit(1);
});
