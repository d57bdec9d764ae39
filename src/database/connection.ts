/**
 * Lending Hub - Database Connection
 * One pg pool per process, checked against the hub's tables before any action runs
 */

import { Pool } from 'pg';

/** Tables created by schema.sql */
export const HUB_TABLES = [
  'f_token_balances',
  'loan_types',
  'pools',
  'price_feeds',
  'reward_epochs',
  'user_loans',
  'user_pool_rewards',
] as const;

let pool: Pool | null = null;

export function openPool(databaseUrl: string): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: databaseUrl,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      console.error('[Database] Unexpected error on idle client:', err);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('[Database] Connection pool closed');
  }
}

export function missingTables(present: readonly string[]): string[] {
  const found = new Set(present);
  return HUB_TABLES.filter((table) => !found.has(table));
}

export async function listTables(db: Pool): Promise<string[]> {
  const result = await db.query<{ table_name: string }>(
    `SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' ORDER BY table_name`
  );
  return result.rows.map((row) => row.table_name);
}

/**
 * Fails when the database is unreachable or has not been migrated
 */
export async function assertSchemaReady(db: Pool): Promise<void> {
  const missing = missingTables(await listTables(db));
  if (missing.length > 0) {
    throw new Error(`[Database] Missing tables ${missing.join(', ')}; run the migration first`);
  }
  console.log(`[Database] Schema ready (${HUB_TABLES.length} tables)`);
}
