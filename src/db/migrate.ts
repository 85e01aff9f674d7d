// =============================================================================
// SEALED RATINGS — Schema Migration
//
// Applies src/db/schema.sql. The script is idempotent; the server also
// runs it at startup when the postgres ledger is selected.
// =============================================================================

import { readFile } from 'fs/promises';
import { Pool } from 'pg';
import { config } from '../config';
import { createPool } from './pool';

export async function applySchema(pool: Pool, schemaPath: string = config.db.schemaPath): Promise<void> {
  const sql = await readFile(schemaPath, 'utf-8');
  await pool.query(sql);
  console.log(`[DB] Schema applied from ${schemaPath}`);
}

if (require.main === module) {
  const pool = createPool();
  applySchema(pool)
    .then(() => pool.end())
    .catch(async (err: unknown) => {
      console.error('[DB] Migration failed:', err instanceof Error ? err.message : err);
      await pool.end();
      process.exit(1);
    });
}
