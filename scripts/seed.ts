/**
 * Seed CLI
 *
 * Uses 'pg' driver by default to create and seed the HR tables.
 */
import pg from 'pg';
import { runSeed } from '../src/scripts/run-seed.js';
import { PostgresUnitOfWork } from '../src/adapters/persistence/postgres-unit-of-work.js';
import { loadConfig } from '../src/main/config.js';

async function main() {
  const config = loadConfig();
  const pool = new pg.Pool({ connectionString: config.databaseUrl });

  try {
    await runSeed(new PostgresUnitOfWork(pool), { onConflict: config.onConflict });
  } catch (err) {
    console.error('❌ Seeding failed:', err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('❌ Unexpected error:', err);
  process.exitCode = 1;
});
