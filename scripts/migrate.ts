/**
 * Migration CLI
 *
 * Creates the HR tables without seed rows.
 */
import pg from 'pg';
import { runMigrations } from '../src/scripts/run-migrations.js';
import { PostgresUnitOfWork } from '../src/adapters/persistence/postgres-unit-of-work.js';
import { loadConfig } from '../src/main/config.js';

async function main() {
  const config = loadConfig();
  console.log('🐘 Connecting to database...');
  const pool = new pg.Pool({ connectionString: config.databaseUrl });

  try {
    const result = await runMigrations(new PostgresUnitOfWork(pool), {
      onConflict: config.onConflict,
    });
    console.log(`✅ Migration complete! Created: ${result.tablesCreated.join(', ')}`);
  } catch (err) {
    console.error('❌ Migration failed:', err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('❌ Unexpected error:', err);
  process.exitCode = 1;
});
