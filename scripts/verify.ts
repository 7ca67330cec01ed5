/**
 * Verify CLI
 *
 * Compares the stored HR tables with the seed batch.
 */
import pg from 'pg';
import { PostgresHrRepository } from '../src/adapters/persistence/postgres-hr.repository.js';
import { SeedVerifier } from '../src/core/domain/services/seed-verifier.js';
import { loadConfig } from '../src/main/config.js';

async function main() {
  const config = loadConfig();
  const pool = new pg.Pool({ connectionString: config.databaseUrl });

  try {
    const report = await new SeedVerifier(new PostgresHrRepository(pool)).verify();
    for (const check of report.checks) {
      console.log(`${check.passed ? '✅' : '❌'} ${check.name}: ${check.message}`);
    }
    if (report.status === 'failed') {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error('❌ Verification failed:', err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('❌ Unexpected error:', err);
  process.exitCode = 1;
});
