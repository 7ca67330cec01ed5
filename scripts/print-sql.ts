/**
 * Print the seed script in the configured dialect (SEED_SQL_DIALECT).
 */
import { renderSeedScript } from '../src/adapters/sql/seed-script.js';
import { loadConfig } from '../src/main/config.js';

try {
  process.stdout.write(renderSeedScript(loadConfig().dialect));
} catch (err) {
  console.error('❌', err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
