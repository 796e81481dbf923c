#!/usr/bin/env node
/**
 * Database migration script
 *
 * Supports:
 *  - apply (default): applies pending migrations against DATABASE_URL
 *  - --status: checks that required tables are present and exits 0/1
 */

import { checkSchema, getConnectionString, runMigration } from './migration';

async function main() {
  const statusOnly = process.argv.slice(2).includes('--status');
  const connectionString = getConnectionString();

  if (statusOnly) {
    const ok = await checkSchema({ connectionString });
    if (ok) {
      console.log('[Migration] Schema validated');
      process.exit(0);
    }
    console.error('[Migration] Schema not found or incomplete');
    process.exit(1);
  }

  await runMigration({ connectionString });
}

main().catch((err) => {
  console.error('[Migration] Runner failed:', err);
  process.exit(1);
});
