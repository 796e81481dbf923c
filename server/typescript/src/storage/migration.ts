import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { defaultPoolFactory, withTransaction, type PoolFactory } from './pool';

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

export const REQUIRED_TABLES = ['page_operations'];

const appliedRowSchema = z.object({ filename: z.string() });
const tableRowSchema = z.object({ table_name: z.string() });

export function getConnectionString(env: NodeJS.ProcessEnv = process.env): string {
  return env.DATABASE_URL || 'postgresql://localhost:5432/pagesync';
}

/**
 * Sorted .sql files of a migrations directory
 */
export function listMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every migration not yet recorded in schema_migrations
 *
 * @returns filenames applied by this run
 */
export async function runMigration(opts: {
  connectionString?: string;
  migrationsDir?: string;
  poolFactory?: PoolFactory;
}): Promise<string[]> {
  const connectionString = opts.connectionString ?? getConnectionString();
  const migrationsDir = opts.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  const poolFactory = opts.poolFactory ?? defaultPoolFactory;

  console.log('[Migration] Starting database migration');
  console.log(`[Migration] Database: ${connectionString.replace(/:[^:@]+@/, ':***@')}`);

  const pool = poolFactory(connectionString);
  const appliedNow: string[] = [];

  try {
    await pool.query('SELECT NOW()');

    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id SERIAL PRIMARY KEY,
        filename VARCHAR(255) NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    const appliedRes = await pool.query('SELECT filename FROM schema_migrations');
    const applied = new Set(appliedRes.rows.map((row) => appliedRowSchema.parse(row).filename));
    const unapplied = listMigrations(migrationsDir).filter((f) => !applied.has(f));

    if (unapplied.length === 0) {
      console.log('[Migration] No new migrations to apply');
    }

    for (const filename of unapplied) {
      const sql = readFileSync(join(migrationsDir, filename), 'utf-8');
      console.log(`[Migration] Applying ${filename}`);
      await withTransaction(pool, async (client) => {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [filename]);
      });
      appliedNow.push(filename);
    }

    console.log(`[Migration] Done (${appliedNow.length} applied)`);
    return appliedNow;
  } finally {
    await pool.end();
  }
}

/**
 * True when every required table exists
 */
export async function checkSchema(opts: {
  connectionString?: string;
  requiredTables?: string[];
  poolFactory?: PoolFactory;
}): Promise<boolean> {
  const connectionString = opts.connectionString ?? getConnectionString();
  const poolFactory = opts.poolFactory ?? defaultPoolFactory;
  const requiredTables = opts.requiredTables ?? REQUIRED_TABLES;

  const pool = poolFactory(connectionString);
  try {
    const placeholders = requiredTables.map((_, i) => `$${i + 1}`).join(',');
    const res = await pool.query(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name IN (${placeholders})`,
      requiredTables
    );
    const found = new Set(res.rows.map((row) => tableRowSchema.parse(row).table_name));
    return requiredTables.every((t) => found.has(t));
  } finally {
    await pool.end();
  }
}
