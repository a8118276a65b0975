import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { env } from '../config/env.config';
import { logger } from '../config/logger.config';
import { closePool, createPool } from './pool';

const MIGRATIONS_TABLE = 'schema_migrations';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function getMigrationsDir(): string {
  return path.join(__dirname, '..', '..', 'migrations');
}

/** Numbered `.sql` files (`001_name.sql`) in apply order. */
export function loadMigrationFiles(migrationsDir = getMigrationsDir()): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && /^\d+_/.test(file))
    .sort();
}

/**
 * Apply every pending migration, each in its own transaction on one checked-out
 * client. Stops at the first failure after rolling it back.
 */
export async function applyMigrations(pool: Pool, migrationsDir = getMigrationsDir()): Promise<MigrationResult> {
  const files = loadMigrationFiles(migrationsDir);
  const client = await pool.connect();
  const result: MigrationResult = { applied: [], skipped: [] };

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
         name TEXT PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       )`
    );
    const existing = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE}`);
    const done = new Set(existing.rows.map((row) => row.name));

    for (const file of files) {
      if (done.has(file)) {
        result.skipped.push(file);
        continue;
      }

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Migration failed', { migration: file, error: String(error) });
        throw error;
      }
      logger.info('Migration applied', { migration: file });
      result.applied.push(file);
    }
  } finally {
    client.release();
  }

  logger.info('Migrations complete', { applied: result.applied.length, skipped: result.skipped.length });
  return result;
}

async function main(): Promise<void> {
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL is required to run migrations');
  }
  const pool = createPool(env.DATABASE_URL);
  try {
    await applyMigrations(pool);
  } finally {
    await closePool(pool);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error('❌ Migration process failed:', err);
    process.exit(1);
  });
}
