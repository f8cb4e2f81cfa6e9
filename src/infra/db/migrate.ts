import { readdir, readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type pg from 'pg';
import { loadConfig } from '../../config.js';
import { createPool } from './pool.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

export interface Migration {
  filename: string;
  version: number;
}

/**
 * Order migration files by the numeric prefix of their names.
 */
export function parseMigrations(files: string[]): Migration[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: pg.Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: pg.Pool, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration, each in its own transaction.
 */
export async function migrate(pool: pg.Pool): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrations(await readdir(MIGRATIONS_DIR));
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    console.log('No pending migrations.');
    return 0;
  }

  console.log(`Found ${pending.length} pending migration(s)`);
  for (const migration of pending) {
    await applyMigration(pool, migration);
  }
  console.log('All migrations applied successfully.');
  return pending.length;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);
  try {
    console.log('Starting migrations...');
    await migrate(pool);
  } finally {
    await pool.end();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  });
}
