// Must stay first: the logger reads NODE_ENV and LOG_LEVEL on import.
import 'dotenv/config';
import { readdir, readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { loadConfig } from '../config.js';
import { logger } from '../logger.js';
import { createPool } from './pool.js';

export const MIGRATIONS_DIR = join(
  dirname(fileURLToPath(import.meta.url)),
  'migrations'
);

export interface Migration {
  filename: string;
  version: number;
}

/**
 * Orders `NNN_name.sql` files by their numeric prefix.
 */
export function parseMigrationFilenames(files: string[]): Migration[] {
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

async function getAppliedVersions(pool: pg.Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(
  pool: pg.Pool,
  dir: string,
  migration: Migration
): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    logger.info({ version: migration.version, file: migration.filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Applies pending migrations, each in its own transaction. Returns the
 * versions applied by this run.
 */
export async function runMigrations(
  pool: pg.Pool,
  dir: string = MIGRATIONS_DIR
): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrationFilenames(await readdir(dir));
  const applied = await getAppliedVersions(pool);
  const pending = migrations.filter((m) => !applied.includes(m.version));

  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  logger.info({ count: pending.length }, 'Applying pending migrations');
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
  }
  return pending.map((m) => m.version);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config);
  try {
    await runMigrations(pool);
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Migration could not start');
    process.exitCode = 1;
  });
}
