import { readdir, readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import type { Pool } from 'pg';
import { loadDatabaseUrl } from '../../config.js';
import { createPool, withClient } from './pool.js';
import { describeError, logger } from '../logger.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
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

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: Pool, { filename, version }: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, filename), 'utf-8');

  await withClient(pool, async (client) => {
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  });

  logger.info('migrate', `Applied migration ${version}: ${filename}`);
}

export async function migrate(pool: Pool): Promise<void> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations();
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('migrate', 'No pending migrations');
    return;
  }

  logger.info('migrate', `Found ${pending.length} pending migration(s)`);
  for (const migration of pending) {
    await applyMigration(pool, migration);
  }
  logger.info('migrate', 'All migrations applied');
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  dotenv.config();
  const pool = createPool(loadDatabaseUrl());
  migrate(pool)
    .catch((error: unknown) => {
      logger.error('migrate', 'Migration failed', describeError(error));
      process.exitCode = 1;
    })
    .finally(() => {
      void pool.end();
    });
}
