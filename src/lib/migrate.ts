// Database migration runner for Neon Serverless Postgres

import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { query, rawQuery, isDatabaseConfigured } from './db';
import { errorMessage } from './errors';
import { logger } from './logger';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  error?: string;
}

async function ensureMigrationsTable(): Promise<void> {
  await query`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
}

async function getAppliedMigrations(): Promise<string[]> {
  const rows = await query<{ name: string }>`
    SELECT name FROM migrations ORDER BY id ASC
  `;
  return rows.map((row) => row.name);
}

/**
 * Sorted .sql files in the migrations directory; empty when the directory is missing
 */
export function getMigrationFiles(migrationsDir: string): string[] {
  try {
    return readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();
  } catch {
    return [];
  }
}

/**
 * Split a migration file into statements, dropping comment-only lines
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Apply pending migrations in file-name order, recording each in the `migrations` table.
 * Stops at the first failing migration and reports it in `error`.
 */
export async function runMigrations(migrationsDir: string): Promise<MigrationResult> {
  const result: MigrationResult = { applied: [], skipped: [] };

  if (!isDatabaseConfigured()) {
    result.error = 'Database not configured - missing DATABASE_URL environment variable';
    return result;
  }

  try {
    await ensureMigrationsTable();
    const applied = await getAppliedMigrations();

    for (const file of getMigrationFiles(migrationsDir)) {
      const migrationName = file.replace(/\.sql$/, '');

      if (applied.includes(migrationName)) {
        result.skipped.push(migrationName);
        logger.debug(`Skipping already-applied migration: ${migrationName}`);
        continue;
      }

      for (const statement of splitStatements(readFileSync(join(migrationsDir, file), 'utf-8'))) {
        await rawQuery(statement);
      }

      await query`
        INSERT INTO migrations (name) VALUES (${migrationName})
      `;

      result.applied.push(migrationName);
      logger.info(`Applied migration: ${migrationName}`);
    }

    return result;
  } catch (error) {
    result.error = errorMessage(error);
    logger.error('Migration failed', { error: result.error });
    return result;
  }
}
