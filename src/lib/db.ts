// Neon Serverless Postgres access for the signal log and migrations

import { neon, type NeonQueryFunction, type NeonQueryPromise } from '@neondatabase/serverless';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { DatabaseStatus } from '../types';

type Sql = NeonQueryFunction<false, false>;

const URL_VARIABLES = ['DATABASE_URL', 'POSTGRES_URL', 'POSTGRES_URL_NON_POOLING'] as const;
const NOT_CONFIGURED = 'Database not configured - missing DATABASE_URL environment variable';

let sqlInstance: Sql | null = null;

function getDatabaseUrl(): string | undefined {
  for (const name of URL_VARIABLES) {
    const value = process.env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

/** Lazily connect on first use */
function getSql(): Sql {
  if (!sqlInstance) {
    const connectionString = getDatabaseUrl();
    if (!connectionString) {
      throw new Error(NOT_CONFIGURED);
    }
    sqlInstance = neon(connectionString);
  }
  return sqlInstance;
}

export function isDatabaseConfigured(): boolean {
  return getDatabaseUrl() !== undefined;
}

/** Round-trip a trivial query; never throws */
export async function checkDatabaseConnection(): Promise<DatabaseStatus> {
  if (!isDatabaseConfigured()) {
    return { connected: false, error: NOT_CONFIGURED };
  }

  try {
    const result = await getSql()`SELECT 1 as health_check`;
    if (result[0]?.health_check === 1) {
      logger.debug('Database connection successful');
      return { connected: true };
    }
    return { connected: false, error: 'Unexpected health check response' };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Database connection failed', { error: message });
    return { connected: false, error: message };
  }
}

/**
 * Parameterized query through a tagged template.
 *
 * @example
 * const rows = await query<SignalRow>`SELECT * FROM signals WHERE underlying = ${underlying}`;
 */
export function query<T = Record<string, unknown>>(
  strings: TemplateStringsArray,
  ...values: unknown[]
): Promise<T[]> {
  const sql = getSql();
  return sql(strings, ...values) as Promise<T[]>;
}

/**
 * Run the statements built by `build` in one transaction (a single HTTP round trip)
 * and return the rows of the last statement.
 */
export async function transaction<T = Record<string, unknown>>(
  build: (sql: Sql) => NeonQueryPromise<false, false>[],
): Promise<T[]> {
  const sql = getSql();
  const results = await sql.transaction(build(sql));
  return (results[results.length - 1] ?? []) as T[];
}

/** Unparameterized statement text, as read from a migration file */
export async function rawQuery<T = Record<string, unknown>>(
  text: string,
): Promise<{ rows: T[]; rowCount: number }> {
  const sql = getSql();
  const strings = [text] as unknown as TemplateStringsArray;
  Object.defineProperty(strings, 'raw', { value: [text] });
  const result = (await sql(strings)) as T[];
  return {
    rows: result,
    rowCount: result.length,
  };
}

/** Drop the cached connection (tests) */
export function resetConnection(): void {
  sqlInstance = null;
}
