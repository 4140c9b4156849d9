// Signal log — persists admitted intents to the `signals` table for audit and dedup rehydration

import { dedupKey } from '../bot/deduplicator';
import { query, transaction } from '../lib/db';
import { errorMessage } from '../lib/errors';
import { formatIsoDate } from '../lib/expiry';
import { logger } from '../lib/logger';
import type { SignalLog } from '../bot/types';
import type { SignalRecord, TradeIntent } from '../types';
import type { SignalRow } from '../types/database';

function toNumber(value: string | number): number {
  return typeof value === 'number' ? value : Number(value);
}

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

/**
 * Map a database row to a SignalRecord
 */
export function rowToRecord(row: SignalRow): SignalRecord {
  return {
    id: row.id,
    timestamp: toDate(row.signal_time),
    tradingSymbol: row.trading_symbol,
    underlying: row.underlying,
    strike: row.strike,
    optionType: row.option_type,
    action: row.action,
    entryTrigger: toNumber(row.entry_trigger),
    stopLoss: row.stop_loss === null ? null : toNumber(row.stop_loss),
    isPositional: row.is_positional,
    rawText: row.raw_text,
  };
}

/**
 * Append one admitted intent. Returns the stored record.
 */
export async function appendSignal(intent: TradeIntent): Promise<SignalRecord> {
  try {
    const rows = await query<SignalRow>`
      INSERT INTO signals (
        signal_time, trading_symbol, underlying, strike, option_type, action,
        entry_trigger, stop_loss, target, is_positional, expiry_date, raw_text
      ) VALUES (
        ${intent.timestamp.toISOString()}, ${intent.tradingSymbol}, ${intent.underlying},
        ${intent.strike}, ${intent.optionType}, ${intent.action},
        ${intent.entryTrigger}, ${intent.stopLoss}, ${intent.target}, ${intent.isPositional},
        ${formatIsoDate(intent.expiryDate)}, ${intent.rawText}
      )
      RETURNING *
    `;

    const record = rowToRecord(rows[0]);
    logger.info('Signal logged', { signalId: record.id, tradingSymbol: record.tradingSymbol });
    return record;
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Failed to log signal', { error: message, tradingSymbol: intent.tradingSymbol });
    throw new Error(`Failed to log signal: ${message}`);
  }
}

/**
 * Append an intent unless the log already holds the same (underlying, strike,
 * option type, action) at or after `windowMinutes` before its signal time.
 * Returns null for such a duplicate.
 *
 * The existence check and the insert run in one transaction under an advisory
 * lock on the dedup key, so concurrent callers cannot both admit the same key.
 */
export async function appendSignalIfNew(intent: TradeIntent, windowMinutes: number): Promise<SignalRecord | null> {
  const key = dedupKey(intent);
  const signalTime = intent.timestamp.toISOString();

  let rows: SignalRow[];
  try {
    rows = await transaction<SignalRow>((sql) => [
      sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`,
      sql`
        INSERT INTO signals (
          signal_time, trading_symbol, underlying, strike, option_type, action,
          entry_trigger, stop_loss, target, is_positional, expiry_date, raw_text
        )
        SELECT
          ${signalTime}::timestamptz, ${intent.tradingSymbol}::text, ${intent.underlying}::text,
          ${intent.strike}::integer, ${intent.optionType}::text, ${intent.action}::text,
          ${intent.entryTrigger}::numeric, ${intent.stopLoss}::numeric, ${intent.target}::numeric,
          ${intent.isPositional}::boolean, ${formatIsoDate(intent.expiryDate)}::date, ${intent.rawText}::text
        WHERE NOT EXISTS (
          SELECT 1 FROM signals
          WHERE underlying = ${intent.underlying}
            AND strike = ${intent.strike}::integer
            AND option_type = ${intent.optionType}
            AND action = ${intent.action}
            AND signal_time >= ${signalTime}::timestamptz - ${windowMinutes}::double precision * interval '1 minute'
        )
        RETURNING *
      `,
    ]);
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Failed to log signal', { error: message, tradingSymbol: intent.tradingSymbol });
    throw new Error(`Failed to log signal: ${message}`);
  }

  if (rows.length === 0) {
    logger.info('Signal already logged within window', { key, tradingSymbol: intent.tradingSymbol });
    return null;
  }
  const record = rowToRecord(rows[0]);
  logger.info('Signal logged', { signalId: record.id, tradingSymbol: record.tradingSymbol });
  return record;
}

/**
 * Signals with a signal time at or after `since`, oldest first.
 */
export async function loadRecentSignals(since: Date): Promise<SignalRecord[]> {
  const rows = await query<SignalRow>`
    SELECT * FROM signals
    WHERE signal_time >= ${since.toISOString()}
    ORDER BY signal_time ASC
  `;
  return rows.map(rowToRecord);
}

/** SignalLog backed by Neon Postgres */
export const neonSignalLog: SignalLog = {
  append: appendSignal,
  loadSince: loadRecentSignals,
};
