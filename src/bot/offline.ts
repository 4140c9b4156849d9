// Offline collaborators for evaluating batches from a file (`npm run bot -- --file`)

import { randomUUID } from 'crypto';
import { formatIsoDate } from '../lib/expiry';
import { parseTimestamp } from '../lib/validation';
import type { RawMessage, SignalRecord, TradeIntent } from '../types';
import type {
  InstrumentResolver,
  MarketDataProvider,
  ResolvedInstrument,
  SignalLog,
  SignalOutcome,
} from './types';

/** Resolves every contract to a synthetic instrument with a fixed lot size */
export class StaticInstrumentResolver implements InstrumentResolver {
  private readonly lotSize: number;

  constructor(lotSize: number) {
    this.lotSize = lotSize;
  }

  async resolve(intent: TradeIntent): Promise<ResolvedInstrument> {
    return {
      securityId: `${intent.underlying}-${formatIsoDate(intent.expiryDate)}-${intent.strike}-${intent.optionType}`,
      exchangeSegment: intent.underlying === 'SENSEX' ? 'BSE_FNO' : 'NSE_FNO',
      lotSize: this.lotSize,
      tradingSymbol: intent.tradingSymbol,
    };
  }
}

/** Quotes the same LTP for every instrument */
export class StaticMarketData implements MarketDataProvider {
  private readonly ltp: number;

  constructor(ltp: number) {
    this.ltp = ltp;
  }

  async getLtp(): Promise<number> {
    return this.ltp;
  }
}

/** Signal log kept in memory for offline runs and tests */
export class InMemorySignalLog implements SignalLog {
  readonly records: SignalRecord[] = [];

  async append(intent: TradeIntent): Promise<SignalRecord> {
    const record: SignalRecord = {
      id: randomUUID(),
      timestamp: intent.timestamp,
      tradingSymbol: intent.tradingSymbol,
      underlying: intent.underlying,
      strike: intent.strike,
      optionType: intent.optionType,
      action: intent.action,
      entryTrigger: intent.entryTrigger,
      stopLoss: intent.stopLoss,
      isPositional: intent.isPositional,
      rawText: intent.rawText,
    };
    this.records.push(record);
    return record;
  }

  async loadSince(since: Date): Promise<SignalRecord[]> {
    return this.records.filter((r) => r.timestamp.getTime() >= since.getTime());
  }
}

/**
 * Parse a batch file.
 *
 * JSON: an array of `{ text, timestamp }` objects or plain strings.
 * Text: messages separated by blank lines.
 * Messages without a timestamp are spaced one second apart from `start`.
 */
export function parseBatchFile(content: string, fileName: string, start: Date): RawMessage[] {
  const at = (i: number) => new Date(start.getTime() + i * 1000);

  if (fileName.toLowerCase().endsWith('.json')) {
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new Error(`${fileName} must contain a JSON array of messages`);
    }
    return parsed.map((item: unknown, i: number): RawMessage => {
      if (typeof item === 'string') return { text: item, timestamp: at(i) };
      if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
        const timestamp = 'timestamp' in item ? parseTimestamp(item.timestamp) : null;
        return { text: item.text, timestamp: timestamp ?? at(i) };
      }
      throw new Error(`${fileName}: message ${i} must be a string or { text, timestamp }`);
    });
  }

  return content
    .split(/\r?\n\s*\r?\n/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0)
    .map((text, i) => ({ text, timestamp: at(i) }));
}

/**
 * Anchor for rehydrating dedup state before a batch: its earliest message, so
 * logged signals that still cover any message of the batch are restored.
 */
export function batchStart(messages: RawMessage[], fallback: Date): Date {
  if (messages.length === 0) return fallback;
  return new Date(Math.min(...messages.map((m) => m.timestamp.getTime())));
}

/** One console line per outcome */
export function formatOutcome(outcome: SignalOutcome): string {
  const subject = outcome.intent?.tradingSymbol ?? outcome.rawText.replace(/\s+/g, ' ').slice(0, 60);
  const parts = [`${outcome.outcome.padEnd(26)} ${subject}`];
  if (outcome.plan) {
    const { plan } = outcome;
    const price = plan.limitPrice !== undefined ? ` @ ${plan.limitPrice}` : '';
    parts.push(
      `${outcome.intent?.action ?? ''} ${plan.orderType}${price} qty ${plan.quantity} SL ${plan.stopLossPrice} TGT ${plan.targetPrice} trail ${plan.trailingJump} ${plan.productType}`.trim(),
    );
  }
  if (outcome.detail) parts.push(outcome.detail);
  return parts.join(' | ');
}
