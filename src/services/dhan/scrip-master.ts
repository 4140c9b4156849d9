// Scrip master resolver — maps canonical option contracts to Dhan security ids via the instrument CSV

import { readFileSync } from 'fs';
import Papa from 'papaparse';
import { errorMessage, MarketDataUnavailableError } from '../../lib/errors';
import { formatIsoDate, parseIsoDate } from '../../lib/expiry';
import { createLogger } from '../../lib/logger';
import type { CalendarDate, OptionType, TradeIntent, Underlying } from '../../types';
import type { ExchangeSegment, InstrumentResolver, ResolvedInstrument } from '../../bot/types';

const log = createLogger('ScripMaster');

export const DEFAULT_SCRIP_MASTER_PATH = 'cache/dhan_master.csv';

/** Columns read from the Dhan compact scrip master */
type ScripRow = Record<string, string | undefined>;

interface ContractKey {
  underlying: Underlying;
  expiryDate: CalendarDate;
  strike: number;
  optionType: OptionType;
}

function contractKey(key: ContractKey): string {
  return `${key.underlying}|${formatIsoDate(key.expiryDate)}|${key.strike}|${key.optionType}`;
}

const EXCHANGE_SEGMENTS: Record<string, ExchangeSegment> = {
  NSE: 'NSE_FNO',
  BSE: 'BSE_FNO',
};

function toUnderlying(value: string): Underlying | null {
  switch (value) {
    case 'NIFTY':
    case 'BANKNIFTY':
    case 'SENSEX':
      return value;
    default:
      return null;
  }
}

/**
 * Convert one CSV row into an index option instrument; null for rows that are not
 * NIFTY/BANKNIFTY/SENSEX options or carry unusable values.
 */
export function parseScripRow(row: ScripRow): (ContractKey & ResolvedInstrument) | null {
  if (row.SEM_INSTRUMENT_NAME?.trim() !== 'OPTIDX') return null;

  const segment = EXCHANGE_SEGMENTS[row.SEM_EXM_EXCH_ID?.trim() ?? ''];
  const tradingSymbol = row.SEM_TRADING_SYMBOL?.trim() ?? '';
  const underlying = toUnderlying(tradingSymbol.split('-')[0]);
  const expiryDate = parseIsoDate((row.SEM_EXPIRY_DATE ?? '').trim().slice(0, 10));
  const strike = Number(row.SEM_STRIKE_PRICE);
  const lotSize = Number(row.SEM_LOT_UNITS);
  const optionType = row.SEM_OPTION_TYPE?.trim();
  const securityId = row.SEM_SMST_SECURITY_ID?.trim();

  if (
    !segment ||
    !underlying ||
    !expiryDate ||
    !securityId ||
    (optionType !== 'CE' && optionType !== 'PE') ||
    !Number.isFinite(strike) ||
    strike <= 0 ||
    !Number.isInteger(lotSize) ||
    lotSize <= 0
  ) {
    return null;
  }

  return {
    underlying,
    expiryDate,
    strike,
    optionType,
    securityId,
    exchangeSegment: segment,
    lotSize,
    tradingSymbol: row.SEM_CUSTOM_SYMBOL?.trim() || tradingSymbol,
  };
}

export class ScripMasterResolver implements InstrumentResolver {
  private readonly contracts = new Map<string, ResolvedInstrument>();

  private constructor(rows: ScripRow[]) {
    for (const row of rows) {
      const parsed = parseScripRow(row);
      if (!parsed) continue;
      const { underlying, expiryDate, strike, optionType, ...instrument } = parsed;
      this.contracts.set(contractKey({ underlying, expiryDate, strike, optionType }), instrument);
    }
  }

  /** Parse scrip master CSV text */
  static fromCsv(content: string): ScripMasterResolver {
    const result = Papa.parse<ScripRow>(content, {
      header: true,
      skipEmptyLines: true,
    });
    if (result.errors.length > 0) {
      log.warn('Scrip master parsed with errors', {
        count: result.errors.length,
        first: result.errors[0].message,
      });
    }
    const resolver = new ScripMasterResolver(result.data);
    log.info('Scrip master loaded', { rows: result.data.length, contracts: resolver.size });
    return resolver;
  }

  /** Load the CSV from disk (SCRIP_MASTER_PATH, default cache/dhan_master.csv) */
  static fromFile(path = process.env.SCRIP_MASTER_PATH?.trim() || DEFAULT_SCRIP_MASTER_PATH): ScripMasterResolver {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new MarketDataUnavailableError(`Scrip master not readable at ${path}: ${errorMessage(err)}`);
    }
    return ScripMasterResolver.fromCsv(content);
  }

  get size(): number {
    return this.contracts.size;
  }

  lookup(key: ContractKey): ResolvedInstrument | null {
    return this.contracts.get(contractKey(key)) ?? null;
  }

  async resolve(intent: TradeIntent): Promise<ResolvedInstrument | null> {
    const instrument = this.lookup(intent);
    if (!instrument) {
      log.warn('No instrument for contract', { tradingSymbol: intent.tradingSymbol });
    }
    return instrument;
  }
}
