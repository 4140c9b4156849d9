import { describe, it, expect, vi } from 'vitest';
import { ScripMasterResolver, parseScripRow } from './scrip-master';
import { MarketDataUnavailableError } from '../../lib/errors';
import type { TradeIntent } from '../../types';

vi.mock('../../lib/logger', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { logger: log, createLogger: () => log };
});

const CSV = [
  'SEM_EXM_EXCH_ID,SEM_SEGMENT,SEM_SMST_SECURITY_ID,SEM_INSTRUMENT_NAME,SEM_TRADING_SYMBOL,SEM_CUSTOM_SYMBOL,SEM_EXPIRY_DATE,SEM_STRIKE_PRICE,SEM_OPTION_TYPE,SEM_LOT_UNITS',
  'NSE,D,43512,OPTIDX,NIFTY-Dec2025-24000-CE,NIFTY 04 DEC 24000 CALL,2025-12-04 14:30:00,24000.00000,CE,75.0',
  'NSE,D,43513,OPTIDX,BANKNIFTY-Dec2025-45000-PE,BANKNIFTY DEC 45000 PUT,2025-12-30 14:30:00,45000.00000,PE,35.0',
  'BSE,D,825001,OPTIDX,SENSEX-Dec2025-80000-CE,SENSEX 04 DEC 80000 CALL,2025-12-04 14:30:00,80000.00000,CE,20.0',
  'NSE,D,35001,FUTIDX,NIFTY-Dec2025-FUT,NIFTY DEC FUT,2025-12-30 14:30:00,-0.01000,XX,75.0',
  'NSE,D,43999,OPTIDX,FINNIFTY-Dec2025-21000-CE,FINNIFTY 30 DEC 21000 CALL,2025-12-30 14:30:00,21000.00000,CE,65.0',
  '',
].join('\n');

function makeIntent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    timestamp: new Date('2025-12-01T04:00:00Z'),
    underlying: 'NIFTY',
    strike: 24000,
    optionType: 'CE',
    action: 'BUY',
    entryTrigger: 120,
    stopLoss: 80,
    target: null,
    isPositional: false,
    expiryDate: { year: 2025, month: 12, day: 4 },
    tradingSymbol: 'NIFTY 04 DEC 24000 CE',
    rawText: 'BUY NIFTY 24000 CE ABOVE 120 SL 80',
    ...overrides,
  };
}

describe('parseScripRow', () => {
  const row = {
    SEM_EXM_EXCH_ID: 'NSE',
    SEM_SMST_SECURITY_ID: '43512',
    SEM_INSTRUMENT_NAME: 'OPTIDX',
    SEM_TRADING_SYMBOL: 'NIFTY-Dec2025-24000-CE',
    SEM_CUSTOM_SYMBOL: '',
    SEM_EXPIRY_DATE: '2025-12-04 14:30:00',
    SEM_STRIKE_PRICE: '24000.00000',
    SEM_OPTION_TYPE: 'CE',
    SEM_LOT_UNITS: '75.0',
  };

  it('reads an index option row', () => {
    expect(parseScripRow(row)).toEqual({
      underlying: 'NIFTY',
      expiryDate: { year: 2025, month: 12, day: 4 },
      strike: 24000,
      optionType: 'CE',
      securityId: '43512',
      exchangeSegment: 'NSE_FNO',
      lotSize: 75,
      tradingSymbol: 'NIFTY-Dec2025-24000-CE',
    });
  });

  it('skips futures, other underlyings and bad values', () => {
    expect(parseScripRow({ ...row, SEM_INSTRUMENT_NAME: 'FUTIDX' })).toBeNull();
    expect(parseScripRow({ ...row, SEM_TRADING_SYMBOL: 'FINNIFTY-Dec2025-21000-CE' })).toBeNull();
    expect(parseScripRow({ ...row, SEM_EXM_EXCH_ID: 'MCX' })).toBeNull();
    expect(parseScripRow({ ...row, SEM_LOT_UNITS: '0' })).toBeNull();
    expect(parseScripRow({ ...row, SEM_EXPIRY_DATE: '' })).toBeNull();
  });
});

describe('ScripMasterResolver', () => {
  const resolver = ScripMasterResolver.fromCsv(CSV);

  it('indexes only supported index options', () => {
    expect(resolver.size).toBe(3);
  });

  it('resolves an intent to its security id and lot size', async () => {
    expect(await resolver.resolve(makeIntent())).toEqual({
      securityId: '43512',
      exchangeSegment: 'NSE_FNO',
      lotSize: 75,
      tradingSymbol: 'NIFTY 04 DEC 24000 CALL',
    });
  });

  it('resolves SENSEX contracts on the BSE segment', async () => {
    const instrument = await resolver.resolve(makeIntent({ underlying: 'SENSEX', strike: 80000 }));
    expect(instrument?.exchangeSegment).toBe('BSE_FNO');
    expect(instrument?.securityId).toBe('825001');
  });

  it('returns null for a contract that is not listed', async () => {
    expect(await resolver.resolve(makeIntent({ strike: 24050 }))).toBeNull();
    expect(await resolver.resolve(makeIntent({ expiryDate: { year: 2025, month: 12, day: 11 } }))).toBeNull();
  });

  it('raises MarketDataUnavailableError for a missing file', () => {
    expect(() => ScripMasterResolver.fromFile('/nonexistent/dhan_master.csv')).toThrow(MarketDataUnavailableError);
  });
});
