import { describe, it, expect } from 'vitest';
import { Deduplicator, InMemoryDedupStore, dedupKey } from './deduplicator';
import type { TradeIntent } from '../types';

const T0 = new Date('2025-12-01T04:00:00Z').getTime();
const at = (minutes: number) => new Date(T0 + minutes * 60_000);

function makeIntent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    timestamp: at(0),
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

describe('Deduplicator', () => {
  it('builds keys from underlying, strike, option type and action', () => {
    expect(dedupKey(makeIntent())).toBe('NIFTY|24000|CE|BUY');
  });

  it('admits the first occurrence', () => {
    const dedup = new Deduplicator(60);
    expect(dedup.admit(makeIntent())).toBe('ADMITTED');
    expect(dedup.lastAdmittedAt('NIFTY|24000|CE|BUY')).toEqual(at(0));
  });

  it('rejects a repeat within the window', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    expect(dedup.admit(makeIntent({ timestamp: at(10), entryTrigger: 125 }))).toBe('REJECTED_DUPLICATE');
  });

  it('treats the window edge as inside the window', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    expect(dedup.admit(makeIntent({ timestamp: at(60) }))).toBe('REJECTED_DUPLICATE');
  });

  it('admits again once the window has passed', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    expect(dedup.admit(makeIntent({ timestamp: at(61) }))).toBe('ADMITTED');
    expect(dedup.lastAdmittedAt('NIFTY|24000|CE|BUY')).toEqual(at(61));
  });

  it('does not extend the window on a rejected duplicate', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    dedup.admit(makeIntent({ timestamp: at(50) }));
    expect(dedup.admit(makeIntent({ timestamp: at(61) }))).toBe('ADMITTED');
  });

  it('keeps opposite actions and other strikes apart', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    expect(dedup.admit(makeIntent({ action: 'SELL' }))).toBe('ADMITTED');
    expect(dedup.admit(makeIntent({ strike: 24100 }))).toBe('ADMITTED');
    expect(dedup.admit(makeIntent({ optionType: 'PE' }))).toBe('ADMITTED');
  });

  it('ignores expiry and prices when matching', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    const other = makeIntent({ expiryDate: { year: 2025, month: 12, day: 11 }, stopLoss: null, timestamp: at(1) });
    expect(dedup.admit(other)).toBe('REJECTED_DUPLICATE');
  });

  it('is idempotent for a replayed batch', () => {
    const dedup = new Deduplicator(60);
    const batch = [makeIntent(), makeIntent({ underlying: 'BANKNIFTY', strike: 45000 })];
    expect(batch.map((i) => dedup.admit(i))).toEqual(['ADMITTED', 'ADMITTED']);
    expect(batch.map((i) => dedup.admit(i))).toEqual(['REJECTED_DUPLICATE', 'REJECTED_DUPLICATE']);
  });

  it('prunes records older than the window', () => {
    const dedup = new Deduplicator(60);
    dedup.admit(makeIntent());
    dedup.admit(makeIntent({ strike: 24100, timestamp: at(30) }));

    expect(dedup.prune(at(61))).toBe(1);
    expect(dedup.lastAdmittedAt('NIFTY|24000|CE|BUY')).toBeUndefined();
    expect(dedup.lastAdmittedAt('NIFTY|24100|CE|BUY')).toEqual(at(30));
  });

  it('rehydrates recent records, latest timestamp winning', () => {
    const dedup = new Deduplicator(60);
    const record = { underlying: 'NIFTY' as const, strike: 24000, optionType: 'CE' as const, action: 'BUY' as const };

    const restored = dedup.rehydrate(
      [
        { ...record, strike: 23900, timestamp: at(-90) },
        { ...record, timestamp: at(-30) },
        { ...record, timestamp: at(-10) },
      ],
      at(0),
    );

    expect(restored).toBe(2);
    expect(dedup.lastAdmittedAt('NIFTY|23900|CE|BUY')).toBeUndefined();
    expect(dedup.lastAdmittedAt('NIFTY|24000|CE|BUY')).toEqual(at(-10));
    expect(dedup.admit(makeIntent({ timestamp: at(5) }))).toBe('REJECTED_DUPLICATE');
  });

  it('writes through a supplied store', () => {
    const store = new InMemoryDedupStore();
    new Deduplicator(60, store).admit(makeIntent());
    expect(Array.from(store.keys())).toEqual(['NIFTY|24000|CE|BUY']);
  });
});
