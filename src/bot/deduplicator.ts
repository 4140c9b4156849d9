// Deduplicator — sliding-window suppression of repeated intents.
// The key→timestamp map is the only shared mutable state in the pipeline.

import type { DedupVerdict, OptionType, TradeAction, TradeIntent, Underlying } from '../types';

/** Fields that identify a trade for dedup purposes */
export interface DedupFields {
  underlying: Underlying;
  strike: number;
  optionType: OptionType;
  action: TradeAction;
}

/** Storage for the last admission time per key */
export interface DedupStore {
  get(key: string): Date | undefined;
  set(key: string, admittedAt: Date): void;
  delete(key: string): void;
  keys(): IterableIterator<string>;
}

export class InMemoryDedupStore implements DedupStore {
  private records = new Map<string, Date>();

  get(key: string): Date | undefined {
    return this.records.get(key);
  }

  set(key: string, admittedAt: Date): void {
    this.records.set(key, admittedAt);
  }

  delete(key: string): void {
    this.records.delete(key);
  }

  keys(): IterableIterator<string> {
    return this.records.keys();
  }
}

/** "NIFTY|24000|CE|BUY" */
export function dedupKey(fields: DedupFields): string {
  return `${fields.underlying}|${fields.strike}|${fields.optionType}|${fields.action}`;
}

export class Deduplicator {
  private readonly windowMs: number;
  private readonly store: DedupStore;

  constructor(windowMinutes: number, store: DedupStore = new InMemoryDedupStore()) {
    this.windowMs = windowMinutes * 60_000;
    this.store = store;
  }

  /**
   * Check-and-record for one key. Admits when no record exists within the window
   * of `timestamp`; a rejected duplicate leaves the existing record untouched.
   *
   * Lookup and write must stay in one synchronous step so that batches
   * interleaved on the event loop cannot both admit the same key.
   */
  admitKey(key: string, timestamp: Date): boolean {
    const last = this.store.get(key);
    if (last !== undefined) {
      if (timestamp.getTime() - last.getTime() <= this.windowMs) {
        return false;
      }
      this.store.delete(key);
    }
    this.store.set(key, timestamp);
    return true;
  }

  admit(intent: TradeIntent): DedupVerdict {
    return this.admitKey(dedupKey(intent), intent.timestamp) ? 'ADMITTED' : 'REJECTED_DUPLICATE';
  }

  /** Time the key was last admitted, if still recorded */
  lastAdmittedAt(key: string): Date | undefined {
    return this.store.get(key);
  }

  /** Drop every record older than the window relative to `now` */
  prune(now: Date): number {
    let removed = 0;
    for (const key of Array.from(this.store.keys())) {
      const at = this.store.get(key);
      if (at !== undefined && now.getTime() - at.getTime() > this.windowMs) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Rebuild records from signal-log entries after a restart.
   * Only entries within the window of `now` are kept; the latest timestamp wins per key.
   */
  rehydrate(records: Array<DedupFields & { timestamp: Date }>, now: Date): number {
    let restored = 0;
    for (const record of records) {
      if (now.getTime() - record.timestamp.getTime() > this.windowMs) continue;
      const key = dedupKey(record);
      const existing = this.store.get(key);
      if (existing === undefined || existing.getTime() < record.timestamp.getTime()) {
        this.store.set(key, record.timestamp);
        restored++;
      }
    }
    return restored;
  }
}
