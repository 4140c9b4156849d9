// Bot runner — drives message batches through extraction, dedup, planning and submission

import { errorMessage } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { getSupabase } from '../lib/supabase';
import { extractSignals } from '../services/signal-extractor';
import type { PipelineConfig, RawMessage, TradeIntent } from '../types';
import { Deduplicator, dedupKey } from './deduplicator';
import { planExecution } from './execution-planner';
import { MessageBatcher } from './message-batcher';
import { MessageListener } from './message-listener';
import type {
  InstrumentResolver,
  MarketDataProvider,
  OrderSubmitter,
  ResolvedInstrument,
  SignalLog,
  SignalOutcome,
} from './types';

const log = createLogger('BotRunner');

/** Collaborators the runner talks to */
export interface BotRunnerDeps {
  resolver: InstrumentResolver;
  marketData: MarketDataProvider;
  submitter: OrderSubmitter;
  signalLog: SignalLog;
  /** Defaults to an in-memory deduplicator over the configured window */
  deduplicator?: Deduplicator;
  /** Defaults to a listener on every chat channel */
  listener?: MessageListener;
}

/**
 * BotRunner — orchestrates the signal pipeline.
 *
 * Per candidate: RECEIVED → EXTRACTED → VALIDATED → DEDUP_CHECKED → PLANNED,
 * ending in exactly one SignalOutcome.
 *
 * Lifecycle:
 *   start() -> rehydrate dedup from signal log -> subscribe chat messages -> batch -> process
 *   stop()  -> flush pending batch -> wait for in-flight batches -> unsubscribe
 */
export class BotRunner {
  private readonly config: PipelineConfig;
  private readonly deps: BotRunnerDeps;
  private readonly deduplicator: Deduplicator;
  private readonly listener: MessageListener;
  private readonly batcher: MessageBatcher;
  private readonly inFlight = new Set<Promise<SignalOutcome[]>>();
  private running = false;

  constructor(config: PipelineConfig, deps: BotRunnerDeps) {
    this.config = config;
    this.deps = deps;
    this.deduplicator = deps.deduplicator ?? new Deduplicator(config.dedupeWindowMinutes);
    this.listener = deps.listener ?? new MessageListener();
    this.batcher = new MessageBatcher(config.batchDelayMs);

    this.listener.on('message', (message: RawMessage) => this.batcher.push(message));
    this.batcher.on('batch', (batch: RawMessage[]) => this.track(this.processBatch(batch)));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Start the bot */
  async start(now: Date = new Date()): Promise<void> {
    if (this.running) return;
    this.running = true;

    const restored = await this.rehydrate(now);
    this.listener.start(getSupabase());

    log.info('Bot running', {
      dedupeWindowMinutes: this.config.dedupeWindowMinutes,
      batchDelayMs: this.config.batchDelayMs,
      restoredDedupRecords: restored,
    });
  }

  /** Stop the bot; pending messages are processed before returning */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.batcher.stop();
    await Promise.allSettled(Array.from(this.inFlight));
    await this.listener.stop();
    log.info('Bot stopped');
  }

  /**
   * Re-derive dedup records from the signal log entries inside the window.
   * A log that cannot be read leaves the deduplicator empty.
   */
  async rehydrate(now: Date): Promise<number> {
    const since = new Date(now.getTime() - this.config.dedupeWindowMinutes * 60_000);
    try {
      const records = await this.deps.signalLog.loadSince(since);
      const restored = this.deduplicator.rehydrate(records, now);
      log.info('Dedup state rehydrated', { records: records.length, restored });
      return restored;
    } catch (err) {
      log.error('Dedup rehydration failed, starting empty', { error: errorMessage(err) });
      return 0;
    }
  }

  private track(work: Promise<SignalOutcome[]>): void {
    const tracked = work
      .catch((err: unknown): SignalOutcome[] => {
        log.error('Batch processing failed', { error: errorMessage(err) });
        return [];
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  /**
   * Process one batch. Extraction and every dedup decision happen synchronously
   * in stitch order before the first await; planning then runs per admitted intent.
   */
  async processBatch(batch: RawMessage[]): Promise<SignalOutcome[]> {
    const outcomes: SignalOutcome[] = [];
    const admitted: Array<{ index: number; intent: TradeIntent }> = [];

    if (batch.length > 0) {
      const pruned = this.deduplicator.prune(batch[0].timestamp);
      if (pruned > 0) log.debug('Pruned expired dedup records', { pruned });
    }

    for (const result of extractSignals(batch, this.config.extractor)) {
      if (result.status === 'rejected') {
        log.warn('Signal rejected', {
          outcome: result.outcome,
          error: result.error,
          detail: result.detail,
          rawText: result.rawText,
        });
        outcomes.push({
          outcome: result.outcome,
          stage: result.stage,
          rawText: result.rawText,
          timestamp: result.timestamp,
          detail: result.detail,
        });
        continue;
      }

      const { intent } = result;
      const key = dedupKey(intent);
      const lastAdmittedAt = this.deduplicator.lastAdmittedAt(key);
      if (this.deduplicator.admit(intent) === 'REJECTED_DUPLICATE') {
        const detail = `Duplicate of ${key} admitted at ${lastAdmittedAt?.toISOString() ?? 'unknown'}`;
        log.info('Duplicate signal', { tradingSymbol: intent.tradingSymbol, detail });
        outcomes.push({
          outcome: 'REJECTED_DUPLICATE',
          stage: 'DEDUP_CHECKED',
          rawText: intent.rawText,
          timestamp: intent.timestamp,
          detail,
          intent,
        });
        continue;
      }

      admitted.push({ index: outcomes.length, intent });
      outcomes.push({
        outcome: 'ADMITTED_FOR_EXECUTION',
        stage: 'DEDUP_CHECKED',
        rawText: intent.rawText,
        timestamp: intent.timestamp,
        intent,
      });
    }

    for (const { index, intent } of admitted) {
      outcomes[index] = await this.execute(outcomes[index], intent);
    }

    return outcomes;
  }

  /** Persist, resolve, price, plan and submit one admitted intent */
  private async execute(base: SignalOutcome, intent: TradeIntent): Promise<SignalOutcome> {
    let outcome: SignalOutcome = { ...base };

    try {
      const record = await this.deps.signalLog.append(intent);
      outcome.signalId = record.id;
    } catch (err) {
      log.error('Signal log append failed', { tradingSymbol: intent.tradingSymbol, error: errorMessage(err) });
    }

    let instrument: ResolvedInstrument | null;
    let ltp: number | null;
    try {
      instrument = await this.deps.resolver.resolve(intent);
      ltp = instrument ? await this.deps.marketData.getLtp(instrument) : null;
    } catch (err) {
      return this.fail(outcome, `Market data unavailable: ${errorMessage(err)}`);
    }
    if (!instrument) {
      return this.fail(outcome, `No instrument for ${intent.tradingSymbol}`);
    }
    outcome.instrument = instrument;

    const verdict = planExecution(intent, ltp, instrument.lotSize, this.config.risk);
    if (verdict.status === 'failed') {
      if (verdict.reason === 'MISSING_MARKET_DATA') {
        return this.fail(outcome, verdict.detail);
      }
      log.error('Invalid risk configuration', { tradingSymbol: intent.tradingSymbol, detail: verdict.detail });
      return { ...outcome, outcome: 'FAILED_INVALID_RISK', stage: 'PLANNED', detail: verdict.detail };
    }
    if (verdict.status === 'skipped') {
      log.info('Entry skipped, price moved', { tradingSymbol: intent.tradingSymbol, detail: verdict.detail });
      return { ...outcome, outcome: 'SKIPPED_PRICE_MOVED', stage: 'PLANNED', detail: verdict.detail };
    }

    const { plan } = verdict;
    outcome = { ...outcome, stage: 'PLANNED', plan };
    log.info('Execution planned', {
      tradingSymbol: intent.tradingSymbol,
      action: intent.action,
      orderType: plan.orderType,
      quantity: plan.quantity,
      ltp: plan.ltp,
      stopLossPrice: plan.stopLossPrice,
      targetPrice: plan.targetPrice,
    });

    try {
      outcome.submission = await this.deps.submitter.submit(intent, instrument, plan);
    } catch (err) {
      log.error('Order submission failed', { tradingSymbol: intent.tradingSymbol, error: errorMessage(err) });
    }
    return outcome;
  }

  private fail(outcome: SignalOutcome, detail: string): SignalOutcome {
    log.warn('Missing market data', { tradingSymbol: outcome.intent?.tradingSymbol, detail });
    return { ...outcome, outcome: 'FAILED_MISSING_MARKET_DATA', stage: 'DEDUP_CHECKED', detail };
  }
}
