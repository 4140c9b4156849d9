// Bot types — collaborator interfaces and per-candidate outcomes

import type {
  ExecutionPlan,
  SignalOutcomeCode,
  SignalRecord,
  SignalStage,
  TradeIntent,
} from '../types';

/** Broker exchange segment for index options */
export type ExchangeSegment = 'NSE_FNO' | 'BSE_FNO';

/** Instrument resolved from a canonical trading symbol */
export interface ResolvedInstrument {
  /** Broker security id (numeric string) */
  securityId: string;
  exchangeSegment: ExchangeSegment;
  lotSize: number;
  tradingSymbol: string;
}

/** Maps an intent's contract to the broker instrument; null when unknown */
export interface InstrumentResolver {
  resolve(intent: TradeIntent): Promise<ResolvedInstrument | null>;
}

/** Supplies the last traded price; null when unavailable */
export interface MarketDataProvider {
  getLtp(instrument: ResolvedInstrument): Promise<number | null>;
}

export interface SubmissionResult {
  orderId: string;
  status: string;
  dryRun: boolean;
}

/** Accepts an execution plan and talks to the broker */
export interface OrderSubmitter {
  submit(intent: TradeIntent, instrument: ResolvedInstrument, plan: ExecutionPlan): Promise<SubmissionResult>;
}

/** Persistent audit log of admitted intents, also the dedup rehydration source */
export interface SignalLog {
  append(intent: TradeIntent): Promise<SignalRecord>;
  loadSince(since: Date): Promise<SignalRecord[]>;
}

/** Terminal result of one candidate through the pipeline */
export interface SignalOutcome {
  outcome: SignalOutcomeCode;
  /** Last stage the candidate reached */
  stage: SignalStage;
  rawText: string;
  timestamp: Date;
  detail?: string;
  intent?: TradeIntent;
  plan?: ExecutionPlan;
  instrument?: ResolvedInstrument;
  /** Signal log id, set once the intent is persisted */
  signalId?: string;
  submission?: SubmissionResult;
}
