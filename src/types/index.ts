// Options Signal Bot - Type Definitions

/**
 * Index underlyings the bot trades options on
 */
export type Underlying = 'NIFTY' | 'BANKNIFTY' | 'SENSEX';

/**
 * Option contract type: Call (CE) or Put (PE)
 */
export type OptionType = 'CE' | 'PE';

/**
 * Trade direction parsed from the signal
 */
export type TradeAction = 'BUY' | 'SELL';

/**
 * Calendar date without a time component. Months are 1-based.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * One raw chat message as delivered by the ingestion layer
 */
export interface RawMessage {
  text: string;
  timestamp: Date;
}

/**
 * Structured, validated trade intent extracted from one or more stitched messages.
 * Frozen after validation.
 */
export interface TradeIntent {
  /** Timestamp of the last message stitched into this intent */
  timestamp: Date;
  underlying: Underlying;
  strike: number;
  optionType: OptionType;
  action: TradeAction;
  /** Price level at which the signal wants entry */
  entryTrigger: number;
  stopLoss: number | null;
  /** Highest quoted target, kept for the audit trail only */
  target: number | null;
  isPositional: boolean;
  expiryDate: CalendarDate;
  /** e.g. "NIFTY 03 DEC 24000 CE" */
  tradingSymbol: string;
  rawText: string;
}

/**
 * Parse failure categories
 */
export type ParseErrorKind =
  | 'IncompleteFields'
  | 'UnsupportedInstrument'
  | 'NoiseMatch'
  | 'ExpiryResolutionError';

/**
 * Terminal outcome of one candidate signal across the pipeline
 */
export type SignalOutcomeCode =
  | 'ADMITTED_FOR_EXECUTION'
  | 'REJECTED_DUPLICATE'
  | 'REJECTED_INCOMPLETE'
  | 'REJECTED_NOISE'
  | 'SKIPPED_PRICE_MOVED'
  | 'FAILED_MISSING_MARKET_DATA'
  | 'FAILED_INVALID_RISK';

/**
 * Pipeline stages a candidate passes through, in order
 */
export type SignalStage = 'RECEIVED' | 'EXTRACTED' | 'VALIDATED' | 'DEDUP_CHECKED' | 'PLANNED';

/**
 * Rejection produced by the extractor for one candidate buffer
 */
export interface ExtractionRejection {
  status: 'rejected';
  outcome: Extract<SignalOutcomeCode, 'REJECTED_NOISE' | 'REJECTED_INCOMPLETE'>;
  error: ParseErrorKind;
  detail: string;
  /** Stage reached before rejection: noise is caught on receipt, the rest after extraction */
  stage: Extract<SignalStage, 'RECEIVED' | 'EXTRACTED'>;
  rawText: string;
  timestamp: Date;
}

export interface ExtractionMatch {
  status: 'matched';
  intent: TradeIntent;
}

export type ExtractionResult = ExtractionMatch | ExtractionRejection;

export type DedupVerdict = 'ADMITTED' | 'REJECTED_DUPLICATE';

/**
 * Order types sent to the broker
 */
export type OrderType = 'MARKET' | 'LIMIT';

/**
 * Broker product: intraday positions are squared off same day, margin positions are carried
 */
export type ProductType = 'INTRADAY' | 'MARGIN';

/**
 * Risk sizing audit attached to every plan
 */
export interface PlanSizing {
  riskAmount: number;
  slGap: number;
  rawUnits: number;
  lots: number;
  lotSize: number;
}

/**
 * Concrete, risk-sized order instruction for the submission collaborator
 */
export interface ExecutionPlan {
  orderType: OrderType;
  /** Present iff orderType is LIMIT */
  limitPrice?: number;
  quantity: number;
  targetPrice: number;
  stopLossPrice: number;
  trailingJump: number;
  productType: ProductType;
  /** LTP the decision was made against */
  ltp: number;
  sizing: PlanSizing;
}

export type PlanFailureReason = 'MISSING_MARKET_DATA' | 'INVALID_RISK_CONFIGURATION';

export type PlanVerdict =
  | { status: 'planned'; plan: ExecutionPlan }
  | { status: 'skipped'; reason: 'PRICE_MOVED'; detail: string }
  | { status: 'failed'; reason: PlanFailureReason; detail: string };

/**
 * Risk parameters consumed by the planner
 */
export interface RiskConfig {
  /** Rupees at risk per intraday trade (default 3500) */
  riskIntraday: number;
  /** Rupees at risk per positional trade (default 5000) */
  riskPositional: number;
  /** Fractional move above the trigger beyond which entry is skipped (default 0.03) */
  skipThresholdPct: number;
  /** Target = entry x multiplier (default 10) */
  targetMultiplier: number;
  /** Stop loss distance used when the signal carries none (default 0.10) */
  defaultSlPct: number;
  /** Trailing jump = entry x pct (default 0.05) */
  trailingPct: number;
}

/**
 * Weekday index, Sunday = 0 ... Saturday = 6
 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface ExpiryRules {
  /** Weekly expiry weekday for NIFTY */
  niftyWeekday: Weekday;
  /** Weekly expiry weekday for SENSEX */
  sensexWeekday: Weekday;
  /** Monthly expiry falls on the last occurrence of this weekday */
  bankniftyWeekday: Weekday;
}

/**
 * Settings consumed by the signal extractor
 */
export interface ExtractorConfig {
  /** Denylisted exit/management phrases */
  noiseKeywords: string[];
  /** A silence longer than this between two messages closes the current buffer */
  stitchGapSeconds: number;
  expiryRules: ExpiryRules;
}

/**
 * Full pipeline configuration, passed explicitly into each component
 */
export interface PipelineConfig {
  risk: RiskConfig;
  extractor: ExtractorConfig;
  /** Sliding dedup window in minutes (default 60) */
  dedupeWindowMinutes: number;
  /** Silence that closes a message batch (default 1500ms) */
  batchDelayMs: number;
}

/**
 * Validation Error
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Database connection status
 */
export interface DatabaseStatus {
  connected: boolean;
  error?: string;
}

/**
 * Signal log record as persisted for audit and dedup rehydration
 */
export interface SignalRecord {
  id: string;
  timestamp: Date;
  tradingSymbol: string;
  underlying: Underlying;
  strike: number;
  optionType: OptionType;
  action: TradeAction;
  entryTrigger: number;
  stopLoss: number | null;
  isPositional: boolean;
  rawText: string;
}

/**
 * Per-candidate result of POST /api/signals
 */
export interface SignalsApiResult {
  outcome: SignalOutcomeCode | 'ACCEPTED';
  tradingSymbol?: string;
  action?: TradeAction;
  signalId?: string;
  detail?: string;
  rawText: string;
}

/**
 * Signals API Response
 */
export interface SignalsResponse {
  success: boolean;
  message?: string;
  error?: string;
  data?: {
    accepted: number;
    rejected: number;
    results: SignalsApiResult[];
    timestamp: string;
  };
  details?: string | ValidationError[];
}
