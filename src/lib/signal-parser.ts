// Chat signal parser — field extraction over a single text buffer.
// Pure functions over an immutable buffer; stitching across messages lives in the signal extractor.

import { SignalParseError } from './errors';
import {
  DEFAULT_EXPIRY_RULES,
  MONTHS,
  formatExpiryLabel,
  isMonthName,
  resolveExplicitExpiry,
  resolveImplicitExpiry,
  toIstDate,
  type MonthName,
} from './expiry';
import type {
  CalendarDate,
  ExpiryRules,
  OptionType,
  ParseErrorKind,
  TradeAction,
  TradeIntent,
  Underlying,
} from '../types';

/** Fields every intent must carry */
export type RequiredField = 'action' | 'underlying' | 'strike' | 'optionType' | 'entryTrigger';

const REQUIRED_FIELDS: RequiredField[] = ['action', 'underlying', 'strike', 'optionType', 'entryTrigger'];

/** Raw field scan of a buffer, before validation */
export interface SignalFields {
  action?: TradeAction;
  underlying?: Underlying;
  strike?: number;
  optionType?: OptionType;
  entryTrigger?: number;
  stopLoss?: number;
  target?: number;
  isPositional: boolean;
  explicitExpiry?: { day: number; month: MonthName };
  /** Fields whose marker was followed by a malformed number */
  malformed: string[];
}

export type BlockParseResult =
  | { status: 'matched'; intent: TradeIntent }
  | { status: 'incomplete'; fields: SignalFields; missing: RequiredField[]; detail: string }
  | { status: 'rejected'; error: ParseErrorKind; detail: string };

export interface ParseOptions {
  noiseKeywords: string[];
  expiryRules?: ExpiryRules;
}

// ─── Patterns (applied to normalised, upper-cased text) ──────────────────────

const MONTH_PATTERN = MONTHS.join('|');
const NUM = String.raw`(\d+(?:\.\d+)*)`;
const PRICE = String.raw`${NUM}(?:\s*-\s*${NUM})?`;

const RE_ACTION = /\b(BUY|SELL)\b/;
const RE_ACTION_GLOBAL = /\b(BUY|SELL)\b/gi;
const RE_UNDERLYING = /\b(BANK\s?NIFTY|NIFTY\s?BANK|NIFTY|SENSEX)\b/;
const RE_UNSUPPORTED = /\b(FIN\s?NIFTY|MIDCP\s?NIFTY|MID\s?CAP\w*|FUT|FUTS|FUTURE|FUTURES)\b/;
const RE_STRIKE_AFTER_UNDERLYING = new RegExp(
  String.raw`^(?:\s+\d{1,2}(?:ST|ND|RD|TH)?\s*(?:${MONTH_PATTERN})\b)?\s*${NUM}`,
);
const RE_STRIKE_BEFORE_TYPE = new RegExp(String.raw`${NUM}\s*(?:CE|PE|CALL|PUT)\b`);
const RE_OPTION_TYPE = /(?:\b|(?<=\d))(CE|PE|CALL|PUT)\b/;
const RE_ENTRY = new RegExp(String.raw`\b(?:ABOVE|ABV)\b\s*[:@-]?\s*${PRICE}`);
const RE_ENTRY_MARKER = /\b(?:ABOVE|ABV)\b/;
const RE_SL = new RegExp(String.raw`\b(?:SL|STOP\s?LOSS)\b\s*[:@-]?\s*${PRICE}`);
const RE_SL_MARKER = /\b(?:SL|STOP\s?LOSS)\b/;
const RE_TARGET = /\b(?:TARGETS?|TGT)\b\s*[:@-]?\s*([\d.\s,/-]+)/;
const RE_TARGET_MARKER = /\b(?:TARGETS?|TGT)\b/;
const RE_POSITIONAL = /\b(?:POSITIONAL|POSITION|HOLD|LONG\s?TERM)\b/;
const RE_EXPIRY = new RegExp(String.raw`\b(\d{1,2})(?:ST|ND|RD|TH)?\s*(${MONTH_PATTERN})\b`);
const RE_NUMBER_LINE = /^[\d.\s,/-]+$/;
const RE_FIRST_NUMBER = new RegExp(NUM);

// ─── Text helpers ────────────────────────────────────────────────────────────

/** Upper-case, collapse whitespace within lines, drop blank lines */
export function normalizeText(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/\s+/g, ' ').toUpperCase())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function hasActionKeyword(text: string): boolean {
  return RE_ACTION.test(text.toUpperCase());
}

/** Offsets of every BUY/SELL keyword in `text` */
export function actionKeywordOffsets(text: string): number[] {
  return Array.from(text.matchAll(RE_ACTION_GLOBAL), (m) => m.index ?? 0);
}

/** Parse a plain decimal token; null for malformed tokens such as "12.3.4" */
function parseNumberToken(token: string): number | null {
  return /^\d+(?:\.\d+)?$/.test(token) ? Number(token) : null;
}

/** "120" → 120, "120-130" → 125 */
function parsePrice(low: string, high: string | undefined): number | null {
  const a = parseNumberToken(low);
  if (a === null) return null;
  if (high === undefined) return a;
  const b = parseNumberToken(high);
  return b === null ? null : (a + b) / 2;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keywords: string[]): RegExp | null {
  const parts = keywords
    .map((k) => k.trim())
    .filter((k) => k.length > 0)
    .map((k) => k.split(/\s+/).map(escapeRegExp).join(String.raw`\s+`));
  return parts.length > 0 ? new RegExp(String.raw`\b(?:${parts.join('|')})\b`) : null;
}

function toUnderlying(token: string): Underlying {
  const compact = token.replace(/\s/g, '');
  if (compact === 'BANKNIFTY' || compact === 'NIFTYBANK') return 'BANKNIFTY';
  if (compact === 'SENSEX') return 'SENSEX';
  return 'NIFTY';
}

// ─── Noise ───────────────────────────────────────────────────────────────────

/** True when the text carries a denylisted exit/management phrase */
export function matchesNoiseKeyword(normalized: string, noiseKeywords: string[]): boolean {
  const denylist = keywordPattern(noiseKeywords);
  return denylist !== null && denylist.test(normalized);
}

/**
 * Classify a normalised buffer as noise.
 * Returns the rejection or null when the buffer may carry a signal.
 */
export function detectNoise(
  normalized: string,
  noiseKeywords: string[],
): { error: Extract<ParseErrorKind, 'NoiseMatch' | 'UnsupportedInstrument'>; detail: string } | null {
  const denylist = keywordPattern(noiseKeywords);
  const denied = denylist ? normalized.match(denylist) : null;
  if (denied) {
    return { error: 'NoiseMatch', detail: `Matched noise keyword "${denied[0]}"` };
  }

  const lines = normalized.split('\n');
  if (!RE_ACTION.test(normalized) && lines.length > 0 && lines.every((l) => RE_NUMBER_LINE.test(l))) {
    return { error: 'NoiseMatch', detail: 'Bare numbers without an action keyword' };
  }

  const unsupported = normalized.match(RE_UNSUPPORTED);
  if (unsupported) {
    return { error: 'UnsupportedInstrument', detail: `Unsupported instrument "${unsupported[0]}"` };
  }

  return null;
}

// ─── Field extraction ────────────────────────────────────────────────────────

function extractStrike(normalized: string, malformed: string[]): number | undefined {
  const underlying = RE_UNDERLYING.exec(normalized);
  let token: string | undefined;
  if (underlying) {
    const rest = normalized.slice(underlying.index + underlying[0].length);
    token = RE_STRIKE_AFTER_UNDERLYING.exec(rest)?.[1];
  }
  token ??= RE_STRIKE_BEFORE_TYPE.exec(normalized)?.[1];
  if (token === undefined) return undefined;

  const value = parseNumberToken(token);
  if (value === null || !Number.isInteger(value) || value <= 0) {
    malformed.push('strike');
    return undefined;
  }
  return value;
}

/** Entry fallback: first number on a plain line after the action line */
function fallbackEntry(normalized: string): number | undefined {
  const lines = normalized.split('\n');
  const actionLine = lines.findIndex((l) => RE_ACTION.test(l));
  if (actionLine === -1) return undefined;

  for (const line of lines.slice(actionLine + 1)) {
    if (
      RE_SL_MARKER.test(line) ||
      RE_TARGET_MARKER.test(line) ||
      RE_UNDERLYING.test(line) ||
      RE_OPTION_TYPE.test(line)
    ) {
      continue;
    }
    const token = RE_FIRST_NUMBER.exec(line)?.[1];
    if (token !== undefined) {
      return parseNumberToken(token) ?? undefined;
    }
  }
  return undefined;
}

function extractPrice(
  normalized: string,
  pattern: RegExp,
  field: string,
  malformed: string[],
): number | undefined {
  const match = pattern.exec(normalized);
  if (!match) return undefined;
  const value = parsePrice(match[1], match[2]);
  if (value === null || value <= 0) {
    malformed.push(field);
    return undefined;
  }
  return value;
}

/**
 * Scan a normalised buffer for signal fields.
 */
export function extractFields(normalized: string): SignalFields {
  const malformed: string[] = [];

  const action = RE_ACTION.exec(normalized)?.[1];
  const underlying = RE_UNDERLYING.exec(normalized)?.[1];
  const optionType = RE_OPTION_TYPE.exec(normalized)?.[1];

  const fields: SignalFields = {
    isPositional: RE_POSITIONAL.test(normalized),
    malformed,
  };

  if (action === 'BUY' || action === 'SELL') fields.action = action;
  if (underlying) fields.underlying = toUnderlying(underlying);
  if (optionType) fields.optionType = optionType.startsWith('C') ? 'CE' : 'PE';

  const strike = extractStrike(normalized, malformed);
  if (strike !== undefined) fields.strike = strike;

  const entry = extractPrice(normalized, RE_ENTRY, 'entryTrigger', malformed) ??
    (malformed.includes('entryTrigger') ? undefined : fallbackEntry(normalized));
  if (entry !== undefined) fields.entryTrigger = entry;

  const stopLoss = extractPrice(normalized, RE_SL, 'stopLoss', malformed);
  if (stopLoss !== undefined) fields.stopLoss = stopLoss;

  const targetGroup = RE_TARGET.exec(normalized)?.[1];
  if (targetGroup) {
    const values = Array.from(targetGroup.matchAll(/\d+(?:\.\d+)?/g), (m) => Number(m[0]));
    if (values.length > 0) fields.target = Math.max(...values);
  }

  const expiry = RE_EXPIRY.exec(normalized);
  if (expiry && isMonthName(expiry[2])) {
    fields.explicitExpiry = { day: Number(expiry[1]), month: expiry[2] };
  }

  return fields;
}

export function missingFields(fields: SignalFields): RequiredField[] {
  return REQUIRED_FIELDS.filter((f) => fields[f] === undefined);
}

/** Marker-bearing fields a follow-up message would contribute to a buffer */
export function suppliedMarkers(normalized: string): Array<'entryTrigger' | 'stopLoss' | 'target'> {
  const supplied: Array<'entryTrigger' | 'stopLoss' | 'target'> = [];
  if (RE_ENTRY_MARKER.test(normalized)) supplied.push('entryTrigger');
  if (RE_SL_MARKER.test(normalized)) supplied.push('stopLoss');
  if (RE_TARGET_MARKER.test(normalized)) supplied.push('target');
  return supplied;
}

// ─── Trading symbol ──────────────────────────────────────────────────────────

/** "NIFTY 03 DEC 24000 CE" */
export function buildTradingSymbol(
  underlying: Underlying,
  expiry: CalendarDate,
  strike: number,
  optionType: OptionType,
): string {
  return `${underlying} ${formatExpiryLabel(expiry)} ${strike} ${optionType}`;
}

export interface TradingSymbolParts {
  underlying: Underlying;
  expiryDate: CalendarDate;
  strike: number;
  optionType: OptionType;
}

/**
 * Parse a canonical trading symbol back into its parts.
 * The year is resolved against `referenceDate` the same way explicit expiries are.
 */
export function parseTradingSymbol(symbol: string, referenceDate: CalendarDate): TradingSymbolParts | null {
  const match = symbol
    .trim()
    .toUpperCase()
    .match(new RegExp(String.raw`^(NIFTY|BANKNIFTY|SENSEX) (\d{2}) (${MONTH_PATTERN}) (\d+) (CE|PE)$`));
  if (!match || !isMonthName(match[3])) return null;

  const optionType: OptionType = match[5] === 'CE' ? 'CE' : 'PE';
  try {
    return {
      underlying: toUnderlying(match[1]),
      expiryDate: resolveExplicitExpiry(Number(match[2]), match[3], referenceDate),
      strike: Number(match[4]),
      optionType,
    };
  } catch (err) {
    if (err instanceof SignalParseError) return null;
    throw err;
  }
}

// ─── Block parsing ───────────────────────────────────────────────────────────

/**
 * Parse one candidate buffer into a validated, frozen TradeIntent.
 *
 * Stages: noise filter → field scan → completeness → expiry → canonical symbol.
 * `timestamp` is the time of the last message in the buffer; its IST date anchors expiry.
 */
export function parseSignalBlock(text: string, timestamp: Date, options: ParseOptions): BlockParseResult {
  const normalized = normalizeText(text);
  if (!normalized) {
    return { status: 'rejected', error: 'NoiseMatch', detail: 'Empty message' };
  }

  const noise = detectNoise(normalized, options.noiseKeywords);
  if (noise) {
    return { status: 'rejected', error: noise.error, detail: noise.detail };
  }

  const fields = extractFields(normalized);
  if (fields.malformed.length > 0) {
    return {
      status: 'rejected',
      error: 'IncompleteFields',
      detail: `Malformed numeric value for ${fields.malformed.join(', ')}`,
    };
  }

  const missing = missingFields(fields);
  const { action, underlying, strike, optionType, entryTrigger } = fields;
  if (
    action === undefined ||
    underlying === undefined ||
    strike === undefined ||
    optionType === undefined ||
    entryTrigger === undefined
  ) {
    return { status: 'incomplete', fields, missing, detail: `Missing ${missing.join(', ')}` };
  }

  const stopLoss = fields.stopLoss ?? null;
  if (stopLoss !== null && stopLoss === entryTrigger) {
    return { status: 'rejected', error: 'IncompleteFields', detail: 'Stop loss equals entry trigger' };
  }

  const messageDate = toIstDate(timestamp);
  let expiryDate: CalendarDate;
  try {
    expiryDate = fields.explicitExpiry
      ? resolveExplicitExpiry(fields.explicitExpiry.day, fields.explicitExpiry.month, messageDate)
      : resolveImplicitExpiry(underlying, messageDate, options.expiryRules ?? DEFAULT_EXPIRY_RULES);
  } catch (err) {
    if (err instanceof SignalParseError) {
      return { status: 'rejected', error: err.kind, detail: err.message };
    }
    throw err;
  }

  const intent: TradeIntent = {
    timestamp,
    underlying,
    strike,
    optionType,
    action,
    entryTrigger,
    stopLoss,
    target: fields.target ?? null,
    isPositional: fields.isPositional,
    expiryDate: Object.freeze({ ...expiryDate }),
    tradingSymbol: buildTradingSymbol(underlying, expiryDate, strike, optionType),
    rawText: text.trim(),
  };

  return { status: 'matched', intent: Object.freeze(intent) };
}
