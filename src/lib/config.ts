// Pipeline configuration — string-keyed surface (env vars) parsed into an explicit config value

import { readFileSync } from 'fs';
import { ConfigError } from './errors';
import { DEFAULT_EXPIRY_RULES, WEEKDAYS, parseWeekday } from './expiry';
import type { ExpiryRules, PipelineConfig, ValidationError, Weekday } from '../types';

export type ConfigSource = Record<string, string | undefined>;

export const DEFAULT_NOISE_KEYWORDS = [
  'RISK TRAIL',
  'SAFE BOOK',
  'IGNORE',
  'BOOK PROFIT',
  'EXIT',
  'AVOID',
  'CLOSE',
  'WATCHLIST',
  'WATCH',
];

export const DEFAULT_CONFIG: PipelineConfig = {
  risk: {
    riskIntraday: 3500,
    riskPositional: 5000,
    skipThresholdPct: 0.03,
    targetMultiplier: 10,
    defaultSlPct: 0.1,
    trailingPct: 0.05,
  },
  extractor: {
    noiseKeywords: DEFAULT_NOISE_KEYWORDS,
    stitchGapSeconds: 300,
    expiryRules: DEFAULT_EXPIRY_RULES,
  },
  dedupeWindowMinutes: 60,
  batchDelayMs: 1500,
};

interface NumberRule {
  min?: number;
  /** Exclusive upper bound */
  below?: number;
  positive?: boolean;
  integer?: boolean;
}

function readNumber(
  source: ConfigSource,
  key: string,
  fallback: number,
  rule: NumberRule,
  errors: ValidationError[],
): number {
  const raw = source[key]?.trim();
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    errors.push({ field: key, message: `must be a number, got "${raw}"` });
    return fallback;
  }
  if (rule.integer && !Number.isInteger(value)) {
    errors.push({ field: key, message: 'must be an integer' });
  }
  if (rule.positive && value <= 0) {
    errors.push({ field: key, message: 'must be greater than 0' });
  }
  if (rule.min !== undefined && value < rule.min) {
    errors.push({ field: key, message: `must be at least ${rule.min}` });
  }
  if (rule.below !== undefined && value >= rule.below) {
    errors.push({ field: key, message: `must be less than ${rule.below}` });
  }
  return value;
}

function readWeekday(source: ConfigSource, key: string, fallback: Weekday, errors: ValidationError[]): Weekday {
  const raw = source[key]?.trim();
  if (!raw) return fallback;
  const weekday = parseWeekday(raw);
  if (weekday === null) {
    errors.push({ field: key, message: `must be one of ${WEEKDAYS.join(', ')}` });
    return fallback;
  }
  return weekday;
}

function readList(source: ConfigSource, key: string, fallback: string[]): string[] {
  const raw = source[key]?.trim();
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((s) => s.trim().toUpperCase().replace(/\s+/g, ' '))
    .filter((s) => s.length > 0);
}

/**
 * Build the pipeline config from a string-keyed source (defaults to process.env).
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(source: ConfigSource = process.env): PipelineConfig {
  const errors: ValidationError[] = [];
  const d = DEFAULT_CONFIG;

  const expiryRules: ExpiryRules = {
    niftyWeekday: readWeekday(source, 'NIFTY_EXPIRY_WEEKDAY', d.extractor.expiryRules.niftyWeekday, errors),
    sensexWeekday: readWeekday(source, 'SENSEX_EXPIRY_WEEKDAY', d.extractor.expiryRules.sensexWeekday, errors),
    bankniftyWeekday: readWeekday(source, 'BANKNIFTY_EXPIRY_WEEKDAY', d.extractor.expiryRules.bankniftyWeekday, errors),
  };

  const config: PipelineConfig = {
    risk: {
      riskIntraday: readNumber(source, 'RISK_INTRADAY', d.risk.riskIntraday, { positive: true }, errors),
      riskPositional: readNumber(source, 'RISK_POSITIONAL', d.risk.riskPositional, { positive: true }, errors),
      skipThresholdPct: readNumber(source, 'SKIP_THRESHOLD_PCT', d.risk.skipThresholdPct, { min: 0, below: 1 }, errors),
      targetMultiplier: readNumber(source, 'TARGET_MULTIPLIER', d.risk.targetMultiplier, { positive: true }, errors),
      defaultSlPct: readNumber(source, 'DEFAULT_SL_PCT', d.risk.defaultSlPct, { positive: true, below: 1 }, errors),
      trailingPct: readNumber(source, 'TRAILING_PCT', d.risk.trailingPct, { min: 0, below: 1 }, errors),
    },
    extractor: {
      noiseKeywords: readList(source, 'NOISE_KEYWORDS', d.extractor.noiseKeywords),
      stitchGapSeconds: readNumber(source, 'STITCH_GAP_SECONDS', d.extractor.stitchGapSeconds, { positive: true }, errors),
      expiryRules,
    },
    dedupeWindowMinutes: readNumber(source, 'DEDUPE_WINDOW_MINUTES', d.dedupeWindowMinutes, { min: 0 }, errors),
    batchDelayMs: readNumber(source, 'BATCH_DELAY_MS', d.batchDelayMs, { min: 0, integer: true }, errors),
  };

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}

/**
 * Load KEY=value lines from an env file into process.env without overriding existing values.
 * Returns the number of keys applied; a missing file is not an error.
 */
export function loadEnvFile(path = '.env.local'): number {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    // .env.local not required if env vars are already set
    return 0;
  }

  let applied = 0;
  for (const line of content.split('\n')) {
    const match = line.match(/^([A-Z0-9_]+)=(.*)$/);
    if (match && process.env[match[1]] === undefined) {
      process.env[match[1]] = match[2].trim().replace(/^(['"])(.*)\1$/, '$2');
      applied++;
    }
  }
  return applied;
}
