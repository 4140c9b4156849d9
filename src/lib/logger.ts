// Structured JSON logger with per-component scopes + file logging for bot runs

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import type { LogLevel, LogEntry } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Sensitive keys that should never be logged
const SENSITIVE_KEYS = ['secret', 'password', 'token', 'apiKey', 'api_key', 'authorization', 'access-token'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEYS.some((k) => key.toLowerCase().includes(k.toLowerCase()))) {
      redacted[key] = '[REDACTED]';
    } else if (value instanceof Date) {
      redacted[key] = value.toISOString();
    } else if (isPlainObject(value)) {
      redacted[key] = redactSensitive(value);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  component?: string,
): LogEntry {
  const merged = component ? { component, ...data } : data;
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(merged && { data: redactSensitive(merged) }),
  };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function shouldLog(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  const currentLevel: LogLevel = isLogLevel(configured) ? configured : 'info';
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

// ─── File logging for bot runs ───────────────────────────────────────────────

let logFilePath: string | null = null;

/** Enable file logging. Creates a timestamped log file in the given directory. */
export function enableFileLogging(dir = 'logs'): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const ts = new Date().toISOString().replace(/[:.]/g, '-').replace('T', '_').slice(0, 19);
  logFilePath = join(dir, `signals-${ts}.log`);
  return logFilePath;
}

function writeToFile(output: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, output + '\n');
  } catch (err) {
    // Disable the file sink instead of recursing through the logger
    logFilePath = null;
    console.error(`File logging disabled: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>, component?: string): void {
  if (!shouldLog(level)) return;

  const entry = createLogEntry(level, message, data, component);
  const output = JSON.stringify(entry);

  writeToFile(output);

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(output);
  }
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/** Logger that tags every entry with `component` (e.g. 'SignalExtractor') */
export function createLogger(component?: string): Logger {
  return {
    debug: (message, data) => log('debug', message, data, component),
    info: (message, data) => log('info', message, data, component),
    warn: (message, data) => log('warn', message, data, component),
    error: (message, data) => log('error', message, data, component),
  };
}

export const logger: Logger = createLogger();

export { redactSensitive, createLogEntry, shouldLog };
