import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Deduplicator, dedupKey } from '../src/bot/deduplicator';
import { loadConfig } from '../src/lib/config';
import { isDatabaseConfigured } from '../src/lib/db';
import { ConfigError, errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';
import { validateSignalsPayload, validateWebhookSecret } from '../src/lib/validation';
import { extractSignals } from '../src/services/signal-extractor';
import { appendSignalIfNew } from '../src/services/signal-log';
import type { PipelineConfig, RawMessage, SignalsApiResult, SignalsResponse } from '../src/types';

function earliestTimestamp(messages: RawMessage[]): Date {
  return new Date(Math.min(...messages.map((m) => m.timestamp.getTime())));
}

// Dedup state for deployments without a database, shared by every request to this instance
let shared: { windowMinutes: number; deduplicator: Deduplicator } | null = null;

function sharedDeduplicator(windowMinutes: number): Deduplicator {
  if (!shared || shared.windowMinutes !== windowMinutes) {
    shared = { windowMinutes, deduplicator: new Deduplicator(windowMinutes) };
  }
  return shared.deduplicator;
}

/** Forget in-process dedup state (tests) */
export function resetSharedDeduplicator(): void {
  shared = null;
}

/**
 * POST /api/signals
 *
 * Body: { secret, messages: [{ text, timestamp }] }
 * Extracts intents from the batch, drops duplicates of signals seen within the
 * dedup window, logs admitted intents and reports one result per candidate.
 *
 * With a database the signal log decides: each intent is checked and inserted in
 * one locked transaction. Without one, a per-instance Deduplicator decides, and
 * every decision of a request is taken before the handler next yields.
 */
export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  if (req.method !== 'POST') {
    logger.warn('Method not allowed', { method: req.method });
    const response: SignalsResponse = {
      success: false,
      error: 'Method not allowed',
      details: 'Only POST requests are accepted',
    };
    res.status(405).json(response);
    return;
  }

  const validation = validateSignalsPayload(req.body);
  if (!validation.valid || !validation.payload) {
    logger.warn('Validation failed', { errors: validation.errors });
    const response: SignalsResponse = {
      success: false,
      error: 'Validation failed',
      details: validation.errors,
    };
    res.status(400).json(response);
    return;
  }

  const { secret, messages } = validation.payload;
  if (!validateWebhookSecret(secret)) {
    logger.warn('Invalid webhook secret');
    const response: SignalsResponse = {
      success: false,
      error: 'Unauthorized',
      details: 'Invalid webhook secret',
    };
    res.status(401).json(response);
    return;
  }

  let config: PipelineConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const details = error instanceof ConfigError ? error.errors : errorMessage(error);
    logger.error('Invalid configuration', { error: errorMessage(error) });
    const response: SignalsResponse = { success: false, error: 'Configuration error', details };
    res.status(500).json(response);
    return;
  }

  const persist = isDatabaseConfigured();
  const windowMinutes = config.dedupeWindowMinutes;
  const deduplicator = persist ? null : sharedDeduplicator(windowMinutes);
  deduplicator?.prune(earliestTimestamp(messages));

  const results: SignalsApiResult[] = [];

  for (const result of extractSignals(messages, config.extractor)) {
    if (result.status === 'rejected') {
      logger.info('Signal rejected', { outcome: result.outcome, detail: result.detail });
      results.push({ outcome: result.outcome, detail: result.detail, rawText: result.rawText });
      continue;
    }

    const { intent } = result;
    const summary = { tradingSymbol: intent.tradingSymbol, action: intent.action, rawText: intent.rawText };
    let signalId: string | undefined;

    if (deduplicator) {
      if (deduplicator.admit(intent) === 'REJECTED_DUPLICATE') {
        logger.info('Duplicate signal', { key: dedupKey(intent) });
        results.push({ outcome: 'REJECTED_DUPLICATE', ...summary });
        continue;
      }
    } else {
      try {
        const record = await appendSignalIfNew(intent, windowMinutes);
        if (!record) {
          logger.info('Duplicate signal', { key: dedupKey(intent) });
          results.push({ outcome: 'REJECTED_DUPLICATE', ...summary });
          continue;
        }
        signalId = record.id;
      } catch (error) {
        logger.error('Failed to persist signal', { error: errorMessage(error) });
        const response: SignalsResponse = {
          success: false,
          error: 'Storage error',
          details: 'Failed to persist signal',
        };
        res.status(500).json(response);
        return;
      }
    }

    results.push({ outcome: 'ACCEPTED', ...summary, signalId });
  }

  const accepted = results.filter((r) => r.outcome === 'ACCEPTED').length;
  logger.info('Signals processed', { messages: messages.length, candidates: results.length, accepted });

  const response: SignalsResponse = {
    success: true,
    message: `${accepted} of ${results.length} candidate(s) accepted`,
    data: {
      accepted,
      rejected: results.length - accepted,
      results,
      timestamp: new Date().toISOString(),
    },
  };
  res.status(200).json(response);
}
