// Signal extractor — stitches a batch of chat messages into candidate buffers and parses each one.
// Pure and synchronous: the same batch always yields the same results, in stitch order.

import {
  actionKeywordOffsets,
  detectNoise,
  extractFields,
  hasActionKeyword,
  matchesNoiseKeyword,
  missingFields,
  normalizeText,
  parseSignalBlock,
  suppliedMarkers,
  type BlockParseResult,
  type SignalFields,
} from '../lib/signal-parser';
import type { ExtractionResult, ExtractorConfig, RawMessage } from '../types';

interface StitchBuffer {
  lines: string[];
  /** Timestamp of the last message stitched in */
  timestamp: Date;
  hasAction: boolean;
}

function bufferText(buffer: StitchBuffer): string {
  return buffer.lines.join('\n');
}

function scanBuffer(buffer: StitchBuffer): SignalFields {
  return extractFields(normalizeText(bufferText(buffer)));
}

/**
 * Whether a message without an action keyword continues the current buffer:
 * the buffer is still missing a required field, or the message carries a marker
 * (ABOVE, SL, TARGET) for a field the buffer does not have yet. A positional
 * marker alone never extends a complete buffer: it leads the next call.
 */
function continuesBuffer(buffer: StitchBuffer, normalizedMessage: string): boolean {
  const fields = scanBuffer(buffer);
  if (fields.malformed.length > 0) return false;
  if (missingFields(fields).length > 0) return true;

  return suppliedMarkers(normalizedMessage).some((marker) => {
    switch (marker) {
      case 'entryTrigger':
        return fields.entryTrigger === undefined;
      case 'stopLoss':
        return fields.stopLoss === undefined;
      case 'target':
        return fields.target === undefined;
    }
  });
}

/**
 * Split a buffer holding several action keywords into one candidate per keyword.
 * Splits at line starts when each keyword sits on its own line, otherwise at the keywords.
 * Text before the first cut is shared context prepended to every candidate.
 */
export function splitCandidates(text: string): string[] {
  const offsets = actionKeywordOffsets(text);
  if (offsets.length < 2) return [text];

  const lineStarts = offsets.map((offset) => text.lastIndexOf('\n', offset - 1) + 1);
  const cuts = new Set(lineStarts).size === lineStarts.length ? lineStarts : offsets;
  const prefix = text.slice(0, cuts[0]);

  return cuts.map((cut, i) => `${prefix}${text.slice(cut, cuts[i + 1])}`.trim());
}

function toResult(rawText: string, timestamp: Date, parsed: BlockParseResult): ExtractionResult {
  switch (parsed.status) {
    case 'matched':
      return { status: 'matched', intent: parsed.intent };
    case 'incomplete':
      return {
        status: 'rejected',
        outcome: 'REJECTED_INCOMPLETE',
        error: 'IncompleteFields',
        detail: parsed.detail,
        stage: 'EXTRACTED',
        rawText,
        timestamp,
      };
    case 'rejected': {
      const noise = parsed.error === 'NoiseMatch' || parsed.error === 'UnsupportedInstrument';
      return {
        status: 'rejected',
        outcome: noise ? 'REJECTED_NOISE' : 'REJECTED_INCOMPLETE',
        error: parsed.error,
        detail: parsed.detail,
        stage: noise ? 'RECEIVED' : 'EXTRACTED',
        rawText,
        timestamp,
      };
    }
  }
}

/**
 * Evaluate one flushed buffer. A multi-signal buffer is reported per part when at
 * least one part parses; otherwise the whole buffer is evaluated as one candidate.
 */
export function evaluateBuffer(text: string, timestamp: Date, config: ExtractorConfig): ExtractionResult[] {
  const options = { noiseKeywords: config.noiseKeywords, expiryRules: config.expiryRules };
  const parts = splitCandidates(text);

  if (parts.length > 1) {
    const parsed = parts.map((part) => ({ part, result: parseSignalBlock(part, timestamp, options) }));
    if (parsed.some(({ result }) => result.status === 'matched')) {
      return parsed.map(({ part, result }) => toResult(part, timestamp, result));
    }
  }

  return [toResult(text.trim(), timestamp, parseSignalBlock(text, timestamp, options))];
}

/**
 * Extract trade intents from an ordered batch of raw messages.
 * Every stitched buffer yields at least one result; rejections carry their reason.
 */
export function extractSignals(batch: RawMessage[], config: ExtractorConfig): ExtractionResult[] {
  const results: ExtractionResult[] = [];
  const gapMs = config.stitchGapSeconds * 1000;
  let buffer: StitchBuffer | null = null;

  const flush = () => {
    if (buffer) {
      results.push(...evaluateBuffer(bufferText(buffer), buffer.timestamp, config));
      buffer = null;
    }
  };

  for (const message of batch) {
    const text = message.text.trim();
    if (!text) continue;

    const normalized = normalizeText(text);
    const isAction = hasActionKeyword(normalized);
    const start: StitchBuffer = { lines: [text], timestamp: message.timestamp, hasAction: isAction };

    if (buffer === null) {
      buffer = start;
      continue;
    }

    const current: StitchBuffer = buffer;
    const stale = message.timestamp.getTime() - current.timestamp.getTime() > gapMs;
    let append = false;

    if (!stale) {
      if (isAction) {
        // A prelude ("Positional") joins the action that follows unless it is noise itself
        append = !current.hasAction && detectNoise(normalizeText(bufferText(current)), config.noiseKeywords) === null;
      } else if (!matchesNoiseKeyword(normalized, config.noiseKeywords)) {
        append = current.hasAction && continuesBuffer(current, normalized);
      }
    }

    if (append) {
      current.lines.push(text);
      current.timestamp = message.timestamp;
      current.hasAction = current.hasAction || isAction;
    } else {
      flush();
      buffer = start;
    }
  }

  flush();
  return results;
}
