// Request validation for the signals API

import type { RawMessage, ValidationError } from '../types';

/** Upper bound on messages accepted in one request */
export const MAX_MESSAGES_PER_REQUEST = 200;

/** Validated POST /api/signals body */
export interface SignalsRequest {
  secret: string;
  messages: RawMessage[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that the provided secret matches the WEBHOOK_SECRET environment variable
 */
export function validateWebhookSecret(secret: string | undefined): boolean {
  const webhookSecret = process.env.WEBHOOK_SECRET;
  if (!webhookSecret) {
    return false;
  }
  return secret === webhookSecret;
}

/**
 * Parse a message timestamp: ISO 8601 string or epoch milliseconds
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Validates a signals request body.
 * Every message needs a string `text` and a `timestamp`; errors name the offending index.
 */
export function validateSignalsPayload(body: unknown): {
  valid: boolean;
  errors?: ValidationError[];
  payload?: SignalsRequest;
} {
  if (!isRecord(body)) {
    return {
      valid: false,
      errors: [{ field: 'body', message: 'Request body must be a JSON object' }],
    };
  }

  const errors: ValidationError[] = [];

  if (!body.secret || typeof body.secret !== 'string') {
    errors.push({ field: 'secret', message: 'Secret is required and must be a string' });
  }

  const messages: RawMessage[] = [];
  if (!Array.isArray(body.messages)) {
    errors.push({ field: 'messages', message: 'Messages must be an array' });
  } else if (body.messages.length === 0) {
    errors.push({ field: 'messages', message: 'At least one message is required' });
  } else if (body.messages.length > MAX_MESSAGES_PER_REQUEST) {
    errors.push({ field: 'messages', message: `At most ${MAX_MESSAGES_PER_REQUEST} messages per request` });
  } else {
    body.messages.forEach((item: unknown, i: number) => {
      if (!isRecord(item)) {
        errors.push({ field: `messages[${i}]`, message: 'Message must be an object' });
        return;
      }
      if (typeof item.text !== 'string') {
        errors.push({ field: `messages[${i}].text`, message: 'Text is required and must be a string' });
      }
      const timestamp = parseTimestamp(item.timestamp);
      if (!timestamp) {
        errors.push({ field: `messages[${i}].timestamp`, message: 'Timestamp must be an ISO 8601 string or epoch ms' });
      }
      if (typeof item.text === 'string' && timestamp) {
        messages.push({ text: item.text, timestamp });
      }
    });
  }

  if (errors.length > 0 || typeof body.secret !== 'string') {
    return { valid: false, errors };
  }

  return { valid: true, payload: { secret: body.secret, messages } };
}
