// Dhan REST API client — LTP quotes and super orders

import { errorMessage, MarketDataUnavailableError } from '../../lib/errors';
import { createLogger } from '../../lib/logger';
import type { ExchangeSegment, MarketDataProvider, ResolvedInstrument } from '../../bot/types';
import {
  DEFAULT_DHAN_API_URL,
  type DhanClientConfig,
  type LtpRequest,
  type SuperOrderRequest,
  type SuperOrderResponse,
} from './types';

const log = createLogger('DhanClient');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read `data[segment][securityId].last_price` from an LTP response.
 */
export function readLastPrice(body: unknown, segment: ExchangeSegment, securityId: string): number | null {
  if (!isRecord(body) || !isRecord(body.data)) return null;
  const bySegment = body.data[segment];
  if (!isRecord(bySegment)) return null;
  const quote = bySegment[securityId];
  if (!isRecord(quote)) return null;
  const price = quote.last_price;
  return typeof price === 'number' && Number.isFinite(price) && price > 0 ? price : null;
}

function readOrderResponse(body: unknown): SuperOrderResponse {
  if (!isRecord(body) || (typeof body.orderId !== 'string' && typeof body.orderId !== 'number')) {
    throw new Error(`Unexpected super order response: ${JSON.stringify(body)}`);
  }
  return {
    orderId: String(body.orderId),
    orderStatus: typeof body.orderStatus === 'string' ? body.orderStatus : 'UNKNOWN',
  };
}

export class DhanClient implements MarketDataProvider {
  private readonly config: DhanClientConfig;

  constructor(config: DhanClientConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
  }

  /**
   * Build a client from DHAN_CLIENT_ID / DHAN_ACCESS_TOKEN (and optional DHAN_API_URL).
   */
  static fromEnv(env: Record<string, string | undefined> = process.env): DhanClient {
    const clientId = env.DHAN_CLIENT_ID?.trim();
    const accessToken = env.DHAN_ACCESS_TOKEN?.trim();
    if (!clientId || !accessToken) {
      throw new Error('Missing DHAN_CLIENT_ID or DHAN_ACCESS_TOKEN environment variables');
    }
    return new DhanClient({
      baseUrl: env.DHAN_API_URL?.trim() || DEFAULT_DHAN_API_URL,
      clientId,
      accessToken,
    });
  }

  get clientId(): string {
    return this.config.clientId;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.config.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'access-token': this.config.accessToken,
        'client-id': this.config.clientId,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Dhan API ${path} failed (${response.status}): ${text}`);
    }
    return response.json();
  }

  /**
   * Last traded price of one security.
   * Throws MarketDataUnavailableError when the request fails; null when the quote is absent.
   */
  async fetchLtp(securityId: string, segment: ExchangeSegment): Promise<number | null> {
    const request: LtpRequest = { [segment]: [Number(securityId)] };
    let body: unknown;
    try {
      body = await this.post('/marketfeed/ltp', request);
    } catch (err) {
      throw new MarketDataUnavailableError(`LTP request for ${segment}:${securityId} failed: ${errorMessage(err)}`);
    }

    const ltp = readLastPrice(body, segment, securityId);
    log.debug('LTP fetched', { securityId, segment, ltp });
    return ltp;
  }

  getLtp(instrument: ResolvedInstrument): Promise<number | null> {
    return this.fetchLtp(instrument.securityId, instrument.exchangeSegment);
  }

  /**
   * Place a super order (entry + target + stop loss + trailing jump in one request).
   */
  async placeSuperOrder(request: SuperOrderRequest): Promise<SuperOrderResponse> {
    const body = await this.post('/super/orders', request);
    const result = readOrderResponse(body);
    log.info('Super order placed', {
      orderId: result.orderId,
      orderStatus: result.orderStatus,
      securityId: request.securityId,
      quantity: request.quantity,
    });
    return result;
  }
}
