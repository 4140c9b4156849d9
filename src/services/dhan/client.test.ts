import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DhanClient, readLastPrice } from './client';
import { MarketDataUnavailableError } from '../../lib/errors';
import type { ResolvedInstrument } from '../../bot/types';
import type { SuperOrderRequest } from './types';

vi.mock('../../lib/logger', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { logger: log, createLogger: () => log };
});

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

const instrument: ResolvedInstrument = {
  securityId: '43512',
  exchangeSegment: 'NSE_FNO',
  lotSize: 75,
  tradingSymbol: 'NIFTY 04 DEC 24000 CALL',
};

const order: SuperOrderRequest = {
  dhanClientId: 'client-1',
  transactionType: 'BUY',
  exchangeSegment: 'NSE_FNO',
  productType: 'INTRADAY',
  orderType: 'MARKET',
  securityId: '43512',
  quantity: 75,
  price: 0,
  targetPrice: 1200,
  stopLossPrice: 80,
  trailingJump: 6,
};

describe('DhanClient', () => {
  let client: DhanClient;

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
    client = new DhanClient({ baseUrl: 'http://localhost:9999/', clientId: 'client-1', accessToken: 'test-token' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getLtp', () => {
    it('requests the quote for the instrument segment', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ data: { NSE_FNO: { '43512': { last_price: 131.5 } } }, status: 'success' }),
      );

      expect(await client.getLtp(instrument)).toBe(131.5);
      expect(mockFetch).toHaveBeenCalledWith('http://localhost:9999/marketfeed/ltp', {
        method: 'POST',
        headers: {
          'access-token': 'test-token',
          'client-id': 'client-1',
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: '{"NSE_FNO":[43512]}',
      });
    });

    it('returns null when the quote is absent', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ data: { NSE_FNO: {} }, status: 'success' }));

      expect(await client.getLtp(instrument)).toBeNull();
    });

    it('raises MarketDataUnavailableError on an HTTP error', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse('invalid token', 401));

      const error = await client.getLtp(instrument).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MarketDataUnavailableError);
      expect(error).toMatchObject({
        message: 'LTP request for NSE_FNO:43512 failed: Dhan API /marketfeed/ltp failed (401): invalid token',
      });
    });

    it('raises MarketDataUnavailableError when the network fails', async () => {
      mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(client.getLtp(instrument)).rejects.toThrow(MarketDataUnavailableError);
    });
  });

  describe('placeSuperOrder', () => {
    it('posts the order and normalises the response', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ orderId: 112111182198, orderStatus: 'PENDING' }));

      expect(await client.placeSuperOrder(order)).toEqual({ orderId: '112111182198', orderStatus: 'PENDING' });
      expect(mockFetch.mock.calls[0][0]).toBe('http://localhost:9999/super/orders');
      expect(JSON.parse(mockFetch.mock.calls[0][1].body)).toEqual(order);
    });

    it('rejects a response without an order id', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await expect(client.placeSuperOrder(order)).rejects.toThrow('Unexpected super order response: {}');
    });

    it('surfaces broker errors', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse('bad request', 400));

      await expect(client.placeSuperOrder(order)).rejects.toThrow('Dhan API /super/orders failed (400): bad request');
    });
  });

  describe('fromEnv', () => {
    it('requires credentials', () => {
      expect(() => DhanClient.fromEnv({})).toThrow('Missing DHAN_CLIENT_ID or DHAN_ACCESS_TOKEN environment variables');
    });

    it('reads credentials and defaults the API URL', async () => {
      const fromEnv = DhanClient.fromEnv({ DHAN_CLIENT_ID: 'client-2', DHAN_ACCESS_TOKEN: 'test-token' });
      mockFetch.mockResolvedValueOnce(jsonResponse({ data: {} }));

      await fromEnv.getLtp(instrument);

      expect(fromEnv.clientId).toBe('client-2');
      expect(mockFetch.mock.calls[0][0]).toBe('https://api.dhan.co/v2/marketfeed/ltp');
    });
  });
});

describe('readLastPrice', () => {
  it('reads a positive last price', () => {
    expect(readLastPrice({ data: { BSE_FNO: { '825001': { last_price: 210.25 } } } }, 'BSE_FNO', '825001')).toBe(210.25);
  });

  it('returns null for malformed bodies and non-positive prices', () => {
    expect(readLastPrice(null, 'NSE_FNO', '1')).toBeNull();
    expect(readLastPrice({ data: [] }, 'NSE_FNO', '1')).toBeNull();
    expect(readLastPrice({ data: { NSE_FNO: { '1': { last_price: 0 } } } }, 'NSE_FNO', '1')).toBeNull();
    expect(readLastPrice({ data: { NSE_FNO: { '1': { last_price: '12' } } } }, 'NSE_FNO', '1')).toBeNull();
  });
});
