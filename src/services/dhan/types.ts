// Dhan broker REST API types (v2)

import type { ExchangeSegment } from '../../bot/types';
import type { OrderType, ProductType, TradeAction } from '../../types';

export interface DhanClientConfig {
  /** e.g. https://api.dhan.co/v2 */
  baseUrl: string;
  clientId: string;
  accessToken: string;
}

/** Body of POST /super/orders */
export interface SuperOrderRequest {
  dhanClientId: string;
  correlationId?: string;
  transactionType: TradeAction;
  exchangeSegment: ExchangeSegment;
  productType: ProductType;
  orderType: OrderType;
  securityId: string;
  quantity: number;
  /** 0 for MARKET orders */
  price: number;
  targetPrice: number;
  stopLossPrice: number;
  trailingJump: number;
}

export interface SuperOrderResponse {
  orderId: string;
  orderStatus: string;
}

/** Body of POST /marketfeed/ltp: segment → security ids */
export type LtpRequest = Partial<Record<ExchangeSegment, number[]>>;

export const DEFAULT_DHAN_API_URL = 'https://api.dhan.co/v2';
