// Trade executor — turns execution plans into Dhan super orders, with dry-run support

import { createLogger } from '../lib/logger';
import type { DhanClient } from '../services/dhan/client';
import type { SuperOrderRequest } from '../services/dhan/types';
import type { ExecutionPlan, TradeIntent } from '../types';
import type { OrderSubmitter, ResolvedInstrument, SubmissionResult } from './types';

const log = createLogger('TradeExecutor');

/**
 * Build the super order body for a plan. MARKET orders carry price 0.
 */
export function buildSuperOrder(
  clientId: string,
  intent: TradeIntent,
  instrument: ResolvedInstrument,
  plan: ExecutionPlan,
): SuperOrderRequest {
  return {
    dhanClientId: clientId,
    transactionType: intent.action,
    exchangeSegment: instrument.exchangeSegment,
    productType: plan.productType,
    orderType: plan.orderType,
    securityId: instrument.securityId,
    quantity: plan.quantity,
    price: plan.orderType === 'LIMIT' ? (plan.limitPrice ?? intent.entryTrigger) : 0,
    targetPrice: plan.targetPrice,
    stopLossPrice: plan.stopLossPrice,
    trailingJump: plan.trailingJump,
  };
}

export class TradeExecutor implements OrderSubmitter {
  private client: Pick<DhanClient, 'clientId' | 'placeSuperOrder'> | null;
  private dryRun: boolean;

  /** `client` may be null only in dry-run mode */
  constructor(client: Pick<DhanClient, 'clientId' | 'placeSuperOrder'> | null, dryRun = false) {
    if (!client && !dryRun) {
      throw new Error('TradeExecutor needs a Dhan client unless running in dry-run mode');
    }
    this.client = client;
    this.dryRun = dryRun;
  }

  async submit(intent: TradeIntent, instrument: ResolvedInstrument, plan: ExecutionPlan): Promise<SubmissionResult> {
    const request = buildSuperOrder(this.client?.clientId ?? 'DRY-RUN', intent, instrument, plan);

    if (this.dryRun || !this.client) {
      log.info('[DRY-RUN] Would place super order', {
        tradingSymbol: intent.tradingSymbol,
        ...request,
      });
      return { orderId: 'DRY-RUN', status: 'DRY_RUN', dryRun: true };
    }

    const response = await this.client.placeSuperOrder(request);
    return { orderId: response.orderId, status: response.orderStatus, dryRun: false };
  }
}
