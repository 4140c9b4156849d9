import { describe, it, expect } from 'vitest';
import { planExecution, resolveStopLoss, roundPrice, validateRiskConfig } from './execution-planner';
import { DEFAULT_CONFIG } from '../lib/config';
import type { ExecutionPlan, PlanVerdict, RiskConfig, TradeIntent } from '../types';

const risk: RiskConfig = DEFAULT_CONFIG.risk;

function makeIntent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    timestamp: new Date('2025-12-01T04:00:00Z'),
    underlying: 'NIFTY',
    strike: 24000,
    optionType: 'CE',
    action: 'BUY',
    entryTrigger: 120,
    stopLoss: 80,
    target: null,
    isPositional: false,
    expiryDate: { year: 2025, month: 12, day: 4 },
    tradingSymbol: 'NIFTY 04 DEC 24000 CE',
    rawText: 'BUY NIFTY 24000 CE ABOVE 120 SL 80',
    ...overrides,
  };
}

function expectPlan(verdict: PlanVerdict): ExecutionPlan {
  if (verdict.status !== 'planned') {
    throw new Error(`expected a plan, got ${verdict.status}: ${verdict.detail}`);
  }
  return verdict.plan;
}

describe('execution planner', () => {
  describe('planExecution', () => {
    it('sizes an intraday MARKET order from the stop-loss gap', () => {
      const plan = expectPlan(planExecution(makeIntent(), 122, 75, risk));

      expect(plan).toEqual({
        orderType: 'MARKET',
        quantity: 75,
        targetPrice: 1200,
        stopLossPrice: 80,
        trailingJump: 6,
        productType: 'INTRADAY',
        ltp: 122,
        sizing: { riskAmount: 3500, slGap: 40, rawUnits: 87.5, lots: 1, lotSize: 75 },
      });
    });

    it('places a LIMIT order at the trigger when LTP is below it', () => {
      const plan = expectPlan(planExecution(makeIntent(), 110, 75, risk));
      expect(plan.orderType).toBe('LIMIT');
      expect(plan.limitPrice).toBe(120);
    });

    it('uses positional risk and the margin product for positional intents', () => {
      const intent = makeIntent({
        underlying: 'BANKNIFTY',
        strike: 45000,
        optionType: 'PE',
        entryTrigger: 300,
        stopLoss: 250,
        isPositional: true,
      });
      const plan = expectPlan(planExecution(intent, 295, 30, risk));

      expect(plan.sizing).toEqual({ riskAmount: 5000, slGap: 50, rawUnits: 100, lots: 3, lotSize: 30 });
      expect(plan.quantity).toBe(90);
      expect(plan.productType).toBe('MARGIN');
      expect(plan.targetPrice).toBe(3000);
      expect(plan.trailingJump).toBe(15);
    });

    it('never sizes below one lot', () => {
      const plan = expectPlan(planExecution(makeIntent({ stopLoss: 10 }), 120, 75, risk));
      expect(plan.sizing.lots).toBe(1);
      expect(plan.quantity).toBe(75);
    });

    it('derives a default stop loss when the signal has none', () => {
      const plan = expectPlan(planExecution(makeIntent({ stopLoss: null }), 120, 75, risk));

      expect(plan.stopLossPrice).toBe(108);
      expect(plan.sizing.slGap).toBe(12);
      expect(plan.sizing.lots).toBe(4);
      expect(plan.quantity).toBe(300);
    });

    it('keeps quantity a whole number of lots', () => {
      for (const [stopLoss, lotSize] of [[80, 75], [100, 15], [60, 25], [115, 20]]) {
        const plan = expectPlan(planExecution(makeIntent({ stopLoss }), 120, lotSize, risk));
        expect(plan.quantity % lotSize).toBe(0);
        expect(plan.quantity).toBeGreaterThanOrEqual(lotSize);
      }
    });

    it('skips when LTP has run past the threshold', () => {
      expect(planExecution(makeIntent(), 200, 75, risk)).toEqual({
        status: 'skipped',
        reason: 'PRICE_MOVED',
        detail: 'LTP 200 is above 123.6 (entry 120 + 3%)',
      });
    });

    it('does not skip just under the threshold', () => {
      const plan = expectPlan(planExecution(makeIntent({ entryTrigger: 100, stopLoss: 90 }), 102.99, 75, risk));
      expect(plan.orderType).toBe('MARKET');
    });

    it('fails without an LTP', () => {
      expect(planExecution(makeIntent(), null, 75, risk)).toEqual({
        status: 'failed',
        reason: 'MISSING_MARKET_DATA',
        detail: 'LTP unavailable for NIFTY 04 DEC 24000 CE',
      });
    });

    it('fails without a usable lot size', () => {
      for (const lotSize of [undefined, 0, 7.5]) {
        expect(planExecution(makeIntent(), 120, lotSize, risk)).toMatchObject({
          status: 'failed',
          reason: 'MISSING_MARKET_DATA',
          detail: 'Lot size unavailable for NIFTY 04 DEC 24000 CE',
        });
      }
    });

    it('reports missing market data before risk problems', () => {
      const verdict = planExecution(makeIntent(), 0, 75, { ...risk, riskIntraday: 0 });
      expect(verdict).toMatchObject({ status: 'failed', reason: 'MISSING_MARKET_DATA' });
    });

    it('skips a moved price whatever the sizing inputs', () => {
      const broken = { ...risk, riskIntraday: 0, targetMultiplier: 0, defaultSlPct: 0 };
      expect(planExecution(makeIntent({ stopLoss: null }), 200, 75, broken)).toMatchObject({
        status: 'skipped',
        reason: 'PRICE_MOVED',
      });
    });

    it('fails on an unusable skip threshold before checking the price', () => {
      expect(planExecution(makeIntent(), 200, 75, { ...risk, skipThresholdPct: 1.5 })).toEqual({
        status: 'failed',
        reason: 'INVALID_RISK_CONFIGURATION',
        detail: 'skipThresholdPct must be in [0, 1)',
      });
    });

    it('ignores the default stop-loss percentage when the signal has a stop loss', () => {
      const plan = expectPlan(planExecution(makeIntent(), 122, 75, { ...risk, defaultSlPct: 0 }));
      expect(plan.stopLossPrice).toBe(80);
    });

    it('fails on an unusable default stop-loss percentage when the signal has none', () => {
      expect(planExecution(makeIntent({ stopLoss: null }), 122, 75, { ...risk, defaultSlPct: 0 })).toEqual({
        status: 'failed',
        reason: 'INVALID_RISK_CONFIGURATION',
        detail: 'defaultSlPct must be in (0, 1)',
      });
    });

    it('fails on an invalid risk configuration', () => {
      expect(planExecution(makeIntent(), 120, 75, { ...risk, riskIntraday: 0 })).toEqual({
        status: 'failed',
        reason: 'INVALID_RISK_CONFIGURATION',
        detail: 'riskIntraday must be positive',
      });
    });
  });

  describe('validateRiskConfig', () => {
    it('accepts the defaults', () => {
      expect(validateRiskConfig(risk)).toEqual([]);
    });

    it('lists every problem', () => {
      expect(
        validateRiskConfig({ ...risk, targetMultiplier: -1, skipThresholdPct: 1, defaultSlPct: 0, trailingPct: Number.NaN }),
      ).toEqual([
        'targetMultiplier must be positive',
        'skipThresholdPct must be in [0, 1)',
        'defaultSlPct must be in (0, 1)',
        'trailingPct must be in [0, 1)',
      ]);
    });
  });

  describe('resolveStopLoss', () => {
    it('prefers the signal stop loss', () => {
      expect(resolveStopLoss(makeIntent({ stopLoss: 95 }), 0.1)).toBe(95);
    });

    it('places default stops below BUY entries and above SELL entries', () => {
      expect(resolveStopLoss(makeIntent({ stopLoss: null, entryTrigger: 100 }), 0.1)).toBeCloseTo(90);
      expect(resolveStopLoss(makeIntent({ stopLoss: null, entryTrigger: 100, action: 'SELL' }), 0.1)).toBeCloseTo(110);
    });
  });

  it('rounds prices to two decimals', () => {
    expect(roundPrice(123.60000000000001)).toBe(123.6);
    expect(roundPrice(10.456)).toBe(10.46);
  });
});
