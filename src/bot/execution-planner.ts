// Execution planner — pure function from an admitted intent plus market data to a sized order plan

import type { ExecutionPlan, PlanVerdict, RiskConfig, TradeIntent } from '../types';

/** Round a price to paise */
export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

function isPositiveNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isFraction(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value < 1;
}

function sizingProblems(risk: RiskConfig): string[] {
  const problems: string[] = [];
  if (!isPositiveNumber(risk.riskIntraday)) problems.push('riskIntraday must be positive');
  if (!isPositiveNumber(risk.riskPositional)) problems.push('riskPositional must be positive');
  if (!isPositiveNumber(risk.targetMultiplier)) problems.push('targetMultiplier must be positive');
  return problems;
}

function thresholdProblems(risk: RiskConfig): string[] {
  return isFraction(risk.skipThresholdPct) ? [] : ['skipThresholdPct must be in [0, 1)'];
}

function defaultSlProblems(risk: RiskConfig): string[] {
  return isFraction(risk.defaultSlPct) && risk.defaultSlPct > 0 ? [] : ['defaultSlPct must be in (0, 1)'];
}

function trailingProblems(risk: RiskConfig): string[] {
  return isFraction(risk.trailingPct) ? [] : ['trailingPct must be in [0, 1)'];
}

/**
 * Problems with a risk configuration, empty when usable.
 */
export function validateRiskConfig(risk: RiskConfig): string[] {
  return [...sizingProblems(risk), ...thresholdProblems(risk), ...defaultSlProblems(risk), ...trailingProblems(risk)];
}

function invalidRisk(problems: string[]): PlanVerdict {
  return { status: 'failed', reason: 'INVALID_RISK_CONFIGURATION', detail: problems.join('; ') };
}

/**
 * Stop loss for an intent: the signal's own level, else a default distance from entry.
 * BUY stops sit below entry and SELL stops above it.
 */
export function resolveStopLoss(intent: TradeIntent, defaultSlPct: number): number {
  if (intent.stopLoss !== null) return intent.stopLoss;
  return intent.action === 'BUY'
    ? intent.entryTrigger * (1 - defaultSlPct)
    : intent.entryTrigger * (1 + defaultSlPct);
}

/**
 * Plan the execution of an admitted intent.
 *
 * Checks run in order: market data, price moved past the skip threshold, stop
 * loss, sizing, then MARKET when LTP is at or above the trigger, LIMIT at the
 * trigger otherwise. Each risk setting is validated only at the step that reads
 * it. Quantity is `lots × lotSize` where
 * `lots = max(1, round(riskAmount / slGap / lotSize))`.
 */
export function planExecution(
  intent: TradeIntent,
  ltp: number | null | undefined,
  lotSize: number | null | undefined,
  risk: RiskConfig,
): PlanVerdict {
  if (!isPositiveNumber(ltp)) {
    return { status: 'failed', reason: 'MISSING_MARKET_DATA', detail: `LTP unavailable for ${intent.tradingSymbol}` };
  }
  if (!isPositiveNumber(lotSize) || !Number.isInteger(lotSize)) {
    return {
      status: 'failed',
      reason: 'MISSING_MARKET_DATA',
      detail: `Lot size unavailable for ${intent.tradingSymbol}`,
    };
  }

  const thresholdIssues = thresholdProblems(risk);
  if (thresholdIssues.length > 0) return invalidRisk(thresholdIssues);

  const entry = intent.entryTrigger;
  const skipAbove = entry * (1 + risk.skipThresholdPct);
  if (ltp > skipAbove) {
    return {
      status: 'skipped',
      reason: 'PRICE_MOVED',
      detail: `LTP ${ltp} is above ${roundPrice(skipAbove)} (entry ${entry} + ${risk.skipThresholdPct * 100}%)`,
    };
  }

  if (intent.stopLoss === null) {
    const slIssues = defaultSlProblems(risk);
    if (slIssues.length > 0) return invalidRisk(slIssues);
  }
  const stopLoss = resolveStopLoss(intent, risk.defaultSlPct);
  const slGap = Math.abs(entry - stopLoss);
  if (slGap === 0) {
    return invalidRisk(['Stop loss gap is zero']);
  }

  const sizingIssues = [...sizingProblems(risk), ...trailingProblems(risk)];
  if (sizingIssues.length > 0) return invalidRisk(sizingIssues);

  const riskAmount = intent.isPositional ? risk.riskPositional : risk.riskIntraday;
  const rawUnits = riskAmount / slGap;
  const lots = Math.max(1, Math.round(rawUnits / lotSize));
  const orderType = ltp >= entry ? 'MARKET' : 'LIMIT';

  const plan: ExecutionPlan = {
    orderType,
    quantity: lots * lotSize,
    targetPrice: roundPrice(entry * risk.targetMultiplier),
    stopLossPrice: roundPrice(stopLoss),
    trailingJump: roundPrice(entry * risk.trailingPct),
    productType: intent.isPositional ? 'MARGIN' : 'INTRADAY',
    ltp,
    sizing: { riskAmount, slGap: roundPrice(slGap), rawUnits, lots, lotSize },
  };
  if (orderType === 'LIMIT') {
    plan.limitPrice = entry;
  }

  return { status: 'planned', plan };
}
