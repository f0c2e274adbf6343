import { Panel } from '../types/canonical';
import { InsufficientDataError } from '../errors';
import { mean, sampleStd } from '../utils/numbers';
import { CostConfig, HedgeConfig } from './config';
import { basisSeries } from './inputs';
import { inverseNormalCdf } from './normal';

export const TRADING_DAYS_PER_YEAR = 252;
export const DAYS_PER_YEAR = 365;
export const MIN_BASIS_POINTS = 30;

export interface VolatilityAnalysis {
  dailyVolatility: number;
  annualizedVolatility: number;
  holdingPeriodVolatility: number;
  varPercentage: number;
  varAmount: number;
  confidence: number;
  worstCaseReturn: number;
  worstCaseAmount: number;
  dataPoints: number;
}

export interface CostAnalysis {
  commissionCost: number;
  slippageCost: number;
  totalTradingCost: number;
  marginAmount: number;
  financingCost: number;
  totalCost: number;
  costPercentage: number;
}

export type BasisRiskLevel = 'high' | 'medium' | 'low';

export type BasisRiskAnalysis =
  | {
      status: 'success';
      column: string;
      basisMean: number;
      basisStd: number;
      basisVolatility: number;
      basisAnnualVol: number | null;
      riskLevel: BasisRiskLevel;
      dataPoints: number;
    }
  | { status: 'insufficient_data'; dataPoints: number }
  | { status: 'no_futures_data' | 'no_common_dates' | 'cannot_calculate_basis' };

export type RecommendationCode = 'STRONG_RECOMMEND' | 'RECOMMEND' | 'NOT_RECOMMEND';

export interface HedgeDecision {
  riskToCostRatio: number;
  recommendation: RecommendationCode;
  reason: string;
  varAmount: number;
  totalCost: number;
}

export interface HedgeAnalysis {
  volatility: VolatilityAnalysis;
  costs: CostAnalysis;
  basisRisk: BasisRiskAnalysis;
  decision: HedgeDecision;
}

/** Simple period returns; steps from a zero price are skipped. */
export function simpleReturns(prices: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const r = prices[i] / prices[i - 1] - 1;
    if (Number.isFinite(r)) out.push(r);
  }
  return out;
}

export function analyzeVolatility(
  prices: readonly number[],
  { hedgeDays, confidence, positionValue }: Pick<HedgeConfig, 'hedgeDays' | 'confidence' | 'positionValue'>
): VolatilityAnalysis {
  if (prices.length < 2) {
    throw new InsufficientDataError(2, prices.length, 'prices to compute volatility');
  }
  const returns = simpleReturns(prices);
  if (returns.length < 30) {
    console.warn(`Only ${returns.length} returns available; volatility estimate may be unreliable`);
  }

  const dailyVolatility = sampleStd(returns) ?? 0;
  const holdingPeriodVolatility = dailyVolatility * Math.sqrt(hedgeDays);
  const z = inverseNormalCdf(1 - confidence);
  const varPercentage = Math.abs(z * holdingPeriodVolatility);
  const worstCaseReturn = returns.length > 0 ? Math.min(...returns) : 0;

  return {
    dailyVolatility,
    annualizedVolatility: dailyVolatility * Math.sqrt(TRADING_DAYS_PER_YEAR),
    holdingPeriodVolatility,
    varPercentage,
    varAmount: varPercentage * positionValue,
    confidence,
    worstCaseReturn,
    worstCaseAmount: Math.abs(worstCaseReturn) * positionValue,
    dataPoints: returns.length,
  };
}

/** Commission and slippage on open and close; financing on the margin for the holding period. */
export function analyzeCosts(positionValue: number, hedgeDays: number, costs: CostConfig): CostAnalysis {
  const commissionCost = positionValue * costs.commissionRate * 2;
  const slippageCost = positionValue * costs.slippageRate * 2;
  const totalTradingCost = commissionCost + slippageCost;
  const marginAmount = positionValue * costs.marginRate;
  const financingCost = marginAmount * costs.financingRate * (hedgeDays / DAYS_PER_YEAR);
  const totalCost = totalTradingCost + financingCost;
  return {
    commissionCost,
    slippageCost,
    totalTradingCost,
    marginAmount,
    financingCost,
    totalCost,
    costPercentage: totalCost / positionValue,
  };
}

export function basisRiskLevel(volatility: number): BasisRiskLevel {
  if (volatility > 0.1) return 'high';
  if (volatility > 0.05) return 'medium';
  return 'low';
}

export function analyzeBasisRisk(panel: Panel | null, spotPrices: readonly number[]): BasisRiskAnalysis {
  if (!panel) return { status: 'no_futures_data' };
  const source = basisSeries(panel);
  if (source.status !== 'ok') return { status: source.status };

  const values = source.points.map(p => p.value);
  if (values.length < MIN_BASIS_POINTS) {
    return { status: 'insufficient_data', dataPoints: values.length };
  }

  const basisMean = mean(values) ?? 0;
  const basisStd = sampleStd(values) ?? 0;

  let basisVolatility: number;
  if (Math.abs(basisMean) > 0) {
    basisVolatility = basisStd / Math.abs(basisMean);
  } else {
    // Zero-mean basis: scale by the spot level instead
    const spotMean = mean(spotPrices);
    basisVolatility = spotMean ? basisStd / Math.abs(spotMean) : Infinity;
  }

  let basisAnnualVol: number | null = null;
  const basisReturns = simpleReturns(values);
  if (basisReturns.length > 0) {
    const daily = sampleStd(basisReturns);
    basisAnnualVol = daily === null ? null : daily * Math.sqrt(TRADING_DAYS_PER_YEAR);
  } else {
    const changes = values.slice(1).map((v, i) => v - values[i]);
    const changeStd = sampleStd(changes);
    if (changeStd !== null) {
      const daily = basisMean !== 0 ? changeStd / Math.abs(basisMean) : changeStd;
      basisAnnualVol = daily * Math.sqrt(TRADING_DAYS_PER_YEAR);
    }
  }

  return {
    status: 'success',
    column: source.column,
    basisMean,
    basisStd,
    basisVolatility,
    basisAnnualVol,
    riskLevel: basisRiskLevel(basisVolatility),
    dataPoints: values.length,
  };
}

export function evaluateHedgeEfficiency(varAmount: number, totalCost: number): HedgeDecision {
  const ratio = totalCost > 0 ? varAmount / totalCost : Infinity;
  if (ratio > 2) {
    return {
      riskToCostRatio: ratio,
      recommendation: 'STRONG_RECOMMEND',
      reason: 'Risk far exceeds cost; hedging has clear economic value',
      varAmount,
      totalCost,
    };
  }
  if (ratio > 1) {
    return {
      riskToCostRatio: ratio,
      recommendation: 'RECOMMEND',
      reason: 'Risk moderately exceeds cost; hedging is worthwhile',
      varAmount,
      totalCost,
    };
  }
  return {
    riskToCostRatio: ratio,
    recommendation: 'NOT_RECOMMEND',
    reason: 'Hedging costs more than the price risk; stay unhedged or shorten the holding period',
    varAmount,
    totalCost,
  };
}

/** Volatility/VaR, cost, basis risk and the risk-to-cost decision for one spot series. */
export function analyzeHedgeNecessity({
  spotPrices,
  panel,
  config,
}: {
  spotPrices: readonly number[];
  panel: Panel | null;
  config: HedgeConfig;
}): HedgeAnalysis {
  const volatility = analyzeVolatility(spotPrices, config);
  const costs = analyzeCosts(config.positionValue, config.hedgeDays, config.costs);
  const basisRisk = analyzeBasisRisk(panel, spotPrices);
  const decision = evaluateHedgeEfficiency(volatility.varAmount, costs.totalCost);
  return { volatility, costs, basisRisk, decision };
}
