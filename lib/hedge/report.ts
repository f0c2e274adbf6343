import Papa from 'papaparse';
import { HedgeConfig } from './config';
import { HedgeAnalysis } from './analyzer';

const money = (v: number) => v.toLocaleString('en-US', { maximumFractionDigits: 0 });
const pct = (v: number, digits = 2) => `${(v * 100).toFixed(digits)}%`;

export function formatHedgeReport(result: HedgeAnalysis, config: HedgeConfig, now: Date = new Date()): string[] {
  const { volatility: vol, costs, basisRisk, decision } = result;
  const rule = '='.repeat(70);
  const lines = [
    rule,
    'Hedge necessity report',
    rule,
    `Generated: ${now.toISOString()}`,
    '',
    '[Position]',
    `  Position value: ${money(config.positionValue)}`,
    `  Holding days: ${config.hedgeDays}`,
    `  Confidence: ${pct(config.confidence, 1)}`,
    '',
    '[Price risk]',
    `  Annualized volatility: ${pct(vol.annualizedVolatility)}`,
    `  Holding-period volatility: ${pct(vol.holdingPeriodVolatility)}`,
    `  VaR: ${pct(vol.varPercentage)} (${money(vol.varAmount)})`,
    `  Worst historical return: ${pct(vol.worstCaseReturn)} (${money(vol.worstCaseAmount)})`,
    `  Returns used: ${vol.dataPoints}`,
    '',
    '[Costs]',
    `  Commission: ${money(costs.commissionCost)}`,
    `  Slippage: ${money(costs.slippageCost)}`,
    `  Trading cost: ${money(costs.totalTradingCost)}`,
    `  Margin posted: ${money(costs.marginAmount)}`,
    `  Financing: ${money(costs.financingCost)}`,
    `  Total: ${money(costs.totalCost)} (${pct(costs.costPercentage, 4)})`,
    '',
  ];

  if (basisRisk.status === 'success') {
    lines.push(
      '[Basis risk]',
      `  Column: ${basisRisk.column}`,
      `  Mean: ${basisRisk.basisMean.toFixed(2)}`,
      `  Std: ${basisRisk.basisStd.toFixed(2)}`,
      `  Relative volatility: ${pct(basisRisk.basisVolatility)}`
    );
    if (basisRisk.basisAnnualVol !== null) {
      lines.push(`  Annualized: ${pct(basisRisk.basisAnnualVol)}`);
    }
    lines.push(`  Level: ${basisRisk.riskLevel.toUpperCase()}`, '');
  } else {
    lines.push(`[Basis risk] ${basisRisk.status}`, '');
  }

  lines.push(
    '[Decision]',
    `  Risk-to-cost ratio: ${decision.riskToCostRatio.toFixed(2)}`,
    `  Recommendation: ${decision.recommendation}`,
    `  Reason: ${decision.reason}`,
    rule
  );
  return lines;
}

export function hedgeSummaryRows(result: HedgeAnalysis): [string, string][] {
  const { volatility: vol, costs, decision } = result;
  return [
    ['annualized_volatility', pct(vol.annualizedVolatility)],
    ['holding_period_volatility', pct(vol.holdingPeriodVolatility)],
    ['var_percentage', pct(vol.varPercentage)],
    ['var_amount', vol.varAmount.toFixed(0)],
    ['trading_cost', costs.totalTradingCost.toFixed(0)],
    ['financing_cost', costs.financingCost.toFixed(0)],
    ['total_cost', costs.totalCost.toFixed(0)],
    ['risk_to_cost_ratio', decision.riskToCostRatio.toFixed(2)],
    ['recommendation', decision.recommendation],
  ];
}

export function hedgeSummaryCsv(result: HedgeAnalysis): string {
  return '\ufeff' + Papa.unparse({ fields: ['metric', 'value'], data: hedgeSummaryRows(result) }, { newline: '\n' });
}
