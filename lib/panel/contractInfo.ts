import { ContractInfo, ContractSummary, GatewayState, NormalizedSeries, SpotSummary } from '../types/canonical';
import { sortedRecords } from '../ingestion/contracts';
import { max, mean, presentValues } from '../utils/numbers';

function span(series: NormalizedSeries): { start_date: string; end_date: string; trading_days: number } | null {
  if (series.date.length === 0) return null;
  return {
    start_date: series.date[0],
    end_date: series.date[series.date.length - 1],
    trading_days: series.date.length,
  };
}

export function summarizeContract(series: NormalizedSeries): ContractSummary | null {
  const s = span(series);
  if (!s) return null;
  const oi = series.open_interest ? presentValues(series.open_interest) : null;
  const volume = series.volume ? presentValues(series.volume) : null;
  return {
    ...s,
    avg_oi: oi ? mean(oi) : null,
    max_oi: oi ? max(oi) : null,
    avg_volume: volume ? mean(volume) : null,
  };
}

export function summarizeSpot(series: NormalizedSeries): SpotSummary | null {
  const s = span(series);
  if (!s) return null;
  return { ...s, avg_price: mean(presentValues(series.price)) };
}

/** Date span, trading days and OI/volume averages per contract, plus the spot series. */
export function getContractInfo(state: GatewayState): ContractInfo {
  const contracts: Record<string, ContractSummary> = {};
  for (const { id, series } of sortedRecords(state.contracts)) {
    const summary = summarizeContract(series);
    if (summary) contracts[id] = summary;
  }
  return {
    contracts,
    spot: state.spot ? summarizeSpot(state.spot) : null,
  };
}
