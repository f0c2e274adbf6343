import { ContractRecord, GatewayState, NormalizedSeries, Panel, PanelColumn } from '../types/canonical';
import { EmptyPanelError } from '../errors';
import { alignSpotToFutures } from '../alignment/calendarAligner';
import { ContractRegistry } from '../ingestion/contracts';

export const SPOT_COLUMN = 'spot_price';
export const futuresColumn = (id: string) => `futures_${id}`;
export const basisColumn = (id: string) => `basis_${id}`;

function valuesOn(dates: readonly string[], series: NormalizedSeries): (number | null)[] {
  const byDate = new Map<string, number | null>();
  series.date.forEach((d, i) => byDate.set(d, series.price[i]));
  return dates.map(d => byDate.get(d) ?? null);
}

/**
 * Outer-join spot and every contract on the union of their dates.
 *
 * Columns: `spot_price` (when spot exists), then `futures_<id>` and `basis_<id>` per contract
 * in sorted id order. Basis is spot minus futures where both are present, null otherwise;
 * nothing is filled at this stage.
 */
export function buildPanel(spot: NormalizedSeries | null, contracts: readonly ContractRecord[]): Panel {
  const all = new Set<string>(spot ? spot.date : []);
  contracts.forEach(c => c.series.date.forEach(d => all.add(d)));
  if (all.size === 0) throw new EmptyPanelError();

  const dates = [...all].sort();
  const columns: PanelColumn[] = [];

  const spotValues = spot ? valuesOn(dates, spot) : null;
  if (spotValues) {
    columns.push({ name: SPOT_COLUMN, kind: 'spot', values: spotValues });
  }

  const ordered = [...contracts].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  for (const { id, series } of ordered) {
    const fut = valuesOn(dates, series);
    const basis = fut.map((f, i) => {
      const s = spotValues ? spotValues[i] : null;
      return s !== null && f !== null ? s - f : null;
    });
    columns.push({ name: futuresColumn(id), kind: 'futures', contract: id, values: fut });
    columns.push({ name: basisColumn(id), kind: 'basis', contract: id, values: basis });
  }

  return { dates, columns };
}

/**
 * Align the state's spot onto the futures calendar, store the aligned series back in the
 * state, and build the panel. The state should not change after this call.
 */
export function getUnifiedPanel(state: GatewayState): Panel {
  const registry = new ContractRegistry(state.contracts);
  state.spot = alignSpotToFutures(state.spot, registry.toSeriesMap().values());
  return buildPanel(state.spot, registry.list());
}

export function getPanelColumn(panel: Panel, name: string): PanelColumn | undefined {
  return panel.columns.find(c => c.name === name);
}

/** First column whose lower-cased name contains `fragment`. */
export function findPanelColumn(panel: Panel, fragment: string): PanelColumn | undefined {
  const needle = fragment.toLowerCase();
  return panel.columns.find(c => c.name.toLowerCase().includes(needle));
}

/** Values of a column paired with dates, absent cells dropped. */
export function presentPoints(panel: Panel, column: PanelColumn): { date: string; value: number }[] {
  const points: { date: string; value: number }[] = [];
  column.values.forEach((v, i) => {
    if (v !== null) points.push({ date: panel.dates[i], value: v });
  });
  return points;
}
