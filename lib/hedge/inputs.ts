import { Panel } from '../types/canonical';
import { InsufficientDataError } from '../errors';
import { findPanelColumn, presentPoints } from '../panel/panelBuilder';

export const MIN_SPOT_OBSERVATIONS = 30;

export interface PricePoint {
  date: string;
  value: number;
}

/**
 * The spot price series the analysis runs on: first panel column whose name contains
 * "spot", absent cells dropped.
 */
export function extractSpotSeries(panel: Panel, minObservations = MIN_SPOT_OBSERVATIONS): PricePoint[] {
  const column = findPanelColumn(panel, 'spot');
  const points = column ? presentPoints(panel, column) : [];
  if (points.length < minObservations) {
    throw new InsufficientDataError(minObservations, points.length);
  }
  return points;
}

export type BasisSource =
  | { status: 'ok'; column: string; points: PricePoint[] }
  | { status: 'no_common_dates' }
  | { status: 'cannot_calculate_basis' };

/**
 * First `basis` column of the panel; without one, spot minus the first futures column on
 * the dates where both are present.
 */
export function basisSeries(panel: Panel): BasisSource {
  const basis = findPanelColumn(panel, 'basis');
  if (basis) {
    return { status: 'ok', column: basis.name, points: presentPoints(panel, basis) };
  }

  const spot = findPanelColumn(panel, 'spot');
  const futures = findPanelColumn(panel, 'futures');
  if (!spot || !futures) return { status: 'cannot_calculate_basis' };

  const points: PricePoint[] = [];
  panel.dates.forEach((date, i) => {
    const s = spot.values[i];
    const f = futures.values[i];
    if (s !== null && f !== null) points.push({ date, value: s - f });
  });
  if (points.length === 0) return { status: 'no_common_dates' };
  return { status: 'ok', column: `${spot.name}-${futures.name}`, points };
}
