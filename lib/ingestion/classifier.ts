import { Classification, RawTable } from '../types/canonical';
import { dateSpanDays, parseDateColumn } from '../utils/dates';
import { FieldMapper, SPOT_PRICE_SIGNALS, anyColumnMatches, defaultFieldMapper } from './fieldMapper';

/** Futures contracts trade for months; spot indices run for years. */
export const SPAN_THRESHOLD_DAYS = 1000;
export const MIN_SPOT_ROWS = 100;

export interface ClassificationSignals {
  hasOpenInterest: boolean;
  hasVolume: boolean;
  hasSpotPrice: boolean;
  rowCount: number;
  spanDays: number | null;
}

export function detectSignals(table: RawTable, mapper: FieldMapper = defaultFieldMapper): ClassificationSignals {
  const { columns, rows } = table;
  const dateCol = mapper.map(columns, 'date');
  const spanDays = dateCol ? dateSpanDays(parseDateColumn(rows.map(r => r[dateCol] ?? null))) : null;
  return {
    hasOpenInterest: mapper.map(columns, 'open_interest') !== null,
    hasVolume: mapper.map(columns, 'volume') !== null,
    hasSpotPrice: anyColumnMatches(columns, SPOT_PRICE_SIGNALS),
    rowCount: rows.length,
    spanDays,
  };
}

/**
 * Decide spot vs futures from column signals and date span. First matching rule wins:
 * open interest, then short-span volume without a spot-price column, then an explicit
 * spot-price column, then a long (>1000 day, >100 row) history.
 *
 * Long-running futures continuation series fall through to spot; the threshold is kept as is.
 */
export function classifySignals(s: ClassificationSignals): Classification {
  if (s.hasOpenInterest) return 'futures';
  if (s.hasVolume && !s.hasSpotPrice && s.spanDays !== null && s.spanDays < SPAN_THRESHOLD_DAYS) {
    return 'futures';
  }
  if (s.hasSpotPrice) return 'spot';
  if (s.rowCount > MIN_SPOT_ROWS && s.spanDays !== null && s.spanDays > SPAN_THRESHOLD_DAYS) {
    return 'spot';
  }
  return 'unknown';
}

export function classify(table: RawTable, mapper: FieldMapper = defaultFieldMapper): Classification {
  return classifySignals(detectSignals(table, mapper));
}
