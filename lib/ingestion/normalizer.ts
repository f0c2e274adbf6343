import { CellValue, NormalizedSeries, RawTable, SeriesKind } from '../types/canonical';
import { MissingFieldError } from '../errors';
import { parseDateColumn } from '../utils/dates';
import { toFiniteNumber } from '../utils/numbers';
import { FieldMapper, PRICE_FALLBACK_COLUMNS, defaultFieldMapper } from './fieldMapper';

interface WorkingRow {
  date: string;
  price: number | null;
  open_interest?: number | null;
  volume?: number | null;
}

function columnValues(table: RawTable, col: string): CellValue[] {
  return table.rows.map(r => r[col] ?? null);
}

function resolvePriceColumn(table: RawTable, mapper: FieldMapper): string | null {
  const mapped = mapper.map(table.columns, 'price');
  if (mapped) return mapped;
  return PRICE_FALLBACK_COLUMNS.find(c => table.columns.includes(c)) ?? null;
}

/** Carry the last present value into later gaps; leading gaps stay null. */
export function forwardFill(values: readonly (number | null)[]): (number | null)[] {
  let last: number | null = null;
  return values.map(v => {
    if (v !== null) {
      last = v;
      return v;
    }
    return last;
  });
}

/**
 * Produce the canonical series for one classified table.
 *
 * Rows whose date cannot be parsed are dropped; a table where no date parses fails with
 * MissingFieldError. Duplicate dates keep the row that came
 * first in the file; the result is sorted ascending and `price` is forward-filled.
 * The source table is not modified.
 */
export function normalize(
  table: RawTable,
  kind: SeriesKind,
  identifier: string,
  mapper: FieldMapper = defaultFieldMapper
): NormalizedSeries {
  const dateCol = mapper.map(table.columns, 'date');
  if (!dateCol) throw new MissingFieldError('date', identifier);

  const priceCol = resolvePriceColumn(table, mapper);
  if (!priceCol) throw new MissingFieldError('price', identifier);

  const dates = parseDateColumn(columnValues(table, dateCol));
  const prices = columnValues(table, priceCol).map(toFiniteNumber);

  const oiCol = kind === 'futures' ? mapper.map(table.columns, 'open_interest') : null;
  const volumeCol = kind === 'futures' ? mapper.map(table.columns, 'volume') : null;
  const oi = oiCol ? columnValues(table, oiCol).map(toFiniteNumber) : null;
  const volume = volumeCol ? columnValues(table, volumeCol).map(toFiniteNumber) : null;

  const seen = new Set<string>();
  const rows: WorkingRow[] = [];
  dates.forEach((date, i) => {
    if (date === null || seen.has(date)) return;
    seen.add(date);
    const row: WorkingRow = { date, price: prices[i] };
    if (oi) row.open_interest = oi[i];
    if (volume) row.volume = volume[i];
    rows.push(row);
  });

  if (rows.length === 0) {
    throw new MissingFieldError('date', identifier, `no parseable dates in column "${dateCol}"`);
  }
  rows.sort((a, b) => a.date.localeCompare(b.date));

  const series: NormalizedSeries = {
    date: rows.map(r => r.date),
    price: forwardFill(rows.map(r => r.price)),
  };
  if (oi) series.open_interest = rows.map(r => r.open_interest ?? null);
  if (volume) series.volume = rows.map(r => r.volume ?? null);
  return series;
}

/** Render a series back into a table, e.g. to re-normalize it. */
export function seriesToRawTable(series: NormalizedSeries, filename: string): RawTable {
  const columns = ['date', 'price'];
  if (series.open_interest) columns.push('open_interest');
  if (series.volume) columns.push('volume');
  const rows = series.date.map((date, i) => {
    const row: Record<string, CellValue> = { date, price: series.price[i] };
    if (series.open_interest) row.open_interest = series.open_interest[i];
    if (series.volume) row.volume = series.volume[i];
    return row;
  });
  return { filename, columns, rows };
}
