import { ContractRecord, NormalizedSeries, QualityReport, SeriesQuality } from '../types/canonical';
import { sortedRecords } from '../ingestion/contracts';

export function seriesQuality(series: NormalizedSeries): SeriesQuality {
  const total = series.date.length;
  const valid = series.price.filter(p => p !== null).length;
  return {
    total_records: total,
    valid_records: valid,
    completeness: total > 0 ? valid / total : 0,
    date_range: total > 0 ? { start: series.date[0], end: series.date[total - 1] } : null,
  };
}

/** Observation counts, completeness and date range per series. Read-only. */
export function computeQualityReport(
  spot: NormalizedSeries | null,
  contracts: ReadonlyMap<string, ContractRecord>,
  scanTime: Date = new Date()
): QualityReport {
  const futures: Record<string, SeriesQuality> = {};
  for (const { id, series } of sortedRecords(contracts)) {
    futures[id] = seriesQuality(series);
  }
  return {
    scan_time: scanTime.toISOString(),
    spot: spot ? seriesQuality(spot) : null,
    futures,
  };
}

const pct = (ratio: number) => `${(ratio * 100).toFixed(2)}%`;

function qualityLines(q: SeriesQuality, indent: string): string[] {
  const range = q.date_range ? `${q.date_range.start} to ${q.date_range.end}` : 'N/A';
  return [
    `${indent}Total records: ${q.total_records}`,
    `${indent}Valid records: ${q.valid_records}`,
    `${indent}Completeness: ${pct(q.completeness)}`,
    `${indent}Date range: ${range}`,
  ];
}

export function formatQualityReport(report: QualityReport): string[] {
  const rule = '='.repeat(60);
  const lines = [rule, 'Data quality report', rule, `Scan time: ${report.scan_time}`, '', '[Spot]'];

  if (report.spot) {
    lines.push(...qualityLines(report.spot, '  '));
  } else {
    lines.push('  No spot data found');
  }

  lines.push('', '[Futures]');
  const ids = Object.keys(report.futures);
  if (ids.length === 0) {
    lines.push('  No futures data found');
  } else {
    lines.push(`  Contracts: ${ids.length}`);
    for (const id of ids) {
      lines.push('', `  Contract ${id}:`, ...qualityLines(report.futures[id], '    '));
    }
  }

  lines.push('', rule);
  return lines;
}
