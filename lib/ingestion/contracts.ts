import * as path from 'path';
import { ContractRecord, NormalizedSeries, RawTable } from '../types/canonical';

// e.g. cu2301, rb2405: commodity letters followed by a yymm expiry
const CONTRACT_CODE = /([a-z]+)(\d{4})/;
const CONTRACT_COLUMN = /合约|contract/i;

/**
 * Stable identifier for a futures file: a letters+4-digit code in the filename, else the
 * first cell of a contract column when it is text, else the filename stem.
 */
export function identifyContract(filename: string, table: RawTable): string {
  const match = CONTRACT_CODE.exec(filename.toLowerCase());
  if (match) return match[1] + match[2];

  for (const col of table.columns) {
    if (!CONTRACT_COLUMN.test(col)) continue;
    const first = table.rows.length > 0 ? table.rows[0][col] : null;
    if (typeof first === 'string' && first.length > 0) return first;
  }

  return path.parse(filename).name;
}

/**
 * One series per contract id. A later series under the same id replaces the earlier one;
 * two files that derive the same id therefore lose the first file's data.
 */
export class ContractRegistry {
  constructor(private readonly records: Map<string, ContractRecord> = new Map()) {}

  /** Returns true when an existing record was overwritten. */
  set(id: string, series: NormalizedSeries): boolean {
    const replaced = this.records.has(id);
    this.records.set(id, { id, series });
    return replaced;
  }

  get size(): number {
    return this.records.size;
  }

  /** Ids in sorted order so downstream output is reproducible. */
  ids(): string[] {
    return this.list().map(r => r.id);
  }

  /** Records in sorted id order. */
  list(): ContractRecord[] {
    return sortedRecords(this.records);
  }

  toSeriesMap(): Map<string, NormalizedSeries> {
    return new Map(this.list().map(r => [r.id, r.series]));
  }
}

export function sortedRecords(records: ReadonlyMap<string, ContractRecord>): ContractRecord[] {
  return [...records.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
