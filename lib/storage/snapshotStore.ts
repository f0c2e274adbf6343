import * as fs from 'fs';
import * as path from 'path';
import { GatewayState, NormalizedSeries, Panel, ScanStats, Snapshot } from '../types/canonical';
import { InvalidSnapshotError, errorMessage } from '../errors';
import { ContractRegistry } from '../ingestion/contracts';
import { getContractInfo } from '../panel/contractInfo';
import { panelCsvPathFor, panelToCsv } from '../panel/panelCsv';
import { computeQualityReport } from '../validation/quality';

export function createSnapshot(state: GatewayState, panel: Panel, stats: ScanStats, now: Date = new Date()): Snapshot {
  const futures: Record<string, NormalizedSeries> = Object.fromEntries(
    new ContractRegistry(state.contracts).toSeriesMap()
  );
  return {
    version: 1,
    created_at: now.toISOString(),
    panel,
    contract_info: getContractInfo(state),
    quality_report: state.quality ?? computeQualityReport(state.spot, state.contracts, now),
    stats,
    spot: state.spot,
    futures,
  };
}

async function writeAtomic(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, content, 'utf-8');
  await fs.promises.rename(tempPath, filePath);
}

/** Write the snapshot JSON and the human-readable panel CSV beside it. */
export async function saveSnapshot(filePath: string, snapshot: Snapshot): Promise<{ snapshot: string; panelCsv: string }> {
  const csvPath = panelCsvPathFor(filePath);
  await writeAtomic(filePath, JSON.stringify(snapshot));
  await writeAtomic(csvPath, panelToCsv(snapshot.panel));
  return { snapshot: filePath, panelCsv: csvPath };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isNumberOrNullArray(value: unknown): value is (number | null)[] {
  return Array.isArray(value) && value.every(v => v === null || typeof v === 'number');
}

function isSeries(value: unknown): value is NormalizedSeries {
  if (!isRecord(value)) return false;
  const { date, price, open_interest, volume } = value;
  if (!isStringArray(date) || !isNumberOrNullArray(price) || price.length !== date.length) return false;
  if (open_interest !== undefined && !isNumberOrNullArray(open_interest)) return false;
  if (volume !== undefined && !isNumberOrNullArray(volume)) return false;
  return true;
}

function isPanelColumn(value: unknown, rows: number): boolean {
  if (!isRecord(value)) return false;
  const { name, kind, values } = value;
  return (
    typeof name === 'string' &&
    (kind === 'spot' || kind === 'futures' || kind === 'basis') &&
    isNumberOrNullArray(values) &&
    values.length === rows
  );
}

function isPanel(value: unknown): value is Panel {
  if (!isRecord(value)) return false;
  const { dates, columns } = value;
  if (!isStringArray(dates) || !Array.isArray(columns)) return false;
  return columns.every(c => isPanelColumn(c, dates.length));
}

export function isSnapshot(value: unknown): value is Snapshot {
  if (!isRecord(value) || value.version !== 1 || typeof value.created_at !== 'string') return false;
  if (!isPanel(value.panel)) return false;
  if (!isRecord(value.contract_info) || !isRecord(value.quality_report) || !isRecord(value.stats)) return false;
  if (value.spot !== null && !isSeries(value.spot)) return false;
  const { futures } = value;
  return isRecord(futures) && Object.values(futures).every(isSeries);
}

export function parseSnapshot(json: string, source = 'snapshot'): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new InvalidSnapshotError(source, errorMessage(error));
  }
  if (!isSnapshot(parsed)) {
    throw new InvalidSnapshotError(source, 'unexpected structure');
  }
  return parsed;
}

export async function loadSnapshot(filePath: string): Promise<Snapshot> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InvalidSnapshotError(filePath, errorMessage(error));
  }
  return parseSnapshot(content, filePath);
}
