import * as fs from 'fs';
import * as path from 'path';
import { GatewayState, ScanError, ScanStats } from '../types/canonical';
import { DirectoryNotFoundError, UnclassifiableFileError, errorMessage, isGatewayError } from '../errors';
import { computeQualityReport } from '../validation/quality';
import { readCsvWithFallback } from './csvReader';
import { classify } from './classifier';
import { normalize } from './normalizer';
import { ContractRegistry, identifyContract } from './contracts';
import { FieldMapper, defaultFieldMapper } from './fieldMapper';

export interface ScanOptions {
  recursive?: boolean;
  quiet?: boolean;
  mapper?: FieldMapper;
}

const BACKUP_SUFFIX = /(\.bak|~)\.csv$/i;

export function isDataFile(name: string): boolean {
  return /\.csv$/i.test(name) && !BACKUP_SUFFIX.test(name);
}

/** CSV files under `dir`, sorted by path so discovery order is stable. */
export async function listCsvFiles(dir: string, recursive = true): Promise<string[]> {
  const found: string[] = [];
  const walk = async (current: string): Promise<void> => {
    const entries = await fs.promises.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (recursive) await walk(full);
      } else if (entry.isFile() && isDataFile(entry.name)) {
        found.push(full);
      }
    }
  };
  await walk(dir);
  return found.sort();
}

async function assertDirectory(dir: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(dir);
    if (!stat.isDirectory()) throw new DirectoryNotFoundError(dir);
  } catch (error) {
    if (isGatewayError(error)) throw error;
    throw new DirectoryNotFoundError(dir);
  }
}

function toScanError(file: string, error: unknown): ScanError {
  return {
    file,
    code: isGatewayError(error) ? error.code : 'UNEXPECTED',
    message: errorMessage(error),
  };
}

/**
 * Scan `dir` for CSV files and load each into `state`, one file at a time in path order.
 *
 * Per-file failures (unreadable, unclassifiable, missing fields) are collected in
 * `stats.errors` and the scan moves on. Only a missing directory throws.
 * A later spot file replaces the earlier one; futures go through the registry (last write wins).
 */
export async function scanAndLoad(
  state: GatewayState,
  dir: string,
  { recursive = true, quiet = false, mapper = defaultFieldMapper }: ScanOptions = {}
): Promise<ScanStats> {
  const log = quiet ? () => {} : (msg: string) => console.log(msg);
  const stats: ScanStats = { files: 0, spot_count: 0, futures_count: 0, errors: [] };

  await assertDirectory(dir);
  const files = await listCsvFiles(dir, recursive);
  stats.files = files.length;

  if (files.length === 0) {
    console.warn(`No CSV files found in ${dir}`);
    state.quality = computeQualityReport(state.spot, state.contracts);
    return stats;
  }

  log(`Found ${files.length} CSV files, processing...`);
  const registry = new ContractRegistry(state.contracts);

  for (const file of files) {
    const name = path.basename(file);
    try {
      const { table, encoding } = await readCsvWithFallback(file);
      const kind = classify(table, mapper);

      if (kind === 'spot') {
        state.spot = normalize(table, 'spot', path.parse(name).name, mapper);
        stats.spot_count++;
        log(`  ✓ spot: ${name} (${encoding})`);
      } else if (kind === 'futures') {
        const id = identifyContract(name, table);
        const series = normalize(table, 'futures', id, mapper);
        if (registry.set(id, series)) {
          console.warn(`  ! ${name}: contract ${id} already loaded, replacing it`);
        }
        stats.futures_count++;
        log(`  ✓ futures: ${name} -> ${id} (${encoding})`);
      } else {
        throw new UnclassifiableFileError(name);
      }
    } catch (error) {
      const scanError = toScanError(name, error);
      stats.errors.push(scanError);
      console.warn(`  ✗ ${scanError.message}`);
    }
  }

  state.quality = computeQualityReport(state.spot, state.contracts);

  log(`\nScan complete: ${stats.spot_count} spot, ${stats.futures_count} futures`);
  if (registry.size > 0) {
    log(`Contracts (${registry.size}): ${registry.ids().join(', ')}`);
  }
  if (stats.errors.length > 0) {
    log(`Files with errors: ${stats.errors.length}`);
  }
  return stats;
}
