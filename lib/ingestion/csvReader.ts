import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { CellValue, RawTable } from '../types/canonical';
import { FileUnreadableError, errorMessage } from '../errors';
import { NUMERIC } from '../utils/numbers';

export interface EncodingCandidate {
  name: string;
  label: string;
  ignoreBOM: boolean;
}

// Fixed priority; stop at the first one that decodes into a non-empty table.
export const ENCODING_FALLBACKS: readonly EncodingCandidate[] = [
  { name: 'utf-8-sig', label: 'utf-8', ignoreBOM: false },
  { name: 'utf-8', label: 'utf-8', ignoreBOM: true },
  { name: 'gbk', label: 'gbk', ignoreBOM: false },
  { name: 'gb2312', label: 'gb2312', ignoreBOM: false },
  { name: 'gb18030', label: 'gb18030', ignoreBOM: false },
];

export function typeCell(raw: string | undefined): CellValue {
  if (raw === undefined) return null;
  const text = raw.trim();
  if (!text) return null;
  return NUMERIC.test(text) ? Number(text) : text;
}

/** Parse CSV text with a header row into a RawTable. */
export function parseCsvText(text: string, filename: string): RawTable {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: 'greedy',
    transformHeader: h => h.trim(),
  });
  const columns = (parsed.meta.fields ?? []).filter(c => c.length > 0);
  const rows = parsed.data.map(record => {
    const row: Record<string, CellValue> = {};
    for (const col of columns) {
      row[col] = typeCell(record[col]);
    }
    return row;
  });
  return { filename, columns, rows };
}

function decode(buffer: Buffer, candidate: EncodingCandidate): string | null {
  try {
    const decoder = new TextDecoder(candidate.label, { fatal: true, ignoreBOM: candidate.ignoreBOM });
    return decoder.decode(buffer);
  } catch {
    // Invalid bytes for this encoding, or the runtime lacks the decoder
    return null;
  }
}

/** Decode a CSV buffer trying each fallback encoding in turn. */
export function parseCsvBuffer(
  buffer: Buffer,
  filename: string,
  encodings: readonly EncodingCandidate[] = ENCODING_FALLBACKS
): { table: RawTable; encoding: string } {
  for (const candidate of encodings) {
    const text = decode(buffer, candidate);
    if (text === null) continue;
    const table = parseCsvText(text, filename);
    if (table.columns.length > 0 && table.rows.length > 0) {
      return { table, encoding: candidate.name };
    }
  }
  throw new FileUnreadableError(filename);
}

export async function readCsvWithFallback(filePath: string): Promise<{ table: RawTable; encoding: string }> {
  const filename = path.basename(filePath);
  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new FileUnreadableError(filename, errorMessage(error));
  }
  return parseCsvBuffer(buffer, filename);
}
