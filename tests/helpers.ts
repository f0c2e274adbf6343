import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { addDays, format, parseISO } from "date-fns";
import type { CellValue, NormalizedSeries, RawTable } from "@/lib/types/canonical";

/** `count` distinct dates from `start`, the last one exactly `spanDays` later. */
export function spreadDates(start: string, count: number, spanDays: number): string[] {
  const base = parseISO(start);
  return Array.from({ length: count }, (_, i) =>
    format(addDays(base, Math.round((i * spanDays) / (count - 1))), "yyyy-MM-dd")
  );
}

export function makeTable(columns: string[], rows: CellValue[][], filename = "test.csv"): RawTable {
  return {
    filename,
    columns,
    rows: rows.map((cells) => Object.fromEntries(columns.map((c, i) => [c, cells[i] ?? null]))),
  };
}

export function toCsv(columns: string[], rows: CellValue[][]): string {
  const lines = [columns.join(","), ...rows.map((r) => r.map((c) => (c === null ? "" : String(c))).join(","))];
  return lines.join("\n") + "\n";
}

export function series(dates: string[], price: (number | null)[]): NormalizedSeries {
  return { date: dates, price };
}

export async function makeTempDir(prefix = "basis-gateway-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Write `files` (relative path -> content) under `root`, creating folders as needed. */
export async function writeFiles(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    await fs.promises.mkdir(path.dirname(full), { recursive: true });
    await fs.promises.writeFile(full, content);
  }
}
