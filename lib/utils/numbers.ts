import { CellValue } from '../types/canonical';

// Plain decimal or exponent notation; hex, binary and "Infinity" are not prices
export const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/** Invalid tokens become null; zero stays zero. */
export function toFiniteNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = value.trim();
  if (!NUMERIC.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

export function presentValues(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null);
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function max(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((m, v) => (v > m ? v : m), values[0]);
}

/** Sample standard deviation (n - 1). */
export function sampleStd(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const m = values.reduce((sum, v) => sum + v, 0) / values.length;
  const ss = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}
