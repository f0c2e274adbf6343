import fieldPatterns from '../data/field_patterns.json';
import { CanonicalField } from '../types/canonical';

export type FieldPatternTable = Readonly<Record<CanonicalField, readonly string[]>>;

export const DEFAULT_FIELD_PATTERNS: FieldPatternTable = Object.freeze({
  date: Object.freeze([...fieldPatterns.fields.date]),
  price: Object.freeze([...fieldPatterns.fields.price]),
  open_interest: Object.freeze([...fieldPatterns.fields.open_interest]),
  volume: Object.freeze([...fieldPatterns.fields.volume]),
});

export const SPOT_PRICE_SIGNALS: readonly string[] = Object.freeze([...fieldPatterns.signals.spot_price]);

export const PRICE_FALLBACK_COLUMNS: readonly string[] = Object.freeze([...fieldPatterns.priceFallbackColumns]);

// Column headers are compared trimmed and lower-cased
const norm = (s: string) => s.trim().toLowerCase();

function compile(patterns: readonly string[]): RegExp[] {
  return patterns.map(p => new RegExp(p, 'i'));
}

/** True when any column name matches any of the patterns. */
export function anyColumnMatches(columns: readonly string[], patterns: readonly string[]): boolean {
  const regexes = compile(patterns);
  return columns.some(col => regexes.some(re => re.test(norm(col))));
}

/**
 * Maps arbitrary column headers onto canonical fields.
 *
 * Lookups are memoized per (ordered column list, field). The key is a string snapshot of the
 * columns, so mutating the caller's array afterwards cannot corrupt the cache.
 */
export class FieldMapper {
  private readonly compiled: Record<CanonicalField, RegExp[]>;
  private readonly cache = new Map<string, string | null>();

  constructor(patterns: FieldPatternTable = DEFAULT_FIELD_PATTERNS) {
    this.compiled = {
      date: compile(patterns.date),
      price: compile(patterns.price),
      open_interest: compile(patterns.open_interest),
      volume: compile(patterns.volume),
    };
  }

  /** First column whose name matches a pattern for `field`, or null. */
  map(columns: readonly string[], field: CanonicalField): string | null {
    const key = `${field}\u0000${JSON.stringify(columns)}`;
    const hit = this.cache.get(key);
    if (hit !== undefined) return hit;

    const regexes = this.compiled[field];
    const found = columns.find(col => regexes.some(re => re.test(norm(col)))) ?? null;
    this.cache.set(key, found);
    return found;
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}

export const defaultFieldMapper = new FieldMapper();
