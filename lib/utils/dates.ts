import { differenceInCalendarDays, format, isValid, parse, parseISO } from 'date-fns';
import { CellValue } from '../types/canonical';

// Tried in order; the first format that consumes the whole cell wins.
const DATE_FORMATS = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'yyyy.MM.dd',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy/MM/dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'yyyy/MM/dd HH:mm',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy年MM月dd日',
  'MM/dd/yyyy',
  'M/d/yy',
  'dd-MMM-yyyy',
  'MMM d, yyyy',
];

// Date-time stamps keep the calendar day as written, whatever the offset
const ISO_DATE_TIME = /^(\d{4}-\d{1,2}-\d{1,2})[T ]\d{1,2}:\d{2}/;

const COMPACT_DATE = /(\d{4})(\d{2})(\d{2})/;

const REFERENCE_DATE = new Date(2000, 0, 1);

// `yyyy` also accepts 1-3 digits; "1/5/23" must not become year 1
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

function toDay(d: Date): string | null {
  if (!isValid(d)) return null;
  const year = d.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR ? format(d, 'yyyy-MM-dd') : null;
}

/** Parse one cell to a calendar date (YYYY-MM-DD), or null. */
export function parseDateCell(value: CellValue): string | null {
  if (value === null) return null;
  const text = String(value).trim();
  if (!text) return null;

  for (const f of DATE_FORMATS) {
    const day = toDay(parse(text, f, REFERENCE_DATE));
    if (day) return day;
  }

  const stamp = ISO_DATE_TIME.exec(text);
  if (stamp) return toDay(parse(stamp[1], 'yyyy-MM-dd', REFERENCE_DATE));

  const iso = toDay(parseISO(text));
  if (iso) return iso;

  // Month names the formats above miss, e.g. "January 5 2023"
  return /[a-z]/i.test(text) ? toDay(new Date(text)) : null;
}

/** 20230105 -> 2023-01-05; anything else is returned untouched. */
export function expandCompactDate(value: CellValue): CellValue {
  if (value === null) return null;
  return String(value).trim().replace(COMPACT_DATE, '$1-$2-$3');
}

/**
 * Parse a whole date column. When nothing parses, retry once after expanding
 * 8-digit compact dates.
 */
export function parseDateColumn(values: readonly CellValue[]): (string | null)[] {
  const parsed = values.map(parseDateCell);
  if (parsed.some(d => d !== null)) return parsed;
  return values.map(v => parseDateCell(expandCompactDate(v)));
}

export function daysBetween(a: string, b: string): number {
  return differenceInCalendarDays(parseISO(a), parseISO(b));
}

/** Max minus min date in days, or null when no date is present. */
export function dateSpanDays(dates: readonly (string | null)[]): number | null {
  const present = dates.filter((d): d is string => d !== null);
  if (present.length === 0) return null;
  let min = present[0];
  let max = present[0];
  for (const d of present) {
    if (d < min) min = d;
    if (d > max) max = d;
  }
  return daysBetween(max, min);
}
