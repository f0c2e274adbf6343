import { NormalizedSeries } from '../types/canonical';
import { daysBetween } from '../utils/dates';

/** Sorted union of every futures series' dates. */
export function futuresCalendar(futures: Iterable<NormalizedSeries>): string[] {
  const all = new Set<string>();
  for (const series of futures) {
    series.date.forEach(d => all.add(d));
  }
  return [...all].sort();
}

/**
 * Price of the observation closest in calendar days to `target`; ties go to the earlier date.
 * Linear over the observations. It only runs until the first value is known, because the
 * carry-forward cursor covers every later date.
 */
export function nearestPrice(target: string, observations: readonly [string, number][]): number | null {
  let best: number | null = null;
  let bestDiff = Infinity;
  for (const [date, price] of observations) {
    const diff = Math.abs(daysBetween(target, date));
    if (diff < bestDiff) {
      bestDiff = diff;
      best = price;
    }
  }
  return best;
}

/**
 * Re-index the spot series onto the futures trading calendar.
 *
 * Exact spot prints are used as is; dates without a print reuse the last known spot
 * price (spot is assumed flat on such days); before any value is known the nearest spot
 * print in time is used. The spot calendar itself is discarded.
 *
 * Returns the input unchanged when there is no spot or no futures date.
 */
export function alignSpotToFutures(
  spot: NormalizedSeries | null,
  futures: Iterable<NormalizedSeries>
): NormalizedSeries | null {
  if (!spot) return spot;
  const calendar = futuresCalendar(futures);
  if (calendar.length === 0) return spot;

  const observations: [string, number][] = [];
  spot.date.forEach((d, i) => {
    const p = spot.price[i];
    if (p !== null) observations.push([d, p]);
  });
  const byDate = new Map(observations);

  let last: number | null = null;
  const price = calendar.map(target => {
    const exact = byDate.get(target);
    if (exact !== undefined) {
      last = exact;
    } else if (last === null) {
      last = nearestPrice(target, observations);
    }
    return last;
  });

  return { date: calendar, price };
}
