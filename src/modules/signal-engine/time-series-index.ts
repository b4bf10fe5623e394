/**
 * Query helpers over timestamp-ordered chart data.
 *
 * Both functions assume the input is sorted ascending by timestamp. Ordering is
 * not checked: `nearest` runs on every pointer move and must stay O(log n).
 */

export interface ChartPoint {
  readonly timestamp: number;
  readonly value: number;
}

export type TimestampOf<T> = (point: T) => number;

const byTimestamp = <T extends { readonly timestamp: number }>(point: T): number => point.timestamp;

/**
 * Uniform stride sampling down to at most `maxPoints` elements. The first and
 * last elements are always kept; interior picks land on `round(i * step)` with
 * `step = (n - 1) / (maxPoints - 1)`. Single-sample spikes between picks are
 * not preserved.
 *
 * Returns the input itself when it already fits, or when `maxPoints < 2`.
 */
export function downsample<T>(items: readonly T[], maxPoints: number): readonly T[] {
  const limit = Math.floor(maxPoints);
  if (!(limit >= 2) || items.length <= limit) return items;

  const lastIndex = items.length - 1;
  const step = lastIndex / (limit - 1);
  const result: T[] = [items[0]];
  for (let i = 1; i < limit - 1; i++) {
    result.push(items[Math.round(i * step)]);
  }
  result.push(items[lastIndex]);
  return result;
}

/**
 * Element whose timestamp is closest to `target`; ties go to the earlier one.
 * Returns null for an empty sequence.
 */
export function nearestBy<T>(
  items: readonly T[],
  target: number,
  timestampOf: TimestampOf<T>,
): T | null {
  if (items.length === 0) return null;

  // first index whose timestamp is >= target
  let low = 0;
  let high = items.length - 1;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (timestampOf(items[mid]) < target) low = mid + 1;
    else high = mid;
  }

  if (low === 0) return items[0];
  const before = items[low - 1];
  const after = items[low];
  return Math.abs(timestampOf(before) - target) <= Math.abs(timestampOf(after) - target)
    ? before
    : after;
}

export function nearest<T extends { readonly timestamp: number }>(
  items: readonly T[],
  target: number,
): T | null {
  return nearestBy(items, target, byTimestamp);
}
