/**
 * Quantile of already sorted values with linear interpolation between the
 * two nearest order statistics. Returns `null` for an empty input.
 */
export function quantileSorted(sorted: readonly number[], q: number): number | null {
  if (sorted.length === 0) return null;

  const position = (sorted.length - 1) * q;
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex];
  const upper = sorted[upperIndex];
  if (lower === undefined || upper === undefined) return null;

  return lower + (position - lowerIndex) * (upper - lower);
}

/**
 * Round half away from zero to a fixed number of decimal places
 */
export function roundTo(value: number, digits: number = 2): number {
  const factor = 10 ** digits;
  return Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
}

/**
 * Compact text form of a result value: integers as is, fractions to four places
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "number") {
    if (Number.isInteger(value) || !Number.isFinite(value)) return String(value);
    return String(roundTo(value, 4));
  }
  return String(value);
}

/**
 * Cut text to at most `width` characters, marking the cut with `...`
 */
export function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  if (width <= 3) return text.slice(0, width);
  return `${text.slice(0, width - 3)}...`;
}
