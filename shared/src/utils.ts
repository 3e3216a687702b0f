/**
 * Format a date as ISO-8601 in UTC with second precision, e.g. `2020-09-22T23:55:10+00:00`
 */
export function isoSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}+00:00`;
}

/**
 * Split an array into consecutive chunks of at most `n` items
 */
export function chunk<T>(items: readonly T[], n: number = 200): T[][] {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`n must be a positive integer: ${n}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += n) {
    chunks.push(items.slice(i, i + n));
  }
  return chunks;
}
