/**
 * Rounds to three decimals and drops trailing zeros, so 0.2 prints as
 * "0.2" and 2/3 as "0.667".
 */
export function formatScore(value: number): string {
  return String(Number(value.toFixed(3)));
}

export function sortedIds(ids: Iterable<number>): number[] {
  return Array.from(ids).sort((a, b) => a - b);
}

export function formatIdList(ids: readonly number[]): string {
  return `[${ids.join(', ')}]`;
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}
