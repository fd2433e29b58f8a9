export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Round to one decimal place. */
export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/** Occurrence counts, keyed in first-seen order. */
export function countBy<T>(items: Iterable<T>): Map<T, number> {
  const counts = new Map<T, number>();
  for (const item of items) counts.set(item, (counts.get(item) ?? 0) + 1);
  return counts;
}

/** Most frequent first; ties keep first-seen order. */
export function mostCommon<T>(items: Iterable<T>, n?: number): Array<[T, number]> {
  const ranked = [...countBy(items)].sort((a, b) => b[1] - a[1]);
  return n === undefined ? ranked : ranked.slice(0, n);
}

export function toRecord<K extends string>(counts: Map<K, number>): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const [k, v] of counts) out[k] = v;
  return out;
}
