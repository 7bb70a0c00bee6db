/**
 * Natural ordering for catalog codes: "A2" < "A10".
 *
 * Digit runs compare numerically (as bigint, so long numeric codes keep
 * their precision), everything else case-insensitively.
 */

export type NaturalSortKey = Array<string | bigint>;

export function naturalSortKey(value: string): NaturalSortKey {
  return value.split(/(\d+)/).map((part, index) =>
    // split() with a capture group puts digit runs at odd positions
    index % 2 === 1 ? BigInt(part) : part.toLowerCase()
  );
}

export function compareNatural(a: string, b: string): number {
  const left = naturalSortKey(a);
  const right = naturalSortKey(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const x = left[i];
    const y = right[i];
    if (x === y) continue;
    if (typeof x === 'bigint' && typeof y === 'bigint') return x < y ? -1 : 1;
    return String(x) < String(y) ? -1 : 1;
  }
  return left.length - right.length;
}

export function naturalSort(values: Iterable<string>): string[] {
  return [...values].sort(compareNatural);
}

/** Smallest value in natural order, or null for an empty list */
export function naturalMin(values: Iterable<string>): string | null {
  let best: string | null = null;
  for (const value of values) {
    if (best === null || compareNatural(value, best) < 0) best = value;
  }
  return best;
}
