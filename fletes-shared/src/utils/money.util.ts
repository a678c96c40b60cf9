export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/** Sum a numeric field across records, rounded to cents */
export function sumBy<T>(items: readonly T[], pick: (item: T) => number): number {
  return round2(items.reduce((acc, item) => acc + (pick(item) || 0), 0));
}

/**
 * Round up to the next multiple. The quotient is trimmed to six decimals first
 * so that float noise (700000 / 0.7 = 1000000.0000000001) does not bump a
 * value that is already a multiple.
 */
export function ceilToMultiple(value: number, multiple: number): number {
  const quotient = Number((value / multiple).toFixed(6));
  return Math.ceil(quotient) * multiple;
}
