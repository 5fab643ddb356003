export function sum(xs: readonly number[]): number {
  return xs.reduce((s, x) => s + x, 0);
}

/** Arithmetic mean; 0 for an empty sample. */
export function mean(xs: readonly number[]): number {
  return xs.length ? sum(xs) / xs.length : 0;
}

/** Population standard deviation (divisor N); 0 below two values. */
export function populationStd(xs: readonly number[]): number {
  if (xs.length < 2) return 0;
  const m = mean(xs);
  const variance = xs.reduce((s, x) => s + (x - m) ** 2, 0) / xs.length;
  return Math.sqrt(variance);
}
