/**
 * Round to a fixed number of decimal places.
 *
 * Works on the exact decimal expansion of the double, so a literal such as
 * 0.945 (stored as 0.94499999...) rounds down to 0.94.
 */
export function roundTo(x: number, decimals: number): number {
  return Number(x.toFixed(decimals));
}

/**
 * Nearest integer; exact halves go away from zero (2.5 -> 3, -2.5 -> -3).
 */
export function roundHalfAwayFromZero(x: number): number {
  const r = Math.sign(x) * Math.round(Math.abs(x));
  // normalise -0
  return r === 0 ? 0 : r;
}
