import { roundTo } from "./rounding.js";

/**
 * Standard normal quantiles used for the p10 / p90 forecast band.
 */
export const Z10 = -1.2815515655446004;
export const Z90 = 1.2815515655446004;

/**
 * Cycle service level -> z-score. Keys are service levels rounded to two
 * decimal places; values are non-decreasing in the key.
 */
export type ZTable = ReadonlyMap<number, number>;

export const DEFAULT_Z_TABLE: ZTable = new Map<number, number>([
  [0.5, 0.0],
  [0.6, 0.2533471],
  [0.7, 0.5244005],
  [0.8, 0.8416212],
  [0.85, 1.0364334],
  [0.9, 1.2815516],
  [0.95, 1.6448536],
  [0.98, 2.0537489],
  [0.99, 2.3263479],
]);

// ~90th percentile, used when the rounded service level has no entry
export const DEFAULT_FALLBACK_Z = 1.2815516;

export type ZLookup = {
  z: number;
  csl_key: number; // target_csl rounded to 2 places
  matched: boolean; // false => fallback z was used
};

export function lookupZ(
  target_csl: number,
  table: ZTable = DEFAULT_Z_TABLE,
  fallback: number = DEFAULT_FALLBACK_Z
): ZLookup {
  const csl_key = roundTo(target_csl, 2);
  const z = table.get(csl_key);
  return z === undefined
    ? { z: fallback, csl_key, matched: false }
    : { z, csl_key, matched: true };
}

/**
 * Build a z table from a plain record (e.g. parsed JSON `{ "0.95": 1.64 }`).
 * Keys are rounded to two places so lookups line up with `lookupZ`.
 */
export function zTableFromRecord(r: Record<string, number>): ZTable {
  const m = new Map<number, number>();
  for (const [k, v] of Object.entries(r)) {
    const key = Number(k);
    if (!Number.isFinite(key) || !Number.isFinite(v)) continue;
    m.set(roundTo(key, 2), v);
  }
  return m;
}
