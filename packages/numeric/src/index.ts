export { Z10, Z90, DEFAULT_Z_TABLE, DEFAULT_FALLBACK_Z, lookupZ, zTableFromRecord } from "./z-table.js";
export type { ZTable, ZLookup } from "./z-table.js";

export { roundTo, roundHalfAwayFromZero } from "./rounding.js";
export { sum, mean, populationStd } from "./stats.js";
