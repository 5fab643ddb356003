import { DEFAULT_Z_TABLE, lookupZ } from "../../numeric/src/z-table.js";
import type { ZTable } from "../../numeric/src/z-table.js";

export type PolicyInput = {
  mean_demand_per_day: number;
  std_demand_per_day: number;
  lead_time_mean: number; // days
  lead_time_std: number; // days
  target_csl: number; // (0, 1)
};

export type InventoryPolicy = {
  mu_lt: number;
  sigma_lt: number;
  safety_stock: number;
  reorder_point: number;
  base_stock: number;
};

/**
 * Safety stock, reorder point and base stock under a normal approximation
 * of demand during a random lead time:
 *
 *   mu_LT    = mu_D * LT
 *   sigma_LT = sqrt(LT * sigma_D^2 + mu_D^2 * sigma_LT_days^2)
 *   SS       = z(csl) * sigma_LT
 *   ROP      = mu_LT + SS
 *   BS       = ROP + mu_LT
 *
 * BS is a simplified order-up-to level (lead time counted twice, no review
 * period). Callers must not read it as a periodic-review base stock.
 *
 * Inputs are expected to be validated upstream (PolicyRequestSchema); out of
 * range values produce degenerate numbers, never an exception. No rounding.
 */
export function computeInventoryPolicy(input: PolicyInput, zTable: ZTable = DEFAULT_Z_TABLE): InventoryPolicy {
  const { mean_demand_per_day: muD, std_demand_per_day: sdD, lead_time_mean: lt, lead_time_std: sdLt } = input;

  const mu_lt = muD * lt;
  const sigma_lt = Math.sqrt(lt * sdD ** 2 + muD ** 2 * sdLt ** 2);

  const { z } = lookupZ(input.target_csl, zTable);
  const safety_stock = z * sigma_lt;
  const reorder_point = mu_lt + safety_stock;
  const base_stock = reorder_point + mu_lt;

  return { mu_lt, sigma_lt, safety_stock, reorder_point, base_stock };
}
