import { DEFAULT_Z_TABLE, lookupZ } from "../../numeric/src/z-table.js";
import type { ZTable } from "../../numeric/src/z-table.js";
import type { InventoryPolicy, PolicyInput } from "../../policy/src/inventory-policy.js";
import { fmt } from "./tree.js";
import type { ExplainTree } from "./tree.js";

export function explainInventoryPolicy(
  input: PolicyInput,
  policy: InventoryPolicy,
  zTable: ZTable = DEFAULT_Z_TABLE
): ExplainTree {
  const zl = lookupZ(input.target_csl, zTable);
  const muD = fmt(input.mean_demand_per_day);
  const sdD = fmt(input.std_demand_per_day);
  const lt = fmt(input.lead_time_mean);
  const sdLt = fmt(input.lead_time_std);

  const computations: ExplainTree["computations"] = [
    {
      name: "z",
      formula: "z_table[round(target_csl, 2)] ?? fallback",
      substituted: zl.matched ? `z_table[${zl.csl_key}]` : `fallback (no entry for ${zl.csl_key})`,
      value: zl.z,
    },
    {
      name: "mu_lt",
      formula: "mean_demand_per_day * lead_time_mean",
      substituted: `${muD} * ${lt}`,
      value: policy.mu_lt,
    },
    {
      name: "sigma_lt",
      formula: "sqrt(lead_time_mean * std_demand_per_day^2 + mean_demand_per_day^2 * lead_time_std^2)",
      substituted: `sqrt(${lt} * ${sdD}^2 + ${muD}^2 * ${sdLt}^2)`,
      value: policy.sigma_lt,
    },
    {
      name: "safety_stock",
      formula: "z * sigma_lt",
      substituted: `${fmt(zl.z)} * ${fmt(policy.sigma_lt)}`,
      value: policy.safety_stock,
    },
    {
      name: "reorder_point",
      formula: "mu_lt + safety_stock",
      substituted: `${fmt(policy.mu_lt)} + ${fmt(policy.safety_stock)}`,
      value: policy.reorder_point,
    },
    {
      name: "base_stock",
      formula: "reorder_point + mu_lt",
      substituted: `${fmt(policy.reorder_point)} + ${fmt(policy.mu_lt)}`,
      value: policy.base_stock,
    },
  ];

  const notes: string[] = [];
  if (!zl.matched) {
    notes.push(`NOTE: target_csl ${input.target_csl} has no z-table entry at ${zl.csl_key}; fallback z ${zl.z} used.`);
  }
  if (policy.sigma_lt === 0) {
    notes.push("NOTE: no demand or lead-time variability; safety stock is 0.");
  }
  if (Number.isNaN(policy.sigma_lt)) {
    notes.push("WARN: sigma_lt is NaN; inputs violate policy preconditions.");
  }
  notes.push("NOTE: base_stock = reorder_point + mu_lt is a simplified order-up-to level (no review period).");

  return {
    stage: "POLICY",
    subject: `csl ${input.target_csl}`,
    inputs: [
      { name: "mean_demand_per_day", value: input.mean_demand_per_day },
      { name: "std_demand_per_day", value: input.std_demand_per_day },
      { name: "lead_time_mean", value: input.lead_time_mean },
      { name: "lead_time_std", value: input.lead_time_std },
      { name: "target_csl", value: input.target_csl },
    ],
    computations,
    result: { ...policy },
    notes,
  };
}
