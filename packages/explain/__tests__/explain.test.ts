import { describe, expect, it } from "vitest";

import { explainDemandEstimate } from "../src/explain-forecast-tree.js";
import { explainInventoryPolicy } from "../src/explain-policy-tree.js";
import { explainReplenishment } from "../src/explain-replenish-tree.js";
import { explainLines } from "../src/explain-lines.js";
import { estimateDemand } from "../../forecast/src/estimate.js";
import { computeInventoryPolicy } from "../../policy/src/inventory-policy.js";
import { decideReplenishment } from "../../replenish/src/order-up-to.js";

const policyInput = {
  mean_demand_per_day: 10,
  std_demand_per_day: 2,
  lead_time_mean: 7,
  lead_time_std: 1,
  target_csl: 0.95,
};

describe("explainInventoryPolicy", () => {
  it("shows each formula with substituted inputs", () => {
    const policy = computeInventoryPolicy(policyInput);
    const t = explainInventoryPolicy(policyInput, policy);

    expect(t.stage).toBe("POLICY");
    expect(t.computations.map((c) => c.name)).toEqual([
      "z",
      "mu_lt",
      "sigma_lt",
      "safety_stock",
      "reorder_point",
      "base_stock",
    ]);

    const byName = new Map(t.computations.map((c) => [c.name, c]));
    expect(byName.get("z")?.substituted).toBe("z_table[0.95]");
    expect(byName.get("z")?.value).toBe(1.6448536);
    expect(byName.get("mu_lt")?.substituted).toBe("10 * 7");
    expect(byName.get("sigma_lt")?.substituted).toBe("sqrt(7 * 2^2 + 10^2 * 1^2)");
    expect(byName.get("base_stock")?.value).toBe(policy.base_stock);

    expect(t.result).toEqual({ ...policy });
    expect(t.notes).toEqual([
      "NOTE: base_stock = reorder_point + mu_lt is a simplified order-up-to level (no review period).",
    ]);
  });

  it("notes the fallback z", () => {
    const input = { ...policyInput, target_csl: 0.93 };
    const t = explainInventoryPolicy(input, computeInventoryPolicy(input));

    expect(t.computations[0]?.substituted).toBe("fallback (no entry for 0.93)");
    expect(t.notes[0]).toBe("NOTE: target_csl 0.93 has no z-table entry at 0.93; fallback z 1.2815516 used.");
  });

  it("notes zero variability", () => {
    const input = { ...policyInput, std_demand_per_day: 0, lead_time_std: 0 };
    const t = explainInventoryPolicy(input, computeInventoryPolicy(input));
    expect(t.notes).toContain("NOTE: no demand or lead-time variability; safety stock is 0.");
  });
});

describe("explainReplenishment", () => {
  it("explains a triggered order", () => {
    const pos = { net_available: 50, reorder_point: 88.608, base_stock: 158.608 };
    const t = explainReplenishment(pos, decideReplenishment(pos));

    expect(t.computations).toEqual([
      { name: "triggered", formula: "net_available < reorder_point", substituted: "50 < 88.608", value: 1 },
      {
        name: "order_quantity",
        formula: "round(max(0, base_stock - net_available))",
        substituted: "round(max(0, 158.608 - 50))",
        value: 109,
      },
    ]);
    expect(t.result).toEqual({ order_quantity: 109, triggered: true });
    expect(t.notes).toEqual([]);
  });

  it("explains why no order is placed", () => {
    const pos = { net_available: 500, reorder_point: 88.608, base_stock: 158.608 };
    const t = explainReplenishment(pos, decideReplenishment(pos));
    expect(t.notes).toEqual(["NOTE: no order; net_available 500 is not below reorder_point 88.608."]);
  });

  it("flags backorders", () => {
    const pos = { net_available: -20, reorder_point: 10, base_stock: 30 };
    const t = explainReplenishment(pos, decideReplenishment(pos));
    expect(t.notes).toEqual(["NOTE: position is backordered (net_available -20)."]);
    expect(t.result.order_quantity).toBe(50);
  });
});

describe("explainDemandEstimate", () => {
  it("carries the estimate's stats, band and notes", () => {
    const params = { sku_id: "SKU1", site_id: "STORE1", window_days: 28, horizon_days: 2 };
    const est = estimateDemand(
      [
        { date: "2024-01-01", sku_id: "SKU1", site_id: "STORE1", qty: 2 },
        { date: "2024-01-02", sku_id: "SKU1", site_id: "STORE1", qty: 6 },
      ],
      params
    );
    const t = explainDemandEstimate(params, est);

    expect(t.subject).toBe("SKU1@STORE1");
    expect(t.computations.map((c) => c.name)).toEqual(["mean", "std", "p50", "p10", "p90"]);
    expect(t.computations[3]?.formula).toBe("max(0, mean + z10 * std)");
    expect(t.result).toMatchObject({ mean: 4, std: 2, p50: 4, horizon_days: 2 });
    expect(t.notes).toEqual(["NOTE: history covers 2 of 28 requested window days."]);
  });

  it("uses the degenerate formulas when std is 0", () => {
    const params = { sku_id: "X", site_id: "Y", window_days: 7, horizon_days: 3 };
    const t = explainDemandEstimate(params, estimateDemand([], params));

    expect(t.computations[3]).toEqual({ name: "p10", formula: "mean (std = 0)", substituted: "0", value: 0 });
    expect(t.result).toMatchObject({ mean: 0, std: 0, p10: 0, p90: 0, horizon_days: 3 });
  });
});

describe("explainLines", () => {
  it("flattens a tree into kinds and text", () => {
    const pos = { net_available: 50, reorder_point: 88.608, base_stock: 158.608 };
    const lines = explainLines(explainReplenishment(pos, decideReplenishment(pos)));

    expect(lines).toEqual([
      { kind: "INPUT", text: "net_available = 50" },
      { kind: "INPUT", text: "reorder_point = 88.608" },
      { kind: "INPUT", text: "base_stock = 158.608" },
      { kind: "COMPUTE", text: "triggered = net_available < reorder_point = 50 < 88.608 = 1" },
      {
        kind: "COMPUTE",
        text: "order_quantity = round(max(0, base_stock - net_available)) = round(max(0, 158.608 - 50)) = 109",
      },
      { kind: "RESULT", text: "order_quantity = 109" },
      { kind: "RESULT", text: "triggered = true" },
    ]);
  });
});
