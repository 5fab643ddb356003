import { Z10, Z90 } from "../../numeric/src/z-table.js";
import type { DemandEstimate, EstimateParams } from "../../forecast/src/estimate.js";
import { fmt } from "./tree.js";
import type { ExplainTree } from "./tree.js";

export function explainDemandEstimate(params: EstimateParams, est: DemandEstimate): ExplainTree {
  const first = est.predictions[0];
  const n = est.trace.window_length;

  const computations: ExplainTree["computations"] = [
    {
      name: "mean",
      formula: "sum(window qty) / N",
      substituted: `N = ${n}`,
      value: est.mean,
    },
    {
      name: "std",
      formula: "sqrt(sum((qty - mean)^2) / N), 0 when N < 2",
      substituted: `N = ${n}, mean = ${fmt(est.mean)}`,
      value: est.std,
    },
    {
      name: "p50",
      formula: "mean",
      substituted: fmt(est.mean),
      value: first?.p50 ?? null,
    },
  ];

  if (est.std > 0) {
    computations.push(
      {
        name: "p10",
        formula: "max(0, mean + z10 * std)",
        substituted: `max(0, ${fmt(est.mean)} + ${Z10} * ${fmt(est.std)})`,
        value: first?.p10 ?? null,
      },
      {
        name: "p90",
        formula: "max(0, mean + z90 * std)",
        substituted: `max(0, ${fmt(est.mean)} + ${Z90} * ${fmt(est.std)})`,
        value: first?.p90 ?? null,
      }
    );
  } else {
    computations.push(
      { name: "p10", formula: "mean (std = 0)", substituted: fmt(est.mean), value: first?.p10 ?? null },
      { name: "p90", formula: "mean (std = 0)", substituted: fmt(est.mean), value: first?.p90 ?? null }
    );
  }

  return {
    stage: "FORECAST",
    subject: `${params.sku_id}@${params.site_id}`,
    inputs: [
      { name: "sku_id", value: params.sku_id },
      { name: "site_id", value: params.site_id },
      { name: "window_days", value: params.window_days },
      { name: "horizon_days", value: params.horizon_days },
      { name: "records_used", value: est.trace.records_used },
      { name: "series_start", value: est.trace.series_start },
      { name: "series_end", value: est.trace.series_end },
    ],
    computations,
    result: {
      mean: est.mean,
      std: est.std,
      p10: first?.p10 ?? null,
      p50: first?.p50 ?? null,
      p90: first?.p90 ?? null,
      horizon_days: est.predictions.length,
    },
    notes: [...est.notes],
  };
}
