import { estimateDemand } from "../../forecast/src/estimate.js";
import type { ForecastPoint } from "../../forecast/src/estimate.js";
import { computeInventoryPolicy } from "../../policy/src/inventory-policy.js";
import type { InventoryPolicy } from "../../policy/src/inventory-policy.js";
import { decideReplenishment } from "../../replenish/src/order-up-to.js";
import { explainDemandEstimate } from "../../explain/src/explain-forecast-tree.js";
import { explainInventoryPolicy } from "../../explain/src/explain-policy-tree.js";
import { explainReplenishment } from "../../explain/src/explain-replenish-tree.js";
import type { ExplainTree } from "../../explain/src/tree.js";
import { DEFAULT_Z_TABLE } from "../../numeric/src/z-table.js";
import type { ZTable } from "../../numeric/src/z-table.js";
import type { SalesRecord } from "../../history/src/schema.js";
import type { SalesHistorySource } from "../../history/src/source.js";
import type { PipelineRequest } from "./request.js";

export type PipelineLogger = {
  debug(msg: string): void;
};

export type PipelineOptions = {
  explain?: boolean;
  z_table?: ZTable;
  logger?: PipelineLogger;
};

export type ForecastResult = {
  sku_id: string;
  site_id: string;
  mean_demand_per_day: number;
  std_demand_per_day: number;
  predictions: ForecastPoint[];
  notes: string[];
};

export type PipelineResult = {
  forecast: ForecastResult;
  policy: InventoryPolicy;
  replenishment: { order_quantity: number };
  explain?: {
    forecast: ExplainTree;
    policy: ExplainTree;
    replenishment: ExplainTree;
  };
};

/**
 * forecast -> inventory policy -> replenishment, in process.
 * The request must already be validated (validatePipelineRequest).
 */
export function runPipeline(
  history: readonly SalesRecord[],
  req: PipelineRequest,
  opts: PipelineOptions = {}
): PipelineResult {
  const zTable = opts.z_table ?? DEFAULT_Z_TABLE;
  const log = opts.logger;

  const params = {
    sku_id: req.sku_id,
    site_id: req.site_id,
    window_days: req.history_window,
    horizon_days: req.forecast_horizon,
  };
  const est = estimateDemand(history, params);
  log?.debug(
    `forecast ${req.sku_id}@${req.site_id}: records=${est.trace.records_used} mean=${est.mean} std=${est.std}`
  );

  const policyInput = {
    mean_demand_per_day: est.mean,
    std_demand_per_day: est.std,
    lead_time_mean: req.lead_time_mean,
    lead_time_std: req.lead_time_std,
    target_csl: req.target_csl,
  };
  const policy = computeInventoryPolicy(policyInput, zTable);
  log?.debug(`policy: reorder_point=${policy.reorder_point} base_stock=${policy.base_stock}`);

  const position = {
    net_available: req.net_available,
    reorder_point: policy.reorder_point,
    base_stock: policy.base_stock,
  };
  const decision = decideReplenishment(position);
  log?.debug(`replenish: net_available=${req.net_available} order_quantity=${decision.order_quantity}`);

  const out: PipelineResult = {
    forecast: {
      sku_id: req.sku_id,
      site_id: req.site_id,
      mean_demand_per_day: est.mean,
      std_demand_per_day: est.std,
      predictions: est.predictions,
      notes: est.notes,
    },
    policy,
    replenishment: { order_quantity: decision.order_quantity },
  };

  if (opts.explain) {
    out.explain = {
      forecast: explainDemandEstimate(params, est),
      policy: explainInventoryPolicy(policyInput, policy, zTable),
      replenishment: explainReplenishment(position, decision),
    };
  }

  return out;
}

export async function runPipelineFromSource(
  source: SalesHistorySource,
  req: PipelineRequest,
  opts: PipelineOptions = {}
): Promise<PipelineResult> {
  const history = await source.listSales(req.sku_id, req.site_id);
  opts.logger?.debug(`loaded ${history.length} sales records for ${req.sku_id}@${req.site_id}`);
  return runPipeline(history, req, opts);
}
