import { readFileSync } from "node:fs";
import { parseSalesCsv } from "../packages/history/src/index.js";
import { explainLines, runPipeline, parseForecastRequest } from "../packages/pipeline/src/index.js";
import type { ExplainTree } from "../packages/pipeline/src/index.js";

const history = parseSalesCsv(readFileSync("examples/sales/sales_history.csv", "utf-8"));
const base = parseForecastRequest({ sku_id: "SKU2", site_id: "STORE1", forecast_horizon: 7 });

const result = runPipeline(
  history,
  { ...base, lead_time_mean: 5, lead_time_std: 1.5, target_csl: 0.9, net_available: 4 },
  { explain: true }
);

function print(t: ExplainTree) {
  console.log(`[${t.stage}] ${t.subject}`);
  for (const l of explainLines(t)) console.log(`  ${l.kind.padEnd(7)} ${l.text}`);
  console.log("");
}

if (result.explain) {
  print(result.explain.forecast);
  print(result.explain.policy);
  print(result.explain.replenishment);
}
