import { readFileSync } from "node:fs";
import {
  parseSalesCsv,
  canonicalizeSalesHistory,
  checkHistoryInvariants,
} from "../packages/history/src/index.js";
import { runPipeline, validatePipelineRequest } from "../packages/pipeline/src/index.js";

const csvPath = process.argv[2] ?? "examples/sales/sales_history.csv";
const history = canonicalizeSalesHistory(parseSalesCsv(readFileSync(csvPath, "utf-8")));
const violations = checkHistoryInvariants(history);

const v = validatePipelineRequest({
  sku_id: process.argv[3] ?? "SKU1",
  site_id: process.argv[4] ?? "STORE1",
  lead_time_mean: 7,
  lead_time_std: 2,
  target_csl: 0.95,
  net_available: 60,
});

if (violations.length) {
  console.error("Sales history violations:");
  for (const x of violations) console.error(`- ${x.code} ${x.path}: ${x.message}`);
  process.exitCode = 1;
} else if (!v.ok) {
  console.error("Invalid request:");
  for (const x of v.violations) console.error(`- ${x.path}: ${x.message}`);
  process.exitCode = 1;
} else {
  const result = runPipeline(history, v.request, {
    logger: { debug: (msg) => console.error(`[stockplan] ${msg}`) },
  });
  console.log(JSON.stringify(result, null, 2));
}
