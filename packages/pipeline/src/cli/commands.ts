// packages/pipeline/src/cli/commands.ts
import { readFileSync } from "node:fs";
import * as path from "node:path";
import { z } from "zod";

import { zTableFromRecord } from "../../../numeric/src/z-table.js";
import type { ZTable } from "../../../numeric/src/z-table.js";
import { loadSalesCsv } from "../../../history/src/csv.js";
import { InMemorySalesHistorySource } from "../../../history/src/in-memory-source.js";
import { SqliteSalesHistorySource } from "../../../history/src/sqlite-source.js";
import type { SalesHistorySource } from "../../../history/src/source.js";
import {
  ForecastRequestSchema,
  PolicyRequestSchema,
  ReplenishRequestSchema,
} from "../../../history/src/validate.js";
import { estimateDemand } from "../../../forecast/src/estimate.js";
import { computeInventoryPolicy } from "../../../policy/src/inventory-policy.js";
import { decideReplenishment } from "../../../replenish/src/order-up-to.js";
import { explainDemandEstimate } from "../../../explain/src/explain-forecast-tree.js";
import { explainInventoryPolicy } from "../../../explain/src/explain-policy-tree.js";
import { explainReplenishment } from "../../../explain/src/explain-replenish-tree.js";
import { explainLines } from "../../../explain/src/explain-lines.js";
import type { ExplainTree } from "../../../explain/src/tree.js";
import { validatePipelineRequest } from "../request.js";
import { runPipelineFromSource } from "../run.js";

export const CLI_VERSION = "stockplan cli v1";

export type CliIO = {
  out(s: string): void;
  err(s: string): void;
};

export const processIO: CliIO = {
  out: (s) => process.stdout.write(s),
  err: (s) => process.stderr.write(s),
};

export function usage(): string {
  return `stockplan - demand forecast, inventory policy and replenishment

Usage:
  stockplan --help
  stockplan version

  stockplan forecast --csv <file> --sku <id> --site <id> [--window N] [--horizon N] [--explain] [--text]
  stockplan policy --mean <x> --std <x> --lt-mean <x> --lt-std <x> --csl <x> [--z-table <json>] [--explain] [--text]
  stockplan replenish --net <x> --rop <x> --base <x> [--explain] [--text]
  stockplan run (--csv <file> | --db <file> [--table <name>]) --sku <id> --site <id>
                --lt-mean <x> --lt-std <x> --csl <x> --net <x>
                [--window N] [--horizon N] [--z-table <json>] [--explain] [--text] [--verbose]

  --z-table reads a JSON object of service level -> z, e.g. { "0.95": 1.6448536 }

Examples:
  stockplan forecast --csv sales_history.csv --sku SKU1 --site STORE1
  stockplan policy --mean 10 --std 2 --lt-mean 7 --lt-std 1 --csl 0.95 --explain
  stockplan run --csv sales_history.csv --sku SKU1 --site STORE1 --lt-mean 7 --lt-std 2 --csl 0.95 --net 500
`;
}

// -------------------- arg helpers --------------------

function getFlagValue(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i < 0) return undefined;
  const v = args[i + 1];
  return typeof v === "string" && !v.startsWith("--") ? v : undefined;
}

// missing -> undefined, garbage -> NaN; both are rejected by the schemas
function getNumberFlag(args: string[], name: string): number | undefined {
  const v = getFlagValue(args, name);
  return v === undefined ? undefined : Number(v);
}

// { "0.95": 1.64, ... }
const ZTableFileSchema = z.record(z.string(), z.number());

function loadZTable(args: string[]): ZTable | undefined {
  if (!args.includes("--z-table")) return undefined;
  const file = getFlagValue(args, "--z-table");
  if (!file) throw new Error("Missing value for --z-table <json>");

  const raw: unknown = JSON.parse(readFileSync(path.resolve(process.cwd(), file), "utf8"));
  const parsed = ZTableFileSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid z table in ${file}: expected an object of numbers`);
  return zTableFromRecord(parsed.data);
}

function writeJsonPretty(io: CliIO, obj: unknown): void {
  io.out(JSON.stringify(obj, null, 2) + "\n");
}

function writeTrees(io: CliIO, trees: ExplainTree[]): void {
  for (const t of trees) {
    io.out(`[${t.stage}] ${t.subject}\n`);
    for (const l of explainLines(t)) io.out(`  ${l.kind.padEnd(7)} ${l.text}\n`);
  }
}

function reportIssues(io: CliIO, issues: Array<{ path: string; message: string }>): number {
  io.err("[stockplan] invalid request:\n");
  for (const i of issues) io.err(`[stockplan]   ${i.path}: ${i.message}\n`);
  return 1;
}

function zodIssues(issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>) {
  return issues.map((i) => ({ path: "/" + i.path.map(String).join("/"), message: i.message }));
}

function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// -------------------- commands --------------------

function cmdForecast(args: string[], io: CliIO): number {
  const csv = getFlagValue(args, "--csv");
  if (!csv) {
    io.err("[stockplan] Missing --csv <file>\n");
    return 1;
  }

  const req = ForecastRequestSchema.safeParse({
    sku_id: getFlagValue(args, "--sku"),
    site_id: getFlagValue(args, "--site"),
    history_window: getNumberFlag(args, "--window"),
    forecast_horizon: getNumberFlag(args, "--horizon"),
  });
  if (!req.success) return reportIssues(io, zodIssues(req.error.issues));

  const history = loadSalesCsv(csv);
  const params = {
    sku_id: req.data.sku_id,
    site_id: req.data.site_id,
    window_days: req.data.history_window,
    horizon_days: req.data.forecast_horizon,
  };
  const est = estimateDemand(history, params);

  if (args.includes("--explain") && args.includes("--text")) {
    writeTrees(io, [explainDemandEstimate(params, est)]);
    return 0;
  }

  writeJsonPretty(io, {
    sku_id: params.sku_id,
    site_id: params.site_id,
    mean_demand_per_day: est.mean,
    std_demand_per_day: est.std,
    predictions: est.predictions,
    notes: est.notes,
    ...(args.includes("--explain") ? { explain: explainDemandEstimate(params, est) } : {}),
  });
  return 0;
}

function cmdPolicy(args: string[], io: CliIO): number {
  const req = PolicyRequestSchema.safeParse({
    mean_demand_per_day: getNumberFlag(args, "--mean"),
    std_demand_per_day: getNumberFlag(args, "--std"),
    lead_time_mean: getNumberFlag(args, "--lt-mean"),
    lead_time_std: getNumberFlag(args, "--lt-std"),
    target_csl: getNumberFlag(args, "--csl"),
  });
  if (!req.success) return reportIssues(io, zodIssues(req.error.issues));

  const zTable = loadZTable(args);
  const policy = computeInventoryPolicy(req.data, zTable);

  if (args.includes("--explain") && args.includes("--text")) {
    writeTrees(io, [explainInventoryPolicy(req.data, policy, zTable)]);
    return 0;
  }

  writeJsonPretty(io, {
    ...policy,
    ...(args.includes("--explain") ? { explain: explainInventoryPolicy(req.data, policy, zTable) } : {}),
  });
  return 0;
}

function cmdReplenish(args: string[], io: CliIO): number {
  const req = ReplenishRequestSchema.safeParse({
    net_available: getNumberFlag(args, "--net"),
    reorder_point: getNumberFlag(args, "--rop"),
    base_stock: getNumberFlag(args, "--base"),
  });
  if (!req.success) return reportIssues(io, zodIssues(req.error.issues));

  const decision = decideReplenishment(req.data);

  if (args.includes("--explain") && args.includes("--text")) {
    writeTrees(io, [explainReplenishment(req.data, decision)]);
    return 0;
  }

  writeJsonPretty(io, {
    order_quantity: decision.order_quantity,
    ...(args.includes("--explain") ? { explain: explainReplenishment(req.data, decision) } : {}),
  });
  return 0;
}

async function cmdRun(args: string[], io: CliIO): Promise<number> {
  const csv = getFlagValue(args, "--csv");
  const db = getFlagValue(args, "--db");
  if (csv && db) {
    io.err("[stockplan] Use either --csv <file> or --db <file>, not both\n");
    return 1;
  }

  const v = validatePipelineRequest({
    sku_id: getFlagValue(args, "--sku"),
    site_id: getFlagValue(args, "--site"),
    history_window: getNumberFlag(args, "--window"),
    forecast_horizon: getNumberFlag(args, "--horizon"),
    lead_time_mean: getNumberFlag(args, "--lt-mean"),
    lead_time_std: getNumberFlag(args, "--lt-std"),
    target_csl: getNumberFlag(args, "--csl"),
    net_available: getNumberFlag(args, "--net"),
  });
  if (!v.ok) return reportIssues(io, v.violations);

  const z_table = loadZTable(args);
  const verbose = args.includes("--verbose");
  const explain = args.includes("--explain");
  const logger = verbose ? { debug: (msg: string) => io.err(`[stockplan] ${msg}\n`) } : undefined;

  let source: SalesHistorySource;
  let close = () => {};
  if (csv) {
    source = new InMemorySalesHistorySource(loadSalesCsv(csv));
  } else if (db) {
    const table = getFlagValue(args, "--table");
    const sqlite = new SqliteSalesHistorySource(db, table ? { table } : {});
    source = sqlite;
    close = () => sqlite.close();
  } else {
    io.err("[stockplan] Missing --csv <file> or --db <file>\n");
    return 1;
  }

  try {
    const result = await runPipelineFromSource(source, v.request, { explain, logger, z_table });

    if (explain && args.includes("--text") && result.explain) {
      writeTrees(io, [result.explain.forecast, result.explain.policy, result.explain.replenishment]);
      return 0;
    }
    writeJsonPretty(io, result);
    return 0;
  } finally {
    close();
  }
}

/**
 * Dispatch one CLI invocation. Returns the process exit code; never calls
 * process.exit so it can run in tests.
 */
export async function runCli(args: string[], io: CliIO = processIO): Promise<number> {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const cmd = args[0];
  const rest = args.slice(1);

  try {
    switch (cmd) {
      case "version":
        io.out(CLI_VERSION + "\n");
        return 0;
      case "forecast":
        return cmdForecast(rest, io);
      case "policy":
        return cmdPolicy(rest, io);
      case "replenish":
        return cmdReplenish(rest, io);
      case "run":
        return await cmdRun(rest, io);
      default:
        io.err(`[stockplan] Unknown command: ${cmd}\n\n`);
        io.err(usage());
        return 1;
    }
  } catch (e) {
    io.err(`[stockplan] ${errMessage(e)}\n`);
    return 1;
  }
}
