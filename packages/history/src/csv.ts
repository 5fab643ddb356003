import { readFileSync } from "node:fs";
import * as path from "node:path";
import Papa from "papaparse";

import { SalesHistorySchema } from "./validate.js";
import type { SalesRecord } from "./schema.js";

const REQUIRED_COLUMNS = ["date", "sku_id", "site_id"] as const;
// "quantity" is accepted as an alias of "qty"
const QTY_COLUMNS = ["qty", "quantity"] as const;

/**
 * Parse sales history CSV text. The header must name `date`, `sku_id`,
 * `site_id` and `qty` (or `quantity`); other columns are ignored.
 * Throws on malformed CSV or rows that fail SalesRecordSchema.
 */
export function parseSalesCsv(text: string): SalesRecord[] {
  const res = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  if (res.errors.length) {
    const first = res.errors[0];
    const where = first?.row != null ? ` (row ${first.row + 1})` : "";
    throw new Error(`Sales CSV could not be parsed${where}: ${first?.message ?? "unknown error"}`);
  }

  const fields = res.meta.fields ?? [];
  const missing: string[] = REQUIRED_COLUMNS.filter((c) => !fields.includes(c));
  const qtyColumn = QTY_COLUMNS.find((c) => fields.includes(c));
  if (!qtyColumn) missing.push("qty");
  if (missing.length || !qtyColumn) {
    throw new Error(`Sales CSV is missing column(s): ${missing.join(", ")}`);
  }

  const rows = res.data.map((row) => ({
    date: row.date,
    sku_id: row.sku_id,
    site_id: row.site_id,
    qty: row[qtyColumn],
  }));

  return SalesHistorySchema.parse(rows);
}

export function loadSalesCsv(filePath: string): SalesRecord[] {
  const abs = path.resolve(process.cwd(), filePath);
  return parseSalesCsv(readFileSync(abs, "utf8"));
}
