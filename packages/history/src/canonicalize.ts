import { toCalendarDate } from "./dates.js";
import type { SalesRecord } from "./schema.js";

/**
 * Canonicalize sales history for deterministic downstream computation.
 * - Reduces dates to YYYY-MM-DD
 * - Leaves sku/site ids exactly as given (matching is exact string equality;
 *   padded ids are reported by checkHistoryInvariants)
 * - Sorts by date, then sku_id, then site_id
 *
 * NOTE: Duplicate rows are kept; daily aggregation sums them.
 * Unparseable dates are left as-is for checkHistoryInvariants to report.
 */
export function canonicalizeSalesHistory(records: readonly SalesRecord[]): SalesRecord[] {
  return records
    .map((r) => ({
      date: toCalendarDate(r.date) ?? r.date,
      sku_id: r.sku_id,
      site_id: r.site_id,
      qty: r.qty,
    }))
    .sort(bySalesKey);
}

function bySalesKey(a: SalesRecord, b: SalesRecord): number {
  return (
    a.date.localeCompare(b.date) ||
    a.sku_id.localeCompare(b.sku_id) ||
    a.site_id.localeCompare(b.site_id)
  );
}
