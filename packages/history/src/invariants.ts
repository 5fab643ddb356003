import { toCalendarDate } from "./dates.js";
import type { SalesRecord } from "./schema.js";

export type HistoryViolationCode =
  | "EMPTY_ID"
  | "UNTRIMMED_ID"
  | "INVALID_DATE"
  | "NEGATIVE_QUANTITY"
  | "NON_FINITE_QUANTITY";

export type HistoryViolation = {
  code: HistoryViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

export function checkHistoryInvariants(records: readonly SalesRecord[]): HistoryViolation[] {
  const v: HistoryViolation[] = [];

  records.forEach((r, i) => {
    for (const field of ["sku_id", "site_id"] as const) {
      const id = r[field];
      if (id.trim() === "") {
        v.push({ code: "EMPTY_ID", message: `Sales record has an empty ${field}`, path: `/${i}/${field}` });
      } else if (id.trim() !== id) {
        // ids match exactly, so " SKU1" never matches "SKU1"
        v.push({
          code: "UNTRIMMED_ID",
          message: `Sales record ${field} '${id}' has leading or trailing whitespace`,
          path: `/${i}/${field}`,
        });
      }
    }

    if (toCalendarDate(r.date) === null) {
      v.push({
        code: "INVALID_DATE",
        message: `Sales record date '${r.date}' is not a calendar date`,
        path: `/${i}/date`,
      });
    }

    if (!Number.isFinite(r.qty)) {
      v.push({
        code: "NON_FINITE_QUANTITY",
        message: `Sales record qty must be finite, got ${r.qty}`,
        path: `/${i}/qty`,
      });
    } else if (r.qty < 0) {
      // returns net against sales in the daily sum; flagged, not rejected
      v.push({
        code: "NEGATIVE_QUANTITY",
        message: `Sales record qty is negative (${r.qty})`,
        path: `/${i}/qty`,
      });
    }
  });

  return v;
}
