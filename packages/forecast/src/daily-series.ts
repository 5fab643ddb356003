import { addDays, toCalendarDate } from "../../history/src/dates.js";
import type { DailyDemandPoint, SalesRecord } from "../../history/src/schema.js";

/**
 * Aggregate raw sales records into a dense daily series.
 *
 * Quantities are summed per calendar day; the series runs from the first to
 * the last recorded day inclusive, and days without sales carry qty 0.
 * Records whose date does not parse are skipped.
 */
export function buildDailySeries(records: readonly SalesRecord[]): DailyDemandPoint[] {
  const byDay = new Map<string, number>();

  for (const r of records) {
    const day = toCalendarDate(r.date);
    if (!day) continue;
    byDay.set(day, (byDay.get(day) ?? 0) + r.qty);
  }

  if (byDay.size === 0) return [];

  const days = [...byDay.keys()].sort();
  const first = days[0];
  const last = days[days.length - 1];
  if (first === undefined || last === undefined) return [];

  const out: DailyDemandPoint[] = [];
  for (let day = first; day <= last; day = addDays(day, 1)) {
    out.push({ date: day, qty: byDay.get(day) ?? 0 });
  }
  return out;
}
