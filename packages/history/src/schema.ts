// Sales history model
// Types only. No functions.

export type CalendarDate = string; // YYYY-MM-DD

export interface SalesRecord {
  date: CalendarDate;
  sku_id: string;
  site_id: string;
  qty: number;
}

export type SalesHistory = readonly SalesRecord[];

export interface DailyDemandPoint {
  date: CalendarDate;
  qty: number;
}
