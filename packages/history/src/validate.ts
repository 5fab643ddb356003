import { z } from "zod";
import { toCalendarDate } from "./dates.js";
import type { SalesRecord } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const CalendarDateString = z
  .string()
  .refine((v) => toCalendarDate(v) !== null, "Invalid calendar date");

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

// CSV cells arrive as strings
const CoercedQuantity = z.coerce
  .number()
  .refine(Number.isFinite, "Quantity must be a finite number");

/* ------------------------------------------------------------------ */
/*                             Sales records                          */
/* ------------------------------------------------------------------ */

export const SalesRecordSchema = z.object({
  date: CalendarDateString,
  sku_id: z.string(),
  site_id: z.string(),
  qty: CoercedQuantity,
});

export const SalesHistorySchema = z.array(SalesRecordSchema);

export type ParsedSalesRecord = z.infer<typeof SalesRecordSchema>;

export function parseSalesHistory(input: unknown): SalesRecord[] {
  return SalesHistorySchema.parse(input);
}

/* ------------------------------------------------------------------ */
/*                         Stage request models                       */
/* ------------------------------------------------------------------ */

export const DEFAULT_HISTORY_WINDOW = 28;
export const DEFAULT_FORECAST_HORIZON = 14;

export const ForecastRequestSchema = z.object({
  sku_id: z.string(),
  site_id: z.string(),
  history_window: z.number().int().min(1).default(DEFAULT_HISTORY_WINDOW),
  forecast_horizon: z.number().int().min(1).default(DEFAULT_FORECAST_HORIZON),
});

export const PolicyRequestSchema = z.object({
  mean_demand_per_day: FiniteNumber.min(0),
  std_demand_per_day: FiniteNumber.min(0),
  lead_time_mean: FiniteNumber.gt(0),
  lead_time_std: FiniteNumber.min(0),
  target_csl: FiniteNumber.gt(0).lt(1),
});

export const ReplenishRequestSchema = z.object({
  net_available: FiniteNumber,
  reorder_point: FiniteNumber.min(0),
  base_stock: FiniteNumber.min(0),
});

export type ForecastRequest = z.infer<typeof ForecastRequestSchema>;
export type PolicyRequest = z.infer<typeof PolicyRequestSchema>;
export type ReplenishRequest = z.infer<typeof ReplenishRequestSchema>;

export function parseForecastRequest(input: unknown): ForecastRequest {
  return ForecastRequestSchema.parse(input);
}

export function parsePolicyRequest(input: unknown): PolicyRequest {
  return PolicyRequestSchema.parse(input);
}

export function parseReplenishRequest(input: unknown): ReplenishRequest {
  return ReplenishRequestSchema.parse(input);
}
