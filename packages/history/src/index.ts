export type { CalendarDate, SalesRecord, SalesHistory, DailyDemandPoint } from "./schema.js";

export {
  SalesRecordSchema,
  SalesHistorySchema,
  ForecastRequestSchema,
  PolicyRequestSchema,
  ReplenishRequestSchema,
  DEFAULT_HISTORY_WINDOW,
  DEFAULT_FORECAST_HORIZON,
  parseSalesHistory,
  parseForecastRequest,
  parsePolicyRequest,
  parseReplenishRequest,
} from "./validate.js";
export type { ParsedSalesRecord, ForecastRequest, PolicyRequest, ReplenishRequest } from "./validate.js";

export { toCalendarDate, addDays, dayToUtcMs, formatUtcDay } from "./dates.js";
export { canonicalizeSalesHistory } from "./canonicalize.js";
export { checkHistoryInvariants } from "./invariants.js";
export type { HistoryViolation, HistoryViolationCode } from "./invariants.js";

export { parseSalesCsv, loadSalesCsv } from "./csv.js";

export type { SalesHistorySource } from "./source.js";
export { InMemorySalesHistorySource } from "./in-memory-source.js";
export { SqliteSalesHistorySource } from "./sqlite-source.js";
export type { SqliteSalesHistoryOptions } from "./sqlite-source.js";
