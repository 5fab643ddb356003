export { buildDailySeries } from "./daily-series.js";
export { estimateDemand, demandStatistics, forecastQuantiles } from "./estimate.js";
export type { EstimateParams, ForecastPoint, DemandStatistics, DemandEstimate } from "./estimate.js";
