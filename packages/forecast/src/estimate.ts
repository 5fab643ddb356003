import { Z10, Z90 } from "../../numeric/src/z-table.js";
import { mean, populationStd } from "../../numeric/src/stats.js";
import type { DailyDemandPoint, SalesRecord } from "../../history/src/schema.js";
import { buildDailySeries } from "./daily-series.js";

export type EstimateParams = {
  sku_id: string;
  site_id: string;
  window_days: number; // >= 1
  horizon_days: number; // >= 1
};

export type ForecastPoint = {
  day: number; // 1-based offset into the horizon
  p10: number;
  p50: number;
  p90: number;
};

export type DemandStatistics = {
  mean: number;
  std: number;
  window_length: number;
};

export type DemandEstimate = {
  predictions: ForecastPoint[];
  mean: number;
  std: number;

  trace: {
    records_used: number;
    series_start: string | null;
    series_end: string | null;
    series_length: number;
    window_length: number;
  };

  notes: string[];
};

/**
 * Flat probabilistic demand forecast for one SKU at one site.
 *
 * The filtered history is aggregated to a daily series, mean and population
 * std are taken over the trailing `window_days`, and every horizon day gets
 * the same p10/p50/p90 under a normal assumption. No matching history yields
 * an all-zero forecast rather than an error.
 */
export function estimateDemand(history: readonly SalesRecord[], params: EstimateParams): DemandEstimate {
  const { sku_id, site_id, window_days, horizon_days } = params;

  const matching = history.filter((r) => r.sku_id === sku_id && r.site_id === site_id);

  if (matching.length === 0) {
    return {
      predictions: flatForecast(horizon_days, { p10: 0, p50: 0, p90: 0 }),
      mean: 0,
      std: 0,
      trace: {
        records_used: 0,
        series_start: null,
        series_end: null,
        series_length: 0,
        window_length: 0,
      },
      notes: [`NOTE: no sales history for sku '${sku_id}' at site '${site_id}'; forecast is zero.`],
    };
  }

  const series = buildDailySeries(matching);
  const stats = demandStatistics(series, window_days);
  const q = forecastQuantiles(stats.mean, stats.std);

  const notes: string[] = [];
  if (stats.window_length < window_days) {
    notes.push(`NOTE: history covers ${stats.window_length} of ${window_days} requested window days.`);
  }
  if (stats.std === 0) {
    notes.push("NOTE: zero demand variance in window; p10 = p50 = p90.");
  }

  return {
    predictions: flatForecast(horizon_days, q),
    mean: stats.mean,
    std: stats.std,
    trace: {
      records_used: matching.length,
      series_start: series[0]?.date ?? null,
      series_end: series[series.length - 1]?.date ?? null,
      series_length: series.length,
      window_length: stats.window_length,
    },
    notes,
  };
}

/** Mean and population std over the last `window_days` entries of the series. */
export function demandStatistics(series: readonly DailyDemandPoint[], window_days: number): DemandStatistics {
  const take = Math.max(0, Math.min(Math.floor(window_days), series.length));
  const window = take > 0 ? series.slice(series.length - take).map((p) => p.qty) : [];

  return {
    mean: mean(window),
    std: populationStd(window),
    window_length: window.length,
  };
}

export function forecastQuantiles(mean: number, std: number): Omit<ForecastPoint, "day"> {
  if (std > 0) {
    return {
      p10: Math.max(0, mean + Z10 * std),
      p50: mean,
      p90: Math.max(0, mean + Z90 * std),
    };
  }
  // degenerate distribution
  return { p10: mean, p50: mean, p90: mean };
}

function flatForecast(horizon_days: number, q: Omit<ForecastPoint, "day">): ForecastPoint[] {
  const n = Math.max(0, Math.floor(horizon_days));
  return Array.from({ length: n }, (_, i) => ({ day: i + 1, ...q }));
}
