import { currentRevenue } from "../../business/schema";
import { safeDivide } from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { band } from "../rules";
import type { MarketCategory, MarketPosition } from "../types";

// Saturates at both ends: ratios beyond the outer breakpoints are not extrapolated.
export const PERCENTILE_BANDS: ReadonlyArray<readonly [number, number]> = [
  [1.5, 95],
  [1.3, 85],
  [1.1, 70],
  [0.9, 50],
  [0.7, 30],
  [0.5, 15],
];
export const PERCENTILE_FLOOR = 5;

export const MARKET_CATEGORY_BANDS: ReadonlyArray<readonly [number, MarketCategory]> = [
  [1.5, "top_performer"],
  [1.2, "above_average"],
  [0.8, "average"],
  [0.6, "below_average"],
];

const CATEGORY_MESSAGES: Record<MarketCategory, string> = {
  top_performer: "Revenue is well ahead of comparable businesses in this area.",
  above_average: "Revenue is ahead of most comparable businesses in this area.",
  average: "Revenue is in line with comparable businesses in this area.",
  below_average: "Revenue trails comparable businesses in this area.",
  underperforming: "Revenue is far below comparable businesses in this area.",
};

export function percentileFromRatio(ratio: number) {
  return band(ratio, PERCENTILE_BANDS, PERCENTILE_FLOOR);
}

export function marketCategory(ratio: number): MarketCategory {
  return band(ratio, MARKET_CATEGORY_BANDS, "underperforming");
}

export function computeMarketPosition(ctx: StageContext): MarketPosition {
  const { snapshot, reference, month } = ctx;
  const benchmark = reference.resolveBenchmark(snapshot.sector, snapshot.location, month);
  const revenue = currentRevenue(snapshot);
  const ratio = safeDivide(revenue, benchmark.market_average_revenue);
  const category = marketCategory(ratio);

  return {
    sector: benchmark.sector,
    location: benchmark.location,
    market_average_revenue: benchmark.market_average_revenue,
    sector_base_revenue: benchmark.base_revenue,
    typical_profit_margin: benchmark.typical_profit_margin,
    location_multiplier: benchmark.location_multiplier,
    seasonal_factor: benchmark.seasonal_factor,
    competition_level: benchmark.competition_level,
    performance_ratio: ratio,
    percentile_rank: percentileFromRatio(ratio),
    performance_category: category,
    revenue_gap: Math.max(0, benchmark.market_average_revenue - revenue),
    benchmark_fallback: benchmark.fallback.sector || benchmark.fallback.location || benchmark.fallback.month,
    performance_message: CATEGORY_MESSAGES[category],
  };
}
