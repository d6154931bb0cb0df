import { clampScore, safeDivide } from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { band } from "../rules";
import type {
  CompetitiveAnalysis,
  CompetitivePositionLabel,
  CompetitiveStrength,
  CompetitiveWeakness,
  IntensityLabel,
  MarketPosition,
  PerformanceMetrics,
  SizeCategory,
} from "../types";

export const SIZE_BANDS: ReadonlyArray<readonly [number, SizeCategory]> = [
  [2, "large"],
  [1, "medium"],
  [0.5, "small"],
];

export const INTENSITY_BANDS: ReadonlyArray<readonly [number, IntensityLabel]> = [
  [0.8, "high"],
  [0.6, "moderate"],
];

export const POSITION_BANDS: ReadonlyArray<readonly [number, CompetitivePositionLabel]> = [
  [70, "leader"],
  [50, "challenger"],
  [30, "follower"],
];

export function computeCompetitivePosition(
  ctx: StageContext,
  performance: PerformanceMetrics,
  market: MarketPosition
): CompetitiveAnalysis {
  const { snapshot, reference } = ctx;
  const sector = reference.sector(snapshot.sector).reference;

  const productivityRatio = safeDivide(performance.revenue_per_employee, sector.productivity);
  const revenueMultiple = market.performance_ratio;
  const intensity = sector.competition_intensity;

  const strengths: CompetitiveStrength[] = [];
  if (productivityRatio >= 1.2) strengths.push("high_productivity");
  if (revenueMultiple >= 1.2) strengths.push("strong_market_share");
  if (performance.profit_margin >= sector.typical_profit_margin) strengths.push("margin_advantage");
  if (snapshot.years_in_business >= 5) strengths.push("established_presence");

  const weaknesses: CompetitiveWeakness[] = [];
  if (productivityRatio < 0.8) weaknesses.push("low_productivity");
  if (revenueMultiple < 0.8) weaknesses.push("below_market_scale");
  if (performance.profit_margin < sector.typical_profit_margin) weaknesses.push("margin_disadvantage");
  if (snapshot.years_in_business < 2) weaknesses.push("limited_track_record");

  const score = clampScore(
    50 + (productivityRatio - 1) * 25 + (revenueMultiple - 1) * 25 - (intensity - 0.5) * 20
  );

  return {
    benchmark_productivity: sector.productivity,
    productivity_ratio: productivityRatio,
    revenue_multiple: revenueMultiple,
    size_category: band(revenueMultiple, SIZE_BANDS, "micro"),
    competitive_intensity: intensity,
    intensity_label: band(intensity, INTENSITY_BANDS, "low"),
    competitive_threats: [...sector.common_challenges],
    competitive_strengths: strengths,
    competitive_weaknesses: weaknesses,
    competitive_position_score: score,
    position: band(score, POSITION_BANDS, "laggard"),
  };
}
