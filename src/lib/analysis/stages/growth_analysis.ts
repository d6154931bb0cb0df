import {
  averagePeriodGrowth,
  clamp,
  clampScore,
  mean,
  populationStdDev,
  safeDivide,
} from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { band, classify } from "../rules";
import type {
  EconomicImpact,
  FinancialHealth,
  GrowthAnalysis,
  GrowthBarrier,
  GrowthDriver,
  GrowthOutlook,
  GrowthStrategy,
  MarketPosition,
  MaturityStage,
  PerformanceMetrics,
  ReadinessLevel,
} from "../types";

export const GROWTH_BASELINE = 50;

export const MATURITY_MULTIPLIERS: Record<MaturityStage, number> = {
  startup: 1.5,
  growth: 1.2,
  mature: 1.0,
  established: 0.8,
};

export function maturityStage(years: number): MaturityStage {
  return classify<number, MaturityStage>(
    [
      { when: (y) => y < 2, result: "startup" },
      { when: (y) => y < 5, result: "growth" },
      { when: (y) => y < 10, result: "mature" },
    ],
    years,
    "established"
  );
}

export const GROWTH_OUTLOOK_BANDS: ReadonlyArray<readonly [number, GrowthOutlook]> = [
  [70, "strong"],
  [50, "moderate"],
  [30, "limited"],
];

export const READINESS_BANDS: ReadonlyArray<readonly [number, ReadinessLevel]> = [
  [0.8, "highly_ready"],
  [0.6, "ready"],
  [0.4, "cautiously_ready"],
];

function growthStrategy(score: number): GrowthStrategy {
  return classify<number, GrowthStrategy>(
    [
      { when: (s) => s > 80, result: "aggressive_growth" },
      { when: (s) => s > 60, result: "steady_growth" },
    ],
    score,
    "consolidation"
  );
}

export const READINESS_MIN_SERIES = 3;

/**
 * Expansion readiness on a 0-1 scale from cash cover, momentum, stability and
 * tenure. Works from the raw snapshot figures: no expenses gives no cash
 * cover, and series shorter than three months count as flat and half stable.
 */
export function expansionReadiness(input: {
  revenue: readonly number[];
  current_cash: number;
  monthly_expenses: number;
  years_in_business: number;
}) {
  const { revenue } = input;
  const shortSeries = revenue.length < READINESS_MIN_SERIES;
  const runway = input.monthly_expenses > 0 ? input.current_cash / input.monthly_expenses : 0;
  const trend = shortSeries ? 0 : averagePeriodGrowth(revenue);
  const average = mean(revenue);
  const stability = shortSeries
    ? 0.5
    : average === 0
      ? 0
      : Math.max(0, 1 - populationStdDev(revenue) / average);

  const financial = Math.min(1, runway / 6);
  const momentum = clamp(trend * 2, 0, 1);
  const experience = Math.min(1, input.years_in_business / 3);

  const score = financial * 0.3 + momentum * 0.3 + stability * 0.2 + experience * 0.2;
  return { score, level: band(score, READINESS_BANDS, "not_ready") };
}

export function computeGrowthAnalysis(
  ctx: StageContext,
  performance: PerformanceMetrics,
  market: MarketPosition,
  health: FinancialHealth,
  economic: EconomicImpact
): GrowthAnalysis {
  const { snapshot, reference } = ctx;
  const sector = reference.sector(snapshot.sector).reference;

  const growthComponent = clamp(performance.revenue_growth_rate * 250, -25, 25);
  const scalabilityComponent = clamp(
    (safeDivide(performance.revenue_per_employee, reference.data.thresholds.scalability_reference) - 1) * 10,
    -10,
    10
  );
  const sectorComponent = clamp(sector.growth_rate * 50, 0, 15);
  const tailwind = clamp((economic.overall_score - 50) * 0.5, -20, 20);

  const stage = maturityStage(snapshot.years_in_business);
  const multiplier = MATURITY_MULTIPLIERS[stage];
  const score = clampScore(
    (GROWTH_BASELINE + growthComponent + scalabilityComponent + sectorComponent + tailwind) * multiplier
  );

  const drivers: GrowthDriver[] = [];
  if (market.performance_ratio > 1.1) drivers.push("strong_market_position");
  if (performance.revenue_growth_rate > 0.02) drivers.push("revenue_momentum");
  if (sector.growth_rate >= 0.1) drivers.push("sector_growth");
  if (tailwind > 0) drivers.push("economic_tailwinds");

  const barriers: GrowthBarrier[] = [];
  if (health.score < 60) barriers.push("financial_constraints");
  if (snapshot.current_cash < performance.monthly_expenses * 3) barriers.push("limited_cash_reserves");
  if (performance.revenue_trend === "declining") barriers.push("declining_revenue");
  if (tailwind < 0) barriers.push("economic_headwinds");

  const readiness = expansionReadiness({
    revenue: snapshot.monthly_revenue,
    current_cash: snapshot.current_cash,
    monthly_expenses: performance.monthly_expenses,
    years_in_business: snapshot.years_in_business,
  });

  return {
    growth_score: score,
    maturity_stage: stage,
    maturity_multiplier: multiplier,
    growth_component: growthComponent,
    scalability_component: scalabilityComponent,
    sector_component: sectorComponent,
    economic_tailwind: tailwind,
    growth_outlook: band(score, GROWTH_OUTLOOK_BANDS, "constrained"),
    recommended_strategy: growthStrategy(score),
    growth_drivers: drivers,
    growth_barriers: barriers,
    expansion_readiness_score: readiness.score,
    readiness_level: readiness.level,
  };
}
