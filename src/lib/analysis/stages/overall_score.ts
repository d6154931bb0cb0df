import { clampScore } from "../../metrics/calculations";
import { band } from "../rules";
import type {
  FinancialHealth,
  Grade,
  GrowthAnalysis,
  MarketPosition,
  OverallScore,
  OverallStatus,
  PerformanceMetrics,
  RiskAssessment,
} from "../types";

export const OVERALL_WEIGHTS = {
  efficiency: 0.3,
  market: 0.25,
  health: 0.2,
  growth: 0.15,
  risk: 0.1,
} as const;

export const GRADE_BANDS: ReadonlyArray<readonly [number, Grade]> = [
  [80, "A"],
  [70, "B"],
  [60, "C"],
  [50, "D"],
];

const GRADE_STATUS: Record<Grade, OverallStatus> = {
  A: "excellent",
  B: "good",
  C: "fair",
  D: "needs_improvement",
  F: "poor",
};

export function gradeFor(score: number): Grade {
  return band(score, GRADE_BANDS, "F");
}

export function computeOverallScore(
  performance: PerformanceMetrics,
  market: MarketPosition,
  health: FinancialHealth,
  growth: GrowthAnalysis,
  risk: RiskAssessment
): OverallScore {
  const contributions = {
    efficiency: clampScore(performance.financial_efficiency_score) * OVERALL_WEIGHTS.efficiency,
    market: clampScore(market.percentile_rank) * OVERALL_WEIGHTS.market,
    health: clampScore(health.score) * OVERALL_WEIGHTS.health,
    growth: clampScore(growth.growth_score) * OVERALL_WEIGHTS.growth,
    // low risk scores well
    risk: (100 - clampScore(risk.overall_risk_score)) * OVERALL_WEIGHTS.risk,
  };

  const score = clampScore(
    contributions.efficiency + contributions.market + contributions.health + contributions.growth + contributions.risk
  );
  const grade = gradeFor(score);

  return {
    overall_score: score,
    grade,
    status: GRADE_STATUS[grade],
    efficiency_contribution: contributions.efficiency,
    market_contribution: contributions.market,
    health_contribution: contributions.health,
    growth_contribution: contributions.growth,
    risk_contribution: contributions.risk,
  };
}
