/**
 * Performance analyzer: runs every stage in STAGE_ORDER over one snapshot.
 *
 * Stateless. The reference store is injected (or the default store is used)
 * and nothing is retained between calls.
 */

import { getDefaultReferenceStore, type ReferenceStore } from "../benchmarks/reference_store";
import type { EconomicIndicators } from "../benchmarks/types";
import { assertRequiredFields, type BusinessSnapshot, type EconomicSnapshot } from "../business/schema";
import type { StageContext } from "./contracts";
import { computeCompetitivePosition } from "./stages/competitive_position";
import { computeEconomicImpact } from "./stages/economic_impact";
import { computeFinancialHealth } from "./stages/financial_health";
import { computeGrowthAnalysis } from "./stages/growth_analysis";
import { computeMarketPosition } from "./stages/market_position";
import { computeOverallScore } from "./stages/overall_score";
import { computePerformanceMetrics } from "./stages/performance_metrics";
import { computeRiskAssessment } from "./stages/risk_assessment";
import type { AnalysisResult } from "./types";

export type AnalyzeOptions = {
  reference?: ReferenceStore;
  // picks the seasonal month (UTC); defaults to now
  asOf?: Date;
};

export function mergeIndicators(
  neutral: EconomicIndicators,
  economic: EconomicSnapshot | undefined
): EconomicIndicators | null {
  if (!economic) return null;
  return {
    policy_rate: economic.policy_rate ?? neutral.policy_rate,
    inflation_rate: economic.inflation_rate ?? neutral.inflation_rate,
    unemployment_rate: economic.unemployment_rate ?? neutral.unemployment_rate,
    gdp_growth: economic.gdp_growth ?? neutral.gdp_growth,
    consumer_confidence: economic.consumer_confidence ?? neutral.consumer_confidence,
  };
}

export function buildStageContext(
  snapshot: BusinessSnapshot,
  economic: EconomicSnapshot | undefined,
  options: AnalyzeOptions = {}
): StageContext {
  const reference = options.reference ?? getDefaultReferenceStore();
  const neutral = reference.neutralIndicators();
  return {
    snapshot,
    reference,
    economic: mergeIndicators(neutral, economic),
    supplied: economic ?? null,
    neutral,
    month: (options.asOf ?? new Date()).getUTCMonth() + 1,
  };
}

export function analyzeBusiness(
  snapshot: BusinessSnapshot,
  economic?: EconomicSnapshot,
  options: AnalyzeOptions = {}
): AnalysisResult {
  assertRequiredFields(snapshot);
  const ctx = buildStageContext(snapshot, economic, options);

  const performance = computePerformanceMetrics(ctx);
  const market = computeMarketPosition(ctx);
  const health = computeFinancialHealth(ctx, performance);
  const economicImpact = computeEconomicImpact(ctx);
  const growth = computeGrowthAnalysis(ctx, performance, market, health, economicImpact);
  const risk = computeRiskAssessment(ctx, performance, economicImpact);
  const competitive = computeCompetitivePosition(ctx, performance, market);
  const overall = computeOverallScore(performance, market, health, growth, risk);

  return {
    performance_metrics: performance,
    market_position: market,
    financial_health: health,
    growth_analysis: growth,
    risk_assessment: risk,
    economic_impact: economicImpact,
    competitive_analysis: competitive,
    overall_score: overall,
    metadata: {
      reference_version: ctx.reference.version,
      analysis_month: ctx.month,
      period_months: snapshot.monthly_revenue.length,
    },
  };
}
