/**
 * Analysis result shapes. Every sub-result is a flat record of numbers,
 * closed-set categories and closed-set tag lists.
 */

import type { CompetitionLevel, Location, Sector } from "../benchmarks/types";
import type { TrendDirection } from "../metrics/calculations";

export type PerformanceCategory = "excellent" | "good" | "fair" | "poor" | "critical";

export type PerformanceMetrics = {
  current_revenue: number;
  monthly_expenses: number;
  monthly_profit: number;
  revenue_growth_rate: number;
  average_monthly_growth: number;
  revenue_volatility: number;
  revenue_stability: number;
  revenue_trend: TrendDirection;
  profit_margin: number;
  revenue_per_employee: number;
  // capped at CASH_RUNWAY_CAP_MONTHS; the cap means "at least that long"
  cash_runway_months: number;
  financial_efficiency_score: number;
  margin_adjustment: number;
  productivity_adjustment: number;
  liquidity_adjustment: number;
  performance_category: PerformanceCategory;
};

export type MarketCategory =
  | "top_performer"
  | "above_average"
  | "average"
  | "below_average"
  | "underperforming";

export type MarketPosition = {
  sector: Sector;
  location: Location;
  market_average_revenue: number;
  sector_base_revenue: number;
  typical_profit_margin: number;
  location_multiplier: number;
  seasonal_factor: number;
  competition_level: CompetitionLevel;
  performance_ratio: number;
  percentile_rank: number;
  performance_category: MarketCategory;
  revenue_gap: number;
  benchmark_fallback: boolean;
  performance_message: string;
};

export type HealthStatus = "excellent" | "good" | "fair" | "poor" | "critical";

export type StressIndicator =
  | "negative_cash_flow"
  | "short_cash_runway"
  | "thin_margin"
  | "high_policy_rate"
  | "high_inflation";

export type FinancialStrength = "strong_profitability" | "healthy_cash_position" | "stable_revenue";
export type FinancialConcern = "low_profit_margin" | "cash_flow_constraints" | "revenue_volatility";

export type FinancialHealth = {
  score: number;
  status: HealthStatus;
  description: string;
  monthly_cash_flow: number;
  cash_runway_months: number;
  liquidity_adjustment: number;
  profitability_adjustment: number;
  margin_adjustment: number;
  policy_rate_adjustment: number;
  inflation_adjustment: number;
  stress_indicators: StressIndicator[];
  key_strengths: FinancialStrength[];
  key_concerns: FinancialConcern[];
};

export type EconomicEnvironment =
  | "strong_headwinds"
  | "moderate_headwinds"
  | "neutral"
  | "moderate_tailwinds"
  | "strong_tailwinds";

export type EconomicFactor =
  | "interest_rate_pressure"
  | "interest_rate_relief"
  | "inflation_pressure"
  | "inflation_relief"
  | "weak_employment"
  | "strong_employment"
  | "low_consumer_confidence"
  | "high_consumer_confidence"
  | "slow_gdp_growth"
  | "strong_gdp_growth";

export type EconomicImpact = {
  economic_data_available: boolean;
  interest_rate_score: number;
  inflation_score: number;
  employment_score: number;
  consumer_confidence_score: number;
  gdp_score: number;
  overall_score: number;
  // overall_score - 50, signed
  net_impact: number;
  environment: EconomicEnvironment;
  key_factors: EconomicFactor[];
};

export type MaturityStage = "startup" | "growth" | "mature" | "established";
export type GrowthOutlook = "strong" | "moderate" | "limited" | "constrained";
export type GrowthStrategy = "aggressive_growth" | "steady_growth" | "consolidation";
export type ReadinessLevel = "highly_ready" | "ready" | "cautiously_ready" | "not_ready";
export type GrowthDriver =
  | "strong_market_position"
  | "revenue_momentum"
  | "sector_growth"
  | "economic_tailwinds";
export type GrowthBarrier =
  | "financial_constraints"
  | "limited_cash_reserves"
  | "declining_revenue"
  | "economic_headwinds";

export type GrowthAnalysis = {
  growth_score: number;
  maturity_stage: MaturityStage;
  maturity_multiplier: number;
  growth_component: number;
  scalability_component: number;
  sector_component: number;
  economic_tailwind: number;
  growth_outlook: GrowthOutlook;
  recommended_strategy: GrowthStrategy;
  growth_drivers: GrowthDriver[];
  growth_barriers: GrowthBarrier[];
  expansion_readiness_score: number;
  readiness_level: ReadinessLevel;
};

export type RiskLevel = "very_high" | "high" | "moderate" | "low";
export type RiskComponent = "revenue_volatility" | "financial" | "market" | "economic" | "operational";
export type RiskMitigation =
  | "diversify_revenue_streams"
  | "build_cash_reserves"
  | "differentiate_from_competitors"
  | "hedge_economic_exposure"
  | "strengthen_operations";

export type RiskAssessment = {
  overall_risk_score: number;
  risk_level: RiskLevel;
  revenue_volatility_risk: number;
  financial_risk: number;
  market_risk: number;
  economic_risk: number;
  operational_risk: number;
  key_risk_factors: RiskComponent[];
  mitigation_priorities: RiskMitigation[];
  key_vulnerabilities: RiskComponent[];
};

export type SizeCategory = "large" | "medium" | "small" | "micro";
export type IntensityLabel = "high" | "moderate" | "low";
export type CompetitivePositionLabel = "leader" | "challenger" | "follower" | "laggard";
export type CompetitiveStrength =
  | "high_productivity"
  | "strong_market_share"
  | "margin_advantage"
  | "established_presence";
export type CompetitiveWeakness =
  | "low_productivity"
  | "below_market_scale"
  | "margin_disadvantage"
  | "limited_track_record";

export type CompetitiveAnalysis = {
  benchmark_productivity: number;
  productivity_ratio: number;
  revenue_multiple: number;
  size_category: SizeCategory;
  competitive_intensity: number;
  intensity_label: IntensityLabel;
  competitive_threats: string[];
  competitive_strengths: CompetitiveStrength[];
  competitive_weaknesses: CompetitiveWeakness[];
  competitive_position_score: number;
  position: CompetitivePositionLabel;
};

export type Grade = "A" | "B" | "C" | "D" | "F";
export type OverallStatus = "excellent" | "good" | "fair" | "needs_improvement" | "poor";

export type OverallScore = {
  overall_score: number;
  grade: Grade;
  status: OverallStatus;
  efficiency_contribution: number;
  market_contribution: number;
  health_contribution: number;
  growth_contribution: number;
  risk_contribution: number;
};

export type AnalysisMetadata = {
  reference_version: string;
  analysis_month: number;
  period_months: number;
};

export type AnalysisResult = {
  performance_metrics: PerformanceMetrics;
  market_position: MarketPosition;
  financial_health: FinancialHealth;
  growth_analysis: GrowthAnalysis;
  risk_assessment: RiskAssessment;
  economic_impact: EconomicImpact;
  competitive_analysis: CompetitiveAnalysis;
  overall_score: OverallScore;
  metadata: AnalysisMetadata;
};
