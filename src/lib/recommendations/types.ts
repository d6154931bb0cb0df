import type { AnalysisResult } from "../analysis/types";
import type { BusinessSnapshot } from "../business/schema";

export type Difficulty = "easy" | "medium" | "hard";

export type Recommendation = {
  category: string;
  title: string;
  description: string;
  specific_actions: string[];
  expected_outcome: string;
  // monthly benefit for actions, yearly return for investment options
  expected_amount: number;
  timeframe: string;
  difficulty: Difficulty;
  investment_required: number;
  impact_score: number;
};

export type RiskProfile = "low" | "medium" | "high";

export type InvestmentAdvice = {
  available_capital: number;
  risk_profile: RiskProfile;
  options: Recommendation[];
  recommended_strategy: string;
  reasoning: string;
};

export type PlanPhaseId = "weeks_1_2" | "weeks_3_6" | "weeks_7_12";

export type PlanPhase = {
  id: PlanPhaseId;
  focus: string;
  actions: Recommendation[];
  key_tasks: string[];
  success_metric: string;
  budget_required: number;
};

export type KeyMetric = {
  metric: "monthly_revenue" | "profit_margin" | "new_customers_weekly" | "cash_reserve";
  current: number | null;
  target: number;
  tracking: string;
};

export type Milestone = {
  day: 30 | 60 | 90;
  title: string;
  revenue_target: number;
  margin_target: number;
  targets: string[];
};

export type ExpectedImpact = {
  total_investment_required: number;
  total_expected_monthly_benefit: number;
  expected_roi_percent: number;
  payback_period_months: number;
  confidence_level: number;
};

export type ActionPlan = {
  phases: PlanPhase[];
  key_metrics: KeyMetric[];
  milestones: Milestone[];
  total_expected_impact: ExpectedImpact;
};

/**
 * Recommendation contract. Implementations must be deterministic for a given
 * (analysis, snapshot) pair and return lists in priority order.
 */
export type RecommendationEngine = {
  immediateActions(analysis: AnalysisResult, snapshot: BusinessSnapshot): Recommendation[];
  strategicActions(analysis: AnalysisResult, snapshot: BusinessSnapshot): Recommendation[];
  investmentRecommendations(analysis: AnalysisResult, snapshot: BusinessSnapshot): InvestmentAdvice;
  actionPlan(analysis: AnalysisResult, snapshot: BusinessSnapshot): ActionPlan;
};
