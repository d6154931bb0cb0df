import type { AnalysisResult } from "../analysis/types";
import type { Sector } from "../benchmarks/types";
import type { BusinessSnapshot } from "../business/schema";
import type { Finding, OpportunityFinding, ProblemFinding } from "./types";

export const MAX_FINDINGS = 3;

const DIGITAL_READY_SECTORS: readonly Sector[] = ["electronics", "food", "retail"];

type CandidateSource<T> = (result: AnalysisResult, snapshot: BusinessSnapshot) => T[];

function problemsFromPerformance(result: AnalysisResult): ProblemFinding[] {
  const p = result.performance_metrics;
  const found: ProblemFinding[] = [];
  if (p.revenue_growth_rate < -0.05) {
    found.push({
      kind: "problem",
      type: "revenue_decline",
      title: "Revenue is shrinking month over month",
      description: `Revenue is falling about ${Math.round(Math.abs(p.revenue_growth_rate) * 100)}% per month.`,
      impact_amount: p.current_revenue * Math.abs(p.revenue_growth_rate),
      impact_score: 85,
      urgency: "high",
    });
  }
  if (p.financial_efficiency_score < 40) {
    found.push({
      kind: "problem",
      type: "low_efficiency",
      title: "Operations convert too little revenue into profit",
      description: "Margin, staff productivity and cash cover together score below 40.",
      impact_amount: p.current_revenue * 0.05,
      impact_score: 70,
      urgency: "medium",
    });
  }
  return found;
}

function problemsFromMarket(result: AnalysisResult): ProblemFinding[] {
  const m = result.market_position;
  if (m.performance_ratio >= 0.7) return [];
  return [
    {
      kind: "problem",
      type: "market_underperformance",
      title: "Revenue is well below the area average",
      description: `Revenue is ${Math.round(m.performance_ratio * 100)}% of comparable businesses nearby.`,
      impact_amount: m.revenue_gap,
      impact_score: 80,
      urgency: "medium",
    },
  ];
}

function problemsFromHealth(result: AnalysisResult): ProblemFinding[] {
  const p = result.performance_metrics;
  const found: ProblemFinding[] = [];
  if (p.cash_runway_months < 3) {
    found.push({
      kind: "problem",
      type: "cash_flow",
      title: "Cash runs out within three months",
      description: `Cash covers ${p.cash_runway_months.toFixed(1)} months of current expenses.`,
      impact_amount: p.monthly_expenses * 3,
      impact_score: 95,
      urgency: "critical",
    });
  }
  if (p.monthly_profit < 0) {
    found.push({
      kind: "problem",
      type: "profitability",
      title: "The business is losing money each month",
      description: `Expenses exceed revenue by ${Math.round(Math.abs(p.monthly_profit))} per month.`,
      impact_amount: Math.abs(p.monthly_profit),
      impact_score: 90,
      urgency: "high",
    });
  }
  return found;
}

function problemsFromEconomy(result: AnalysisResult): ProblemFinding[] {
  const e = result.economic_impact;
  if (e.environment !== "strong_headwinds" && e.environment !== "moderate_headwinds") return [];
  const strong = e.environment === "strong_headwinds";
  return [
    {
      kind: "problem",
      type: "economic_headwinds",
      title: strong ? "Economic conditions are strongly against this sector" : "Economic conditions are working against this sector",
      description: `Macro indicators score ${Math.round(e.overall_score)} out of 100 for this sector.`,
      impact_amount: (result.performance_metrics.current_revenue * Math.abs(e.net_impact)) / 100,
      impact_score: strong ? 70 : 55,
      urgency: strong ? "medium" : "low",
    },
  ];
}

function problemsFromGrowth(result: AnalysisResult): ProblemFinding[] {
  const g = result.growth_analysis;
  if (g.growth_score >= 40) return [];
  return [
    {
      kind: "problem",
      type: "growth_stagnation",
      title: "Growth prospects are weak",
      description: `Growth potential scores ${Math.round(g.growth_score)} out of 100.`,
      impact_amount: result.performance_metrics.current_revenue * 0.1,
      impact_score: 60,
      urgency: "low",
    },
  ];
}

function problemsFromRisk(result: AnalysisResult): ProblemFinding[] {
  const r = result.risk_assessment;
  const p = result.performance_metrics;
  const found: ProblemFinding[] = [];
  if (r.overall_risk_score > 70) {
    found.push({
      kind: "problem",
      type: "high_risk_exposure",
      title: "Overall risk exposure is very high",
      description: `Combined risk scores ${Math.round(r.overall_risk_score)} out of 100.`,
      impact_amount: p.monthly_expenses * 2,
      impact_score: 75,
      urgency: "high",
    });
  }
  if (r.revenue_volatility_risk > 60) {
    found.push({
      kind: "problem",
      type: "revenue_volatility",
      title: "Revenue swings sharply between months",
      description: `Monthly revenue varies by about ${Math.round(p.revenue_volatility * 100)}% around its average.`,
      impact_amount: p.current_revenue * p.revenue_volatility,
      impact_score: 65,
      urgency: "medium",
    });
  }
  return found;
}

function problemsFromCompetition(result: AnalysisResult, snapshot: BusinessSnapshot): ProblemFinding[] {
  const c = result.competitive_analysis;
  if (c.productivity_ratio >= 0.8) return [];
  const perEmployeeGap = Math.max(0, c.benchmark_productivity - result.performance_metrics.revenue_per_employee);
  return [
    {
      kind: "problem",
      type: "productivity_gap",
      title: "Revenue per employee trails the sector",
      description: `Each employee generates ${Math.round(c.productivity_ratio * 100)}% of the sector norm.`,
      impact_amount: perEmployeeGap * Math.max(1, snapshot.employee_count),
      impact_score: 50,
      urgency: "low",
    },
  ];
}

function opportunitiesFromPerformance(result: AnalysisResult, snapshot: BusinessSnapshot): OpportunityFinding[] {
  const p = result.performance_metrics;
  const typicalMargin = result.market_position.typical_profit_margin;
  const found: OpportunityFinding[] = [];
  if (p.financial_efficiency_score < 70) {
    found.push({
      kind: "opportunity",
      type: "operational_efficiency",
      title: "Tighten day-to-day operations",
      description: "Inventory, staffing and supplier terms leave room for savings.",
      impact_amount: p.current_revenue * 0.05,
      impact_score: 62,
      ease: "easy",
    });
  }
  if (p.profit_margin < typicalMargin) {
    found.push({
      kind: "opportunity",
      type: "margin_improvement",
      title: `Lift margins toward the ${snapshot.sector} norm`,
      description: `Margin is ${Math.round(p.profit_margin * 100)}% against a typical ${Math.round(typicalMargin * 100)}%.`,
      impact_amount: p.current_revenue * (typicalMargin - p.profit_margin),
      impact_score: 70,
      ease: "medium",
    });
  }
  return found;
}

function opportunitiesFromMarket(result: AnalysisResult): OpportunityFinding[] {
  const m = result.market_position;
  const found: OpportunityFinding[] = [];
  if (m.performance_ratio > 1.2) {
    found.push({
      kind: "opportunity",
      type: "market_expansion",
      title: "Extend a proven lead into new customers",
      description: `Revenue is ${Math.round(m.performance_ratio * 100)}% of the area average.`,
      impact_amount: result.performance_metrics.current_revenue * 0.25,
      impact_score: 80,
      ease: "hard",
    });
  }
  if (m.seasonal_factor >= 1.2) {
    found.push({
      kind: "opportunity",
      type: "seasonal_peak",
      title: "Prepare for the seasonal peak",
      description: `Demand this month runs ${Math.round((m.seasonal_factor - 1) * 100)}% above a normal month.`,
      impact_amount: m.market_average_revenue - m.market_average_revenue / m.seasonal_factor,
      impact_score: 68,
      ease: "easy",
    });
  }
  return found;
}

function opportunitiesFromHealth(result: AnalysisResult, snapshot: BusinessSnapshot): OpportunityFinding[] {
  const p = result.performance_metrics;
  if (p.cash_runway_months < 6 || p.monthly_profit <= 0) return [];
  return [
    {
      kind: "opportunity",
      type: "strategic_investment",
      title: "Put surplus cash to work",
      description: "Reserves exceed six months of expenses while the business is profitable.",
      impact_amount: Math.max(0, snapshot.current_cash - p.monthly_expenses * 3) * 0.4,
      impact_score: 65,
      ease: "medium",
    },
  ];
}

function opportunitiesFromEconomy(result: AnalysisResult): OpportunityFinding[] {
  const e = result.economic_impact;
  if (e.net_impact <= 10) return [];
  return [
    {
      kind: "opportunity",
      type: "economic_timing",
      title: "Use favourable economic conditions",
      description: `Macro indicators score ${Math.round(e.overall_score)} out of 100 for this sector.`,
      impact_amount: result.performance_metrics.current_revenue * 0.1,
      impact_score: 60,
      ease: "medium",
    },
  ];
}

function opportunitiesFromGrowth(result: AnalysisResult): OpportunityFinding[] {
  const g = result.growth_analysis;
  if (g.growth_score < 70) return [];
  return [
    {
      kind: "opportunity",
      type: "scale_operations",
      title: "Scale operations while momentum is strong",
      description: `Growth potential scores ${Math.round(g.growth_score)} out of 100.`,
      impact_amount: result.performance_metrics.current_revenue * 0.2,
      impact_score: 75,
      ease: "hard",
    },
  ];
}

function opportunitiesFromCompetition(result: AnalysisResult, snapshot: BusinessSnapshot): OpportunityFinding[] {
  if (!DIGITAL_READY_SECTORS.includes(snapshot.sector)) return [];
  return [
    {
      kind: "opportunity",
      type: "digital_transformation",
      title: "Reach customers online",
      description: "Online ordering and social channels are reaching customers in this sector.",
      impact_amount: result.performance_metrics.current_revenue * 0.15,
      impact_score: 55,
      ease: "easy",
    },
  ];
}

/**
 * Stable sort by descending impact, cut to the top entries.
 */
export function rankFindings<T extends Finding>(findings: readonly T[], limit = MAX_FINDINGS): T[] {
  return [...findings].sort((a, b) => b.impact_score - a.impact_score).slice(0, limit);
}

export function collectProblems(result: AnalysisResult, snapshot: BusinessSnapshot): ProblemFinding[] {
  const sources: Array<CandidateSource<ProblemFinding>> = [
    problemsFromPerformance,
    problemsFromMarket,
    problemsFromHealth,
    problemsFromEconomy,
    problemsFromGrowth,
    problemsFromRisk,
    problemsFromCompetition,
  ];
  return sources.flatMap((source) => source(result, snapshot));
}

export function collectOpportunities(result: AnalysisResult, snapshot: BusinessSnapshot): OpportunityFinding[] {
  const sources: Array<CandidateSource<OpportunityFinding>> = [
    opportunitiesFromPerformance,
    opportunitiesFromMarket,
    opportunitiesFromHealth,
    opportunitiesFromEconomy,
    opportunitiesFromGrowth,
    opportunitiesFromCompetition,
  ];
  return sources.flatMap((source) => source(result, snapshot));
}
