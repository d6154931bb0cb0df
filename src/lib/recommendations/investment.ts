import type { AnalysisResult } from "../analysis/types";
import type { ReferenceStore } from "../benchmarks/reference_store";
import type { BusinessSnapshot } from "../business/schema";
import { band } from "../analysis/rules";
import type { InvestmentAdvice, Recommendation, RiskProfile } from "./types";

export const EMERGENCY_FUND_MONTHS = 3;

const EXPECTED_RETURNS = {
  business_reinvestment: 0.25,
  sector_equities: 0.18,
  safe_instruments: 0.15,
} as const;

/**
 * Capital that can be committed while keeping an emergency fund:
 * 40% of cash above three months of expenses, capped at six months of profit.
 */
export function investmentCapacity(currentCash: number, monthlyExpenses: number, monthlyProfit: number) {
  const available = Math.max(0, currentCash - monthlyExpenses * EMERGENCY_FUND_MONTHS);
  return Math.max(0, Math.min(available * 0.4, Math.max(0, monthlyProfit) * 6));
}

export function riskToleranceScore(analysis: AnalysisResult, yearsInBusiness: number) {
  const p = analysis.performance_metrics;
  return (
    p.revenue_stability * 30 +
    analysis.financial_health.score * 0.3 +
    Math.min(yearsInBusiness * 5, 20) +
    Math.min(p.cash_runway_months * 2, 20)
  );
}

export function riskProfile(score: number): RiskProfile {
  return band<RiskProfile>(
    score,
    [
      [70, "high"],
      [50, "medium"],
    ],
    "low"
  );
}

function yearly(amount: number, rate: number) {
  return amount * rate;
}

function investmentOptions(
  capacity: number,
  profile: RiskProfile,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore
): Recommendation[] {
  const minimum = reference.data.thresholds.minimum_investable_capital;
  if (capacity < minimum) {
    return [
      {
        category: "build_reserves",
        title: "Build cash reserves first",
        description: "Investable capital is below the level where outside investment makes sense.",
        specific_actions: [
          `Save until at least ${minimum} is free above the emergency fund`,
          "Keep three months of expenses untouched",
        ],
        expected_outcome: "A cushion that allows investment without risking operations",
        expected_amount: 0,
        timeframe: "3-6 months",
        difficulty: "easy",
        investment_required: 0,
        impact_score: 50,
      },
    ];
  }

  const sector = reference.sector(snapshot.sector).reference;
  const options: Recommendation[] = [];

  const reinvestment = Math.min(capacity * 0.6, 200000);
  options.push({
    category: "business_reinvestment",
    title: "Reinvest in the business",
    description: `Put ${Math.round(reinvestment)} into ${sector.reinvestment_focus}.`,
    specific_actions: [`Allocate ${Math.round(reinvestment)} to ${sector.reinvestment_focus}`],
    expected_outcome: `About ${Math.round(yearly(reinvestment, EXPECTED_RETURNS.business_reinvestment))} per year at a 25% return`,
    expected_amount: yearly(reinvestment, EXPECTED_RETURNS.business_reinvestment),
    timeframe: "3-6 months",
    difficulty: "medium",
    investment_required: reinvestment,
    impact_score: 90,
  });

  if (capacity > 100000) {
    const equities = Math.min(capacity * 0.3, 150000);
    options.push({
      category: "sector_equities",
      title: `Invest in listed ${sector.label.toLowerCase()} companies`,
      description: "Sector knowledge helps judge companies in the same trade.",
      specific_actions: [`Allocate ${Math.round(equities)} across several listed companies in the sector`],
      expected_outcome: `About ${Math.round(yearly(equities, EXPECTED_RETURNS.sector_equities))} per year at an 18% return`,
      expected_amount: yearly(equities, EXPECTED_RETURNS.sector_equities),
      timeframe: "12+ months",
      difficulty: profile === "high" ? "medium" : "hard",
      investment_required: equities,
      impact_score: 70,
    });
  }

  if ((profile === "low" || profile === "medium") && capacity > 150000) {
    const safe = Math.min(capacity * 0.2, 100000);
    options.push({
      category: "safe_instruments",
      title: "Government bonds or fixed deposits",
      description: "Low-risk returns that protect reserves against inflation.",
      specific_actions: [`Place ${Math.round(safe)} in government bonds or a fixed deposit`],
      expected_outcome: `About ${Math.round(yearly(safe, EXPECTED_RETURNS.safe_instruments))} per year at a 15% return`,
      expected_amount: yearly(safe, EXPECTED_RETURNS.safe_instruments),
      timeframe: "12 months",
      difficulty: "easy",
      investment_required: safe,
      impact_score: 60,
    });
  }

  return options;
}

function recommendedStrategy(capacity: number, minimum: number, profile: RiskProfile, analysis: AnalysisResult) {
  const overall = analysis.overall_score.overall_score;
  const status = analysis.financial_health.status;

  if (capacity < minimum) return "Grow the business and build cash reserves before outside investment.";
  if (profile === "low") {
    return status === "excellent" || status === "good"
      ? "Conservative: 60% business reinvestment, 30% safe instruments, 10% emergency fund."
      : "Stability first: 80% business improvement, 20% emergency fund.";
  }
  if (profile === "medium") {
    return overall >= 70
      ? "Balanced growth: 50% business expansion, 30% sector investments, 20% diversified holdings."
      : "Business first: 70% business improvement, 20% safe instruments, 10% sector exposure.";
  }
  return overall >= 80
    ? "Aggressive growth: 40% business expansion, 40% growth investments, 20% sector opportunities."
    : "Measured risk: 60% business optimization, 30% growth investments, 10% opportunities.";
}

function investmentReasoning(capacity: number, minimum: number, profile: RiskProfile, sectorLabel: string) {
  if (capacity < minimum) {
    return "Build cash reserves and grow the business before investing outside it.";
  }
  if (profile === "low") {
    return `The ${sectorLabel.toLowerCase()} business calls for a conservative approach focused on reinvestment and safe returns.`;
  }
  if (profile === "medium") {
    return `Reinvest most capital in the ${sectorLabel.toLowerCase()} business, put some into related companies, and keep the emergency fund intact.`;
  }
  return `Strong ${sectorLabel.toLowerCase()} performance supports a more aggressive allocation while keeping business momentum.`;
}

export function buildInvestmentAdvice(
  analysis: AnalysisResult,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore
): InvestmentAdvice {
  const p = analysis.performance_metrics;
  const capacity = investmentCapacity(snapshot.current_cash, p.monthly_expenses, p.monthly_profit);
  const profile = riskProfile(riskToleranceScore(analysis, snapshot.years_in_business));
  const minimum = reference.data.thresholds.minimum_investable_capital;
  const sectorLabel = reference.sector(snapshot.sector).reference.label;

  return {
    available_capital: capacity,
    risk_profile: profile,
    options: investmentOptions(capacity, profile, snapshot, reference),
    recommended_strategy: recommendedStrategy(capacity, minimum, profile, analysis),
    reasoning: investmentReasoning(capacity, minimum, profile, sectorLabel),
  };
}
