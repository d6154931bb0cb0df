import type { AnalysisResult } from "../analysis/types";
import type { SectorReference } from "../benchmarks/reference_schema";
import type { Recommendation } from "./types";

export const MAX_ACTIONS = 3;
export const PEAK_SEASON_FACTOR = 1.2;

export function rankRecommendations(actions: readonly Recommendation[], limit = MAX_ACTIONS) {
  return [...actions].sort((a, b) => b.impact_score - a.impact_score).slice(0, limit);
}

function financialActions(analysis: AnalysisResult): Recommendation[] {
  const p = analysis.performance_metrics;
  const actions: Recommendation[] = [];

  if (p.cash_runway_months < 3) {
    actions.push({
      category: "cash_flow_emergency",
      title: "Fix the cash flow shortfall",
      description: `Only ${p.cash_runway_months.toFixed(1)} months of cash remain at current spending.`,
      specific_actions: [
        "Collect every outstanding receivable this week",
        "Negotiate 30-day payment terms with suppliers",
        "Halve inventory purchases until cash recovers",
        "Cut non-essential expenses immediately",
      ],
      expected_outcome: "Extend cash runway to six months or more",
      expected_amount: p.monthly_expenses * 3,
      timeframe: "This week",
      difficulty: "medium",
      investment_required: 0,
      impact_score: 95,
    });
  }

  if (p.profit_margin < 0.15) {
    const uplift = p.current_revenue * 0.05;
    actions.push({
      category: "margin_improvement",
      title: "Raise profit margins",
      description: `Margin is ${(p.profit_margin * 100).toFixed(1)}%; aim for 20% or more.`,
      specific_actions: [
        "Review pricing across the range",
        "Renegotiate supplier terms",
        "Give shelf space to higher-margin lines",
        "Reduce waste and overheads",
      ],
      expected_outcome: `Add about ${Math.round(uplift)} to monthly profit`,
      expected_amount: uplift,
      timeframe: "2-4 weeks",
      difficulty: "easy",
      investment_required: 0,
      impact_score: 80,
    });
  }

  return actions;
}

function revenueActions(analysis: AnalysisResult, sector: SectorReference): Recommendation[] {
  const market = analysis.market_position;
  const play = sector.revenue_play;
  if (market.performance_ratio >= 0.8 || !play) return [];
  if (play.requires_peak_season && market.seasonal_factor <= PEAK_SEASON_FACTOR) return [];

  const basis = play.benefit_basis === "revenue_gap" ? market.revenue_gap : analysis.performance_metrics.current_revenue;
  const amount = basis * play.benefit_multiplier;

  return [
    {
      category: play.category,
      title: play.title,
      description: play.description,
      specific_actions: [...play.specific_actions],
      expected_outcome: `Add about ${Math.round(amount)} in monthly revenue`,
      expected_amount: amount,
      timeframe: play.timeframe,
      difficulty: play.difficulty,
      investment_required: play.investment_required,
      impact_score: play.impact_score,
    },
  ];
}

function quickWins(analysis: AnalysisResult): Recommendation[] {
  const revenue = analysis.performance_metrics.current_revenue;
  return [
    {
      category: "digital_presence",
      title: "Open a business social media page",
      description: "Most customers look a shop up online before visiting.",
      specific_actions: [
        "Create a business account",
        "Post product photos daily",
        "Publish the phone number and map location",
        "Ask regular customers to follow and share",
      ],
      expected_outcome: "Bring in new walk-in and message enquiries each month",
      expected_amount: revenue * 0.15,
      timeframe: "This weekend",
      difficulty: "easy",
      investment_required: 0,
      impact_score: 70,
    },
    {
      category: "customer_retention",
      title: "Start a customer loyalty program",
      description: "Keeping existing customers costs less than finding new ones.",
      specific_actions: [
        "Introduce a simple stamp card",
        "Reward every tenth purchase",
        "Learn regular customers by name",
        "Send offers to regulars by message",
      ],
      expected_outcome: "Increase repeat purchases",
      expected_amount: revenue * 0.12,
      timeframe: "1 week",
      difficulty: "easy",
      investment_required: 5000,
      impact_score: 65,
    },
  ];
}

export function buildImmediateActions(analysis: AnalysisResult, sector: SectorReference): Recommendation[] {
  return rankRecommendations([
    ...financialActions(analysis),
    ...revenueActions(analysis, sector),
    ...quickWins(analysis),
  ]);
}
