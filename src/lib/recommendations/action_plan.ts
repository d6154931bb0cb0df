import type { AnalysisResult } from "../analysis/types";
import type { BusinessSnapshot } from "../business/schema";
import type {
  ActionPlan,
  ExpectedImpact,
  InvestmentAdvice,
  KeyMetric,
  Milestone,
  PlanPhase,
  Recommendation,
} from "./types";

const FIRST_FORTNIGHT_TIMEFRAMES = new Set(["This week", "1 week", "This weekend"]);

function sumInvestment(actions: readonly Recommendation[]) {
  return actions.reduce((sum, action) => sum + action.investment_required, 0);
}

function isFirstFortnight(action: Recommendation) {
  return FIRST_FORTNIGHT_TIMEFRAMES.has(action.timeframe);
}

// weeks 3-6 skip whatever weeks 1-2 already scheduled
function isMediumTerm(action: Recommendation) {
  const timeframe = action.timeframe.toLowerCase();
  return !isFirstFortnight(action) && (timeframe.includes("week") || timeframe.includes("month"));
}

function buildPhases(
  immediate: readonly Recommendation[],
  strategic: readonly Recommendation[],
  investment: InvestmentAdvice
): PlanPhase[] {
  const mediumTerm = [...immediate, ...strategic].filter(isMediumTerm).slice(0, 3);

  return [
    {
      id: "weeks_1_2",
      focus: "Quick wins and stabilization",
      actions: immediate.filter((action) => FIRST_FORTNIGHT_TIMEFRAMES.has(action.timeframe)),
      key_tasks: [
        "Address any cash flow shortfall",
        "Apply the highest-impact quick fixes",
        "Start the customer retention program",
        "Set up an online presence",
      ],
      success_metric: "Immediate problems fixed and operations stable",
      budget_required: sumInvestment(immediate),
    },
    {
      id: "weeks_3_6",
      focus: "Operational improvements and growth setup",
      actions: mediumTerm,
      key_tasks: [
        "Tune product mix and pricing",
        "Improve operational efficiency",
        "Grow and retain the customer base",
        "Prepare for strategic growth",
      ],
      success_metric: "15% improvement in monthly profit",
      budget_required: sumInvestment(mediumTerm),
    },
    {
      id: "weeks_7_12",
      focus: "Strategic growth and investment",
      actions: [...strategic],
      key_tasks: [
        "Execute the growth strategy",
        "Evaluate expansion opportunities",
        "Carry out the investment plan",
        "Build lasting competitive advantages",
      ],
      success_metric: "Positioned for sustainable long-term growth",
      budget_required: investment.available_capital,
    },
  ];
}

function keyMetrics(analysis: AnalysisResult, snapshot: BusinessSnapshot): KeyMetric[] {
  const p = analysis.performance_metrics;
  return [
    {
      metric: "monthly_revenue",
      current: p.current_revenue,
      target: p.current_revenue * 1.2,
      tracking: "Track weekly; target 5% monthly growth",
    },
    {
      metric: "profit_margin",
      current: p.profit_margin,
      target: 0.22,
      tracking: "Calculate monthly; adjust pricing and costs",
    },
    {
      metric: "new_customers_weekly",
      current: null,
      target: 10,
      tracking: "Count new and repeat customers daily",
    },
    {
      metric: "cash_reserve",
      current: snapshot.current_cash,
      target: p.monthly_expenses * 6,
      tracking: "Check the cash position weekly",
    },
  ];
}

function milestones(analysis: AnalysisResult): Milestone[] {
  const revenue = analysis.performance_metrics.current_revenue;
  return [
    {
      day: 30,
      title: "Operational stability",
      revenue_target: revenue * 1.1,
      margin_target: 0.18,
      targets: ["Cash runway of six months or more", "Online presence established"],
    },
    {
      day: 60,
      title: "Growth momentum",
      revenue_target: revenue * 1.25,
      margin_target: 0.2,
      targets: ["Fifty new customers", "Process improvements complete"],
    },
    {
      day: 90,
      title: "Sustainable growth",
      revenue_target: revenue * 1.4,
      margin_target: 0.22,
      targets: ["Above-average market position", "Ready for expansion or investment"],
    },
  ];
}

export function expectedImpact(actions: readonly Recommendation[]): ExpectedImpact {
  const investment = sumInvestment(actions);
  const benefit = actions.reduce((sum, action) => sum + action.expected_amount, 0);

  return {
    total_investment_required: investment,
    total_expected_monthly_benefit: benefit,
    expected_roi_percent: investment > 0 ? ((benefit - investment) / investment) * 100 : 0,
    payback_period_months: benefit > 0 ? investment / benefit : 0,
    confidence_level: 0.8,
  };
}

export function buildActionPlan(
  analysis: AnalysisResult,
  snapshot: BusinessSnapshot,
  immediate: readonly Recommendation[],
  strategic: readonly Recommendation[],
  investment: InvestmentAdvice
): ActionPlan {
  return {
    phases: buildPhases(immediate, strategic, investment),
    key_metrics: keyMetrics(analysis, snapshot),
    milestones: milestones(analysis),
    total_expected_impact: expectedImpact([...immediate, ...strategic]),
  };
}
