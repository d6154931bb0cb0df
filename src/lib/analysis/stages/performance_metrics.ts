import { currentExpenses, currentRevenue } from "../../business/schema";
import {
  averagePeriodGrowth,
  cashRunway,
  clampScore,
  growthRate,
  profitMargin,
  safeDivide,
  trendDirection,
  volatility,
} from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { classify, firstDelta, type DeltaRule } from "../rules";
import type { PerformanceCategory, PerformanceMetrics } from "../types";

export const CASH_RUNWAY_CAP_MONTHS = 24;
export const EFFICIENCY_BASELINE = 50;

type EfficiencyInputs = {
  raw_margin: number;
  revenue_per_employee: number;
  runway: number;
};

export const MARGIN_RULES: ReadonlyArray<DeltaRule<EfficiencyInputs>> = [
  { id: "margin_above_20", when: (c) => c.raw_margin > 0.2, delta: 25 },
  { id: "margin_above_15", when: (c) => c.raw_margin > 0.15, delta: 15 },
  { id: "margin_above_10", when: (c) => c.raw_margin > 0.1, delta: 10 },
  { id: "operating_loss", when: (c) => c.raw_margin < 0, delta: -20 },
];

export const LIQUIDITY_RULES: ReadonlyArray<DeltaRule<EfficiencyInputs>> = [
  { id: "runway_6_plus", when: (c) => c.runway >= 6, delta: 10 },
  { id: "runway_3_plus", when: (c) => c.runway >= 3, delta: 5 },
  { id: "runway_under_2", when: (c) => c.runway < 2, delta: -15 },
];

export function productivityRules(thresholds: {
  high: number;
  strong: number;
  solid: number;
  low: number;
}): ReadonlyArray<DeltaRule<EfficiencyInputs>> {
  return [
    { id: "productivity_high", when: (c) => c.revenue_per_employee > thresholds.high, delta: 15 },
    { id: "productivity_strong", when: (c) => c.revenue_per_employee > thresholds.strong, delta: 10 },
    { id: "productivity_solid", when: (c) => c.revenue_per_employee > thresholds.solid, delta: 5 },
    { id: "productivity_low", when: (c) => c.revenue_per_employee < thresholds.low, delta: -10 },
  ];
}

/**
 * Margin before the reporting floor: negative when the business runs at a loss.
 */
export function rawMargin(revenue: number, expenses: number) {
  if (revenue > 0) return (revenue - expenses) / revenue;
  return expenses > 0 ? -1 : 0;
}

function categorizePerformance(growth: number, margin: number, runway: number): PerformanceCategory {
  const growthPoints = growth > 0.1 ? 1 : growth > 0 ? 0.5 : 0;
  const marginPoints = margin > 0.2 ? 1 : margin > 0.1 ? 0.5 : 0;
  const cashPoints = runway > 6 ? 1 : runway > 3 ? 0.5 : 0;
  const total = growthPoints + marginPoints + cashPoints;

  return classify<number, PerformanceCategory>(
    [
      { when: (t) => t >= 2.5, result: "excellent" },
      { when: (t) => t >= 2.0, result: "good" },
      { when: (t) => t >= 1.5, result: "fair" },
      { when: (t) => t >= 1.0, result: "poor" },
    ],
    total,
    "critical"
  );
}

export function computePerformanceMetrics(ctx: StageContext): PerformanceMetrics {
  const { snapshot, reference } = ctx;
  const revenue = currentRevenue(snapshot);
  const expenses = currentExpenses(snapshot);
  const profit = revenue - expenses;
  const revenuePerEmployee = safeDivide(revenue, Math.max(1, snapshot.employee_count));
  const runway = cashRunway(snapshot.current_cash, expenses);
  const cappedRunway = Math.min(runway, CASH_RUNWAY_CAP_MONTHS);
  const cv = volatility(snapshot.monthly_revenue);
  const averageGrowth = averagePeriodGrowth(snapshot.monthly_revenue);
  const margin = profitMargin(revenue, expenses);

  const inputs: EfficiencyInputs = {
    raw_margin: rawMargin(revenue, expenses),
    revenue_per_employee: revenuePerEmployee,
    runway,
  };
  const marginDelta = firstDelta(MARGIN_RULES, inputs);
  const productivityDelta = firstDelta(
    productivityRules(reference.data.thresholds.revenue_per_employee),
    inputs
  );
  const liquidityDelta = firstDelta(LIQUIDITY_RULES, inputs);

  return {
    current_revenue: revenue,
    monthly_expenses: expenses,
    monthly_profit: profit,
    revenue_growth_rate: growthRate(snapshot.monthly_revenue),
    average_monthly_growth: averageGrowth,
    revenue_volatility: cv,
    revenue_stability: Math.max(0, 1 - cv),
    revenue_trend: trendDirection(snapshot.monthly_revenue),
    profit_margin: margin,
    revenue_per_employee: revenuePerEmployee,
    cash_runway_months: cappedRunway,
    financial_efficiency_score: clampScore(
      EFFICIENCY_BASELINE + marginDelta.delta + productivityDelta.delta + liquidityDelta.delta
    ),
    margin_adjustment: marginDelta.delta,
    productivity_adjustment: productivityDelta.delta,
    liquidity_adjustment: liquidityDelta.delta,
    performance_category: categorizePerformance(averageGrowth, margin, runway),
  };
}
