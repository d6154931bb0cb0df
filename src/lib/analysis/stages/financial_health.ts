import { clampScore } from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { band, firstDelta, type DeltaRule } from "../rules";
import type {
  FinancialConcern,
  FinancialHealth,
  FinancialStrength,
  HealthStatus,
  PerformanceMetrics,
  StressIndicator,
} from "../types";

export const HEALTH_BASELINE = 50;

type HealthInputs = {
  runway: number;
  profit: number;
  margin: number;
  volatility: number;
  policy_rate: number | null;
  inflation_rate: number | null;
};

export const RUNWAY_RULES: ReadonlyArray<DeltaRule<HealthInputs>> = [
  { id: "runway_6_plus", when: (c) => c.runway >= 6, delta: 20 },
  { id: "runway_3_plus", when: (c) => c.runway >= 3, delta: 10 },
  { id: "runway_under_1", when: (c) => c.runway < 1, delta: -20 },
];

export const PROFIT_RULES: ReadonlyArray<DeltaRule<HealthInputs>> = [
  { id: "profitable", when: (c) => c.profit > 0, delta: 10 },
  { id: "loss_making", when: (c) => c.profit < 0, delta: -20 },
];

export const MARGIN_RULES: ReadonlyArray<DeltaRule<HealthInputs>> = [
  { id: "margin_20_plus", when: (c) => c.margin >= 0.2, delta: 15 },
  { id: "margin_10_plus", when: (c) => c.margin >= 0.1, delta: 5 },
];

export const POLICY_RATE_RULES: ReadonlyArray<DeltaRule<HealthInputs>> = [
  { id: "policy_rate_severe", when: (c) => c.policy_rate !== null && c.policy_rate >= 0.2, delta: -10 },
  { id: "policy_rate_elevated", when: (c) => c.policy_rate !== null && c.policy_rate >= 0.15, delta: -5 },
  { id: "policy_rate_easy", when: (c) => c.policy_rate !== null && c.policy_rate <= 0.08, delta: 5 },
];

export const INFLATION_RULES: ReadonlyArray<DeltaRule<HealthInputs>> = [
  { id: "inflation_severe", when: (c) => c.inflation_rate !== null && c.inflation_rate >= 0.2, delta: -10 },
  { id: "inflation_elevated", when: (c) => c.inflation_rate !== null && c.inflation_rate >= 0.1, delta: -5 },
  { id: "inflation_low", when: (c) => c.inflation_rate !== null && c.inflation_rate <= 0.05, delta: 5 },
];

export const HEALTH_STATUS_BANDS: ReadonlyArray<readonly [number, HealthStatus]> = [
  [80, "excellent"],
  [65, "good"],
  [50, "fair"],
  [30, "poor"],
];

const STATUS_DESCRIPTIONS: Record<HealthStatus, string> = {
  excellent: "Finances are strong with comfortable reserves and healthy margins.",
  good: "Finances are sound with some room to strengthen reserves or margins.",
  fair: "Finances are stable but exposed to a weak month or rising costs.",
  poor: "Finances are strained; cash or margins need attention soon.",
  critical: "Finances are at risk; cash and profitability need immediate action.",
};

export function healthStatus(score: number): HealthStatus {
  return band(score, HEALTH_STATUS_BANDS, "critical");
}

function stressIndicators(inputs: HealthInputs): StressIndicator[] {
  const indicators: StressIndicator[] = [];
  if (inputs.profit < 0) indicators.push("negative_cash_flow");
  if (inputs.runway < 3) indicators.push("short_cash_runway");
  if (inputs.margin < 0.1) indicators.push("thin_margin");
  if (inputs.policy_rate !== null && inputs.policy_rate >= 0.2) indicators.push("high_policy_rate");
  if (inputs.inflation_rate !== null && inputs.inflation_rate >= 0.2) indicators.push("high_inflation");
  return indicators;
}

function strengthsAndConcerns(inputs: HealthInputs) {
  const strengths: FinancialStrength[] = [];
  const concerns: FinancialConcern[] = [];

  if (inputs.margin >= 0.2) strengths.push("strong_profitability");
  if (inputs.runway >= 6) strengths.push("healthy_cash_position");
  if (inputs.volatility <= 0.1) strengths.push("stable_revenue");

  if (inputs.margin < 0.1) concerns.push("low_profit_margin");
  if (inputs.runway < 3) concerns.push("cash_flow_constraints");
  if (inputs.volatility > 0.3) concerns.push("revenue_volatility");

  return { strengths, concerns };
}

export function computeFinancialHealth(ctx: StageContext, performance: PerformanceMetrics): FinancialHealth {
  const inputs: HealthInputs = {
    runway: performance.cash_runway_months,
    profit: performance.monthly_profit,
    margin: performance.profit_margin,
    volatility: performance.revenue_volatility,
    policy_rate: ctx.supplied?.policy_rate ?? null,
    inflation_rate: ctx.supplied?.inflation_rate ?? null,
  };

  const liquidity = firstDelta(RUNWAY_RULES, inputs);
  const profitability = firstDelta(PROFIT_RULES, inputs);
  const margin = firstDelta(MARGIN_RULES, inputs);
  const policy = firstDelta(POLICY_RATE_RULES, inputs);
  const inflation = firstDelta(INFLATION_RULES, inputs);

  const score = clampScore(
    HEALTH_BASELINE + liquidity.delta + profitability.delta + margin.delta + policy.delta + inflation.delta
  );
  const status = healthStatus(score);
  const { strengths, concerns } = strengthsAndConcerns(inputs);

  return {
    score,
    status,
    description: STATUS_DESCRIPTIONS[status],
    monthly_cash_flow: performance.monthly_profit,
    cash_runway_months: performance.cash_runway_months,
    liquidity_adjustment: liquidity.delta,
    profitability_adjustment: profitability.delta,
    margin_adjustment: margin.delta,
    policy_rate_adjustment: policy.delta,
    inflation_adjustment: inflation.delta,
    stress_indicators: stressIndicators(inputs),
    key_strengths: strengths,
    key_concerns: concerns,
  };
}
