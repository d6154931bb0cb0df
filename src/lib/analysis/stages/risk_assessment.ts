import { clampScore } from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { band, classify } from "../rules";
import type {
  EconomicImpact,
  PerformanceMetrics,
  RiskAssessment,
  RiskComponent,
  RiskLevel,
  RiskMitigation,
} from "../types";

export const RISK_WEIGHTS: Record<RiskComponent, number> = {
  revenue_volatility: 0.2,
  financial: 0.3,
  market: 0.2,
  economic: 0.15,
  operational: 0.15,
};

export const RISK_LEVEL_BANDS: ReadonlyArray<readonly [number, RiskLevel]> = [
  [70, "very_high"],
  [50, "high"],
  [30, "moderate"],
];

const MITIGATIONS: Record<RiskComponent, RiskMitigation> = {
  revenue_volatility: "diversify_revenue_streams",
  financial: "build_cash_reserves",
  market: "differentiate_from_competitors",
  economic: "hedge_economic_exposure",
  operational: "strengthen_operations",
};

const RISK_FACTOR_THRESHOLD = 60;
const VULNERABILITY_THRESHOLD = 70;

export function riskLevel(score: number): RiskLevel {
  return band(score, RISK_LEVEL_BANDS, "low");
}

function financialRisk(runway: number, profit: number) {
  const base = classify<number, number>(
    [
      { when: (r) => r < 1, result: 90 },
      { when: (r) => r < 3, result: 70 },
      { when: (r) => r < 6, result: 45 },
    ],
    runway,
    20
  );
  return clampScore(base + (profit < 0 ? 20 : 0));
}

function operationalRisk(years: number, employees: number) {
  const tenure = Math.max(0, 50 - years * 5);
  const headcount = classify<number, number>(
    [
      { when: (e) => e <= 1, result: 30 },
      { when: (e) => e <= 3, result: 20 },
      { when: (e) => e <= 10, result: 10 },
    ],
    employees,
    0
  );
  return clampScore(tenure + headcount);
}

export function computeRiskAssessment(
  ctx: StageContext,
  performance: PerformanceMetrics,
  economic: EconomicImpact
): RiskAssessment {
  const { snapshot, reference } = ctx;

  const components: Record<RiskComponent, number> = {
    revenue_volatility: clampScore(performance.revenue_volatility * 100),
    financial: financialRisk(performance.cash_runway_months, performance.monthly_profit),
    market: clampScore(reference.sector(snapshot.sector).reference.market_risk),
    economic: clampScore(100 - economic.overall_score),
    operational: operationalRisk(snapshot.years_in_business, snapshot.employee_count),
  };

  const order: RiskComponent[] = ["revenue_volatility", "financial", "market", "economic", "operational"];
  const overall = clampScore(order.reduce((sum, key) => sum + components[key] * RISK_WEIGHTS[key], 0));
  const elevated = order.filter((key) => components[key] > RISK_FACTOR_THRESHOLD).slice(0, 3);

  return {
    overall_risk_score: overall,
    risk_level: riskLevel(overall),
    revenue_volatility_risk: components.revenue_volatility,
    financial_risk: components.financial,
    market_risk: components.market,
    economic_risk: components.economic,
    operational_risk: components.operational,
    key_risk_factors: elevated,
    mitigation_priorities: elevated.map((key) => MITIGATIONS[key]),
    key_vulnerabilities: order.filter((key) => components[key] > VULNERABILITY_THRESHOLD),
  };
}
