import { describe, it, expect } from "vitest";
import { computeCompetitivePosition } from "@/src/lib/analysis/stages/competitive_position";
import { computeEconomicImpact, economicEnvironment } from "@/src/lib/analysis/stages/economic_impact";
import { computeFinancialHealth, healthStatus } from "@/src/lib/analysis/stages/financial_health";
import { computeGrowthAnalysis, expansionReadiness, maturityStage } from "@/src/lib/analysis/stages/growth_analysis";
import { computeMarketPosition, marketCategory, percentileFromRatio } from "@/src/lib/analysis/stages/market_position";
import { computeOverallScore, gradeFor } from "@/src/lib/analysis/stages/overall_score";
import { computePerformanceMetrics, rawMargin } from "@/src/lib/analysis/stages/performance_metrics";
import { computeRiskAssessment, riskLevel } from "@/src/lib/analysis/stages/risk_assessment";
import { TEST_REFERENCE, makeContext, makeDistressedSnapshot, makeSnapshot } from "./helpers/analysis_fixtures";

const CURRENT_ECONOMY = TEST_REFERENCE.currentIndicators();

describe("performance metrics stage", () => {
  it("scores a steady profitable business", () => {
    const metrics = computePerformanceMetrics(makeContext(makeSnapshot()));

    expect(metrics.current_revenue).toBe(600000);
    expect(metrics.monthly_profit).toBe(120000);
    expect(metrics.profit_margin).toBeCloseTo(0.2, 10);
    expect(metrics.revenue_per_employee).toBe(100000);
    expect(metrics.cash_runway_months).toBe(3);
    expect(metrics.revenue_volatility).toBe(0);
    expect(metrics.revenue_stability).toBe(1);
    expect(metrics.revenue_trend).toBe("stable");
    // 50 + margin 15 + productivity 5 + liquidity 5
    expect(metrics.margin_adjustment).toBe(15);
    expect(metrics.productivity_adjustment).toBe(5);
    expect(metrics.liquidity_adjustment).toBe(5);
    expect(metrics.financial_efficiency_score).toBe(75);
  });

  it("penalizes losses, low productivity and an empty till", () => {
    const metrics = computePerformanceMetrics(makeContext(makeDistressedSnapshot()));

    expect(metrics.monthly_profit).toBe(-50000);
    expect(metrics.profit_margin).toBe(0);
    expect(metrics.cash_runway_months).toBe(0);
    expect(metrics.revenue_trend).toBe("declining");
    // 50 - 20 - 10 - 15
    expect(metrics.financial_efficiency_score).toBe(5);
    expect(metrics.performance_category).toBe("critical");
  });

  it("caps an unlimited runway", () => {
    const metrics = computePerformanceMetrics(makeContext(makeSnapshot({ monthly_expenses: 0 })));
    expect(metrics.cash_runway_months).toBe(24);
  });

  it("treats zero employees as one", () => {
    const metrics = computePerformanceMetrics(makeContext(makeSnapshot({ employee_count: 0 })));
    expect(metrics.revenue_per_employee).toBe(600000);
  });

  it("keeps the sign of the raw margin", () => {
    expect(rawMargin(100, 150)).toBeCloseTo(-0.5, 10);
    expect(rawMargin(0, 10)).toBe(-1);
    expect(rawMargin(0, 0)).toBe(0);
  });
});

describe("market position stage", () => {
  it("compares against the seasonal, location-adjusted average", () => {
    const market = computeMarketPosition(makeContext(makeSnapshot()));

    expect(market.market_average_revenue).toBe(600000);
    expect(market.performance_ratio).toBe(1);
    expect(market.percentile_rank).toBe(50);
    expect(market.performance_category).toBe("average");
    expect(market.revenue_gap).toBe(0);
    expect(market.typical_profit_margin).toBe(0.25);
    expect(market.benchmark_fallback).toBe(false);
  });

  it("reports the gap to the average", () => {
    const market = computeMarketPosition(
      makeContext(makeSnapshot({ location: "clifton", monthly_revenue: [450000, 450000, 450000, 450000, 450000, 450000] }))
    );
    expect(market.market_average_revenue).toBe(900000);
    expect(market.performance_ratio).toBe(0.5);
    expect(market.percentile_rank).toBe(15);
    expect(market.performance_category).toBe("underperforming");
    expect(market.revenue_gap).toBe(450000);
  });

  it("maps ratios onto saturating percentile bands", () => {
    expect(percentileFromRatio(3)).toBe(95);
    expect(percentileFromRatio(1.5)).toBe(95);
    expect(percentileFromRatio(1.3)).toBe(85);
    expect(percentileFromRatio(1.1)).toBe(70);
    expect(percentileFromRatio(0.7)).toBe(30);
    expect(percentileFromRatio(0.1)).toBe(5);
    expect(percentileFromRatio(0)).toBe(5);
  });

  it("labels market categories", () => {
    expect(marketCategory(1.5)).toBe("top_performer");
    expect(marketCategory(1.2)).toBe("above_average");
    expect(marketCategory(0.6)).toBe("below_average");
    expect(marketCategory(0.59)).toBe("underperforming");
  });

  it("flags a location without a reference factor", () => {
    const market = computeMarketPosition(makeContext(makeSnapshot({ location: "korangi" })));
    expect(market.benchmark_fallback).toBe(true);
    expect(market.competition_level).toBe("medium");
  });
});

describe("financial health stage", () => {
  it("adds up runway, profit and margin adjustments", () => {
    const ctx = makeContext(makeSnapshot());
    const health = computeFinancialHealth(ctx, computePerformanceMetrics(ctx));

    expect(health.liquidity_adjustment).toBe(10);
    expect(health.profitability_adjustment).toBe(10);
    expect(health.margin_adjustment).toBe(15);
    expect(health.policy_rate_adjustment).toBe(0);
    expect(health.inflation_adjustment).toBe(0);
    expect(health.score).toBe(85);
    expect(health.status).toBe("excellent");
    expect(health.stress_indicators).toEqual([]);
    expect(health.key_strengths).toEqual(["strong_profitability", "stable_revenue"]);
    expect(health.key_concerns).toEqual([]);
  });

  it("applies macro pressure only when economic data is supplied", () => {
    const ctx = makeContext(makeSnapshot(), CURRENT_ECONOMY);
    const health = computeFinancialHealth(ctx, computePerformanceMetrics(ctx));

    expect(health.policy_rate_adjustment).toBe(-10);
    expect(health.inflation_adjustment).toBe(-10);
    expect(health.score).toBe(65);
    expect(health.status).toBe("good");
    expect(health.stress_indicators).toEqual(["high_policy_rate", "high_inflation"]);
  });

  it("leaves rate bands untouched for indicators the caller did not give", () => {
    const ctx = makeContext(makeSnapshot(), { gdp_growth: 0.04 });
    const health = computeFinancialHealth(ctx, computePerformanceMetrics(ctx));

    expect(health.policy_rate_adjustment).toBe(0);
    expect(health.inflation_adjustment).toBe(0);
    expect(health.score).toBe(85);
    expect(health.stress_indicators).toEqual([]);
  });

  it("applies only the supplied rate when the other is missing", () => {
    const ctx = makeContext(makeSnapshot(), { policy_rate: 0.21 });
    const health = computeFinancialHealth(ctx, computePerformanceMetrics(ctx));

    expect(health.policy_rate_adjustment).toBe(-10);
    expect(health.inflation_adjustment).toBe(0);
    expect(health.score).toBe(75);
    expect(health.stress_indicators).toEqual(["high_policy_rate"]);
  });

  it("rewards easy money", () => {
    const ctx = makeContext(makeSnapshot(), { policy_rate: 0.07, inflation_rate: 0.04 });
    const health = computeFinancialHealth(ctx, computePerformanceMetrics(ctx));
    expect(health.policy_rate_adjustment).toBe(5);
    expect(health.inflation_adjustment).toBe(5);
    expect(health.score).toBe(95);
  });

  it("marks a business with no cash and losses as critical", () => {
    const ctx = makeContext(makeDistressedSnapshot());
    const health = computeFinancialHealth(ctx, computePerformanceMetrics(ctx));

    expect(health.score).toBe(10);
    expect(health.status).toBe("critical");
    expect(health.stress_indicators).toEqual(["negative_cash_flow", "short_cash_runway", "thin_margin"]);
    expect(health.key_concerns).toEqual(["low_profit_margin", "cash_flow_constraints"]);
  });

  it("bands health status", () => {
    expect(healthStatus(80)).toBe("excellent");
    expect(healthStatus(65)).toBe("good");
    expect(healthStatus(50)).toBe("fair");
    expect(healthStatus(30)).toBe("poor");
    expect(healthStatus(29.9)).toBe("critical");
  });
});

describe("economic impact stage", () => {
  it("is neutral without economic data", () => {
    const impact = computeEconomicImpact(makeContext(makeSnapshot()));

    expect(impact.economic_data_available).toBe(false);
    expect(impact.overall_score).toBe(50);
    expect(impact.net_impact).toBe(0);
    expect(impact.environment).toBe("neutral");
    expect(impact.key_factors).toEqual([]);
  });

  it("weights indicator deviations by sector sensitivity", () => {
    const impact = computeEconomicImpact(makeContext(makeSnapshot(), CURRENT_ECONOMY));

    expect(impact.economic_data_available).toBe(true);
    expect(impact.interest_rate_score).toBeCloseTo(46.5, 6);
    expect(impact.inflation_score).toBeCloseTo(18.5, 6);
    expect(impact.employment_score).toBeCloseTo(49.7, 6);
    expect(impact.consumer_confidence_score).toBeCloseTo(46, 6);
    expect(impact.gdp_score).toBeCloseTo(47.6, 6);
    expect(impact.overall_score).toBeCloseTo(41.66, 6);
    expect(impact.environment).toBe("moderate_headwinds");
    expect(impact.key_factors).toEqual(["inflation_pressure"]);
  });

  it("hits rate-sensitive sectors harder", () => {
    const impact = computeEconomicImpact(makeContext(makeSnapshot({ sector: "auto" }), CURRENT_ECONOMY));

    expect(impact.overall_score).toBeCloseTo(34.82, 6);
    expect(impact.environment).toBe("strong_headwinds");
    expect(impact.key_factors).toEqual([
      "interest_rate_pressure",
      "inflation_pressure",
      "low_consumer_confidence",
      "slow_gdp_growth",
    ]);
  });

  it("fills missing indicators from the neutral set", () => {
    const impact = computeEconomicImpact(makeContext(makeSnapshot(), { consumer_confidence: 110 }));
    expect(impact.interest_rate_score).toBe(50);
    expect(impact.consumer_confidence_score).toBe(55);
    expect(impact.overall_score).toBe(51);
    expect(impact.key_factors).toEqual(["high_consumer_confidence"]);
  });

  it("bands the environment", () => {
    expect(economicEnvironment(65)).toBe("strong_tailwinds");
    expect(economicEnvironment(55)).toBe("moderate_tailwinds");
    expect(economicEnvironment(45.1)).toBe("neutral");
    expect(economicEnvironment(45)).toBe("moderate_headwinds");
    expect(economicEnvironment(35)).toBe("strong_headwinds");
  });
});

describe("growth analysis stage", () => {
  function growthFor(snapshot = makeSnapshot()) {
    const ctx = makeContext(snapshot);
    const performance = computePerformanceMetrics(ctx);
    const market = computeMarketPosition(ctx);
    const health = computeFinancialHealth(ctx, performance);
    return computeGrowthAnalysis(ctx, performance, market, health, computeEconomicImpact(ctx));
  }

  it("combines growth components and applies the maturity multiplier", () => {
    const growth = growthFor();

    expect(growth.growth_component).toBe(0);
    expect(growth.scalability_component).toBe(0);
    expect(growth.sector_component).toBeCloseTo(6, 10);
    expect(growth.economic_tailwind).toBe(0);
    expect(growth.maturity_stage).toBe("growth");
    expect(growth.maturity_multiplier).toBe(1.2);
    expect(growth.growth_score).toBeCloseTo(67.2, 6);
    expect(growth.growth_outlook).toBe("moderate");
    expect(growth.recommended_strategy).toBe("steady_growth");
    expect(growth.growth_drivers).toEqual(["sector_growth"]);
    expect(growth.growth_barriers).toEqual([]);
  });

  it("scores expansion readiness", () => {
    const growth = growthFor();
    // cash 0.5*0.3 + momentum 0 + stability 1*0.2 + tenure 1*0.2
    expect(growth.expansion_readiness_score).toBeCloseTo(0.55, 10);
    expect(growth.readiness_level).toBe("cautiously_ready");
  });

  it("lists barriers for a struggling business", () => {
    const growth = growthFor(makeDistressedSnapshot());
    expect(growth.growth_barriers).toEqual(["financial_constraints", "limited_cash_reserves", "declining_revenue"]);
    expect(growth.growth_component).toBe(-25);
  });

  it("treats short series as flat and half stable", () => {
    const readiness = expansionReadiness({
      revenue: [100, 150],
      current_cash: 1200,
      monthly_expenses: 100,
      years_in_business: 6,
    });
    // cash 1*0.3 + momentum 0 + stability 0.5*0.2 + tenure 1*0.2
    expect(readiness.score).toBeCloseTo(0.6, 10);
    expect(readiness.level).toBe("ready");
  });

  it("gives no cash cover when there are no expenses", () => {
    const readiness = expansionReadiness({
      revenue: [500, 500, 500, 500, 500, 500],
      current_cash: 10000,
      monthly_expenses: 0,
      years_in_business: 3,
    });
    // cash 0 + momentum 0 + stability 1*0.2 + tenure 1*0.2
    expect(readiness.score).toBeCloseTo(0.4, 10);
    expect(readiness.level).toBe("cautiously_ready");
  });

  it("measures stability with the population deviation", () => {
    const readiness = expansionReadiness({
      revenue: [100, 200, 100, 200],
      current_cash: 600,
      monthly_expenses: 100,
      years_in_business: 0,
    });
    // mean growth (1 - 0.5 + 1) / 3 = 0.5; cv 50/150
    expect(readiness.score).toBeCloseTo(0.3 + 0.3 + (2 / 3) * 0.2, 10);
    expect(readiness.level).toBe("ready");
  });

  it("scores zero-revenue series as unstable", () => {
    const readiness = expansionReadiness({
      revenue: [0, 0, 0],
      current_cash: 0,
      monthly_expenses: 100,
      years_in_business: 0,
    });
    expect(readiness.score).toBe(0);
    expect(readiness.level).toBe("not_ready");
  });

  it("classifies maturity by years in business", () => {
    expect(maturityStage(0)).toBe("startup");
    expect(maturityStage(2)).toBe("growth");
    expect(maturityStage(5)).toBe("mature");
    expect(maturityStage(10)).toBe("established");
  });
});

describe("risk assessment stage", () => {
  it("weights the five risk components", () => {
    const ctx = makeContext(makeSnapshot());
    const performance = computePerformanceMetrics(ctx);
    const risk = computeRiskAssessment(ctx, performance, computeEconomicImpact(ctx));

    expect(risk.revenue_volatility_risk).toBe(0);
    expect(risk.financial_risk).toBe(45);
    expect(risk.market_risk).toBe(40);
    expect(risk.economic_risk).toBe(50);
    expect(risk.operational_risk).toBe(40);
    expect(risk.overall_risk_score).toBeCloseTo(35, 10);
    expect(risk.risk_level).toBe("moderate");
    expect(risk.key_risk_factors).toEqual([]);
    expect(risk.mitigation_priorities).toEqual([]);
  });

  it("surfaces the elevated components for a fragile business", () => {
    const snapshot = makeDistressedSnapshot({ employee_count: 1, years_in_business: 0 });
    const ctx = makeContext(snapshot);
    const performance = computePerformanceMetrics(ctx);
    const risk = computeRiskAssessment(ctx, performance, computeEconomicImpact(ctx));

    // runway under a month plus a monthly loss
    expect(risk.financial_risk).toBe(100);
    expect(risk.operational_risk).toBe(80);
    expect(risk.key_risk_factors).toEqual(["financial", "operational"]);
    expect(risk.mitigation_priorities).toEqual(["build_cash_reserves", "strengthen_operations"]);
    expect(risk.key_vulnerabilities).toEqual(["financial", "operational"]);
  });

  it("bands risk levels", () => {
    expect(riskLevel(70)).toBe("very_high");
    expect(riskLevel(50)).toBe("high");
    expect(riskLevel(30)).toBe("moderate");
    expect(riskLevel(10)).toBe("low");
  });
});

describe("competitive position stage", () => {
  it("compares productivity and scale with the sector", () => {
    const ctx = makeContext(makeSnapshot());
    const performance = computePerformanceMetrics(ctx);
    const competitive = computeCompetitivePosition(ctx, performance, computeMarketPosition(ctx));

    expect(competitive.productivity_ratio).toBeCloseTo(4 / 3, 10);
    expect(competitive.revenue_multiple).toBe(1);
    expect(competitive.size_category).toBe("medium");
    expect(competitive.intensity_label).toBe("high");
    expect(competitive.competitive_strengths).toEqual(["high_productivity"]);
    expect(competitive.competitive_weaknesses).toEqual(["margin_disadvantage"]);
    expect(competitive.competitive_position_score).toBeCloseTo(50 + 25 / 3 - 8, 6);
    expect(competitive.position).toBe("challenger");
    expect(competitive.competitive_threats).toEqual(["ingredient_costs", "staff_management", "food_safety", "competition"]);
  });
});

describe("overall score stage", () => {
  it("combines the weighted stage scores", () => {
    const ctx = makeContext(makeSnapshot());
    const performance = computePerformanceMetrics(ctx);
    const market = computeMarketPosition(ctx);
    const health = computeFinancialHealth(ctx, performance);
    const economic = computeEconomicImpact(ctx);
    const growth = computeGrowthAnalysis(ctx, performance, market, health, economic);
    const risk = computeRiskAssessment(ctx, performance, economic);
    const overall = computeOverallScore(performance, market, health, growth, risk);

    expect(overall.efficiency_contribution).toBeCloseTo(22.5, 10);
    expect(overall.market_contribution).toBeCloseTo(12.5, 10);
    expect(overall.health_contribution).toBeCloseTo(17, 10);
    expect(overall.growth_contribution).toBeCloseTo(10.08, 6);
    expect(overall.risk_contribution).toBeCloseTo(6.5, 10);
    expect(overall.overall_score).toBeCloseTo(68.58, 6);
    expect(overall.grade).toBe("C");
    expect(overall.status).toBe("fair");
  });

  it("grades on fixed cut-offs", () => {
    expect(gradeFor(80)).toBe("A");
    expect(gradeFor(79.99)).toBe("B");
    expect(gradeFor(60)).toBe("C");
    expect(gradeFor(50)).toBe("D");
    expect(gradeFor(49.99)).toBe("F");
  });
});
