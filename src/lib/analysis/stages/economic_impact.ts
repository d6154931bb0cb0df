import { clampScore, mean } from "../../metrics/calculations";
import type { StageContext } from "../contracts";
import { classify } from "../rules";
import type { EconomicEnvironment, EconomicFactor, EconomicImpact } from "../types";

// Points of score per unit of indicator deviation, before sector sensitivity.
export const DEVIATION_SCALE = {
  interest_rate: 250,
  inflation: 250,
  employment: 500,
  consumer_confidence: 1,
  gdp: 500,
} as const;

const FACTOR_THRESHOLD = 5;

export function economicEnvironment(score: number): EconomicEnvironment {
  return classify<number, EconomicEnvironment>(
    [
      { when: (s) => s >= 65, result: "strong_tailwinds" },
      { when: (s) => s >= 55, result: "moderate_tailwinds" },
      { when: (s) => s > 45, result: "neutral" },
      { when: (s) => s > 35, result: "moderate_headwinds" },
    ],
    score,
    "strong_headwinds"
  );
}

function keyFactors(scores: {
  interest_rate: number;
  inflation: number;
  employment: number;
  consumer_confidence: number;
  gdp: number;
}): EconomicFactor[] {
  const factors: EconomicFactor[] = [];
  const pick = (score: number, negative: EconomicFactor, positive: EconomicFactor) => {
    if (score <= 50 - FACTOR_THRESHOLD) factors.push(negative);
    else if (score >= 50 + FACTOR_THRESHOLD) factors.push(positive);
  };
  pick(scores.interest_rate, "interest_rate_pressure", "interest_rate_relief");
  pick(scores.inflation, "inflation_pressure", "inflation_relief");
  pick(scores.employment, "weak_employment", "strong_employment");
  pick(scores.consumer_confidence, "low_consumer_confidence", "high_consumer_confidence");
  pick(scores.gdp, "slow_gdp_growth", "strong_gdp_growth");
  return factors;
}

export function computeEconomicImpact(ctx: StageContext): EconomicImpact {
  const { snapshot, reference, neutral } = ctx;
  const indicators = ctx.economic ?? neutral;
  const sensitivity = reference.sector(snapshot.sector).reference.sensitivity;

  const scores = {
    interest_rate: clampScore(
      50 + sensitivity.interest_rate * (indicators.policy_rate - neutral.policy_rate) * DEVIATION_SCALE.interest_rate
    ),
    inflation: clampScore(
      50 + sensitivity.inflation * (indicators.inflation_rate - neutral.inflation_rate) * DEVIATION_SCALE.inflation
    ),
    employment: clampScore(
      50 +
        sensitivity.employment *
          (neutral.unemployment_rate - indicators.unemployment_rate) *
          DEVIATION_SCALE.employment
    ),
    consumer_confidence: clampScore(
      50 +
        sensitivity.consumer_confidence *
          (indicators.consumer_confidence - neutral.consumer_confidence) *
          DEVIATION_SCALE.consumer_confidence
    ),
    gdp: clampScore(50 + sensitivity.gdp * (indicators.gdp_growth - neutral.gdp_growth) * DEVIATION_SCALE.gdp),
  };

  const overall = clampScore(
    mean([scores.interest_rate, scores.inflation, scores.employment, scores.consumer_confidence, scores.gdp])
  );

  return {
    economic_data_available: ctx.economic !== null,
    interest_rate_score: scores.interest_rate,
    inflation_score: scores.inflation,
    employment_score: scores.employment,
    consumer_confidence_score: scores.consumer_confidence,
    gdp_score: scores.gdp,
    overall_score: overall,
    net_impact: overall - 50,
    environment: economicEnvironment(overall),
    key_factors: keyFactors(scores),
  };
}
