/**
 * Primary insight: one headline chosen by an ordered decision table over the
 * market ratio, revenue trend and financial-health status.
 */

import type { AnalysisResult } from "../analysis/types";
import type { BusinessSnapshot } from "../business/schema";
import { CASH_RUNWAY_CAP_MONTHS } from "../analysis/stages/performance_metrics";
import type { Insight, InsightType, InsightUrgency } from "./types";

type DecisionInputs = {
  ratio: number;
  trend: AnalysisResult["performance_metrics"]["revenue_trend"];
  health: AnalysisResult["financial_health"]["status"];
};

type DecisionRow = {
  type: InsightType;
  when: (c: DecisionInputs) => boolean;
  urgency: InsightUrgency;
  confidence: number;
};

// Row order is significant: row 5 captures [0.8, 1.2] before row 6 is consulted.
export const PRIMARY_INSIGHT_TABLE: readonly DecisionRow[] = [
  { type: "critical_financial", when: (c) => c.health === "critical", urgency: "immediate", confidence: 0.95 },
  {
    type: "underperformance_declining",
    when: (c) => c.ratio < 0.7 && c.trend === "declining",
    urgency: "high",
    confidence: 0.9,
  },
  { type: "performance_gap", when: (c) => c.ratio < 0.8, urgency: "medium", confidence: 0.85 },
  {
    type: "top_performer",
    when: (c) => c.ratio > 1.2 && c.trend === "increasing",
    urgency: "low",
    confidence: 0.9,
  },
  { type: "market_average", when: (c) => c.ratio >= 0.8 && c.ratio <= 1.2, urgency: "low", confidence: 0.8 },
  {
    type: "eroding_leader",
    when: (c) => c.ratio > 1.0 && c.trend === "declining",
    urgency: "medium",
    confidence: 0.85,
  },
];

const FALLBACK_ROW: DecisionRow = {
  type: "mixed_signals",
  when: () => true,
  urgency: "low",
  confidence: 0.75,
};

function whole(value: number) {
  return Math.round(value).toString();
}

function runwayText(months: number) {
  return months >= CASH_RUNWAY_CAP_MONTHS ? `${CASH_RUNWAY_CAP_MONTHS}+` : months.toFixed(1);
}

function headline(type: InsightType, result: AnalysisResult): { title: string; message: string } {
  const market = result.market_position;
  const performance = result.performance_metrics;
  const share = Math.round(market.performance_ratio * 100);

  switch (type) {
    case "critical_financial":
      return {
        title: "Financial position is critical",
        message: `Cash covers ${runwayText(performance.cash_runway_months)} months of expenses and monthly cash flow is ${whole(performance.monthly_profit)}. Stabilize cash before pursuing growth.`,
      };
    case "underperformance_declining":
      return {
        title: "Revenue is below the area average and falling",
        message: `Revenue is ${share}% of the ${market.sector} average in ${market.location} and the trend is declining.`,
      };
    case "performance_gap":
      return {
        title: "Revenue trails the area average",
        message: `Revenue is ${share}% of the area average; the gap is about ${whole(market.revenue_gap)} per month.`,
      };
    case "top_performer":
      return {
        title: "Outperforming the area and still growing",
        message: `Revenue is ${share}% of the area average with an increasing trend.`,
      };
    case "market_average":
      return {
        title: "Performing in line with the area",
        message: `Revenue is ${share}% of the area average for ${market.sector} in ${market.location}.`,
      };
    case "eroding_leader":
      return {
        title: "Market lead is eroding",
        message: `Revenue is ${share}% of the area average but the trend is declining.`,
      };
    case "mixed_signals":
      return {
        title: "Mixed performance signals",
        message: `Revenue is ${share}% of the area average with a ${performance.revenue_trend} trend.`,
      };
  }
}

function supportingFacts(result: AnalysisResult, snapshot: BusinessSnapshot) {
  const market = result.market_position;
  const performance = result.performance_metrics;
  const health = result.financial_health;

  const facts = [
    `Current revenue ${whole(performance.current_revenue)} against area average ${whole(market.market_average_revenue)} (ratio ${market.performance_ratio.toFixed(2)})`,
    `Revenue trend: ${performance.revenue_trend}`,
    `Financial health: ${health.status} (${whole(health.score)})`,
    `Cash runway: ${runwayText(performance.cash_runway_months)} months`,
  ];
  for (const challenge of snapshot.challenges.slice(0, 2)) {
    facts.push(`Stated challenge: ${challenge}`);
  }
  for (const goal of snapshot.goals.slice(0, 2)) {
    facts.push(`Stated goal: ${goal}`);
  }
  return facts;
}

export function selectPrimaryInsight(result: AnalysisResult, snapshot: BusinessSnapshot): Insight {
  const inputs: DecisionInputs = {
    ratio: result.market_position.performance_ratio,
    trend: result.performance_metrics.revenue_trend,
    health: result.financial_health.status,
  };
  const row = PRIMARY_INSIGHT_TABLE.find((candidate) => candidate.when(inputs)) ?? FALLBACK_ROW;
  const { title, message } = headline(row.type, result);

  return {
    type: row.type,
    urgency: row.urgency,
    title,
    message,
    supporting_facts: supportingFacts(result, snapshot),
    confidence: row.confidence,
  };
}
