import type { ReferenceStore } from "../benchmarks/reference_store";
import type { EconomicIndicators } from "../benchmarks/types";
import type { BusinessSnapshot, EconomicSnapshot } from "../business/schema";

export const STAGE_ORDER = [
  "performance_metrics",
  "market_position",
  "financial_health",
  "economic_impact",
  "growth_analysis",
  "risk_assessment",
  "competitive_analysis",
  "overall_score",
] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export type StageContext = {
  snapshot: BusinessSnapshot;
  reference: ReferenceStore;
  // supplied indicators merged over neutral values; null when no snapshot was given
  economic: EconomicIndicators | null;
  // indicators exactly as the caller gave them, without the neutral fill
  supplied: EconomicSnapshot | null;
  neutral: EconomicIndicators;
  month: number;
};
