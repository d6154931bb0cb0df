import type { AnalysisResult } from "../analysis/types";
import { getDefaultReferenceStore, type ReferenceStore } from "../benchmarks/reference_store";
import type { BusinessSnapshot } from "../business/schema";
import { collectOpportunities, collectProblems, rankFindings } from "./findings";
import { buildLocationInsights } from "./location_insights";
import { selectPrimaryInsight } from "./primary_insight";
import type { InsightBundle } from "./types";

/**
 * Headline insight, the top problems and opportunities, and what the trading
 * area means for this sector. Deterministic for a given (result, snapshot) pair.
 */
export function generateInsights(
  result: AnalysisResult,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore = getDefaultReferenceStore()
): InsightBundle {
  return {
    primary: selectPrimaryInsight(result, snapshot),
    problems: rankFindings(collectProblems(result, snapshot)),
    opportunities: rankFindings(collectOpportunities(result, snapshot)),
    location: buildLocationInsights(result, snapshot, reference),
  };
}
