/**
 * Default recommendation engine built on the benchmark reference tables.
 */

import { getDefaultReferenceStore, type ReferenceStore } from "../benchmarks/reference_store";
import { buildActionPlan } from "./action_plan";
import { buildImmediateActions } from "./immediate_actions";
import { buildInvestmentAdvice } from "./investment";
import { buildStrategicActions } from "./strategic_actions";
import type { RecommendationEngine } from "./types";

export function createRecommendationEngine(reference?: ReferenceStore): RecommendationEngine {
  const store = () => reference ?? getDefaultReferenceStore();

  const engine: RecommendationEngine = {
    immediateActions: (analysis, snapshot) =>
      buildImmediateActions(analysis, store().sector(snapshot.sector).reference),
    strategicActions: (analysis, snapshot) => buildStrategicActions(analysis, snapshot, store()),
    investmentRecommendations: (analysis, snapshot) => buildInvestmentAdvice(analysis, snapshot, store()),
    actionPlan: (analysis, snapshot) =>
      buildActionPlan(
        analysis,
        snapshot,
        engine.immediateActions(analysis, snapshot),
        engine.strategicActions(analysis, snapshot),
        engine.investmentRecommendations(analysis, snapshot)
      ),
  };

  return engine;
}
