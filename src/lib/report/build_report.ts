/**
 * Report assembler: validate raw input, run the analyzer, then derive insights
 * and recommendations from the same result.
 */

import { analyzeBusiness } from "../analysis/analyzer";
import { STAGE_ORDER } from "../analysis/contracts";
import type { AnalysisResult } from "../analysis/types";
import { getDefaultReferenceStore, type ReferenceStore } from "../benchmarks/reference_store";
import { validateBusinessSnapshot, validateEconomicSnapshot } from "../business/schema";
import { getAnalysisConfig, type PeriodMonths } from "../config/analysis_config";
import { toAnalysisFailureArtifact } from "../errors";
import { generateInsights } from "../insights/insight_generator";
import type { InsightBundle } from "../insights/types";
import { RunLogger } from "../logging/run_logger";
import { createRecommendationEngine } from "../recommendations/recommendation_engine";
import type {
  ActionPlan,
  InvestmentAdvice,
  Recommendation,
  RecommendationEngine,
} from "../recommendations/types";

export const REPORT_VERSION = "business_report_v1";

export type BusinessReport = {
  report_version: typeof REPORT_VERSION;
  generated_at: string;
  business_name: string | null;
  reference: {
    version: string;
    region: string;
    currency: string;
  };
  analysis: AnalysisResult;
  insights: InsightBundle;
  recommendations: {
    immediate: Recommendation[];
    strategic: Recommendation[];
    investment: InvestmentAdvice;
    action_plan: ActionPlan;
  };
};

export type BuildReportParams = {
  snapshot: unknown;
  economic?: unknown;
  reference?: ReferenceStore;
  engine?: RecommendationEngine;
  asOf?: Date;
  period_months?: PeriodMonths;
  logger?: RunLogger;
};

export function buildBusinessReport(params: BuildReportParams): BusinessReport {
  const logger = params.logger ?? new RunLogger({ persist: false });
  const elapsed = logger.startTimer();
  const periodMonths = params.period_months ?? getAnalysisConfig().period_months;
  logger.logEvent("report.started", { period_months: periodMonths });

  try {
    const snapshot = validateBusinessSnapshot(params.snapshot, periodMonths);
    const economic = validateEconomicSnapshot(params.economic);
    logger.logEvent("report.validated", {
      sector: snapshot.sector,
      location: snapshot.location,
      economic_data: economic !== undefined,
    });

    const reference = params.reference ?? getDefaultReferenceStore();
    const engine = params.engine ?? createRecommendationEngine(reference);
    const asOf = params.asOf ?? new Date();

    let startMs = Date.now();
    const analysis = analyzeBusiness(snapshot, economic, { reference, asOf });
    logger.logDuration("analysis.completed", startMs, {
      stages: [...STAGE_ORDER],
      overall_score: analysis.overall_score.overall_score,
      grade: analysis.overall_score.grade,
    });

    startMs = Date.now();
    const insights = generateInsights(analysis, snapshot, reference);
    logger.logDuration("insights.completed", startMs, {
      primary: insights.primary.type,
      problems: insights.problems.map((finding) => finding.type),
      opportunities: insights.opportunities.map((finding) => finding.type),
      location_score: insights.location.location_score,
    });

    startMs = Date.now();
    const immediate = engine.immediateActions(analysis, snapshot);
    const strategic = engine.strategicActions(analysis, snapshot);
    const investment = engine.investmentRecommendations(analysis, snapshot);
    const actionPlan = engine.actionPlan(analysis, snapshot);
    logger.logDuration("recommendations.completed", startMs, {
      immediate: immediate.length,
      strategic: strategic.length,
      investment_options: investment.options.length,
    });

    const report: BusinessReport = {
      report_version: REPORT_VERSION,
      generated_at: asOf.toISOString(),
      business_name: snapshot.business_name ?? null,
      reference: {
        version: reference.version,
        region: reference.region,
        currency: reference.currency,
      },
      analysis,
      insights,
      recommendations: {
        immediate,
        strategic,
        investment,
        action_plan: actionPlan,
      },
    };

    logger.logEvent("report.completed", { duration_ms: elapsed() });
    return report;
  } catch (error) {
    logger.logEvent("report.failed", {
      duration_ms: elapsed(),
      failure: toAnalysisFailureArtifact(error),
      error: RunLogger.serializeError(error),
    });
    throw error;
  }
}
