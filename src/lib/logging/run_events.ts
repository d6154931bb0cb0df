import type { StageName } from "../analysis/contracts";
import type { Grade } from "../analysis/types";
import type { Location, Sector } from "../benchmarks/types";
import type { AnalysisFailureArtifact } from "../errors";
import type { InsightType, OpportunityType, ProblemType } from "../insights/types";

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
  cause?: unknown;
};

/**
 * Payload carried by each report run event, keyed by event type.
 */
export type RunEventPayloads = {
  "report.started": { period_months: number };
  "report.validated": { sector: Sector; location: Location; economic_data: boolean };
  "analysis.completed": { stages: StageName[]; overall_score: number; grade: Grade };
  "insights.completed": {
    primary: InsightType;
    problems: ProblemType[];
    opportunities: OpportunityType[];
    location_score: number;
  };
  "recommendations.completed": { immediate: number; strategic: number; investment_options: number };
  "report.completed": { duration_ms: number };
  "report.failed": { duration_ms: number; failure: AnalysisFailureArtifact; error: SerializedError };
};

export type RunEventType = keyof RunEventPayloads;
