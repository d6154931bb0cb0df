export type AnalysisErrorCode =
  | "SNAPSHOT_INVALID"
  | "REQUIRED_FIELD_MISSING"
  | "REFERENCE_DATA_MISSING"
  | "REFERENCE_DATA_INVALID";

export type AnalysisFailureArtifact = {
  code: AnalysisErrorCode | "UNEXPECTED_FAILURE";
  reason: string;
  issues: string[];
  next_action: string;
};

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly issues: string[];
  readonly next_action: string;

  constructor(params: {
    code: AnalysisErrorCode;
    reason: string;
    issues?: string[];
    next_action: string;
    cause?: unknown;
  }) {
    super(params.reason, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "AnalysisError";
    this.code = params.code;
    this.issues = params.issues ?? [];
    this.next_action = params.next_action;
  }

  toFailureArtifact(): AnalysisFailureArtifact {
    return {
      code: this.code,
      reason: this.message,
      issues: this.issues,
      next_action: this.next_action,
    };
  }
}

export class SnapshotValidationError extends AnalysisError {
  constructor(params: {
    code?: "SNAPSHOT_INVALID" | "REQUIRED_FIELD_MISSING";
    reason: string;
    issues?: string[];
  }) {
    super({
      code: params.code ?? "SNAPSHOT_INVALID",
      reason: params.reason,
      issues: params.issues,
      next_action: "Correct the listed business snapshot fields and rerun the analysis.",
    });
    this.name = "SnapshotValidationError";
  }
}

export class ReferenceDataError extends AnalysisError {
  readonly source_path: string;

  constructor(params: {
    code: "REFERENCE_DATA_MISSING" | "REFERENCE_DATA_INVALID";
    reason: string;
    source_path: string;
    issues?: string[];
    cause?: unknown;
  }) {
    super({
      code: params.code,
      reason: params.reason,
      issues: params.issues,
      cause: params.cause,
      next_action: `Check the benchmark reference file at ${params.source_path} (BENCHMARK_REFERENCE_PATH).`,
    });
    this.name = "ReferenceDataError";
    this.source_path = params.source_path;
  }
}

export function toAnalysisFailureArtifact(error: unknown): AnalysisFailureArtifact {
  if (error instanceof AnalysisError) {
    return error.toFailureArtifact();
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    code: "UNEXPECTED_FAILURE",
    reason,
    issues: [],
    next_action: "Review the run log for the failing step and rerun the analysis.",
  };
}
