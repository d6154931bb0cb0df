import path from "node:path";

export type PeriodMonths = 6 | 12;

export type AnalysisConfig = {
  period_months: PeriodMonths;
  benchmark_reference_path: string;
  log_dir: string;
  run_logs_enabled: boolean;
};

export const DEFAULT_PERIOD_MONTHS: PeriodMonths = 6;

function readNumber(value: string | undefined, fallback: number) {
  if (value === undefined) return fallback;
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
}

function readPeriod(value: string | undefined): PeriodMonths {
  const months = readNumber(value, DEFAULT_PERIOD_MONTHS);
  return months === 12 ? 12 : DEFAULT_PERIOD_MONTHS;
}

export function defaultReferencePath(cwd = process.cwd()) {
  return path.join(cwd, "fixtures", "benchmarks", "reference_v1.json");
}

export function getAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const referenceRaw = env.BENCHMARK_REFERENCE_PATH?.trim();
  const logDirRaw = env.ANALYSIS_LOG_DIR?.trim();
  const runLogsRaw = (env.ANALYSIS_RUN_LOGS ?? "off").toLowerCase();

  return {
    period_months: readPeriod(env.ANALYSIS_PERIOD_MONTHS),
    benchmark_reference_path: referenceRaw ? path.resolve(referenceRaw) : defaultReferencePath(),
    log_dir: path.resolve(logDirRaw || "runs"),
    run_logs_enabled: runLogsRaw === "on" || runLogsRaw === "true" || runLogsRaw === "1",
  };
}
