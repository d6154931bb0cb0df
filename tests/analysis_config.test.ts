import { describe, it, expect } from "vitest";
import path from "node:path";
import { defaultReferencePath, getAnalysisConfig } from "@/src/lib/config/analysis_config";

describe("analysis config", () => {
  it("uses defaults when nothing is set", () => {
    const config = getAnalysisConfig({});
    expect(config.period_months).toBe(6);
    expect(config.benchmark_reference_path).toBe(defaultReferencePath());
    expect(config.log_dir).toBe(path.resolve("runs"));
    expect(config.run_logs_enabled).toBe(false);
  });

  it("reads overrides from the environment", () => {
    const config = getAnalysisConfig({
      ANALYSIS_PERIOD_MONTHS: "12",
      BENCHMARK_REFERENCE_PATH: " /tmp/reference.json ",
      ANALYSIS_LOG_DIR: "/tmp/analysis-logs",
      ANALYSIS_RUN_LOGS: "ON",
    });
    expect(config.period_months).toBe(12);
    expect(config.benchmark_reference_path).toBe("/tmp/reference.json");
    expect(config.log_dir).toBe("/tmp/analysis-logs");
    expect(config.run_logs_enabled).toBe(true);
  });

  it("falls back to six months for unsupported periods", () => {
    expect(getAnalysisConfig({ ANALYSIS_PERIOD_MONTHS: "9" }).period_months).toBe(6);
    expect(getAnalysisConfig({ ANALYSIS_PERIOD_MONTHS: "soon" }).period_months).toBe(6);
  });

  it("points the default reference path at the fixtures directory", () => {
    expect(defaultReferencePath("/srv/app")).toBe(path.join("/srv/app", "fixtures", "benchmarks", "reference_v1.json"));
  });
});
