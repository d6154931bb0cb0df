import fs from "node:fs";
import path from "node:path";
import minimist from "minimist";
import { getDefaultReferenceStore } from "../src/lib/benchmarks/reference_store";
import { getAnalysisConfig } from "../src/lib/config/analysis_config";
import { toAnalysisFailureArtifact } from "../src/lib/errors";
import { RunLogger } from "../src/lib/logging/run_logger";
import { buildBusinessReport } from "../src/lib/report/build_report";

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(filePath), "utf8"));
}

function parseMonth(value: unknown) {
  if (value === undefined) return undefined;
  const month = Number(value);
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new Error(`--month must be an integer between 1 and 12, got ${String(value)}`);
  }
  return month;
}

async function run() {
  const args = minimist(process.argv.slice(2), {
    string: ["input", "economic", "month"],
    boolean: ["reference-economy", "log"],
    alias: { i: "input", e: "economic" },
  });
  const input = args.input;
  if (!input) {
    console.error("Usage: tsx scripts/analyze_business.ts --input <snapshot.json> [--economic <file>] [--reference-economy] [--month <1-12>] [--log]");
    process.exit(1);
  }

  const config = getAnalysisConfig();
  const reference = getDefaultReferenceStore();
  const economic = args.economic
    ? readJson(args.economic)
    : args["reference-economy"]
      ? reference.currentIndicators()
      : undefined;

  const month = parseMonth(args.month);
  const asOf = new Date();
  if (month !== undefined) asOf.setUTCMonth(month - 1, 15);

  const logger = new RunLogger({
    log_dir: config.log_dir,
    persist: args.log === true || config.run_logs_enabled,
  });

  const report = buildBusinessReport({
    snapshot: readJson(input),
    economic,
    reference,
    asOf,
    period_months: config.period_months,
    logger,
  });
  console.log(JSON.stringify(report, null, 2));
  if (logger.persist) console.error(`Run log written to ${logger.log_path}`);
}

run().catch((error) => {
  console.error(JSON.stringify(toAnalysisFailureArtifact(error), null, 2));
  process.exit(1);
});
