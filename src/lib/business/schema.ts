import { z, type ZodError } from "zod";

import { LocationSchema, SectorSchema } from "../benchmarks/types";
import { DEFAULT_PERIOD_MONTHS, type PeriodMonths } from "../config/analysis_config";
import { SnapshotValidationError } from "../errors";

const AmountSchema = z.number().finite().min(0);

export const EconomicSnapshotSchema = z
  .object({
    policy_rate: z.number().finite().optional(),
    inflation_rate: z.number().finite().optional(),
    unemployment_rate: z.number().finite().min(0).optional(),
    gdp_growth: z.number().finite().optional(),
    consumer_confidence: z.number().finite().min(0).optional(),
  })
  .strict();
export type EconomicSnapshot = z.infer<typeof EconomicSnapshotSchema>;

export const BusinessSnapshotSchema = z.object({
  business_name: z.string().optional(),
  sector: SectorSchema,
  location: LocationSchema,
  monthly_revenue: z.array(AmountSchema),
  monthly_expenses: z.union([AmountSchema, z.array(AmountSchema)]),
  current_cash: AmountSchema,
  employee_count: z.number().int().min(0),
  years_in_business: z.number().finite().min(0),
  challenges: z.array(z.string()).default([]),
  goals: z.array(z.string()).default([]),
});
export type BusinessSnapshot = z.infer<typeof BusinessSnapshotSchema>;

export const REQUIRED_SNAPSHOT_FIELDS = [
  "sector",
  "location",
  "monthly_revenue",
  "monthly_expenses",
  "current_cash",
  "employee_count",
  "years_in_business",
] as const;

export function businessSnapshotSchema(periodMonths: PeriodMonths = DEFAULT_PERIOD_MONTHS) {
  return BusinessSnapshotSchema.superRefine((snapshot, ctx) => {
    if (snapshot.monthly_revenue.length !== periodMonths) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["monthly_revenue"],
        message: `Expected ${periodMonths} monthly values, received ${snapshot.monthly_revenue.length}`,
      });
    }
    if (Array.isArray(snapshot.monthly_expenses) && snapshot.monthly_expenses.length !== periodMonths) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["monthly_expenses"],
        message: `Expected ${periodMonths} monthly values, received ${snapshot.monthly_expenses.length}`,
      });
    }
  });
}

function formatIssues(error: ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function isMissingFieldIssue(error: ZodError) {
  return error.issues.some(
    (issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined"
  );
}

export function validateBusinessSnapshot(
  raw: unknown,
  periodMonths: PeriodMonths = DEFAULT_PERIOD_MONTHS
): BusinessSnapshot {
  const parsed = businessSnapshotSchema(periodMonths).safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotValidationError({
      code: isMissingFieldIssue(parsed.error) ? "REQUIRED_FIELD_MISSING" : "SNAPSHOT_INVALID",
      reason: "Business snapshot failed validation",
      issues: formatIssues(parsed.error),
    });
  }
  return parsed.data;
}

export function validateEconomicSnapshot(raw: unknown): EconomicSnapshot | undefined {
  if (raw === undefined || raw === null) return undefined;
  const parsed = EconomicSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotValidationError({
      reason: "Economic snapshot failed validation",
      issues: formatIssues(parsed.error),
    });
  }
  return parsed.data;
}

/**
 * Guards snapshots that reach the analyzer without passing through validation.
 */
export function assertRequiredFields(snapshot: BusinessSnapshot) {
  const fields: Record<string, unknown> = { ...snapshot };
  const missing = REQUIRED_SNAPSHOT_FIELDS.filter((field) => fields[field] === undefined || fields[field] === null);
  if (missing.length > 0) {
    throw new SnapshotValidationError({
      code: "REQUIRED_FIELD_MISSING",
      reason: `Business snapshot is missing required fields: ${missing.join(", ")}`,
      issues: missing.map((field) => `${field}: Required`),
    });
  }
}

export function currentExpenses(snapshot: Pick<BusinessSnapshot, "monthly_expenses">) {
  const expenses = snapshot.monthly_expenses;
  if (typeof expenses === "number") return expenses;
  return expenses[expenses.length - 1] ?? 0;
}

export function currentRevenue(snapshot: Pick<BusinessSnapshot, "monthly_revenue">) {
  return snapshot.monthly_revenue[snapshot.monthly_revenue.length - 1] ?? 0;
}
