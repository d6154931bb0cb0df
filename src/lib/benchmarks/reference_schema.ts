import { z } from "zod";

import {
  AccessibilitySchema,
  CompetitionLevelSchema,
  CustomerTypeSchema,
  FootTrafficSchema,
  LocationSchema,
  RentLevelSchema,
  SectorSchema,
} from "./types";

const RateSchema = z.number().finite();
const ProportionSchema = z.number().finite().min(0).max(1);
const AmountSchema = z.number().finite().min(0);
const ScoreSchema = z.number().finite().min(0).max(100);
const DifficultySchema = z.enum(["easy", "medium", "hard"]);

export const EconomicIndicatorsSchema = z.object({
  policy_rate: RateSchema,
  inflation_rate: RateSchema,
  unemployment_rate: RateSchema,
  gdp_growth: RateSchema,
  consumer_confidence: z.number().finite().min(0),
});

export const LocationFactorSchema = z.object({
  multiplier: z.number().finite().positive(),
  competition: CompetitionLevelSchema,
  rent_factor: z.number().finite().positive(),
});
export type LocationFactor = z.infer<typeof LocationFactorSchema>;

export const RevenuePlaySchema = z.object({
  category: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1),
  specific_actions: z.array(z.string().min(1)).min(1),
  timeframe: z.string().min(1),
  investment_required: AmountSchema,
  benefit_basis: z.enum(["revenue_gap", "current_revenue"]),
  benefit_multiplier: z.number().finite().min(0),
  impact_score: ScoreSchema,
  difficulty: DifficultySchema,
  requires_peak_season: z.boolean(),
});
export type RevenuePlay = z.infer<typeof RevenuePlaySchema>;

export const LocalExpansionSchema = z.object({
  locations: z.array(LocationSchema).min(1),
  category: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1),
  specific_actions: z.array(z.string().min(1)).min(1),
  timeframe: z.string().min(1),
  investment_required: AmountSchema,
  benefit_multiplier: z.number().finite().min(0),
  impact_score: ScoreSchema,
  difficulty: DifficultySchema,
});
export type LocalExpansion = z.infer<typeof LocalExpansionSchema>;

// Every condition given must hold; an entry with none always applies.
const LocationConditionSchema = z.object({
  locations: z.array(LocationSchema).min(1).optional(),
  customer_type: CustomerTypeSchema.optional(),
  foot_traffic: FootTrafficSchema.optional(),
  accessibility: AccessibilitySchema.optional(),
});
export type LocationCondition = z.infer<typeof LocationConditionSchema>;

export const LocationAdviceSchema = LocationConditionSchema.extend({
  message: z.string().min(1),
});
export type LocationAdvice = z.infer<typeof LocationAdviceSchema>;

export const LocationFitBonusSchema = LocationConditionSchema.extend({
  points: z.number().finite(),
});

export const SectorReferenceSchema = z.object({
  label: z.string().min(1),
  average_monthly_revenue: AmountSchema,
  typical_profit_margin: ProportionSchema,
  growth_rate: RateSchema,
  volatility: z.number().finite().min(0),
  productivity: AmountSchema,
  market_risk: ScoreSchema,
  competition_intensity: ProportionSchema,
  seasonal_factors: z.array(z.number().finite().positive()).length(12),
  location_factors: z.record(LocationSchema, LocationFactorSchema),
  sensitivity: z.object({
    interest_rate: RateSchema,
    inflation: RateSchema,
    employment: RateSchema,
    consumer_confidence: RateSchema,
    gdp: RateSchema,
  }),
  high_margin_products: z.array(z.string().min(1)).min(1),
  growth_opportunities: z.array(z.string().min(1)),
  common_challenges: z.array(z.string().min(1)),
  success_factors: z.array(z.string().min(1)),
  location_advice: z.array(LocationAdviceSchema),
  location_fit_bonus: LocationFitBonusSchema.nullable(),
  expansion_investment: AmountSchema,
  reinvestment_focus: z.string().min(1),
  revenue_play: RevenuePlaySchema.nullable(),
  local_expansion: LocalExpansionSchema.nullable(),
});
export type SectorReference = z.infer<typeof SectorReferenceSchema>;

export const LocationReferenceSchema = z.object({
  label: z.string().min(1),
  foot_traffic: FootTrafficSchema,
  customer_type: CustomerTypeSchema,
  rent_level: RentLevelSchema,
  competition: CompetitionLevelSchema,
  accessibility: AccessibilitySchema,
  best_sectors: z.array(SectorSchema),
  expansion_target: LocationSchema,
  advantages: z.array(z.string().min(1)),
  challenges: z.array(z.string().min(1)),
});
export type LocationReference = z.infer<typeof LocationReferenceSchema>;

export const ReferenceDataSchema = z
  .object({
    version: z.string().min(1),
    region: z.string().min(1),
    currency: z.string().min(1),
    default_sector: SectorSchema,
    default_location_factor: LocationFactorSchema,
    default_expansion_target: LocationSchema,
    thresholds: z.object({
      revenue_per_employee: z.object({
        high: AmountSchema,
        strong: AmountSchema,
        solid: AmountSchema,
        low: AmountSchema,
      }),
      scalability_reference: z.number().finite().positive(),
      minimum_investable_capital: AmountSchema,
    }),
    economic: z.object({
      neutral: EconomicIndicatorsSchema,
      current: EconomicIndicatorsSchema,
    }),
    sectors: z.record(SectorSchema, SectorReferenceSchema),
    locations: z.record(LocationSchema, LocationReferenceSchema),
  })
  .refine((data) => data.sectors[data.default_sector] !== undefined, {
    message: "default_sector must be present in sectors",
    path: ["default_sector"],
  });

export type ReferenceData = z.infer<typeof ReferenceDataSchema>;
