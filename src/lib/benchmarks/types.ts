/**
 * Benchmark reference types for comparing a business against sector and location peers
 */

import { z } from "zod";

export const SectorSchema = z.enum(["electronics", "textile", "auto", "food", "retail"]);
export type Sector = z.infer<typeof SectorSchema>;
export const SECTORS = SectorSchema.options;

export const LocationSchema = z.enum([
  "saddar",
  "clifton",
  "dha",
  "gulshan",
  "tariq_road",
  "korangi",
  "landhi",
  "north_karachi",
  "nazimabad",
]);
export type Location = z.infer<typeof LocationSchema>;
export const LOCATIONS = LocationSchema.options;

export const CompetitionLevelSchema = z.enum(["low", "medium", "high", "very_high"]);
export type CompetitionLevel = z.infer<typeof CompetitionLevelSchema>;

export const FootTrafficSchema = z.enum(["low", "medium", "high", "very_high"]);
export type FootTraffic = z.infer<typeof FootTrafficSchema>;

export const CustomerTypeSchema = z.enum([
  "affluent",
  "middle_class",
  "working_class",
  "price_conscious",
  "mixed",
]);
export type CustomerType = z.infer<typeof CustomerTypeSchema>;

export const RentLevelSchema = z.enum(["low", "medium", "medium_high", "high", "very_high"]);
export type RentLevel = z.infer<typeof RentLevelSchema>;

export const AccessibilitySchema = z.enum(["excellent", "good", "moderate", "poor"]);
export type Accessibility = z.infer<typeof AccessibilitySchema>;

export type EconomicIndicators = {
  policy_rate: number;
  inflation_rate: number;
  unemployment_rate: number;
  gdp_growth: number;
  consumer_confidence: number;
};

/**
 * Benchmark view for one sector/location/month, after fallbacks are applied.
 */
export type ResolvedBenchmark = {
  sector: Sector;
  location: Location;
  month: number;
  base_revenue: number;
  typical_profit_margin: number;
  growth_rate: number;
  productivity: number;
  location_multiplier: number;
  competition_level: CompetitionLevel;
  rent_factor: number;
  seasonal_factor: number;
  // base_revenue × location_multiplier × seasonal_factor
  market_average_revenue: number;
  fallback: {
    sector: boolean;
    location: boolean;
    month: boolean;
  };
};
