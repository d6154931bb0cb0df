import type { AnalysisResult } from "../analysis/types";
import type { LocationCondition, LocationReference } from "../benchmarks/reference_schema";
import type { ReferenceStore } from "../benchmarks/reference_store";
import type { CompetitionLevel, CustomerType, FootTraffic, Location, RentLevel } from "../benchmarks/types";
import type { BusinessSnapshot } from "../business/schema";
import type { LocationInsights, LocationOpportunity, SpendingPower } from "./types";

export const MAX_LOCATION_INSIGHTS = 5;
export const MAX_LOCATION_OPPORTUNITIES = 4;
export const MAX_LOCATION_NOTES = 3;

const TRAFFIC_POINTS: Record<FootTraffic, number> = { very_high: 25, high: 20, medium: 15, low: 10 };
const COMPETITION_POINTS: Record<CompetitionLevel, number> = { low: 25, medium: 20, high: 15, very_high: 10 };
const RENT_POINTS: Record<RentLevel, number> = { low: 25, medium: 20, medium_high: 15, high: 10, very_high: 5 };

const SPENDING_POWER: Record<CustomerType, SpendingPower> = {
  affluent: "high",
  middle_class: "medium",
  working_class: "low",
  price_conscious: "low",
  mixed: "medium",
};

const COMPETITION_INSIGHTS: Record<CompetitionLevel, (label: string) => string> = {
  very_high: (label) => `Very high competition in ${label}; differentiation matters more than price.`,
  high: (label) => `High competition in ${label}; pricing has to stay competitive.`,
  medium: (label) => `Moderate competition in ${label} leaves room to grow.`,
  low: (label) => `Low competition in ${label} makes it a strong place to expand.`,
};

const EXPENSIVE_RENT: readonly RentLevel[] = ["high", "very_high"];
const OPEN_COMPETITION: readonly CompetitionLevel[] = ["low", "medium"];

export function matchesLocation(condition: LocationCondition, location: Location, reference: LocationReference) {
  if (condition.locations && !condition.locations.includes(location)) return false;
  if (condition.customer_type && condition.customer_type !== reference.customer_type) return false;
  if (condition.foot_traffic && condition.foot_traffic !== reference.foot_traffic) return false;
  if (condition.accessibility && condition.accessibility !== reference.accessibility) return false;
  return true;
}

function humanize(id: string) {
  const words = id.replace(/_/g, " ");
  return words.charAt(0).toUpperCase() + words.slice(1);
}

function areaInsights(area: LocationReference): string[] {
  const label = area.label;
  const insights = [COMPETITION_INSIGHTS[area.competition](label)];

  insights.push(
    EXPENSIVE_RENT.includes(area.rent_level)
      ? `Rents in ${label} are high; pricing has to carry the premium.`
      : `Rents in ${label} are reasonable, a cost advantage over pricier areas.`
  );

  if (area.customer_type === "affluent") {
    insights.push(`Customers in ${label} are affluent; quality and service win them.`);
  } else if (area.customer_type === "price_conscious") {
    insights.push(`Customers in ${label} are price-conscious; competitive pricing is crucial.`);
  }

  if (area.foot_traffic === "very_high") {
    insights.push(`Foot traffic in ${label} is excellent; convert more walk-ins.`);
  } else if (area.foot_traffic === "high") {
    insights.push(`Foot traffic in ${label} is good; invest in visibility.`);
  }
  return insights;
}

/**
 * Suitability of the area for the sector, 0-100: traffic, competition and rent
 * points plus the sector's fit bonus when its condition holds.
 */
export function locationScore(
  area: LocationReference,
  location: Location,
  bonus: (LocationCondition & { points: number }) | null
) {
  const base = TRAFFIC_POINTS[area.foot_traffic] + COMPETITION_POINTS[area.competition] + RENT_POINTS[area.rent_level];
  const extra = bonus && matchesLocation(bonus, location, area) ? bonus.points : 0;
  return Math.min(100, base + extra);
}

function locationOpportunities(area: LocationReference, growthAreas: readonly string[], sectorLabel: string) {
  const found: LocationOpportunity[] = [];
  if (area.customer_type === "affluent") {
    found.push({
      type: "premium_positioning",
      title: "Premium service strategy",
      description: `Target ${area.label}'s affluent customers with premium products and service.`,
      timeframe: "2-3 months",
    });
  }
  if (OPEN_COMPETITION.includes(area.competition)) {
    found.push({
      type: "market_share_growth",
      title: "Grow market share",
      description: `Lower competition in ${area.label} allows for aggressive growth.`,
      timeframe: "3-6 months",
    });
  }
  for (const growthArea of growthAreas) {
    found.push({
      type: "sector_growth_area",
      title: humanize(growthArea),
      description: `A growing line for ${sectorLabel.toLowerCase()} businesses.`,
      timeframe: "2-4 months",
    });
  }
  return found.slice(0, MAX_LOCATION_OPPORTUNITIES);
}

export function buildLocationInsights(
  result: AnalysisResult,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore
): LocationInsights {
  const { key: sectorKey, reference: sector } = reference.sector(snapshot.sector);
  const { reference: area, fallback } = reference.location(snapshot.location);
  const { factor } = reference.locationFactor(sectorKey, snapshot.location);

  const sectorAdvice = sector.location_advice
    .filter((advice) => matchesLocation(advice, snapshot.location, area))
    .map((advice) => advice.message);

  const businessVolatility = result.performance_metrics.revenue_volatility;

  return {
    location: snapshot.location,
    label: area.label,
    reference_fallback: fallback,
    is_optimal_location: area.best_sectors.includes(sectorKey),
    best_sectors: [...area.best_sectors],
    location_score: locationScore(area, snapshot.location, sector.location_fit_bonus),
    key_insights: [...areaInsights(area), ...sectorAdvice].slice(0, MAX_LOCATION_INSIGHTS),
    advantages: area.advantages.slice(0, MAX_LOCATION_NOTES),
    challenges: area.challenges.slice(0, MAX_LOCATION_NOTES),
    customer_profile: {
      type: area.customer_type,
      foot_traffic: area.foot_traffic,
      spending_power: SPENDING_POWER[area.customer_type],
    },
    cost_structure: {
      rent_level: area.rent_level,
      rent_factor: factor.rent_factor,
      competition_pressure: area.competition,
      accessibility: area.accessibility,
    },
    success_factors: [...sector.success_factors],
    revenue_volatility: {
      business: businessVolatility,
      sector_typical: sector.volatility,
      above_typical: businessVolatility > sector.volatility,
    },
    growth_opportunities: locationOpportunities(area, sector.growth_opportunities, sector.label),
  };
}
