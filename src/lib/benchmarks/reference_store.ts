/**
 * Benchmark reference store
 *
 * Loads the versioned sector/location/month tables once, validates them, and
 * freezes the result. All lookups go through the resolvers below, which fall
 * back to documented defaults instead of throwing.
 */

import fs from "node:fs";
import fsp from "node:fs/promises";

import type { ZodError } from "zod";

import { getAnalysisConfig } from "../config/analysis_config";
import { ReferenceDataError } from "../errors";
import {
  ReferenceDataSchema,
  type LocationFactor,
  type LocationReference,
  type ReferenceData,
  type SectorReference,
} from "./reference_schema";
import type { EconomicIndicators, Location, ResolvedBenchmark, Sector } from "./types";

export type ReferenceStore = {
  version: string;
  region: string;
  currency: string;
  data: ReferenceData;
  sector(sector: Sector): { key: Sector; reference: SectorReference; fallback: boolean };
  location(location: Location): { reference: LocationReference; fallback: boolean };
  locationFactor(sector: Sector, location: Location): { factor: LocationFactor; fallback: boolean };
  seasonalFactor(sector: Sector, month: number): { factor: number; fallback: boolean };
  resolveBenchmark(sector: Sector, location: Location, month: number): ResolvedBenchmark;
  neutralIndicators(): EconomicIndicators;
  currentIndicators(): EconomicIndicators;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function describeIssues(error: ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseReferenceData(raw: unknown, sourcePath = "(inline)"): ReferenceData {
  const parsed = ReferenceDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReferenceDataError({
      code: "REFERENCE_DATA_INVALID",
      reason: "Benchmark reference data failed validation",
      source_path: sourcePath,
      issues: describeIssues(parsed.error),
    });
  }
  return parsed.data;
}

export function createReferenceStore(input: ReferenceData): ReferenceStore {
  const data = deepFreeze(structuredClone(input));

  const defaultKey = data.default_sector;
  const defaultSector = data.sectors[defaultKey];
  if (!defaultSector) {
    throw new ReferenceDataError({
      code: "REFERENCE_DATA_INVALID",
      reason: `Default sector "${defaultKey}" has no reference entry`,
      source_path: "(inline)",
    });
  }

  const sector: ReferenceStore["sector"] = (key) => {
    const reference = data.sectors[key];
    if (reference) return { key, reference, fallback: false };
    return { key: defaultKey, reference: defaultSector, fallback: true };
  };

  const location: ReferenceStore["location"] = (key) => {
    const reference = data.locations[key];
    if (reference) return { reference, fallback: false };
    return {
      reference: {
        label: key,
        foot_traffic: "medium",
        customer_type: "mixed",
        rent_level: "medium",
        competition: data.default_location_factor.competition,
        accessibility: "good",
        best_sectors: [],
        expansion_target: data.default_expansion_target,
        advantages: [],
        challenges: [],
      },
      fallback: true,
    };
  };

  const locationFactor: ReferenceStore["locationFactor"] = (sectorKey, locationKey) => {
    const factor = sector(sectorKey).reference.location_factors[locationKey];
    if (factor) return { factor, fallback: false };
    return { factor: data.default_location_factor, fallback: true };
  };

  const seasonalFactor: ReferenceStore["seasonalFactor"] = (sectorKey, month) => {
    const factors = sector(sectorKey).reference.seasonal_factors;
    const factor = Number.isInteger(month) ? factors[month - 1] : undefined;
    if (factor === undefined) return { factor: 1.0, fallback: true };
    return { factor, fallback: false };
  };

  const resolveBenchmark: ReferenceStore["resolveBenchmark"] = (sectorKey, locationKey, month) => {
    const resolvedSector = sector(sectorKey);
    const resolvedLocation = locationFactor(sectorKey, locationKey);
    const seasonal = seasonalFactor(sectorKey, month);
    const reference = resolvedSector.reference;

    return {
      sector: resolvedSector.key,
      location: locationKey,
      month,
      base_revenue: reference.average_monthly_revenue,
      typical_profit_margin: reference.typical_profit_margin,
      growth_rate: reference.growth_rate,
      productivity: reference.productivity,
      location_multiplier: resolvedLocation.factor.multiplier,
      competition_level: resolvedLocation.factor.competition,
      rent_factor: resolvedLocation.factor.rent_factor,
      seasonal_factor: seasonal.factor,
      market_average_revenue:
        reference.average_monthly_revenue * resolvedLocation.factor.multiplier * seasonal.factor,
      fallback: {
        sector: resolvedSector.fallback,
        location: resolvedLocation.fallback,
        month: seasonal.fallback,
      },
    };
  };

  return Object.freeze({
    version: data.version,
    region: data.region,
    currency: data.currency,
    data,
    sector,
    location,
    locationFactor,
    seasonalFactor,
    resolveBenchmark,
    neutralIndicators: () => ({ ...data.economic.neutral }),
    currentIndicators: () => ({ ...data.economic.current }),
  });
}

function readJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ReferenceDataError({
      code: "REFERENCE_DATA_INVALID",
      reason: "Benchmark reference file is not valid JSON",
      source_path: filePath,
      cause: error,
    });
  }
}

function missingFile(filePath: string, error: unknown) {
  return new ReferenceDataError({
    code: "REFERENCE_DATA_MISSING",
    reason: "Benchmark reference file could not be read",
    source_path: filePath,
    cause: error,
  });
}

export async function loadReferenceStore(filePath: string): Promise<ReferenceStore> {
  let raw: string;
  try {
    raw = await fsp.readFile(filePath, "utf8");
  } catch (error) {
    throw missingFile(filePath, error);
  }
  return createReferenceStore(parseReferenceData(readJson(raw, filePath), filePath));
}

export function loadReferenceStoreSync(filePath: string): ReferenceStore {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw missingFile(filePath, error);
  }
  return createReferenceStore(parseReferenceData(readJson(raw, filePath), filePath));
}

let cached: ReferenceStore | null = null;

/**
 * Store loaded from the configured reference path, read on first use.
 */
export function getDefaultReferenceStore(): ReferenceStore {
  if (cached) return cached;
  cached = loadReferenceStoreSync(getAnalysisConfig().benchmark_reference_path);
  return cached;
}
