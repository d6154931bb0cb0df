import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  createReferenceStore,
  loadReferenceStore,
  loadReferenceStoreSync,
  parseReferenceData,
} from "@/src/lib/benchmarks/reference_store";
import { LOCATIONS, SECTORS } from "@/src/lib/benchmarks/types";
import { ReferenceDataError } from "@/src/lib/errors";
import { REFERENCE_PATH, TEST_REFERENCE } from "./helpers/analysis_fixtures";

let tempDir = "";

afterEach(() => {
  if (tempDir && fs.existsSync(tempDir)) {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
  tempDir = "";
});

describe("benchmark reference store", () => {
  it("exposes the data set version", () => {
    expect(TEST_REFERENCE.version).toBe("karachi_v1");
    expect(TEST_REFERENCE.currency).toBe("PKR");
  });

  it("ships an entry for every sector and location", () => {
    for (const sector of SECTORS) {
      expect(TEST_REFERENCE.sector(sector).fallback).toBe(false);
    }
    for (const location of LOCATIONS) {
      expect(TEST_REFERENCE.location(location).fallback).toBe(false);
    }
  });

  it("resolves sector, location and month into a market average", () => {
    const benchmark = TEST_REFERENCE.resolveBenchmark("food", "clifton", 1);
    expect(benchmark.base_revenue).toBe(600000);
    expect(benchmark.location_multiplier).toBe(1.5);
    expect(benchmark.seasonal_factor).toBe(1.0);
    expect(benchmark.market_average_revenue).toBe(900000);
    expect(benchmark.competition_level).toBe("high");
    expect(benchmark.fallback).toEqual({ sector: false, location: false, month: false });
  });

  it("applies the seasonal factor for the month", () => {
    expect(TEST_REFERENCE.seasonalFactor("electronics", 12)).toEqual({ factor: 1.4, fallback: false });
    expect(TEST_REFERENCE.seasonalFactor("textile", 10)).toEqual({ factor: 1.5, fallback: false });
  });

  it("falls back to a neutral factor for an unlisted location", () => {
    const benchmark = TEST_REFERENCE.resolveBenchmark("food", "korangi", 1);
    expect(benchmark.location_multiplier).toBe(1.0);
    expect(benchmark.competition_level).toBe("medium");
    expect(benchmark.fallback.location).toBe(true);
    expect(benchmark.market_average_revenue).toBe(600000);
  });

  it("falls back to a neutral seasonal factor for an invalid month", () => {
    expect(TEST_REFERENCE.seasonalFactor("food", 13)).toEqual({ factor: 1.0, fallback: true });
    expect(TEST_REFERENCE.seasonalFactor("food", 0)).toEqual({ factor: 1.0, fallback: true });
    expect(TEST_REFERENCE.seasonalFactor("food", 2.5)).toEqual({ factor: 1.0, fallback: true });
  });

  it("falls back to the default sector when a sector has no entry", () => {
    const retail = TEST_REFERENCE.sector("retail").reference;
    const store = createReferenceStore({ ...TEST_REFERENCE.data, sectors: { retail } });

    const resolved = store.sector("food");
    expect(resolved.key).toBe("retail");
    expect(resolved.fallback).toBe(true);

    const benchmark = store.resolveBenchmark("food", "saddar", 1);
    expect(benchmark.sector).toBe("retail");
    expect(benchmark.fallback.sector).toBe(true);
    // retail saddar 1.2, January 1.1
    expect(benchmark.market_average_revenue).toBeCloseTo(500000 * 1.2 * 1.1, 6);
  });

  it("falls back to a synthetic location entry", () => {
    const locations = { saddar: TEST_REFERENCE.location("saddar").reference };
    const store = createReferenceStore({ ...TEST_REFERENCE.data, locations });

    const resolved = store.location("landhi");
    expect(resolved.fallback).toBe(true);
    expect(resolved.reference.expansion_target).toBe("gulshan");
    expect(resolved.reference.competition).toBe("medium");
  });

  it("freezes the loaded tables", () => {
    expect(Object.isFrozen(TEST_REFERENCE)).toBe(true);
    expect(Object.isFrozen(TEST_REFERENCE.data)).toBe(true);
    expect(Object.isFrozen(TEST_REFERENCE.sector("food").reference.seasonal_factors)).toBe(true);
  });

  it("returns copies of the economic indicators", () => {
    const neutral = TEST_REFERENCE.neutralIndicators();
    neutral.policy_rate = 0.5;
    expect(TEST_REFERENCE.neutralIndicators().policy_rate).toBe(0.15);
    expect(TEST_REFERENCE.currentIndicators().inflation_rate).toBe(0.29);
  });

  it("rejects malformed reference data", () => {
    let caught: unknown;
    try {
      parseReferenceData({ version: "broken" }, "inline.json");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ReferenceDataError);
    if (caught instanceof ReferenceDataError) {
      expect(caught.code).toBe("REFERENCE_DATA_INVALID");
      expect(caught.source_path).toBe("inline.json");
      expect(caught.issues.length).toBeGreaterThan(0);
    }
  });

  it("reports a missing reference file", () => {
    const missing = path.join(os.tmpdir(), "no-such-dir", "reference.json");
    expect(() => loadReferenceStoreSync(missing)).toThrowError(
      expect.objectContaining({ code: "REFERENCE_DATA_MISSING" })
    );
  });

  it("reports a reference file that is not JSON", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "reference-store-"));
    const filePath = path.join(tempDir, "reference.json");
    fs.writeFileSync(filePath, "{ not json");
    expect(() => loadReferenceStoreSync(filePath)).toThrowError(
      expect.objectContaining({ code: "REFERENCE_DATA_INVALID" })
    );
  });

  it("loads asynchronously", async () => {
    const store = await loadReferenceStore(REFERENCE_PATH);
    expect(store.sector("electronics").reference.average_monthly_revenue).toBe(750000);
  });
});
