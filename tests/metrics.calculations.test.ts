import { describe, it, expect } from "vitest";
import {
  averagePeriodGrowth,
  cashRunway,
  clamp,
  correlation,
  growthRate,
  mean,
  movingAverage,
  normalizeScore,
  percentileRank,
  populationStdDev,
  profitMargin,
  safeDivide,
  sampleStdDev,
  seasonalIndex,
  simpleForecast,
  smoothValues,
  trendDirection,
  volatility,
  zScore,
} from "@/src/lib/metrics/calculations";

describe("metrics calculations", () => {
  describe("growthRate", () => {
    it("computes compound growth per period", () => {
      expect(growthRate([100, 121])).toBeCloseTo(0.21, 10);
      expect(growthRate([100, 110, 121])).toBeCloseTo(0.1, 10);
    });

    it("returns 0 for short series or a non-positive start", () => {
      expect(growthRate([])).toBe(0);
      expect(growthRate([500])).toBe(0);
      expect(growthRate([0, 100, 200])).toBe(0);
    });

    it("returns -1 when the series ends at zero", () => {
      expect(growthRate([100, 50, 0])).toBe(-1);
    });
  });

  it("averages period-over-period changes", () => {
    expect(averagePeriodGrowth([100, 110, 121])).toBeCloseTo(0.1, 10);
    expect(averagePeriodGrowth([0, 100, 150])).toBeCloseTo(0.5, 10);
    expect(averagePeriodGrowth([42])).toBe(0);
  });

  describe("volatility", () => {
    it("is zero for a constant series", () => {
      expect(volatility([500, 500, 500, 500])).toBe(0);
    });

    it("uses the sample standard deviation over the mean", () => {
      // mean 150, sample sd sqrt(5000)
      expect(volatility([100, 200])).toBeCloseTo(Math.sqrt(5000) / 150, 10);
    });

    it("is zero for degenerate input", () => {
      expect(volatility([])).toBe(0);
      expect(volatility([7])).toBe(0);
      expect(volatility([0, 0, 0])).toBe(0);
    });
  });

  describe("trendDirection", () => {
    it("needs at least three points", () => {
      expect(trendDirection([1, 2])).toBe("insufficient_data");
    });

    it("classifies by regression slope", () => {
      expect(trendDirection([100, 200, 300])).toBe("increasing");
      expect(trendDirection([300, 200, 100])).toBe("declining");
      expect(trendDirection([100, 100, 100])).toBe("stable");
    });

    it("treats slopes inside the threshold as stable", () => {
      expect(trendDirection([1, 1.02, 1.04])).toBe("stable");
    });
  });

  it("floors profit margin at zero and handles zero revenue", () => {
    expect(profitMargin(1000, 800)).toBeCloseTo(0.2, 10);
    expect(profitMargin(1000, 1500)).toBe(0);
    expect(profitMargin(0, 100)).toBe(0);
  });

  it("computes cash runway", () => {
    expect(cashRunway(300, 100)).toBe(3);
    expect(cashRunway(0, 100000)).toBe(0);
    expect(cashRunway(500, 0)).toBe(Number.POSITIVE_INFINITY);
  });

  it("ranks a value within a dataset", () => {
    expect(percentileRank(3, [1, 2, 3, 4])).toBe(62.5);
    expect(percentileRank(10, [])).toBe(50);
  });

  it("measures correlation", () => {
    expect(correlation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(correlation([1, 2, 3], [6, 4, 2])).toBeCloseTo(-1, 10);
    expect(correlation([1, 1, 1], [1, 2, 3])).toBe(0);
    expect(correlation([1, 2], [1])).toBe(0);
  });

  it("smooths values exponentially from the first point", () => {
    const smoothed = smoothValues([10, 20], 0.5);
    expect(smoothed).toEqual([10, 15]);
  });

  it("computes moving averages", () => {
    expect(movingAverage([1, 2, 3, 4], 2)).toEqual([1.5, 2.5, 3.5]);
    expect(movingAverage([1, 2], 3)).toEqual([]);
    expect(movingAverage([1, 2], 0)).toEqual([]);
  });

  it("computes z-scores and seasonal indices", () => {
    expect(zScore(5, [5, 5, 5])).toBe(0);
    expect(zScore(3, [1, 3, 5])).toBe(0);
    expect(seasonalIndex([50, 150])).toEqual([0.5, 1.5]);
    expect(seasonalIndex([0, 0])).toEqual([1, 1]);
  });

  it("forecasts by compounding the series growth", () => {
    const forecast = simpleForecast([100, 110, 121], 2);
    expect(forecast).toHaveLength(2);
    expect(forecast[0]).toBeCloseTo(133.1, 6);
    expect(forecast[1]).toBeCloseTo(146.41, 6);
    expect(simpleForecast([], 3)).toEqual([]);
  });

  it("normalizes scores into 0-100", () => {
    expect(normalizeScore(5, 0, 10)).toBe(50);
    expect(normalizeScore(20, 0, 10)).toBe(100);
    expect(normalizeScore(3, 5, 5)).toBe(50);
  });

  it("handles basic helpers", () => {
    expect(mean([])).toBe(0);
    expect(sampleStdDev([4])).toBe(0);
    expect(populationStdDev([])).toBe(0);
    expect(populationStdDev([100, 200, 100, 200])).toBe(50);
    expect(safeDivide(1, 0)).toBe(0);
    expect(safeDivide(1, 0, -1)).toBe(-1);
    expect(clamp(Number.NaN, 0, 100)).toBe(0);
    expect(clamp(150, 0, 100)).toBe(100);
  });
});
