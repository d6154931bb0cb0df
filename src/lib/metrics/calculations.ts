/**
 * Metrics library: pure numeric helpers shared by the analyzer stages.
 *
 * Every function is total. Degenerate input (empty series, zero denominators)
 * resolves to a documented sentinel rather than NaN or an exception.
 */

export type TrendDirection = "increasing" | "declining" | "stable" | "insufficient_data";

export const TREND_SLOPE_THRESHOLD = 0.05;
export const DEFAULT_SMOOTHING_FACTOR = 0.3;

export function clamp(value: number, min: number, max: number) {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clampScore(value: number) {
  return clamp(value, 0, 100);
}

export function safeDivide(numerator: number, denominator: number, fallback = 0) {
  if (denominator === 0 || !Number.isFinite(denominator)) return fallback;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}

export function mean(values: readonly number[]) {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function sampleStdDev(values: readonly number[]) {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function populationStdDev(values: readonly number[]) {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Compound per-period growth between the first and last observation.
 * 0 when fewer than two points or the first value is not positive.
 */
export function growthRate(series: readonly number[]) {
  if (series.length < 2) return 0;
  const start = series[0];
  const end = series[series.length - 1];
  if (start === undefined || end === undefined || start <= 0) return 0;
  if (end <= 0) return -1;
  return (end / start) ** (1 / (series.length - 1)) - 1;
}

/**
 * Mean of period-over-period changes, skipping periods whose base is not positive.
 */
export function averagePeriodGrowth(series: readonly number[]) {
  const changes: number[] = [];
  for (let i = 1; i < series.length; i += 1) {
    const previous = series[i - 1];
    const current = series[i];
    if (previous === undefined || current === undefined || previous <= 0) continue;
    changes.push((current - previous) / previous);
  }
  return mean(changes);
}

/**
 * Coefficient of variation (sample standard deviation over mean).
 */
export function volatility(series: readonly number[]) {
  if (series.length < 2) return 0;
  const avg = mean(series);
  if (avg === 0) return 0;
  return sampleStdDev(series) / avg;
}

function regressionSlope(series: readonly number[]) {
  const n = series.length;
  const xMean = (n - 1) / 2;
  const yMean = mean(series);
  let numerator = 0;
  let denominator = 0;
  series.forEach((value, index) => {
    numerator += (index - xMean) * (value - yMean);
    denominator += (index - xMean) ** 2;
  });
  return denominator === 0 ? 0 : numerator / denominator;
}

export function trendDirection(series: readonly number[]): TrendDirection {
  if (series.length < 3) return "insufficient_data";
  const slope = regressionSlope(series);
  if (slope > TREND_SLOPE_THRESHOLD) return "increasing";
  if (slope < -TREND_SLOPE_THRESHOLD) return "declining";
  return "stable";
}

export function profitMargin(revenue: number, expenses: number) {
  if (revenue <= 0) return 0;
  return Math.max(0, (revenue - expenses) / revenue);
}

/**
 * Months of cash at the given burn. Infinite when nothing is burned.
 */
export function cashRunway(cash: number, monthlyBurn: number) {
  if (monthlyBurn <= 0) return Number.POSITIVE_INFINITY;
  return Math.max(0, cash / monthlyBurn);
}

export function percentileRank(value: number, dataset: readonly number[]) {
  if (dataset.length === 0) return 50;
  let below = 0;
  let equal = 0;
  for (const item of dataset) {
    if (item < value) below += 1;
    else if (item === value) equal += 1;
  }
  return ((below + 0.5 * equal) / dataset.length) * 100;
}

export function correlation(x: readonly number[], y: readonly number[]) {
  if (x.length !== y.length || x.length < 2) return 0;
  const xMean = mean(x);
  const yMean = mean(y);
  let covariance = 0;
  let xVariance = 0;
  let yVariance = 0;
  x.forEach((xValue, index) => {
    const yValue = y[index] ?? yMean;
    covariance += (xValue - xMean) * (yValue - yMean);
    xVariance += (xValue - xMean) ** 2;
    yVariance += (yValue - yMean) ** 2;
  });
  const denominator = Math.sqrt(xVariance * yVariance);
  return denominator === 0 ? 0 : covariance / denominator;
}

/**
 * Exponential smoothing; the first value seeds the series.
 */
export function smoothValues(values: readonly number[], factor = DEFAULT_SMOOTHING_FACTOR) {
  const smoothed: number[] = [];
  for (const value of values) {
    const previous = smoothed[smoothed.length - 1];
    smoothed.push(previous === undefined ? value : factor * value + (1 - factor) * previous);
  }
  return smoothed;
}

export function movingAverage(values: readonly number[], window: number) {
  if (window <= 0 || values.length < window) return [];
  const averages: number[] = [];
  for (let end = window; end <= values.length; end += 1) {
    averages.push(mean(values.slice(end - window, end)));
  }
  return averages;
}

export function zScore(value: number, dataset: readonly number[]) {
  const deviation = sampleStdDev(dataset);
  if (deviation === 0) return 0;
  return (value - mean(dataset)) / deviation;
}

/**
 * Each value over the series mean; 1.0 means an average period.
 */
export function seasonalIndex(values: readonly number[]) {
  const avg = mean(values);
  return values.map((value) => (avg === 0 ? 1 : value / avg));
}

export function compoundGrowth(value: number, rate: number, periods: number) {
  return value * (1 + rate) ** periods;
}

/**
 * Projects the next periods by compounding the series' own growth from its last value.
 */
export function simpleForecast(series: readonly number[], periods: number) {
  const last = series[series.length - 1];
  if (last === undefined || periods <= 0) return [];
  const rate = growthRate(series);
  return Array.from({ length: periods }, (_, index) => compoundGrowth(last, rate, index + 1));
}

export function normalizeScore(value: number, min: number, max: number) {
  if (max <= min) return 50;
  return clampScore(((value - min) / (max - min)) * 100);
}
