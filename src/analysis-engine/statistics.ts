/**
 * Descriptive statistics and regression helpers for sensor series
 */

import type { SeriesStatistics } from '../types/sensor-data';

export interface LinearRegression {
  slope: number;
  intercept: number;
  rSquared: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Sample variance (n - 1); zero for a single value
 */
export function variance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const average = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return squares / (values.length - 1);
}

/**
 * Linear interpolation quantile, matching the common "type 7" definition
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/**
 * Smallest and largest value in one pass; no argument spreading, so series of
 * any length are fine
 */
export function extent(values: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

export function summarize(values: readonly number[]): SeriesStatistics {
  const sampleVariance = variance(values);
  const { min, max } = extent(values);
  return {
    count: values.length,
    min,
    max,
    mean: mean(values),
    median: median(values),
    standardDeviation: Math.sqrt(sampleVariance),
    variance: sampleVariance,
  };
}

/**
 * Ordinary least squares fit of y on x.
 * Returns null when x has no spread (slope undefined).
 */
export function linearRegression(xs: readonly number[], ys: readonly number[]): LinearRegression | null {
  if (xs.length !== ys.length || xs.length < 2) return null;

  const xMean = mean(xs);
  const yMean = mean(ys);
  let sxx = 0;
  let sxy = 0;
  let syy = 0;

  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - xMean;
    const dy = ys[i] - yMean;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }

  if (sxx === 0) return null;

  const slope = sxy / sxx;
  return {
    slope,
    intercept: yMean - slope * xMean,
    // flat series: the fit is exact
    rSquared: syy === 0 ? 1 : (sxy * sxy) / (sxx * syy),
  };
}
