/**
 * Trend Detector
 * Classifies the direction of a parameter over the analysis window
 */

import { TrendDirection } from '../types/core';
import type { OptimalRange } from '../types/plant-profile';
import type { ParameterSeries } from '../types/sensor-data';
import type { TrendAssessment, TrendThresholds } from '../types/analysis';
import { TREND_THRESHOLDS, MS_PER_DAY } from '../shared/config/constants';
import { linearRegression } from './statistics';

export const DEFAULT_TREND_THRESHOLDS: TrendThresholds = {
  risingRate: TREND_THRESHOLDS.RISING_RATE,
  fallingRate: TREND_THRESHOLDS.FALLING_RATE,
  minSamples: TREND_THRESHOLDS.MIN_SAMPLES
};

export class TrendDetector {
  private thresholds: TrendThresholds;

  constructor(thresholds: TrendThresholds = DEFAULT_TREND_THRESHOLDS) {
    this.thresholds = { ...thresholds };
  }

  /**
   * Slope of value over elapsed days, normalized by the range span.
   * Too few samples, or no time spread, yields a low-confidence stable trend.
   */
  public detect(series: ParameterSeries, range: OptimalRange): TrendAssessment {
    const sampleCount = series.readings.length;
    const lowConfidence = sampleCount < this.thresholds.minSamples;

    if (sampleCount < 2 || lowConfidence) {
      return this.stable(sampleCount);
    }

    const origin = series.readings[0].timestamp.getTime();
    const elapsedDays = series.readings.map(r => (r.timestamp.getTime() - origin) / MS_PER_DAY);
    const values = series.readings.map(r => r.value);
    const fit = linearRegression(elapsedDays, values);

    if (!fit) {
      return this.stable(sampleCount);
    }

    // a single-point range has no span; fall back to the raw slope
    const span = range.max - range.min;
    const normalizedRatePerDay = span > 0 ? fit.slope / span : fit.slope;

    return {
      direction: this.classify(normalizedRatePerDay),
      slopePerDay: fit.slope,
      normalizedRatePerDay,
      rSquared: fit.rSquared,
      sampleCount,
      lowConfidence: false
    };
  }

  public classify(normalizedRatePerDay: number): TrendDirection {
    if (normalizedRatePerDay > this.thresholds.risingRate) return TrendDirection.RISING;
    if (normalizedRatePerDay < this.thresholds.fallingRate) return TrendDirection.FALLING;
    return TrendDirection.STABLE;
  }

  private stable(sampleCount: number): TrendAssessment {
    return {
      direction: TrendDirection.STABLE,
      slopePerDay: 0,
      normalizedRatePerDay: 0,
      rSquared: 0,
      sampleCount,
      lowConfidence: true
    };
  }
}
