/**
 * Data Preprocessor
 * Cleans and resamples raw sensor series before they reach the analyzer
 */

import type { ParameterSeries, Reading } from '../types/sensor-data';
import { PREPROCESSING } from '../shared/config/constants';
import { Logger, createComponentLogger } from '../shared/utils/logger';
import { ValidationError } from '../shared/utils/errors';
import { mean, quantile } from './statistics';

export interface PreprocessingConfig {
  outlierIqrMultiplier: number;
  minReadingsForOutlierFilter: number;
  maxMissingFractionForInterpolation: number;
  resampleIntervalMinutes: number;
}

export const DEFAULT_PREPROCESSING_CONFIG: PreprocessingConfig = {
  outlierIqrMultiplier: PREPROCESSING.OUTLIER_IQR_MULTIPLIER,
  minReadingsForOutlierFilter: PREPROCESSING.MIN_READINGS_FOR_OUTLIER_FILTER,
  maxMissingFractionForInterpolation: PREPROCESSING.MAX_MISSING_FRACTION_FOR_INTERPOLATION,
  resampleIntervalMinutes: PREPROCESSING.RESAMPLE_INTERVAL_MINUTES
};

export class DataPreprocessor {
  private logger: Logger;
  private config: PreprocessingConfig;

  constructor(config: Partial<PreprocessingConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_PREPROCESSING_CONFIG, ...config };
    assertInterval(this.config.resampleIntervalMinutes);
    this.logger = logger ?? createComponentLogger('DataPreprocessor');
  }

  /**
   * Sort by time and drop readings without a usable timestamp. Missing values
   * are interpolated linearly in time when fewer than
   * `maxMissingFractionForInterpolation` of the readings lack one (leading and
   * trailing gaps are dropped), otherwise all of them are dropped. Exact
   * duplicates go next, then extreme outliers (outside Q1 - k*IQR .. Q3 + k*IQR)
   * once the series is long enough.
   */
  public clean(series: ParameterSeries): ParameterSeries {
    const dated = series.readings
      .filter(r => r.timestamp instanceof Date && !Number.isNaN(r.timestamp.getTime()))
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    const missing = dated.filter(r => !Number.isFinite(r.value)).length;
    const interpolate = missing > 0 && missing / dated.length < this.config.maxMissingFractionForInterpolation;
    const valid = interpolate ? fillGaps(dated) : dated.filter(r => Number.isFinite(r.value));

    const seen = new Set<string>();
    const unique = valid.filter(r => {
      const key = `${r.timestamp.getTime()}:${r.value}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    const readings = this.removeOutliers(unique);

    this.logger.debug('Cleaned series', {
      parameter: series.parameter,
      undated: series.readings.length - dated.length,
      missing,
      interpolated: interpolate,
      dropped: dated.length - valid.length,
      duplicates: valid.length - unique.length,
      outliers: unique.length - readings.length
    });

    return { parameter: series.parameter, readings };
  }

  /**
   * Mean value per fixed interval, stamped with the interval start.
   * Empty intervals are skipped. Expects a time-ordered series.
   */
  public resample(series: ParameterSeries, intervalMinutes = this.config.resampleIntervalMinutes): ParameterSeries {
    assertInterval(intervalMinutes);
    const intervalMs = intervalMinutes * 60 * 1000;
    const buckets = new Map<number, number[]>();

    for (const reading of series.readings) {
      const bucketStart = Math.floor(reading.timestamp.getTime() / intervalMs) * intervalMs;
      const values = buckets.get(bucketStart);
      if (values) {
        values.push(reading.value);
      } else {
        buckets.set(bucketStart, [reading.value]);
      }
    }

    const readings: Reading[] = [...buckets.entries()]
      .sort(([a], [b]) => a - b)
      .map(([bucketStart, values]) => ({ timestamp: new Date(bucketStart), value: mean(values) }));

    return { parameter: series.parameter, readings };
  }

  private removeOutliers(readings: Reading[]): Reading[] {
    if (readings.length <= this.config.minReadingsForOutlierFilter) {
      return readings;
    }

    const values = readings.map(r => r.value);
    const q1 = quantile(values, 0.25);
    const q3 = quantile(values, 0.75);
    const iqr = q3 - q1;
    const lower = q1 - this.config.outlierIqrMultiplier * iqr;
    const upper = q3 + this.config.outlierIqrMultiplier * iqr;

    return readings.filter(r => r.value >= lower && r.value <= upper);
  }
}

function assertInterval(intervalMinutes: number): void {
  if (!Number.isFinite(intervalMinutes) || intervalMinutes <= 0) {
    throw new ValidationError(`Resample interval must be a positive number of minutes, got ${intervalMinutes}`);
  }
}

/**
 * Linear interpolation by time between the nearest finite neighbours.
 * Expects a time-ordered series.
 */
function fillGaps(readings: readonly Reading[]): Reading[] {
  const nextFinite: number[] = new Array<number>(readings.length).fill(-1);
  let next = -1;
  for (let i = readings.length - 1; i >= 0; i--) {
    nextFinite[i] = next;
    if (Number.isFinite(readings[i].value)) next = i;
  }

  const filled: Reading[] = [];
  let previous: Reading | undefined;
  readings.forEach((reading, i) => {
    if (Number.isFinite(reading.value)) {
      filled.push(reading);
      previous = reading;
      return;
    }
    const following = nextFinite[i] >= 0 ? readings[nextFinite[i]] : undefined;
    if (!previous || !following) return;

    const span = following.timestamp.getTime() - previous.timestamp.getTime();
    const ratio = span === 0 ? 0 : (reading.timestamp.getTime() - previous.timestamp.getTime()) / span;
    filled.push({ timestamp: reading.timestamp, value: previous.value + (following.value - previous.value) * ratio });
  });
  return filled;
}
