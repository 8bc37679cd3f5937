/**
 * Application constants and analysis defaults
 */

// Default values
export const DEFAULT_VALUES = {
  LOG_LEVEL: 'INFO',
  STAGE: 'development',
  ANALYSIS_DAYS: 30,
  ANALYSIS_TIMEOUT_MS: 30000,
  MAX_ANALYSIS_DAYS: 365
} as const;

// Fraction of readings in range needed for each status
export const STATUS_THRESHOLDS = {
  OPTIMAL: 0.9,
  ACCEPTABLE: 0.6
} as const;

// Normalized trend rate limits, in range spans per day
export const TREND_THRESHOLDS = {
  RISING_RATE: 0.05,
  FALLING_RATE: -0.05,
  MIN_SAMPLES: 2
} as const;

// Per-parameter contribution scale
export const SCORE_SCALE = {
  OPTIMAL: 100,
  ACCEPTABLE_FLOOR: 40,
  ACCEPTABLE_CEILING: 79,
  SUBOPTIMAL_FLOOR: 0,
  SUBOPTIMAL_CEILING: 39
} as const;

// Lower bound of each overall growth band
export const BAND_FLOORS = {
  EXCELLENT: 80,
  GOOD: 60,
  ACCEPTABLE: 40
} as const;

export const PREPROCESSING = {
  OUTLIER_IQR_MULTIPLIER: 3,
  MIN_READINGS_FOR_OUTLIER_FILTER: 10,
  MAX_MISSING_FRACTION_FOR_INTERPOLATION: 0.2,
  RESAMPLE_INTERVAL_MINUTES: 60
} as const;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
