import { ParameterStatus, TrendDirection } from '../src/types/core';
import type { PlantProfile, OptimalRange } from '../src/types/plant-profile';
import type { ParameterSeries } from '../src/types/sensor-data';
import type { ParameterAssessment } from '../src/types/analysis';
import { Logger, LogLevel } from '../src/shared/utils/logger';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START = new Date('2024-05-01T00:00:00Z');

export const quietLogger = (): Logger => new Logger({}, LogLevel.ERROR);

export function makeSeries(
  parameter: string,
  values: number[],
  start: Date = START,
  stepMs: number = DAY_MS
): ParameterSeries {
  return {
    parameter,
    readings: values.map((value, index) => ({
      timestamp: new Date(start.getTime() + index * stepMs),
      value
    }))
  };
}

export function makeProfile(
  optimalRanges: Record<string, OptimalRange>,
  overrides: Partial<PlantProfile> = {}
): PlantProfile {
  const sensorMapping: Record<string, string> = {};
  Object.keys(optimalRanges).forEach((parameter, index) => {
    sensorMapping[parameter] = `input-${index + 1}`;
  });

  return {
    profileId: 'tomato',
    type: 'vegetable',
    baseGrowthRate: 1.5,
    optimalRanges,
    sensorMapping,
    ...overrides
  };
}

export const TEMPERATURE_RANGE: OptimalRange = { min: 20, max: 26, unit: '°C' };
export const HUMIDITY_RANGE: OptimalRange = { min: 40, max: 60, unit: '%' };

export function makeAssessment(overrides: Partial<ParameterAssessment> & { parameter: string }): ParameterAssessment {
  return {
    unit: '',
    optimalRange: { min: 0, max: 10, unit: '' },
    inRangeFraction: 1,
    fractionBelow: 0,
    fractionAbove: 0,
    status: ParameterStatus.OPTIMAL,
    trend: {
      direction: TrendDirection.STABLE,
      slopePerDay: 0,
      normalizedRatePerDay: 0,
      rSquared: 0,
      sampleCount: 5,
      lowConfidence: false
    },
    statistics: { count: 5, min: 1, max: 9, mean: 5, median: 5, standardDeviation: 1, variance: 1 },
    score: 100,
    weight: 1,
    ...overrides
  };
}
