/**
 * Sensor time-series models
 */

export interface Reading {
  readonly timestamp: Date;
  readonly value: number;
}

export interface ParameterSeries {
  readonly parameter: string;
  readonly readings: readonly Reading[];
}

export type SeriesByParameter = Readonly<Record<string, ParameterSeries>>;

export interface SeriesStatistics {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  standardDeviation: number; // sample (n - 1)
  variance: number;
}

// Result of asking a data source for one sensor's readings
export type SensorDataResult =
  | { kind: 'data'; sensorId: string; readings: Reading[] }
  | { kind: 'no_data'; sensorId: string; reason: string };

export enum SourceStatus {
  HEALTHY = 'healthy',
  UNAVAILABLE = 'unavailable'
}
