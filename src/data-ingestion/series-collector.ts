/**
 * Series Collector
 * Fetches every mapped sensor of a profile concurrently and joins the results
 * in profile order
 */

import type { PlantProfile } from '../types/plant-profile';
import type { ParameterSeries, SeriesByParameter } from '../types/sensor-data';
import { SourceStatus } from '../types/sensor-data';
import { DEFAULT_VALUES } from '../shared/config/constants';
import { Logger, createComponentLogger } from '../shared/utils/logger';
import { DataPreprocessor } from '../analysis-engine/data-preprocessor';
import type { SensorDataSource } from './sensor-data-source';

export interface CollectOptions {
  days?: number;
  preprocess?: boolean;
  resampleIntervalMinutes?: number;
  logger?: Logger;
}

export interface ParameterSourceStatus {
  parameter: string;
  sensorId?: string;
  status: SourceStatus;
  message?: string;
}

export interface CollectedSeries {
  series: SeriesByParameter;
  sourceStatus: ParameterSourceStatus[];
}

/**
 * Missing sensors and no-data results become empty series; the analyzer turns
 * those into InsufficientDataError rather than scoring without them
 */
export async function collectProfileSeries(
  profile: PlantProfile,
  source: SensorDataSource,
  options: CollectOptions = {}
): Promise<CollectedSeries> {
  const days = options.days ?? DEFAULT_VALUES.ANALYSIS_DAYS;
  const logger = (options.logger ?? createComponentLogger('SeriesCollector')).child({ profileId: profile.profileId });
  const preprocessor =
    options.preprocess || options.resampleIntervalMinutes !== undefined
      ? new DataPreprocessor(
          options.resampleIntervalMinutes !== undefined ? { resampleIntervalMinutes: options.resampleIntervalMinutes } : {},
          logger
        )
      : undefined;
  const parameters = Object.keys(profile.optimalRanges);

  const fetched = await Promise.all(
    parameters.map(async (parameter): Promise<[ParameterSeries, ParameterSourceStatus]> => {
      const sensorId = profile.sensorMapping[parameter];
      if (!sensorId) {
        return [
          { parameter, readings: [] },
          { parameter, status: SourceStatus.UNAVAILABLE, message: 'No sensor mapped' }
        ];
      }

      const result = await source.getMeasurements(sensorId, days);
      if (result.kind === 'no_data') {
        logger.warn('No data for sensor', { parameter, sensorId, source: source.name, reason: result.reason });
        return [
          { parameter, readings: [] },
          { parameter, sensorId, status: SourceStatus.UNAVAILABLE, message: result.reason }
        ];
      }

      let series: ParameterSeries = { parameter, readings: result.readings };
      if (preprocessor && options.preprocess) {
        series = preprocessor.clean(series);
      }
      if (preprocessor && options.resampleIntervalMinutes !== undefined) {
        series = preprocessor.resample(series);
      }
      return [series, { parameter, sensorId, status: SourceStatus.HEALTHY }];
    })
  );

  const series: Record<string, ParameterSeries> = {};
  for (const [entry] of fetched) {
    series[entry.parameter] = entry;
  }

  logger.info('Collected profile series', { source: source.name, days, parameters: parameters.length });

  return { series, sourceStatus: fetched.map(([, status]) => status) };
}
