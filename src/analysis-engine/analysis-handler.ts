/**
 * Growth Analysis Lambda Function
 * Accepts a plant profile and its sensor series, returns the growth report
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import type { PlantProfile } from '../types/plant-profile';
import type { ParameterSeries, Reading } from '../types/sensor-data';
import type { AnalysisEnvelope, AnalysisOptions } from '../types/analysis';
import { EnvironmentManager } from '../shared/config/environment';
import type { EnvironmentSource } from '../shared/config/environment';
import { ValidationError } from '../shared/utils/errors';
import { LambdaResponse, handleLambdaError } from '../shared/utils/lambda-response';
import { Logger, createComponentLogger } from '../shared/utils/logger';
import { isRecord } from '../shared/utils/validation';
import { getPlantProfile, loadPlantProfiles, parsePlantProfile } from '../data-ingestion/profile-loader';
import { DataPreprocessor } from './data-preprocessor';
import { GrowthAnalyzer } from './growth-analyzer';

export type AnalysisEvent = Pick<APIGatewayProxyEvent, 'body' | 'httpMethod'>;

// Profile id used when the request carries its profile and names no id
export const INLINE_PROFILE_ID = 'inline';

export interface AnalysisHandlerDependencies {
  env?: EnvironmentSource;
  loadProfiles?: (filePath: string) => Promise<ReadonlyMap<string, PlantProfile>>;
  logger?: Logger;
}

function parseReading(parameter: string, raw: unknown, index: number): Reading {
  if (!isRecord(raw)) {
    throw new ValidationError(`series.${parameter}[${index}] must be an object`);
  }
  const timestamp = typeof raw.timestamp === 'string' || typeof raw.timestamp === 'number'
    ? new Date(raw.timestamp)
    : new Date(NaN);
  if (Number.isNaN(timestamp.getTime())) {
    throw new ValidationError(`series.${parameter}[${index}].timestamp is not a valid date`);
  }
  if (typeof raw.value !== 'number') {
    throw new ValidationError(`series.${parameter}[${index}].value must be a number`);
  }
  return { timestamp, value: raw.value };
}

export function parseSeries(raw: unknown): Record<string, ParameterSeries> {
  if (!isRecord(raw)) {
    throw new ValidationError('series must be an object keyed by parameter');
  }

  const series: Record<string, ParameterSeries> = {};
  for (const [parameter, readings] of Object.entries(raw)) {
    if (!Array.isArray(readings)) {
      throw new ValidationError(`series.${parameter} must be an array`);
    }
    series[parameter] = {
      parameter,
      readings: readings.map((reading: unknown, index) => parseReading(parameter, reading, index))
    };
  }
  return series;
}

function readSection(options: Record<string, unknown>, section: string): Record<string, unknown> {
  const raw = options[section];
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new ValidationError(`options.${section} must be an object`);
  }
  return raw;
}

function readNumber(section: Record<string, unknown>, path: string, key: string, fallback: number): number {
  const raw = section[key];
  if (raw === undefined) return fallback;
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new ValidationError(`options.${path}.${key} must be a number`);
  }
  return raw;
}

/**
 * Per-request thresholds layered over the configured ones. Only the shape is
 * checked here; GrowthAnalyzer validates the merged values.
 */
export function parseAnalysisOptions(raw: unknown, defaults: AnalysisOptions): AnalysisOptions {
  if (raw === undefined) return defaults;
  if (!isRecord(raw)) {
    throw new ValidationError('options must be an object');
  }

  const status = readSection(raw, 'statusThresholds');
  const trend = readSection(raw, 'trend');

  return {
    statusThresholds: {
      optimal: readNumber(status, 'statusThresholds', 'optimal', defaults.statusThresholds.optimal),
      acceptable: readNumber(status, 'statusThresholds', 'acceptable', defaults.statusThresholds.acceptable)
    },
    trend: {
      risingRate: readNumber(trend, 'trend', 'risingRate', defaults.trend.risingRate),
      fallingRate: readNumber(trend, 'trend', 'fallingRate', defaults.trend.fallingRate),
      minSamples: readNumber(trend, 'trend', 'minSamples', defaults.trend.minSamples)
    }
  };
}

function readProfileId(raw: unknown): string | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    throw new ValidationError('profileId must be a non-empty string');
  }
  return raw;
}

/**
 * Build the handler; dependencies are injectable for tests
 */
export function createAnalysisHandler(dependencies: AnalysisHandlerDependencies = {}) {
  const loadProfiles = dependencies.loadProfiles ?? loadPlantProfiles;

  return async (event: AnalysisEvent, context?: Pick<Context, 'awsRequestId'>): Promise<APIGatewayProxyResult> => {
    const logger = dependencies.logger ?? createComponentLogger('analyzeGrowth', context?.awsRequestId);

    try {
      const environment = new EnvironmentManager(dependencies.env ?? process.env);
      const config = environment.getConfig();

      if (event.httpMethod !== 'POST') {
        return LambdaResponse.error(`Method ${event.httpMethod} not allowed`, 405);
      }

      let body: unknown;
      try {
        body = JSON.parse(event.body || '{}');
      } catch {
        return LambdaResponse.validationError(['Request body must be valid JSON']);
      }
      if (!isRecord(body)) {
        return LambdaResponse.validationError(['Request body must be a JSON object']);
      }

      const profileId = readProfileId(body.profileId);
      const inlineProfile = body.profile ?? body.profileConfig;

      let profile: PlantProfile;
      if (inlineProfile !== undefined) {
        profile = parsePlantProfile(profileId ?? INLINE_PROFILE_ID, inlineProfile);
      } else if (!config.profilesFile) {
        return LambdaResponse.validationError(['profile is required when no profiles file is configured']);
      } else if (profileId === undefined) {
        return LambdaResponse.validationError(['profileId is required to look up a configured profile']);
      } else {
        profile = getPlantProfile(await loadProfiles(config.profilesFile), profileId);
      }

      const options = parseAnalysisOptions(body.options, environment.getAnalysisOptions());

      let series = parseSeries(body.series);
      if (body.preprocess === true) {
        const preprocessor = new DataPreprocessor({}, logger);
        series = Object.fromEntries(
          Object.entries(series).map(([parameter, entry]) => [parameter, preprocessor.clean(entry)])
        );
      }

      const analysisId = `analysis_${uuidv4()}`;
      const analyzer = new GrowthAnalyzer(options, logger.child({ analysisId }));
      const report = await analyzer.analyzeAsync(profile, series, { timeoutMs: config.analysisTimeoutMs });

      const envelope: AnalysisEnvelope = {
        analysisId,
        generatedAt: new Date().toISOString(),
        report
      };

      return LambdaResponse.success(envelope);
    } catch (error) {
      return handleLambdaError(error, logger);
    }
  };
}

export const analyzeGrowthHandler = createAnalysisHandler();
