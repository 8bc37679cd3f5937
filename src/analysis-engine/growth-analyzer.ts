/**
 * Growth Analyzer
 * Entry point of the analysis pipeline: validates the profile, evaluates every
 * parameter and hands the assessments to the scorer
 */

import type { PlantProfile } from '../types/plant-profile';
import type { ParameterSeries, SeriesByParameter } from '../types/sensor-data';
import type { AnalysisOptions, GrowthReport, ParameterAssessment } from '../types/analysis';
import {
  AnalysisError,
  AnalysisTimeoutError,
  EmptyProfileError,
  InsufficientDataError,
  InvalidRangeError
} from '../shared/utils/errors';
import { Logger, createComponentLogger } from '../shared/utils/logger';
import { Validator } from '../shared/utils/validation';
import { ConditionEvaluator, DEFAULT_STATUS_THRESHOLDS } from './condition-evaluator';
import { TrendDetector, DEFAULT_TREND_THRESHOLDS } from './trend-detector';
import { GrowthScorer } from './growth-scorer';
import { summarize } from './statistics';

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  statusThresholds: DEFAULT_STATUS_THRESHOLDS,
  trend: DEFAULT_TREND_THRESHOLDS
};

export interface AnalyzeAsyncOptions {
  timeoutMs?: number;
}

export type AnalysisResult =
  | { success: true; report: GrowthReport }
  | { success: false; error: AnalysisError };

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export class GrowthAnalyzer {
  private logger: Logger;
  private evaluator: ConditionEvaluator;
  private detector: TrendDetector;
  private scorer: GrowthScorer;

  constructor(options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS, logger?: Logger) {
    Validator.throwIfInvalid(Validator.validateAnalysisOptions(options));
    this.logger = logger ?? createComponentLogger('GrowthAnalyzer');
    this.evaluator = new ConditionEvaluator(options.statusThresholds);
    this.detector = new TrendDetector(options.trend);
    this.scorer = new GrowthScorer(options.statusThresholds);
  }

  /**
   * Analyze a profile against its series. Fails without a partial report when the
   * profile is empty or malformed, or any profile parameter has no readings.
   */
  public analyze(profile: PlantProfile, seriesByParameter: SeriesByParameter): GrowthReport {
    const startTime = Date.now();
    const logger = this.logger.child({ profileId: profile.profileId });

    const seriesList = this.prepare(profile, seriesByParameter, logger);
    const weights = this.scorer.resolveWeights(profile);
    const assessments = seriesList.map(series =>
      this.assessParameter(profile, series, weights[series.parameter], logger)
    );

    return this.finish(profile, assessments, logger, startTime);
  }

  /**
   * Same result as analyze(); parameters are evaluated concurrently and joined in
   * profile order. The series may still be in flight when this is called.
   */
  public async analyzeAsync(
    profile: PlantProfile,
    seriesByParameter: SeriesByParameter | Promise<SeriesByParameter>,
    options: AnalyzeAsyncOptions = {}
  ): Promise<GrowthReport> {
    const run = async (): Promise<GrowthReport> => {
      const startTime = Date.now();
      const logger = this.logger.child({ profileId: profile.profileId });
      const resolved = await seriesByParameter;

      const seriesList = this.prepare(profile, resolved, logger);
      const weights = this.scorer.resolveWeights(profile);
      const assessments = await Promise.all(
        seriesList.map(async series => this.assessParameter(profile, series, weights[series.parameter], logger))
      );

      return this.finish(profile, assessments, logger, startTime);
    };

    return options.timeoutMs === undefined ? run() : withTimeout(run(), options.timeoutMs);
  }

  public safeAnalyze(profile: PlantProfile, seriesByParameter: SeriesByParameter): AnalysisResult {
    try {
      return { success: true, report: this.analyze(profile, seriesByParameter) };
    } catch (error) {
      if (error instanceof AnalysisError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Fail-fast validation; returns one series per profile parameter, in profile order
   */
  private prepare(profile: PlantProfile, seriesByParameter: SeriesByParameter, logger: Logger): ParameterSeries[] {
    const parameters = Object.keys(profile.optimalRanges);
    if (parameters.length === 0) {
      throw new EmptyProfileError(profile.profileId);
    }

    for (const parameter of parameters) {
      const range = profile.optimalRanges[parameter];
      if (range.min > range.max) {
        throw new InvalidRangeError(parameter, range.min, range.max);
      }
      Validator.throwIfInvalid(Validator.validateOptimalRange(parameter, range));
    }

    const profileValidation = Validator.validateProfile(profile);
    Validator.throwIfInvalid(profileValidation);
    if (profileValidation.warnings.length > 0) {
      logger.debug('Profile validation warnings', { warnings: profileValidation.warnings });
    }

    const ignored = Object.keys(seriesByParameter).filter(key => !parameters.includes(key));
    if (ignored.length > 0) {
      logger.warn('Ignoring series for parameters outside the profile', { parameters: ignored });
    }

    return parameters.map(parameter => {
      const series = seriesByParameter[parameter];
      if (!series || series.readings.length === 0) {
        throw new InsufficientDataError(parameter);
      }
      const normalized: ParameterSeries = { parameter, readings: series.readings };
      Validator.throwIfInvalid(Validator.validateSeries(normalized));
      return normalized;
    });
  }

  private assessParameter(
    profile: PlantProfile,
    series: ParameterSeries,
    weight: number,
    logger: Logger
  ): ParameterAssessment {
    const range = profile.optimalRanges[series.parameter];
    const evaluation = this.evaluator.evaluate(series, range);
    const trend = this.detector.detect(series, range);

    if (trend.lowConfidence) {
      logger.debug('Low-confidence trend', { parameter: series.parameter, sampleCount: trend.sampleCount });
    }

    return {
      parameter: series.parameter,
      unit: range.unit,
      optimalRange: { min: range.min, max: range.max, unit: range.unit },
      ...evaluation,
      trend,
      statistics: summarize(series.readings.map(r => r.value)),
      score: this.scorer.contribution(evaluation),
      weight
    };
  }

  private finish(
    profile: PlantProfile,
    assessments: ParameterAssessment[],
    logger: Logger,
    startTime: number
  ): GrowthReport {
    const report = deepFreeze(this.scorer.buildReport(profile, assessments));
    logger.info('Growth analysis completed', {
      overallScore: report.overallScore,
      band: report.band,
      recommendations: report.recommendations.length
    });
    logger.performance('analyze', Date.now() - startTime, { parameters: assessments.length });
    return report;
  }
}

/**
 * Reject with AnalysisTimeoutError if the task has not settled in time
 */
export function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AnalysisTimeoutError(timeoutMs)), timeoutMs);
  });

  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

export function analyze(
  profile: PlantProfile,
  seriesByParameter: SeriesByParameter,
  options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS
): GrowthReport {
  return new GrowthAnalyzer(options).analyze(profile, seriesByParameter);
}

export function safeAnalyze(
  profile: PlantProfile,
  seriesByParameter: SeriesByParameter,
  options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS
): AnalysisResult {
  return new GrowthAnalyzer(options).safeAnalyze(profile, seriesByParameter);
}
