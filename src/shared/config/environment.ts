/**
 * Environment configuration for the Plant Growth Analyzer
 * Centralizes environment variable parsing and validation
 */

import type { AnalysisOptions } from '../../types/analysis';
import { ValidationError } from '../utils/errors';
import { DEFAULT_VALUES, STATUS_THRESHOLDS, TREND_THRESHOLDS } from './constants';

export interface EnvironmentConfig {
  // Application Settings
  stage: string;
  logLevel: string;

  // Data window
  analysisDays: number;
  profilesFile?: string;

  // Performance
  analysisTimeoutMs: number;

  // Scoring thresholds
  optimalFraction: number;
  acceptableFraction: number;
  trendRisingRate: number;
  trendFallingRate: number;
  trendMinSamples: number;
}

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export class EnvironmentManager {
  private config: EnvironmentConfig;

  constructor(private readonly env: EnvironmentSource = process.env) {
    this.config = this.loadConfiguration();
    this.validateConfiguration();
  }

  private loadConfiguration(): EnvironmentConfig {
    return {
      // Application Settings
      stage: this.env.STAGE || DEFAULT_VALUES.STAGE,
      logLevel: this.env.LOG_LEVEL || DEFAULT_VALUES.LOG_LEVEL,

      // Data window
      analysisDays: this.parseInteger('ANALYSIS_DAYS', DEFAULT_VALUES.ANALYSIS_DAYS),
      profilesFile: this.env.PROFILES_FILE,

      // Performance
      analysisTimeoutMs: this.parseInteger('ANALYSIS_TIMEOUT_MS', DEFAULT_VALUES.ANALYSIS_TIMEOUT_MS),

      // Scoring thresholds
      optimalFraction: this.parseNumber('OPTIMAL_FRACTION', STATUS_THRESHOLDS.OPTIMAL),
      acceptableFraction: this.parseNumber('ACCEPTABLE_FRACTION', STATUS_THRESHOLDS.ACCEPTABLE),
      trendRisingRate: this.parseNumber('TREND_RISING_RATE', TREND_THRESHOLDS.RISING_RATE),
      trendFallingRate: this.parseNumber('TREND_FALLING_RATE', TREND_THRESHOLDS.FALLING_RATE),
      trendMinSamples: this.parseInteger('TREND_MIN_SAMPLES', TREND_THRESHOLDS.MIN_SAMPLES),
    };
  }

  private parseInteger(name: string, fallback: number): number {
    const raw = this.env[name];
    return raw === undefined || raw === '' ? fallback : parseInt(raw, 10);
  }

  private parseNumber(name: string, fallback: number): number {
    const raw = this.env[name];
    return raw === undefined || raw === '' ? fallback : parseFloat(raw);
  }

  private validateConfiguration(): void {
    const errors: string[] = [];

    if (!Number.isInteger(this.config.analysisDays) || this.config.analysisDays < 1 || this.config.analysisDays > DEFAULT_VALUES.MAX_ANALYSIS_DAYS) {
      errors.push(`ANALYSIS_DAYS must be between 1 and ${DEFAULT_VALUES.MAX_ANALYSIS_DAYS}`);
    }

    if (!Number.isInteger(this.config.analysisTimeoutMs) || this.config.analysisTimeoutMs < 100 || this.config.analysisTimeoutMs > 900000) {
      errors.push('ANALYSIS_TIMEOUT_MS must be between 100 and 900000 milliseconds');
    }

    const { optimalFraction, acceptableFraction } = this.config;
    if (!(acceptableFraction > 0 && acceptableFraction < optimalFraction && optimalFraction <= 1)) {
      errors.push('ACCEPTABLE_FRACTION and OPTIMAL_FRACTION must satisfy 0 < acceptable < optimal <= 1');
    }

    if (!(this.config.trendRisingRate >= 0) || !(this.config.trendFallingRate <= 0)) {
      errors.push('TREND_RISING_RATE must be >= 0 and TREND_FALLING_RATE must be <= 0');
    }

    if (!Number.isInteger(this.config.trendMinSamples) || this.config.trendMinSamples < 2) {
      errors.push('TREND_MIN_SAMPLES must be an integer of at least 2');
    }

    // Validate log level
    const validLogLevels = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
    if (!validLogLevels.includes(this.config.logLevel.toUpperCase())) {
      errors.push(`LOG_LEVEL must be one of: ${validLogLevels.join(', ')}`);
    }

    // Validate stage
    const validStages = ['development', 'staging', 'production'];
    if (!validStages.includes(this.config.stage)) {
      errors.push(`STAGE must be one of: ${validStages.join(', ')}`);
    }

    if (errors.length > 0) {
      throw new ValidationError(`Environment configuration errors:\n${errors.join('\n')}`, errors);
    }
  }

  getConfig(): EnvironmentConfig {
    return { ...this.config };
  }

  get<K extends keyof EnvironmentConfig>(key: K): EnvironmentConfig[K] {
    return this.config[key];
  }

  /**
   * Thresholds for the evaluator, detector and scorer
   */
  getAnalysisOptions(): AnalysisOptions {
    return {
      statusThresholds: {
        optimal: this.config.optimalFraction,
        acceptable: this.config.acceptableFraction,
      },
      trend: {
        risingRate: this.config.trendRisingRate,
        fallingRate: this.config.trendFallingRate,
        minSamples: this.config.trendMinSamples,
      },
    };
  }

  isDevelopment(): boolean {
    return this.config.stage === 'development';
  }

  isProduction(): boolean {
    return this.config.stage === 'production';
  }
}

export function getEnvironment(env: EnvironmentSource = process.env): EnvironmentConfig {
  return new EnvironmentManager(env).getConfig();
}

export function getDefaultAnalysisOptions(): AnalysisOptions {
  return new EnvironmentManager({}).getAnalysisOptions();
}
