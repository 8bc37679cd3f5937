import { describe, it, expect } from 'vitest';
import { EnvironmentManager, getDefaultAnalysisOptions, getEnvironment } from '../../src/shared/config/environment';
import { ValidationError } from '../../src/shared/utils/errors';

describe('EnvironmentManager', () => {
  it('falls back to defaults', () => {
    expect(getEnvironment({})).toEqual({
      stage: 'development',
      logLevel: 'INFO',
      analysisDays: 30,
      profilesFile: undefined,
      analysisTimeoutMs: 30000,
      optimalFraction: 0.9,
      acceptableFraction: 0.6,
      trendRisingRate: 0.05,
      trendFallingRate: -0.05,
      trendMinSamples: 2
    });
  });

  it('builds analysis options from overrides', () => {
    const manager = new EnvironmentManager({
      OPTIMAL_FRACTION: '0.8',
      ACCEPTABLE_FRACTION: '0.5',
      TREND_RISING_RATE: '0.1',
      TREND_MIN_SAMPLES: '4'
    });

    expect(manager.getAnalysisOptions()).toEqual({
      statusThresholds: { optimal: 0.8, acceptable: 0.5 },
      trend: { risingRate: 0.1, fallingRate: -0.05, minSamples: 4 }
    });
  });

  it('matches the documented default thresholds', () => {
    expect(getDefaultAnalysisOptions()).toEqual({
      statusThresholds: { optimal: 0.9, acceptable: 0.6 },
      trend: { risingRate: 0.05, fallingRate: -0.05, minSamples: 2 }
    });
  });

  it('rejects an acceptable threshold above the optimal one', () => {
    expect(() => new EnvironmentManager({ ACCEPTABLE_FRACTION: '0.95' })).toThrow(ValidationError);
  });

  it('rejects unknown stages and log levels', () => {
    expect(() => new EnvironmentManager({ STAGE: 'qa' })).toThrow('STAGE must be one of: development, staging, production');
    expect(() => new EnvironmentManager({ LOG_LEVEL: 'verbose' })).toThrow(ValidationError);
  });

  it('rejects a window outside 1 to 365 days', () => {
    expect(() => new EnvironmentManager({ ANALYSIS_DAYS: '0' })).toThrow(ValidationError);
    expect(() => new EnvironmentManager({ ANALYSIS_DAYS: 'many' })).toThrow(ValidationError);
  });

  it('reports the stage', () => {
    expect(new EnvironmentManager({ STAGE: 'production' }).isProduction()).toBe(true);
    expect(new EnvironmentManager({}).isDevelopment()).toBe(true);
  });
});
