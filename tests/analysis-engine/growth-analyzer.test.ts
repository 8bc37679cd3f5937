import { describe, it, expect } from 'vitest';
import { GrowthAnalyzer, analyze, safeAnalyze } from '../../src/analysis-engine/growth-analyzer';
import { GrowthBand, ParameterStatus, TrendDirection } from '../../src/types/core';
import type { SeriesByParameter } from '../../src/types/sensor-data';
import {
  AnalysisTimeoutError,
  EmptyProfileError,
  InsufficientDataError,
  InvalidRangeError,
  ValidationError
} from '../../src/shared/utils/errors';
import { DAY_MS, HUMIDITY_RANGE, START, TEMPERATURE_RANGE, makeProfile, makeSeries, quietLogger } from '../helpers';

describe('GrowthAnalyzer', () => {
  const analyzer = new GrowthAnalyzer(undefined, quietLogger());

  it('scores 3 of 5 in-range temperature readings in the acceptable band', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });
    const report = analyzer.analyze(profile, { temperature: makeSeries('temperature', [18, 19, 21, 23, 25]) });

    expect(report.overallScore).toBe(40);
    expect(report.band).toBe(GrowthBand.ACCEPTABLE);
    expect(report.assessments).toHaveLength(1);

    const [assessment] = report.assessments;
    expect(assessment.parameter).toBe('temperature');
    expect(assessment.inRangeFraction).toBe(0.6);
    expect(assessment.status).toBe(ParameterStatus.ACCEPTABLE);
    expect(assessment.weight).toBe(1);
    expect(assessment.statistics.mean).toBeCloseTo(21.2, 10);
    expect(assessment.statistics.min).toBe(18);
    expect(assessment.statistics.max).toBe(25);
    expect(assessment.trend.direction).toBe(TrendDirection.RISING);
    expect(report.recommendations.map(r => r.parameter)).toEqual(['temperature']);
  });

  it('produces an excellent report without recommendations when all parameters are optimal', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE });
    const report = analyzer.analyze(profile, {
      temperature: makeSeries('temperature', [22, 23, 22]),
      humidity: makeSeries('humidity', [50, 52, 51])
    });

    expect(report.overallScore).toBe(100);
    expect(report.band).toBe(GrowthBand.EXCELLENT);
    expect(report.recommendations).toEqual([]);
  });

  it('applies profile weights', () => {
    const series: SeriesByParameter = {
      temperature: makeSeries('temperature', [22, 23, 22]),
      humidity: makeSeries('humidity', [80, 85, 90])
    };

    const even = analyzer.analyze(makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE }), series);
    expect(even.overallScore).toBe(50);
    expect(even.band).toBe(GrowthBand.ACCEPTABLE);

    const weighted = analyzer.analyze(
      makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE }, { weights: { humidity: 3 } }),
      series
    );
    expect(weighted.overallScore).toBe(25);
    expect(weighted.band).toBe(GrowthBand.DEFICIENT);
  });

  it('keeps assessments in profile order', () => {
    const profile = makeProfile({ humidity: HUMIDITY_RANGE, temperature: TEMPERATURE_RANGE });
    const report = analyzer.analyze(profile, {
      temperature: makeSeries('temperature', [22]),
      humidity: makeSeries('humidity', [50])
    });
    expect(report.assessments.map(a => a.parameter)).toEqual(['humidity', 'temperature']);
  });

  it('fails with InsufficientDataError for an empty series', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE });
    expect(() => analyzer.analyze(profile, {
      temperature: makeSeries('temperature', [22]),
      humidity: makeSeries('humidity', [])
    })).toThrow(InsufficientDataError);
  });

  it('fails with InsufficientDataError when a profile parameter has no series', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE });
    expect(() => analyzer.analyze(profile, { temperature: makeSeries('temperature', [22]) })).toThrow(InsufficientDataError);
  });

  it('fails with EmptyProfileError for a profile without parameters', () => {
    expect(() => analyzer.analyze(makeProfile({}), {})).toThrow(EmptyProfileError);
  });

  it('reports an inverted range before looking at the data', () => {
    const profile = makeProfile({ temperature: { min: 26, max: 20, unit: '°C' } });
    expect(() => analyzer.analyze(profile, {})).toThrow(InvalidRangeError);
  });

  it('rejects readings out of time order', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });
    const series = {
      temperature: {
        parameter: 'temperature',
        readings: [
          { timestamp: new Date(START.getTime() + DAY_MS), value: 22 },
          { timestamp: START, value: 23 }
        ]
      }
    };
    expect(() => analyzer.analyze(profile, series)).toThrow(ValidationError);
  });

  it('ignores series for parameters outside the profile', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });
    const report = analyzer.analyze(profile, {
      temperature: makeSeries('temperature', [22]),
      light: makeSeries('light', [100])
    });
    expect(report.assessments.map(a => a.parameter)).toEqual(['temperature']);
  });

  it('is deterministic', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE });
    const series = {
      temperature: makeSeries('temperature', [18, 19, 21, 23, 25]),
      humidity: makeSeries('humidity', [45, 70, 38, 55])
    };
    expect(JSON.stringify(analyzer.analyze(profile, series))).toBe(JSON.stringify(analyzer.analyze(profile, series)));
  });

  it('returns a frozen report', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });
    const report = analyzer.analyze(profile, { temperature: makeSeries('temperature', [22]) });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.assessments[0])).toBe(true);
    expect(Object.isFrozen(report.assessments[0].trend)).toBe(true);
  });

  it('rejects inconsistent thresholds', () => {
    expect(() => new GrowthAnalyzer({
      statusThresholds: { optimal: 0.5, acceptable: 0.6 },
      trend: { risingRate: 0.05, fallingRate: -0.05, minSamples: 2 }
    }, quietLogger())).toThrow(ValidationError);
  });

  describe('analyzeAsync', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE, humidity: HUMIDITY_RANGE });
    const series = {
      temperature: makeSeries('temperature', [18, 19, 21, 23, 25]),
      humidity: makeSeries('humidity', [45, 70, 38, 55])
    };

    it('matches the synchronous result', async () => {
      await expect(analyzer.analyzeAsync(profile, Promise.resolve(series))).resolves.toEqual(analyzer.analyze(profile, series));
    });

    it('propagates InsufficientDataError', async () => {
      await expect(analyzer.analyzeAsync(profile, { temperature: series.temperature })).rejects.toBeInstanceOf(InsufficientDataError);
    });

    it('times out when the series never arrive', async () => {
      const pending = new Promise<SeriesByParameter>(() => undefined);
      await expect(analyzer.analyzeAsync(profile, pending, { timeoutMs: 20 })).rejects.toBeInstanceOf(AnalysisTimeoutError);
    });
  });
});

describe('analyze / safeAnalyze', () => {
  const analyzer = new GrowthAnalyzer(undefined, quietLogger());

  it('analyze runs with default thresholds', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });
    expect(analyze(profile, { temperature: makeSeries('temperature', [22]) }).overallScore).toBe(100);
  });

  it('safeAnalyze returns typed failures', () => {
    const result = safeAnalyze(makeProfile({}), {});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('EMPTY_PROFILE');
    }
  });

  it('safeAnalyze returns the report on success', () => {
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });
    const result = safeAnalyze(profile, { temperature: makeSeries('temperature', [22]) });
    expect(result.success).toBe(true);
  });

  it('analyzes thirty days of one-second readings', () => {
    const count = 30 * 24 * 60 * 60;
    const readings = Array.from({ length: count }, (_, i) => ({
      timestamp: new Date(START.getTime() + i * 1000),
      value: 20 + (i % 6)
    }));
    const profile = makeProfile({ temperature: TEMPERATURE_RANGE });

    const report = analyzer.analyze(profile, { temperature: { parameter: 'temperature', readings } });

    const [assessment] = report.assessments;
    expect(assessment.statistics.count).toBe(2_592_000);
    expect(assessment.statistics.min).toBe(20);
    expect(assessment.statistics.max).toBe(25);
    expect(assessment.inRangeFraction).toBe(1);
    expect(report.overallScore).toBe(100);
  }, 60_000);
});
