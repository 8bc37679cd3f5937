import { describe, it, expect } from 'vitest';
import { ConditionEvaluator } from '../../src/analysis-engine/condition-evaluator';
import { ParameterStatus } from '../../src/types/core';
import { InsufficientDataError, InvalidRangeError } from '../../src/shared/utils/errors';
import { TEMPERATURE_RANGE, makeSeries } from '../helpers';

describe('ConditionEvaluator', () => {
  const evaluator = new ConditionEvaluator();

  it('counts boundary readings as in range', () => {
    const result = evaluator.evaluate(makeSeries('temperature', [20, 23, 26]), TEMPERATURE_RANGE);
    expect(result.inRangeFraction).toBe(1);
    expect(result.status).toBe(ParameterStatus.OPTIMAL);
  });

  it('classifies 3 of 5 readings in range as acceptable', () => {
    const result = evaluator.evaluate(makeSeries('temperature', [18, 19, 21, 23, 25]), TEMPERATURE_RANGE);
    expect(result).toEqual({
      inRangeFraction: 0.6,
      fractionBelow: 0.4,
      fractionAbove: 0,
      status: ParameterStatus.ACCEPTABLE
    });
  });

  it('reports zero in range and suboptimal when every reading is outside', () => {
    const result = evaluator.evaluate(makeSeries('temperature', [10, 30, 40]), TEMPERATURE_RANGE);
    expect(result.inRangeFraction).toBe(0);
    expect(result.fractionBelow).toBeCloseTo(1 / 3, 10);
    expect(result.fractionAbove).toBeCloseTo(2 / 3, 10);
    expect(result.status).toBe(ParameterStatus.SUBOPTIMAL);
  });

  it('treats exactly 90% in range as optimal', () => {
    const values = [21, 21, 21, 21, 21, 21, 21, 21, 21, 30];
    expect(evaluator.evaluate(makeSeries('temperature', values), TEMPERATURE_RANGE).status).toBe(ParameterStatus.OPTIMAL);
  });

  it('never lowers the fraction when an in-range reading is added', () => {
    const before = evaluator.evaluate(makeSeries('temperature', [18, 21]), TEMPERATURE_RANGE).inRangeFraction;
    const after = evaluator.evaluate(makeSeries('temperature', [18, 21, 22]), TEMPERATURE_RANGE).inRangeFraction;
    expect(before).toBe(0.5);
    expect(after).toBeGreaterThanOrEqual(before);
  });

  it('honours custom thresholds', () => {
    const custom = new ConditionEvaluator({ optimal: 0.8, acceptable: 0.5 });
    expect(custom.classify(0.8)).toBe(ParameterStatus.OPTIMAL);
    expect(custom.classify(0.5)).toBe(ParameterStatus.ACCEPTABLE);
    expect(custom.classify(0.49)).toBe(ParameterStatus.SUBOPTIMAL);
  });

  it('fails on an empty series', () => {
    expect(() => evaluator.evaluate(makeSeries('temperature', []), TEMPERATURE_RANGE)).toThrow(InsufficientDataError);
  });

  it('fails on an inverted range', () => {
    const series = makeSeries('temperature', [21]);
    expect(() => evaluator.evaluate(series, { min: 26, max: 20, unit: '°C' })).toThrow(InvalidRangeError);
  });
});
