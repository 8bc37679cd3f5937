/**
 * Condition Evaluator
 * Classifies a parameter's readings against its optimal range
 */

import { ParameterStatus } from '../types/core';
import type { OptimalRange } from '../types/plant-profile';
import type { ParameterSeries } from '../types/sensor-data';
import type { RangeEvaluation, StatusThresholds } from '../types/analysis';
import { InsufficientDataError, InvalidRangeError } from '../shared/utils/errors';
import { STATUS_THRESHOLDS } from '../shared/config/constants';

export const DEFAULT_STATUS_THRESHOLDS: StatusThresholds = {
  optimal: STATUS_THRESHOLDS.OPTIMAL,
  acceptable: STATUS_THRESHOLDS.ACCEPTABLE
};

export class ConditionEvaluator {
  private thresholds: StatusThresholds;

  constructor(thresholds: StatusThresholds = DEFAULT_STATUS_THRESHOLDS) {
    this.thresholds = { ...thresholds };
  }

  /**
   * Fraction of readings inside [min, max], boundaries included
   */
  public evaluate(series: ParameterSeries, range: OptimalRange): RangeEvaluation {
    if (range.min > range.max) {
      throw new InvalidRangeError(series.parameter, range.min, range.max);
    }

    const total = series.readings.length;
    if (total === 0) {
      throw new InsufficientDataError(series.parameter);
    }

    let below = 0;
    let above = 0;
    for (const reading of series.readings) {
      if (reading.value < range.min) below++;
      else if (reading.value > range.max) above++;
    }

    const inRangeFraction = (total - below - above) / total;

    return {
      inRangeFraction,
      fractionBelow: below / total,
      fractionAbove: above / total,
      status: this.classify(inRangeFraction)
    };
  }

  public classify(inRangeFraction: number): ParameterStatus {
    if (inRangeFraction >= this.thresholds.optimal) return ParameterStatus.OPTIMAL;
    if (inRangeFraction >= this.thresholds.acceptable) return ParameterStatus.ACCEPTABLE;
    return ParameterStatus.SUBOPTIMAL;
  }

  public getThresholds(): StatusThresholds {
    return { ...this.thresholds };
  }
}
