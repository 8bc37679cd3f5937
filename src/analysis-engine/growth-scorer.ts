/**
 * Growth Scorer
 * Aggregates per-parameter assessments into an overall score, band and ranked recommendations
 */

import {
  AdjustmentDirection,
  GrowthBand,
  ParameterStatus,
  PlantParameter
} from '../types/core';
import type { PlantProfile } from '../types/plant-profile';
import type {
  GrowthReport,
  ParameterAssessment,
  RangeEvaluation,
  Recommendation,
  StatusThresholds
} from '../types/analysis';
import { EmptyProfileError } from '../shared/utils/errors';
import { BAND_FLOORS, SCORE_SCALE } from '../shared/config/constants';
import { DEFAULT_STATUS_THRESHOLDS } from './condition-evaluator';

interface AdjustmentPhrases {
  increase: string;
  decrease: string;
}

const PARAMETER_PHRASES: Record<string, AdjustmentPhrases> = {
  [PlantParameter.TEMPERATURE]: { increase: 'Raise the temperature', decrease: 'Lower the temperature' },
  [PlantParameter.HUMIDITY]: { increase: 'Raise the humidity', decrease: 'Lower the humidity' },
  [PlantParameter.LIGHT]: { increase: 'Increase light exposure', decrease: 'Reduce light exposure' },
  [PlantParameter.SOIL_MOISTURE]: { increase: 'Water more often', decrease: 'Reduce watering' },
  [PlantParameter.CO2]: { increase: 'Enrich the air with CO2', decrease: 'Ventilate to lower CO2' },
  [PlantParameter.PH]: { increase: 'Raise the pH', decrease: 'Lower the pH' }
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round1(value: number): number {
  return Number(value.toFixed(1));
}

export class GrowthScorer {
  private thresholds: StatusThresholds;

  constructor(thresholds: StatusThresholds = DEFAULT_STATUS_THRESHOLDS) {
    this.thresholds = { ...thresholds };
  }

  /**
   * Per-parameter contribution, consistent with the status label:
   * optimal 100, acceptable 40-79, suboptimal 0-39
   */
  public contribution(evaluation: RangeEvaluation): number {
    const { optimal, acceptable } = this.thresholds;
    const fraction = evaluation.inRangeFraction;

    switch (evaluation.status) {
      case ParameterStatus.OPTIMAL:
        return SCORE_SCALE.OPTIMAL;
      case ParameterStatus.ACCEPTABLE: {
        const position = (fraction - acceptable) / (optimal - acceptable);
        const span = SCORE_SCALE.ACCEPTABLE_CEILING - SCORE_SCALE.ACCEPTABLE_FLOOR;
        return clamp(SCORE_SCALE.ACCEPTABLE_FLOOR + position * span, SCORE_SCALE.ACCEPTABLE_FLOOR, SCORE_SCALE.ACCEPTABLE_CEILING);
      }
      case ParameterStatus.SUBOPTIMAL: {
        const span = SCORE_SCALE.SUBOPTIMAL_CEILING - SCORE_SCALE.SUBOPTIMAL_FLOOR;
        return clamp(SCORE_SCALE.SUBOPTIMAL_FLOOR + (fraction / acceptable) * span, SCORE_SCALE.SUBOPTIMAL_FLOOR, SCORE_SCALE.SUBOPTIMAL_CEILING);
      }
    }
  }

  /**
   * Normalized weights in profile order. Parameters without an override weigh 1,
   * so a profile without weights gets 1/n each.
   */
  public resolveWeights(profile: PlantProfile): Record<string, number> {
    const parameters = Object.keys(profile.optimalRanges);
    if (parameters.length === 0) {
      throw new EmptyProfileError(profile.profileId);
    }

    const raw = parameters.map(parameter => profile.weights?.[parameter] ?? 1);
    const total = raw.reduce((sum, weight) => sum + weight, 0);

    const weights: Record<string, number> = {};
    parameters.forEach((parameter, index) => {
      weights[parameter] = raw[index] / total;
    });
    return weights;
  }

  /**
   * Weighted mean of contributions, clamped to [0, 100].
   * Summed in parameter-name order so the supplied order never changes the result.
   */
  public score(assessments: readonly ParameterAssessment[], profileId = 'unknown'): number {
    if (assessments.length === 0) {
      throw new EmptyProfileError(profileId);
    }

    const ordered = [...assessments].sort((a, b) => (a.parameter < b.parameter ? -1 : a.parameter > b.parameter ? 1 : 0));
    let weighted = 0;
    let totalWeight = 0;
    for (const assessment of ordered) {
      weighted += assessment.score * assessment.weight;
      totalWeight += assessment.weight;
    }

    return clamp(totalWeight > 0 ? weighted / totalWeight : 0, 0, 100);
  }

  public band(score: number): GrowthBand {
    if (score >= BAND_FLOORS.EXCELLENT) return GrowthBand.EXCELLENT;
    if (score >= BAND_FLOORS.GOOD) return GrowthBand.GOOD;
    if (score >= BAND_FLOORS.ACCEPTABLE) return GrowthBand.ACCEPTABLE;
    return GrowthBand.DEFICIENT;
  }

  /**
   * One recommendation per non-optimal parameter, worst contribution first.
   * Equal contributions keep the order the assessments were given in.
   */
  public recommend(assessments: readonly ParameterAssessment[]): Recommendation[] {
    return assessments
      .filter(assessment => assessment.status !== ParameterStatus.OPTIMAL)
      .map(assessment => this.createRecommendation(assessment))
      .sort((a, b) => a.score - b.score);
  }

  public buildReport(profile: PlantProfile, assessments: readonly ParameterAssessment[]): GrowthReport {
    const overallScore = this.score(assessments, profile.profileId);

    return {
      profileId: profile.profileId,
      plantType: profile.type,
      overallScore,
      band: this.band(overallScore),
      assessments: [...assessments],
      recommendations: this.recommend(assessments)
    };
  }

  private chooseDirection(assessment: ParameterAssessment): AdjustmentDirection {
    const { min, max } = assessment.optimalRange;
    const average = assessment.statistics.mean;

    if (average < min) return AdjustmentDirection.INCREASE;
    if (average > max) return AdjustmentDirection.DECREASE;

    if (assessment.fractionBelow > assessment.fractionAbove) return AdjustmentDirection.INCREASE;
    if (assessment.fractionAbove > assessment.fractionBelow) return AdjustmentDirection.DECREASE;

    return average - min <= max - average ? AdjustmentDirection.INCREASE : AdjustmentDirection.DECREASE;
  }

  private createRecommendation(assessment: ParameterAssessment): Recommendation {
    const direction = this.chooseDirection(assessment);
    const { min, max } = assessment.optimalRange;

    return {
      parameter: assessment.parameter,
      direction,
      targetBound: direction === AdjustmentDirection.INCREASE ? min : max,
      observedMean: assessment.statistics.mean,
      unit: assessment.unit,
      score: assessment.score,
      fractionBelow: assessment.fractionBelow,
      fractionAbove: assessment.fractionAbove,
      message: this.formatMessage(assessment, direction)
    };
  }

  private formatMessage(assessment: ParameterAssessment, direction: AdjustmentDirection): string {
    const { parameter, unit, fractionBelow, fractionAbove } = assessment;
    const { min, max } = assessment.optimalRange;
    const average = assessment.statistics.mean;
    const unitSuffix = unit ? ` ${unit}` : '';

    const phrases = PARAMETER_PHRASES[parameter] ?? {
      increase: `Increase ${parameter.replace(/_/g, ' ')}`,
      decrease: `Decrease ${parameter.replace(/_/g, ' ')}`
    };
    const action = direction === AdjustmentDirection.INCREASE ? phrases.increase : phrases.decrease;
    const position = average < min ? 'below' : average > max ? 'above' : 'within';

    return `${action}: mean ${round1(average)}${unitSuffix} is ${position} the optimal range of ` +
      `${min}-${max}${unitSuffix} (${round1(fractionBelow * 100)}% of readings below, ${round1(fractionAbove * 100)}% above).`;
  }
}
