/**
 * Analysis result models
 * Everything here is derived per run and never mutated after creation
 */

import {
  AdjustmentDirection,
  GrowthBand,
  ParameterStatus,
  TrendDirection
} from './core';
import type { OptimalRange } from './plant-profile';
import type { SeriesStatistics } from './sensor-data';

export interface StatusThresholds {
  optimal: number;
  acceptable: number;
}

export interface TrendThresholds {
  risingRate: number; // normalized range fraction per day
  fallingRate: number;
  minSamples: number;
}

export interface AnalysisOptions {
  statusThresholds: StatusThresholds;
  trend: TrendThresholds;
}

export interface RangeEvaluation {
  inRangeFraction: number;
  fractionBelow: number;
  fractionAbove: number;
  status: ParameterStatus;
}

export interface TrendAssessment {
  direction: TrendDirection;
  slopePerDay: number;
  normalizedRatePerDay: number;
  rSquared: number;
  sampleCount: number;
  lowConfidence: boolean;
}

export interface ParameterAssessment extends RangeEvaluation {
  parameter: string;
  unit: string;
  optimalRange: OptimalRange;
  trend: TrendAssessment;
  statistics: SeriesStatistics;
  score: number; // per-parameter contribution, 0-100
  weight: number; // normalized, all weights sum to 1
}

export interface Recommendation {
  parameter: string;
  direction: AdjustmentDirection;
  targetBound: number;
  observedMean: number;
  unit: string;
  score: number;
  fractionBelow: number;
  fractionAbove: number;
  message: string;
}

export interface GrowthReport {
  profileId: string;
  plantType: string;
  overallScore: number;
  band: GrowthBand;
  assessments: ParameterAssessment[];
  recommendations: Recommendation[];
}

export interface AnalysisEnvelope {
  analysisId: string;
  generatedAt: string;
  report: GrowthReport;
}
