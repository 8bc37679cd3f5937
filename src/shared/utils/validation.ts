/**
 * Validation utilities for the Plant Growth Analyzer
 * Provides input validation for profiles, series and analysis options
 */

import type { ValidationResult } from '../../types/core';
import type { OptimalRange, PlantProfile } from '../../types/plant-profile';
import type { ParameterSeries } from '../../types/sensor-data';
import type { AnalysisOptions } from '../../types/analysis';
import { ValidationError } from './errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function result(errors: string[], warnings: string[] = []): ValidationResult {
  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Validator class that provides static validation methods
 */
export class Validator {
  /**
   * Validate required string field
   */
  static validateRequiredString(value: unknown, fieldName: string): ValidationResult {
    const errors: string[] = [];

    if (!value || typeof value !== 'string') {
      errors.push(`${fieldName} is required and must be a string`);
    } else if (value.trim().length === 0) {
      errors.push(`${fieldName} cannot be empty`);
    }

    return result(errors);
  }

  /**
   * Validate an optimal range; min > max is reported as an error too
   */
  static validateOptimalRange(parameter: string, range: OptimalRange): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isFinite(range.min) || !Number.isFinite(range.max)) {
      errors.push(`Optimal range for ${parameter} must have finite min and max`);
    } else if (range.min > range.max) {
      errors.push(`Optimal range for ${parameter} has min ${range.min} greater than max ${range.max}`);
    } else if (range.min === range.max) {
      warnings.push(`Optimal range for ${parameter} is a single point (${range.min})`);
    }

    if (!range.unit) {
      warnings.push(`Optimal range for ${parameter} has no unit`);
    }

    return result(errors, warnings);
  }

  /**
   * Validate profile weights: finite, non-negative, positive total
   */
  static validateWeights(profile: PlantProfile): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!profile.weights) {
      return result(errors, warnings);
    }

    const parameters = Object.keys(profile.optimalRanges);
    let total = 0;

    for (const parameter of parameters) {
      const weight = profile.weights[parameter] ?? 1;
      if (!Number.isFinite(weight) || weight < 0) {
        errors.push(`Weight for ${parameter} must be a non-negative number`);
      } else {
        total += weight;
      }
    }

    for (const key of Object.keys(profile.weights)) {
      if (!parameters.includes(key)) {
        warnings.push(`Weight given for ${key}, which has no optimal range`);
      }
    }

    if (errors.length === 0 && parameters.length > 0 && total <= 0) {
      errors.push('Profile weights must have a positive total');
    }

    return result(errors, warnings);
  }

  /**
   * Validate profile structure; ranges are checked separately
   */
  static validateProfile(profile: PlantProfile): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    errors.push(...Validator.validateRequiredString(profile.profileId, 'Profile ID').errors);
    errors.push(...Validator.validateRequiredString(profile.type, 'Plant type').errors);

    if (!Number.isFinite(profile.baseGrowthRate) || profile.baseGrowthRate < 0) {
      errors.push('Base growth rate must be a non-negative number');
    }

    const parameters = Object.keys(profile.optimalRanges);
    for (const parameter of parameters) {
      if (!profile.sensorMapping[parameter]) {
        warnings.push(`No sensor mapped for ${parameter}`);
      }
    }
    for (const parameter of Object.keys(profile.sensorMapping)) {
      if (!parameters.includes(parameter)) {
        warnings.push(`Sensor mapped for ${parameter}, which has no optimal range`);
      }
    }

    return Validator.combineValidationResults([
      result(errors, warnings),
      Validator.validateWeights(profile)
    ]);
  }

  /**
   * Validate a series: valid timestamps in non-decreasing order, finite values
   */
  static validateSeries(series: ParameterSeries): ValidationResult {
    const errors: string[] = [];
    let previous = -Infinity;

    series.readings.forEach((reading, index) => {
      const time = reading.timestamp instanceof Date ? reading.timestamp.getTime() : NaN;
      if (Number.isNaN(time)) {
        errors.push(`${series.parameter} reading ${index} has an invalid timestamp`);
      } else if (time < previous) {
        errors.push(`${series.parameter} reading ${index} is earlier than the reading before it`);
      } else {
        previous = time;
      }

      if (!Number.isFinite(reading.value)) {
        errors.push(`${series.parameter} reading ${index} has a non-finite value`);
      }
    });

    return result(errors);
  }

  static validateAnalysisOptions(options: AnalysisOptions): ValidationResult {
    const errors: string[] = [];
    const { optimal, acceptable } = options.statusThresholds;
    const { risingRate, fallingRate, minSamples } = options.trend;

    if (!(acceptable > 0 && acceptable < optimal && optimal <= 1)) {
      errors.push('Status thresholds must satisfy 0 < acceptable < optimal <= 1');
    }

    if (!(risingRate >= 0) || !(fallingRate <= 0)) {
      errors.push('Trend rising rate must be >= 0 and falling rate <= 0');
    }

    if (!Number.isInteger(minSamples) || minSamples < 2) {
      errors.push('Trend minimum sample count must be an integer of at least 2');
    }

    return result(errors);
  }

  /**
   * Combine multiple validation results
   */
  static combineValidationResults(results: ValidationResult[]): ValidationResult {
    const allErrors: string[] = [];
    const allWarnings: string[] = [];

    for (const entry of results) {
      allErrors.push(...entry.errors);
      allWarnings.push(...entry.warnings);
    }

    return result(allErrors, allWarnings);
  }

  /**
   * Throw error if validation fails
   */
  static throwIfInvalid(validation: ValidationResult): void {
    if (!validation.isValid) {
      throw new ValidationError(validation.errors.join('; '), validation.errors);
    }
  }
}
