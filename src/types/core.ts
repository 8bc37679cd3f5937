/**
 * Core data types for the Plant Growth Analyzer
 * These enums and shared shapes are used throughout the analysis pipeline
 */

// Parameters with dedicated wording in recommendations; profiles may define others
export enum PlantParameter {
  TEMPERATURE = 'temperature',
  HUMIDITY = 'humidity',
  LIGHT = 'light',
  SOIL_MOISTURE = 'soil_moisture',
  CO2 = 'co2',
  PH = 'ph'
}

export enum ParameterStatus {
  OPTIMAL = 'optimal',
  ACCEPTABLE = 'acceptable',
  SUBOPTIMAL = 'suboptimal'
}

export enum TrendDirection {
  RISING = 'rising',
  FALLING = 'falling',
  STABLE = 'stable'
}

export enum GrowthBand {
  EXCELLENT = 'excellent',
  GOOD = 'good',
  ACCEPTABLE = 'acceptable',
  DEFICIENT = 'deficient'
}

export enum AdjustmentDirection {
  INCREASE = 'increase',
  DECREASE = 'decrease'
}

// Validation result shape shared by all validators
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
