/**
 * Plant Growth Analyzer
 * Scores growing conditions from sensor time series against a plant profile
 */

export * from './types';
export * from './shared';
export * from './analysis-engine';
export * from './data-ingestion';
