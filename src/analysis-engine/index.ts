export * from './statistics';
export * from './condition-evaluator';
export * from './trend-detector';
export * from './growth-scorer';
export * from './growth-analyzer';
export * from './data-preprocessor';
export * from './analysis-handler';
