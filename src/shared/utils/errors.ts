/**
 * Error taxonomy for the analysis pipeline
 * Every failure the core can report is one of these classes
 */

export type AnalysisErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'INVALID_RANGE'
  | 'EMPTY_PROFILE'
  | 'VALIDATION_ERROR'
  | 'PROFILE_NOT_FOUND'
  | 'ANALYSIS_TIMEOUT';

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
  }
}

/**
 * A profile parameter has no readings to score
 */
export class InsufficientDataError extends AnalysisError {
  readonly parameter: string;

  constructor(parameter: string, message = `No readings available for parameter '${parameter}'`) {
    super('INSUFFICIENT_DATA', message);
    this.name = 'InsufficientDataError';
    this.parameter = parameter;
  }
}

export class InvalidRangeError extends AnalysisError {
  readonly parameter: string;

  constructor(parameter: string, min: number, max: number) {
    super('INVALID_RANGE', `Optimal range for '${parameter}' is invalid: min ${min} > max ${max}`);
    this.name = 'InvalidRangeError';
    this.parameter = parameter;
  }
}

export class EmptyProfileError extends AnalysisError {
  readonly profileId: string;

  constructor(profileId: string) {
    super('EMPTY_PROFILE', `Plant profile '${profileId}' defines no parameters`);
    this.name = 'EmptyProfileError';
    this.profileId = profileId;
  }
}

/**
 * Custom validation error class
 */
export class ValidationError extends AnalysisError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = [message]) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export class ProfileNotFoundError extends AnalysisError {
  readonly resource = 'Plant profile';

  constructor(profileId: string) {
    super('PROFILE_NOT_FOUND', `Plant profile '${profileId}' not found`);
    this.name = 'ProfileNotFoundError';
  }
}

export class AnalysisTimeoutError extends AnalysisError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('ANALYSIS_TIMEOUT', `Analysis did not complete within ${timeoutMs} ms`);
    this.name = 'AnalysisTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
