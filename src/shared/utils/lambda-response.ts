/**
 * Lambda response utilities for consistent API responses
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import { isAnalysisError } from './errors';
import type { Logger } from './logger';

export class LambdaResponse {
  private static defaultHeaders = {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Api-Key',
    'Access-Control-Allow-Methods': 'POST,OPTIONS',
  };

  /**
   * Create a successful response
   */
  static success(data: unknown, statusCode: number = 200): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create an error response
   */
  static error(message: string, statusCode: number = 500, details?: unknown): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: false,
        error: {
          message,
          details,
        },
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create a validation error response
   */
  static validationError(errors: string[], code: string = 'VALIDATION_ERROR'): APIGatewayProxyResult {
    return this.error('Validation failed', 400, { code, validationErrors: errors });
  }

  static notFound(resource: string): APIGatewayProxyResult {
    return this.error(`${resource} not found`, 404, { code: 'PROFILE_NOT_FOUND' });
  }

  static unprocessable(message: string, details?: unknown): APIGatewayProxyResult {
    return this.error(message, 422, details);
  }

  static timeout(message: string): APIGatewayProxyResult {
    return this.error(message, 504, { code: 'ANALYSIS_TIMEOUT' });
  }
}

/**
 * Map an analysis failure to an HTTP response
 */
export function handleLambdaError(error: unknown, logger?: Logger): APIGatewayProxyResult {
  if (!isAnalysisError(error)) {
    logger?.error('Unhandled analysis failure', error);
    return LambdaResponse.error(
      'Internal server error',
      500,
      process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined
    );
  }

  logger?.warn('Analysis request rejected', { code: error.code, message: error.message });

  switch (error.code) {
    case 'VALIDATION_ERROR':
    case 'INVALID_RANGE':
    case 'EMPTY_PROFILE':
      return LambdaResponse.validationError([error.message], error.code);
    case 'PROFILE_NOT_FOUND':
      return LambdaResponse.notFound('Plant profile');
    case 'INSUFFICIENT_DATA':
      return LambdaResponse.unprocessable(error.message, { code: error.code });
    case 'ANALYSIS_TIMEOUT':
      return LambdaResponse.timeout(error.message);
  }
}
