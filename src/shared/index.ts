/**
 * Shared utilities and configuration exports
 */

// Utilities
export * from './utils';

// Configuration
export * from './config';
