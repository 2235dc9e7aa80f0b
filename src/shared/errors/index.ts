/**
 * Errors Module
 *
 * Standardized error handling and logging utilities.
 */

export * from './handler';
export * from './types';
export * from './logger';
