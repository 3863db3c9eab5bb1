/**
 * Validation exports
 * @module @devstate/shared/validation
 */

export * from './types';
export * from './device-info-validation';
