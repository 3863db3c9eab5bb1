/**
 * Type exports
 * @module @devstate/shared/types
 */

export * from './resources';
export * from './device-info';
