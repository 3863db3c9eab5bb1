/**
 * devstate Core Package
 * Codec, reconciler, patch builder, object stores and update orchestration
 * for the device model carried on Node and Pod annotations
 * @module @devstate/core
 */

export * from './codec';
export * from './reconcile';
export * from './patch';
export * from './store';
export * from './sync';
export * from './services';
export * from './config';
