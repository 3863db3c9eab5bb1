export * from './quantity';
export * from './node-reconciler';
export * from './pod-reconciler';
