export * from './object-store';
export * from './in-memory-store';
export * from './kubernetes-store';
