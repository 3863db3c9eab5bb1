export * from './annotation-codec';
