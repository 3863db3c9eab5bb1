export * from './device-state-client';
