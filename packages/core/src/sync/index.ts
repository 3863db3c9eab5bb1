export * from './update-orchestrator';
