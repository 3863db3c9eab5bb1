/**
 * devstate - Shared Package
 * Device model types, validation, errors and logging
 * @module @devstate/shared
 */

// Types
export * from './types/index';

// Errors
export * from './errors/index';

// Validation
export * from './validation/index';

// Logging
export {
  Logger,
  configureLogging,
  createServiceLogger,
  isTestEnvironment,
  isLogLevel,
  levelFromVerbosity,
  resetLogging,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
  type RootLoggingConfig,
} from './logging/logger';
