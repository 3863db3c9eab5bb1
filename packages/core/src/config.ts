/**
 * Configuration
 * @module @devstate/core/config
 */

import {
  DeviceStateError,
  ErrorCode,
  configureLogging,
  isLogLevel,
  levelFromVerbosity,
  type LogLevel,
  type RootLoggingConfig,
} from '@devstate/shared';

/**
 * Runtime configuration
 */
export interface DeviceStateConfig {
  /** Minimum log level */
  logLevel: LogLevel;
  /**
   * Single kubeconfig file given on the command line. When unset the client
   * reads the `KUBECONFIG` path list, then `~/.kube/config`.
   */
  kubeconfig?: string;
  /** kubeconfig context to use instead of the current one */
  context?: string;
  /** Namespace for pod operations that name none */
  namespace: string;
  /** Runtime environment */
  nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: DeviceStateConfig = {
  logLevel: 'info',
  namespace: 'default',
  nodeEnv: 'development',
};

function invalid(variable: string, value: string, expected: string): DeviceStateError {
  return new DeviceStateError(
    `invalid ${variable}=${JSON.stringify(value)}: expected ${expected}`,
    ErrorCode.INVALID_CONFIG,
    { field: variable },
  );
}

function parseLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const level = env.LOG_LEVEL;
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw invalid('LOG_LEVEL', level, 'one of trace, debug, info, warn, error, fatal');
    }
    return level;
  }

  const verbosity = env.DEVSTATE_VERBOSITY;
  if (verbosity !== undefined && verbosity !== '') {
    if (!/^\d+$/.test(verbosity)) {
      throw invalid('DEVSTATE_VERBOSITY', verbosity, 'a non-negative integer');
    }
    return levelFromVerbosity(Number.parseInt(verbosity, 10));
  }

  return DEFAULT_CONFIG.logLevel;
}

function parseNodeEnv(value: string | undefined): DeviceStateConfig['nodeEnv'] {
  switch (value) {
    case 'production':
    case 'test':
      return value;
    default:
      return DEFAULT_CONFIG.nodeEnv;
  }
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeviceStateConfig {
  return {
    logLevel: parseLogLevel(env),
    context: env.DEVSTATE_KUBE_CONTEXT || undefined,
    namespace: env.DEVSTATE_NAMESPACE || DEFAULT_CONFIG.namespace,
    nodeEnv: parseNodeEnv(env.NODE_ENV),
  };
}

/**
 * Logging settings derived from the configuration
 */
export function loggingOptions(config: DeviceStateConfig): RootLoggingConfig {
  return {
    level: config.logLevel,
    pretty: config.nodeEnv !== 'production',
  };
}

/**
 * Apply the configured level and format to every service logger
 */
export function applyLoggingConfig(config: DeviceStateConfig): void {
  configureLogging(loggingOptions(config));
}
