/**
 * Structured JSON logger with verbosity-gated levels
 * @module @devstate/shared/logging/logger
 */

/**
 * Log levels
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

/**
 * Log entry metadata
 */
export interface LogMeta {
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Object kind being synchronized */
  resourceKind?: string;
  /** Object name being synchronized */
  resourceName?: string;
  /** Namespace of the object */
  namespace?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Metadata */
  meta?: LogMeta;
  /** Error details */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
    cause?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Pretty print output (development) */
  pretty?: boolean;
  /** Custom output function */
  output?: (entry: LogEntry) => void;
  /** Follow the process-wide settings of `configureLogging` */
  inheritRoot?: boolean;
}

/**
 * Process-wide settings applied to service loggers
 */
export type RootLoggingConfig = Partial<Pick<LoggerConfig, 'level' | 'pretty' | 'output'>>;

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
};

let rootConfig: RootLoggingConfig = {};

/**
 * Set the level, format and sink of every service logger, including the
 * module loggers created at import
 */
export function configureLogging(config: RootLoggingConfig): void {
  rootConfig = {};
  if (config.level !== undefined) {
    rootConfig.level = config.level;
  }
  if (config.pretty !== undefined) {
    rootConfig.pretty = config.pretty;
  }
  if (config.output !== undefined) {
    rootConfig.output = config.output;
  }
}

/**
 * Drop the settings of `configureLogging`
 */
export function resetLogging(): void {
  rootConfig = {};
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

/**
 * Map a klog-style verbosity (`-v=4`) onto a log level
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 5) {
    return 'trace';
  }
  if (verbosity >= 4) {
    return 'debug';
  }
  return 'info';
}

/**
 * Structured JSON logger
 */
export class Logger {
  private config: LoggerConfig;
  private meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.meta = {
      ...meta,
      service: config.service || meta.service,
      component: config.component || meta.component,
    };
  }

  private get effective(): LoggerConfig {
    return this.config.inheritRoot ? { ...this.config, ...rootConfig } : this.config;
  }

  get level(): LogLevel {
    return this.effective.level;
  }

  /**
   * Check if a log level is enabled; lets callers skip building expensive messages
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  /**
   * Format and output a log entry
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    // Drop unset keys so child loggers without a component stay compact
    const mergedMeta: LogMeta = {};
    for (const [key, value] of Object.entries({ ...this.meta, ...meta })) {
      if (value !== undefined) {
        mergedMeta[key] = value;
      }
    }
    if (Object.keys(mergedMeta).length > 0) {
      entry.meta = mergedMeta;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
        entry.error.code = error.code;
      }
      if (error.cause instanceof Error) {
        entry.error.cause = error.cause.message;
      }
    }

    const { output, pretty } = this.effective;
    if (output) {
      output(entry);
    } else {
      this.defaultOutput(entry, pretty === true);
    }
  }

  /**
   * Default output to console
   */
  private defaultOutput(entry: LogEntry, pretty: boolean): void {
    const output = pretty ? this.formatPretty(entry) : JSON.stringify(entry);

    switch (entry.level) {
      case 'trace':
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
      case 'fatal':
        console.error(output);
        break;
    }
  }

  /**
   * Format log entry for pretty printing
   */
  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      trace: '\x1b[2m',  // Dim
      debug: '\x1b[90m', // Gray
      info: '\x1b[36m',  // Cyan
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
      fatal: '\x1b[35m', // Magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];
    const levelStr = entry.level.toUpperCase().padEnd(5);

    let output = `${entry.timestamp} ${color}${levelStr}${reset} ${entry.message}`;

    if (entry.meta?.resourceName) {
      const ns = entry.meta.namespace ? `${entry.meta.namespace}/` : '';
      output += ` ${color}[${entry.meta.resourceKind ?? 'object'} ${ns}${entry.meta.resourceName}]${reset}`;
    }

    if (entry.meta?.component) {
      output += ` ${color}(${entry.meta.component})${reset}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.cause) {
        output += `\n  Caused by: ${entry.error.cause}`;
      }
      if (entry.error.stack) {
        output += `\n${entry.error.stack}`;
      }
    }

    return output;
  }

  /**
   * Create a child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Create a child logger scoped to one object
   */
  forResource(resourceKind: string, resourceName: string, namespace?: string): Logger {
    return this.child({ resourceKind, resourceName, namespace });
  }

  /**
   * Log a trace message (klog V(5))
   */
  trace(message: string, meta?: LogMeta): void {
    this.log('trace', message, meta);
  }

  /**
   * Log a debug message (klog V(4))
   */
  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  /**
   * Log an error message
   */
  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  /**
   * Log a fatal error message
   */
  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('fatal', message, meta, error);
    } else {
      this.log('fatal', message, error);
    }
  }
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'test' ||
    process.env.VITEST === 'true' ||
    process.env.JEST_WORKER_ID !== undefined
  );
}

/**
 * Get the default log level based on environment
 */
function getDefaultLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) {
    return configured;
  }
  // In test environment, suppress logs unless explicitly set
  if (isTestEnvironment()) {
    return 'fatal';
  }
  return 'info';
}

/**
 * Silent output function for tests
 */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
function silentOutput(_entry: LogEntry): void {
  // Intentionally empty - suppresses all output
}

/**
 * Create a logger instance with test environment detection
 * Automatically suppresses output during tests unless LOG_LEVEL is explicitly set.
 * Without an explicit level it follows `configureLogging`.
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const testConfig: Partial<LoggerConfig> = {};

  if (isTestEnvironment() && !process.env.LOG_LEVEL) {
    testConfig.level = 'fatal';
    testConfig.output = silentOutput;
  }

  return new Logger(
    {
      level: getDefaultLogLevel(),
      pretty: process.env.NODE_ENV !== 'production',
      service: 'devstate',
      inheritRoot: config?.level === undefined,
      ...config,
      ...testConfig,
    },
    meta,
  );
}
