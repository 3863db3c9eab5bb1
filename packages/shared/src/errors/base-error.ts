/**
 * Base error class with error codes
 * @module @devstate/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  INVALID_CONFIG = 1002,

  // Codec errors (2xxx)
  SERIALIZATION_FAILED = 2000,
  DESERIALIZATION_FAILED = 2001,
  INVALID_QUANTITY = 2002,

  // Patch errors (3xxx)
  DIFF_FAILED = 3000,
  PATCH_APPLY_FAILED = 3001,
  INVALID_PATCH = 3002,

  // Store errors (4xxx)
  NOT_FOUND = 4000,
  CONFLICT = 4001,
  IDENTITY_MISMATCH = 4002,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Object kind involved, e.g. `Node` */
  resourceKind?: string;
  /** Object name involved */
  resourceName?: string;
  /** Namespace of the object, if namespaced */
  namespace?: string;
  /** Sub-resource involved */
  subResource?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all device state errors
 */
export class DeviceStateError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DeviceStateError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

/**
 * Check if an error is a DeviceStateError
 */
export function isDeviceStateError(error: unknown): error is DeviceStateError {
  return error instanceof DeviceStateError;
}

/**
 * Wrap an unknown error as a DeviceStateError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): DeviceStateError {
  if (isDeviceStateError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new DeviceStateError(error.message, code, {}, error);
  }

  return new DeviceStateError(String(error), code);
}

/**
 * Human-readable `kind namespace/name` label for messages
 */
export function describeResource(meta: ErrorMeta): string {
  const name = meta.namespace ? `${meta.namespace}/${meta.resourceName ?? ''}` : meta.resourceName ?? '';
  return meta.resourceKind ? `${meta.resourceKind} ${JSON.stringify(name)}` : JSON.stringify(name);
}
