/**
 * Annotation codec errors
 * @module @devstate/shared/errors/codec-error
 */

import type { ValidationIssue } from '../validation/types';
import { DeviceStateError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * The private model holds a value the wire format cannot represent.
 * Signals a programming error in whoever built the model.
 */
export class SerializationError extends DeviceStateError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], meta: ErrorMeta = {}, cause?: unknown) {
    super(message, ErrorCode.SERIALIZATION_FAILED, meta, cause);
    this.name = 'SerializationError';
    this.issues = issues;
  }
}

/**
 * The annotation is present but is not a valid serialized model,
 * i.e. a previous writer corrupted the state.
 */
export class DeserializationError extends DeviceStateError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], meta: ErrorMeta = {}, cause?: unknown) {
    super(message, ErrorCode.DESERIALIZATION_FAILED, meta, cause);
    this.name = 'DeserializationError';
    this.issues = issues;
  }
}

export function isSerializationError(error: unknown): error is SerializationError {
  return error instanceof SerializationError;
}

export function isDeserializationError(error: unknown): error is DeserializationError {
  return error instanceof DeserializationError;
}
