/**
 * Object store errors
 * @module @devstate/shared/errors/store-error
 */

import { DeviceStateError, ErrorCode, describeResource, type ErrorMeta } from './base-error';

/**
 * Object does not exist in the store
 */
export class NotFoundError extends DeviceStateError {
  constructor(meta: ErrorMeta, cause?: unknown) {
    super(`${describeResource(meta)} not found`, ErrorCode.NOT_FOUND, meta, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * The store refused a write computed against a stale read, or one
 * that changes a field the store treats as immutable
 */
export class ConflictError extends DeviceStateError {
  constructor(message: string, meta: ErrorMeta = {}, cause?: unknown) {
    super(message, ErrorCode.CONFLICT, meta, cause);
    this.name = 'ConflictError';
  }
}

/**
 * Desired object for a restricted update does not name the fetched live object
 */
export class IdentityMismatchError extends DeviceStateError {
  /** Identity the caller asked for */
  public readonly desired: { name: string; namespace: string };
  /** Identity of the fetched live object */
  public readonly live: { name: string; namespace: string };

  constructor(
    desired: { name: string; namespace: string },
    live: { name: string; namespace: string },
    meta: ErrorMeta = {},
  ) {
    super(
      `desired object ${desired.namespace}/${desired.name} does not match live object ${live.namespace}/${live.name}`,
      ErrorCode.IDENTITY_MISMATCH,
      meta,
    );
    this.name = 'IdentityMismatchError';
    this.desired = desired;
    this.live = live;
  }
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

export function isIdentityMismatchError(error: unknown): error is IdentityMismatchError {
  return error instanceof IdentityMismatchError;
}
