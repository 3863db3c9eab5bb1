/**
 * Patch construction and application errors
 * @module @devstate/shared/errors/patch-error
 */

import { DeviceStateError, ErrorCode, describeResource, type ErrorMeta } from './base-error';

/**
 * Sub-resource of an object that is versioned and patched on its own
 */
export type SubResource = 'default' | 'status';

/**
 * Either object could not be serialized or diffed against its schema
 */
export class DiffError extends DeviceStateError {
  constructor(message: string, meta: ErrorMeta = {}, cause?: unknown) {
    super(message, ErrorCode.DIFF_FAILED, meta, cause);
    this.name = 'DiffError';
  }
}

/**
 * The store rejected or failed one step of a patch sequence.
 * Steps listed in `completed` were applied and are not rolled back.
 */
export class PatchApplyError extends DeviceStateError {
  /** Sub-resource whose patch failed */
  public readonly subResource: SubResource;
  /** Sub-resources patched successfully before the failure */
  public readonly completed: SubResource[];

  constructor(
    subResource: SubResource,
    completed: SubResource[],
    meta: ErrorMeta,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `failed to patch ${subResource} of ${describeResource(meta)}: ${reason}`,
      ErrorCode.PATCH_APPLY_FAILED,
      { ...meta, subResource },
      cause,
    );
    this.name = 'PatchApplyError';
    this.subResource = subResource;
    this.completed = completed;
  }

  /**
   * Whether an earlier step already reached the store
   */
  isPartial(): boolean {
    return this.completed.length > 0;
  }
}

export function isDiffError(error: unknown): error is DiffError {
  return error instanceof DiffError;
}

export function isPatchApplyError(error: unknown): error is PatchApplyError {
  return error instanceof PatchApplyError;
}
