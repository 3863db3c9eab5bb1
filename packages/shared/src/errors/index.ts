/**
 * Error classes for device state synchronization
 * @module @devstate/shared/errors
 */

// Base error
export {
  DeviceStateError,
  ErrorCode,
  isDeviceStateError,
  wrapError,
  describeResource,
} from './base-error';

export type { ErrorMeta } from './base-error';

// Codec errors
export {
  SerializationError,
  DeserializationError,
  isSerializationError,
  isDeserializationError,
} from './codec-error';

// Patch errors
export {
  DiffError,
  PatchApplyError,
  isDiffError,
  isPatchApplyError,
} from './patch-error';

export type { SubResource } from './patch-error';

// Store errors
export {
  NotFoundError,
  ConflictError,
  IdentityMismatchError,
  isNotFoundError,
  isConflictError,
  isIdentityMismatchError,
} from './store-error';
