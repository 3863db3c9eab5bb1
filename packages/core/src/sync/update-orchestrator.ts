/**
 * Update orchestrator
 * Sequences the store calls that write a changed object back safely
 * @module @devstate/core/sync/update-orchestrator
 */

import _ from 'lodash';
import {
  DeviceStateError,
  ErrorCode,
  IdentityMismatchError,
  PatchApplyError,
  createServiceLogger,
  type ErrorMeta,
  type SubResource,
} from '@devstate/shared';
import { buildPatch, isEmptyPatch, serializePatch, type PatchSchema } from '../patch';
import type { KubeObject, ObjectMeta, ObjectStore } from '../store';

const logger = createServiceLogger({}, { component: 'update-orchestrator' });

/**
 * One independently versioned partial update
 */
export interface PatchStep {
  subResource: SubResource;
  patchBytes: string;
}

/**
 * Apply patch steps in order. There is no cross-step atomicity: a failed
 * step raises `PatchApplyError` and earlier steps stay applied.
 *
 * @returns the object as returned by the last step
 */
export async function applyPatchSequence<T extends KubeObject>(
  store: ObjectStore<T>,
  name: string,
  steps: PatchStep[],
  namespace?: string,
): Promise<T> {
  const meta: ErrorMeta = { resourceKind: store.kind, resourceName: name, namespace };
  const log = logger.forResource(store.kind, name, namespace);
  const completed: SubResource[] = [];
  let updated: T | undefined;

  for (const step of steps) {
    try {
      updated = await store.patch(name, step.patchBytes, { namespace, subResource: step.subResource });
    } catch (err) {
      const error = new PatchApplyError(step.subResource, [...completed], meta, err);
      log.error('Patch failed', error, { subResource: step.subResource, patch: step.patchBytes });
      throw error;
    }
    completed.push(step.subResource);
    log.trace('Patched sub-resource', { subResource: step.subResource, resourceVersion: updated.metadata?.resourceVersion });
  }

  if (updated === undefined) {
    throw new DeviceStateError('patch sequence has no steps', ErrorCode.INTERNAL, meta);
  }
  return updated;
}

function patchStepBytes(kind: string, name: string, oldObject: unknown, newObject: unknown, schema: PatchSchema): string {
  const patch = buildPatch(oldObject, newObject, schema);
  const patchBytes = serializePatch(patch);
  logger.trace('Computed patch', {
    resourceKind: kind,
    resourceName: name,
    patch: patchBytes,
    empty: isEmptyPatch(patch),
  });
  return patchBytes;
}

/**
 * Patch the default sub-resource with the diff `oldObject` -> `newObject`
 */
export async function patchObjectMetadata<T extends KubeObject>(
  store: ObjectStore<T>,
  name: string,
  oldObject: T,
  newObject: T,
  schema: PatchSchema,
): Promise<T> {
  const patchBytes = patchStepBytes(store.kind, name, oldObject, newObject, schema);
  return applyPatchSequence(store, name, [{ subResource: 'default', patchBytes }], oldObject.metadata?.namespace);
}

/**
 * Patch both the default and the `status` sub-resource with the same
 * bytes, since the store versions them independently
 */
export async function patchObjectMetadataAndStatus<T extends KubeObject>(
  store: ObjectStore<T>,
  name: string,
  oldObject: T,
  newObject: T,
  schema: PatchSchema,
): Promise<T> {
  const patchBytes = patchStepBytes(store.kind, name, oldObject, newObject, schema);
  return applyPatchSequence(
    store,
    name,
    [
      { subResource: 'default', patchBytes },
      { subResource: 'status', patchBytes },
    ],
    oldObject.metadata?.namespace,
  );
}

/**
 * Restricted update: write only the desired annotations.
 *
 * Used where a full replace from a cached copy would be rejected, e.g.
 * because the cached placement field is stale. The live object is fetched,
 * cloned, and only `metadata.annotations` is taken from `desired`, so the
 * store sees every other field unchanged.
 */
export async function updateMetadataOnly<T extends KubeObject>(store: ObjectStore<T>, desired: T): Promise<T> {
  const name = desired.metadata?.name ?? '';
  const namespace = store.namespaced ? desired.metadata?.namespace ?? 'default' : undefined;

  const live = await store.get(name, namespace);

  const desiredId = { name, namespace: desired.metadata?.namespace ?? '' };
  const liveId = { name: live.metadata?.name ?? '', namespace: live.metadata?.namespace ?? '' };
  if (desiredId.name !== liveId.name || desiredId.namespace !== liveId.namespace) {
    throw new IdentityMismatchError(desiredId, liveId, { resourceKind: store.kind, resourceName: name, namespace });
  }

  const modified = _.cloneDeep(live);
  const metadata: ObjectMeta = { ...modified.metadata };
  const annotations = desired.metadata?.annotations;
  if (annotations === undefined) {
    delete metadata.annotations;
  } else {
    metadata.annotations = { ...annotations };
  }
  modified.metadata = metadata;

  logger.debug('Updating annotations only', {
    resourceKind: store.kind,
    resourceName: name,
    namespace,
    resourceVersion: live.metadata?.resourceVersion,
  });
  return store.update(modified);
}
