/**
 * Remote object store interface
 * @module @devstate/core/store/object-store
 */

import type { SubResource } from '@devstate/shared';
import type { AnnotatedMeta } from '../codec';

/**
 * Metadata fields the synchronizer relies on
 */
export interface ObjectMeta extends AnnotatedMeta {
  resourceVersion?: string;
  uid?: string;
}

/**
 * Any orchestrator object; `V1Node` and `V1Pod` satisfy it
 */
export interface KubeObject {
  metadata?: ObjectMeta;
  status?: unknown;
}

/**
 * Options of a patch call
 */
export interface PatchOptions {
  /** Namespace of a namespaced object */
  namespace?: string;
  /** Sub-resource to patch (default: `default`) */
  subResource?: SubResource;
}

/**
 * Get/patch/update access to one object kind.
 * Implementations surface failures unmodified and never retry.
 */
export interface ObjectStore<T extends KubeObject> {
  /** Object kind, e.g. `Node` */
  readonly kind: string;
  /** Whether objects of this kind live in a namespace */
  readonly namespaced: boolean;

  /**
   * Fetch the live object. Rejects with `NotFoundError` when it does not exist.
   */
  get(name: string, namespace?: string): Promise<T>;

  /**
   * Apply a serialized strategic merge patch to one sub-resource
   */
  patch(name: string, patchBytes: string, options?: PatchOptions): Promise<T>;

  /**
   * Replace the whole object
   */
  update(object: T): Promise<T>;
}

/**
 * `namespace/name` of an object, or `name` for cluster-scoped kinds
 */
export function objectKey(name: string, namespace?: string): string {
  return namespace ? `${namespace}/${name}` : name;
}
