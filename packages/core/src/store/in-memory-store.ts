/**
 * In-process object store
 * Keeps objects in a map and applies patches with the kind's merge
 * strategy; used for tests and dry runs
 * @module @devstate/core/store/in-memory-store
 */

import _ from 'lodash';
import { ConflictError, NotFoundError, createServiceLogger, type ErrorMeta } from '@devstate/shared';
import { applyPatch, parsePatch, type PatchSchema } from '../patch';
import { objectKey, type KubeObject, type ObjectStore, type PatchOptions } from './object-store';

/**
 * In-memory store options
 */
export interface InMemoryStoreOptions {
  /** Object kind, e.g. `Pod` */
  kind: string;
  /** Whether objects are namespaced */
  namespaced: boolean;
  /** Merge strategy used for patches */
  schema: PatchSchema;
  /** Field paths that may not change once set, e.g. `['spec', 'nodeName']` */
  immutableFields?: string[][];
}

const DEFAULT_NAMESPACE = 'default';

const logger = createServiceLogger({}, { component: 'in-memory-store' });

/**
 * Give `target` the status of `source`, or none if `source` has none
 */
function copyStatus(target: KubeObject, source: KubeObject): void {
  if (source.status === undefined) {
    delete target.status;
  } else {
    target.status = _.cloneDeep(source.status);
  }
}

/**
 * Object store held in process memory
 */
export class InMemoryObjectStore<T extends KubeObject> implements ObjectStore<T> {
  readonly kind: string;
  readonly namespaced: boolean;
  private readonly schema: PatchSchema;
  private readonly immutableFields: string[][];
  private readonly objects = new Map<string, T>();
  private revision = 0;

  constructor(options: InMemoryStoreOptions) {
    this.kind = options.kind;
    this.namespaced = options.namespaced;
    this.schema = options.schema;
    this.immutableFields = options.immutableFields ?? [];
  }

  private namespaceOf(namespace: string | undefined): string | undefined {
    return this.namespaced ? namespace || DEFAULT_NAMESPACE : undefined;
  }

  private meta(name: string, namespace: string | undefined): ErrorMeta {
    return { resourceKind: this.kind, resourceName: name, namespace };
  }

  private load(name: string, namespace: string | undefined): T {
    const object = this.objects.get(objectKey(name, namespace));
    if (!object) {
      throw new NotFoundError(this.meta(name, namespace));
    }
    return object;
  }

  /**
   * Bump the resource version and keep a private copy
   */
  private save(name: string, namespace: string | undefined, object: T): T {
    this.revision += 1;
    const stored = _.cloneDeep(object);
    stored.metadata = {
      ...stored.metadata,
      name,
      ...(namespace ? { namespace } : {}),
      resourceVersion: String(this.revision),
    };
    this.objects.set(objectKey(name, namespace), stored);
    return _.cloneDeep(stored);
  }

  private checkResourceVersion(current: T, requested: unknown, meta: ErrorMeta): void {
    if (requested !== undefined && requested !== current.metadata?.resourceVersion) {
      throw new ConflictError(
        `the object has been modified; resourceVersion ${String(requested)} is stale`,
        meta,
      );
    }
  }

  private checkImmutableFields(current: T, next: T, meta: ErrorMeta): void {
    for (const path of this.immutableFields) {
      const before: unknown = _.get(current, path);
      const after: unknown = _.get(next, path);
      if (before !== undefined && !_.isEqual(before, after)) {
        throw new ConflictError(`field ${path.join('.')} is immutable`, { ...meta, field: path.join('.') });
      }
    }
  }

  /**
   * Add a new object
   */
  create(object: T): T {
    const name = object.metadata?.name;
    if (!name) {
      throw new ConflictError(`${this.kind} must have metadata.name`, { resourceKind: this.kind });
    }
    const namespace = this.namespaceOf(object.metadata?.namespace);
    if (this.objects.has(objectKey(name, namespace))) {
      throw new ConflictError(`${this.kind} ${objectKey(name, namespace)} already exists`, this.meta(name, namespace));
    }
    return this.save(name, namespace, object);
  }

  async get(name: string, namespace?: string): Promise<T> {
    return _.cloneDeep(this.load(name, this.namespaceOf(namespace)));
  }

  async patch(name: string, patchBytes: string, options: PatchOptions = {}): Promise<T> {
    const namespace = this.namespaceOf(options.namespace);
    const subResource = options.subResource ?? 'default';
    const meta: ErrorMeta = { ...this.meta(name, namespace), subResource };
    const current = this.load(name, namespace);
    const patch = parsePatch(patchBytes);

    this.checkResourceVersion(current, _.get(patch, ['metadata', 'resourceVersion']), meta);

    const patched = applyPatch(current, patch, this.schema);
    let next: T;
    if (subResource === 'status') {
      // Only status is writable through the status sub-resource
      next = _.cloneDeep(current);
      copyStatus(next, patched);
    } else {
      // Status changes are ignored on the main resource
      next = patched;
      copyStatus(next, current);
    }
    this.checkImmutableFields(current, next, meta);

    logger.trace('Applied patch', { ...meta, patch: patchBytes });
    return this.save(name, namespace, next);
  }

  async update(object: T): Promise<T> {
    const name = object.metadata?.name ?? '';
    const namespace = this.namespaceOf(object.metadata?.namespace);
    const meta = this.meta(name, namespace);
    const current = this.load(name, namespace);

    this.checkResourceVersion(current, object.metadata?.resourceVersion, meta);

    const next = _.cloneDeep(object);
    copyStatus(next, current);
    this.checkImmutableFields(current, next, meta);

    return this.save(name, namespace, next);
  }
}
