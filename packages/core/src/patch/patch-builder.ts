/**
 * Two-way strategic merge patch builder
 * @module @devstate/core/patch/patch-builder
 */

import _ from 'lodash';
import { DiffError, isRecord } from '@devstate/shared';
import {
  childSchema,
  isAtomic,
  isMergeList,
  type FieldSchema,
  type MergeListSchema,
  type PatchSchema,
} from './schema';

/**
 * A strategic merge patch document
 */
export type PatchDocument = Record<string, unknown>;

export const SET_ELEMENT_ORDER_PREFIX = '$setElementOrder/';
export const DELETE_FROM_PRIMITIVE_LIST_PREFIX = '$deleteFromPrimitiveList/';
export const PATCH_DIRECTIVE = '$patch';

function hasOwn(object: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key);
}

/**
 * JSON form of an object, as the store would see it
 */
function canonicalize(value: unknown, label: string): Record<string, unknown> {
  let data: unknown;
  try {
    const json = JSON.stringify(value);
    data = json === undefined ? undefined : JSON.parse(json);
  } catch (err) {
    throw new DiffError(`failed to serialize ${label} object`, {}, err);
  }
  if (!isRecord(data)) {
    throw new DiffError(`${label} object does not serialize to a JSON object`);
  }
  return data;
}

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function elementKey(element: unknown, mergeKey: string, path: string): unknown {
  if (!isRecord(element) || element[mergeKey] === undefined || element[mergeKey] === null) {
    throw new DiffError(`element of ${path} has no merge key ${JSON.stringify(mergeKey)}`, { field: path });
  }
  return element[mergeKey];
}

function diffKeyedList(
  patch: PatchDocument,
  key: string,
  oldList: unknown[],
  newList: unknown[],
  schema: MergeListSchema & { mergeKey: string },
  path: string,
): void {
  const { mergeKey } = schema;
  const oldKeys = oldList.map((element) => elementKey(element, mergeKey, path));
  const newKeys = newList.map((element) => elementKey(element, mergeKey, path));
  const entries: unknown[] = [];

  newList.forEach((element, index) => {
    const oldIndex = oldKeys.findIndex((k) => _.isEqual(k, newKeys[index]));
    if (oldIndex < 0) {
      entries.push(element);
      return;
    }
    const previous = oldList[oldIndex];
    if (_.isEqual(previous, element) || !isRecord(previous) || !isRecord(element)) {
      return;
    }
    const change = diffObject(previous, element, schema.items, `${path}[${String(newKeys[index])}]`);
    if (Object.keys(change).length > 0) {
      entries.push({ [mergeKey]: newKeys[index], ...change });
    }
  });

  oldKeys.forEach((oldKey) => {
    if (!newKeys.some((k) => _.isEqual(k, oldKey))) {
      entries.push({ [mergeKey]: oldKey, [PATCH_DIRECTIVE]: 'delete' });
    }
  });

  const keptOrder = oldKeys.filter((oldKey) => newKeys.some((k) => _.isEqual(k, oldKey)));
  const reordered = !_.isEqual(
    keptOrder,
    newKeys.filter((newKey) => oldKeys.some((k) => _.isEqual(k, newKey))),
  );

  if (entries.length > 0) {
    patch[key] = entries;
  }
  if (entries.length > 0 || reordered) {
    patch[`${SET_ELEMENT_ORDER_PREFIX}${key}`] = newKeys.map((k) => ({ [mergeKey]: k }));
  }
}

function diffPrimitiveList(patch: PatchDocument, key: string, oldList: unknown[], newList: unknown[]): void {
  const added = newList.filter((value) => !oldList.some((old) => _.isEqual(old, value)));
  const removed = oldList.filter((old) => !newList.some((value) => _.isEqual(old, value)));

  if (added.length > 0) {
    patch[key] = added;
  }
  if (removed.length > 0) {
    patch[`${DELETE_FROM_PRIMITIVE_LIST_PREFIX}${key}`] = removed;
  }
  patch[`${SET_ELEMENT_ORDER_PREFIX}${key}`] = newList;
}

function diffObject(
  oldObject: Record<string, unknown>,
  newObject: Record<string, unknown>,
  schema: FieldSchema | undefined,
  path: string,
): PatchDocument {
  const patch: PatchDocument = {};

  for (const key of Object.keys(oldObject)) {
    if (!hasOwn(newObject, key)) {
      patch[key] = null;
    }
  }

  for (const [key, newValue] of Object.entries(newObject)) {
    if (!hasOwn(oldObject, key)) {
      patch[key] = newValue;
      continue;
    }

    const oldValue = oldObject[key];
    if (_.isEqual(oldValue, newValue)) {
      continue;
    }

    const field = childSchema(schema, key);
    const fieldPath = joinPath(path, key);

    if (Array.isArray(oldValue) && Array.isArray(newValue) && isMergeList(field)) {
      const { mergeKey } = field;
      if (mergeKey !== undefined) {
        diffKeyedList(patch, key, oldValue, newValue, { ...field, mergeKey }, fieldPath);
      } else {
        diffPrimitiveList(patch, key, oldValue, newValue);
      }
      continue;
    }

    if (isRecord(oldValue) && isRecord(newValue) && !isAtomic(field)) {
      const change = diffObject(oldValue, newValue, field, fieldPath);
      if (Object.keys(change).length > 0) {
        patch[key] = change;
      }
      continue;
    }

    patch[key] = newValue;
  }

  return patch;
}

/**
 * Minimal patch that turns `oldObject` into `newObject` on the store.
 * Fields equal in both objects are absent, so a store applying it leaves
 * concurrently written siblings alone.
 */
export function buildPatch(oldObject: unknown, newObject: unknown, schema: PatchSchema): PatchDocument {
  const oldData = canonicalize(oldObject, 'old');
  const newData = canonicalize(newObject, 'new');
  return diffObject(oldData, newData, schema, '');
}

/**
 * The one serialization of a patch; every sub-resource receives these exact bytes
 */
export function serializePatch(patch: PatchDocument): string {
  return JSON.stringify(patch);
}

/**
 * Whether a patch changes nothing
 */
export function isEmptyPatch(patch: PatchDocument): boolean {
  return Object.keys(patch).length === 0;
}
