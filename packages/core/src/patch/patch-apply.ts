/**
 * Store-side application of strategic merge patches
 * @module @devstate/core/patch/patch-apply
 */

import _ from 'lodash';
import { DeviceStateError, ErrorCode, isRecord, setEntry } from '@devstate/shared';
import {
  DELETE_FROM_PRIMITIVE_LIST_PREFIX,
  PATCH_DIRECTIVE,
  SET_ELEMENT_ORDER_PREFIX,
  type PatchDocument,
} from './patch-builder';
import { childSchema, isAtomic, isMergeList, type FieldSchema, type MergeListSchema, type PatchSchema } from './schema';

const DIRECTIVE_PREFIXES = [SET_ELEMENT_ORDER_PREFIX, DELETE_FROM_PRIMITIVE_LIST_PREFIX];

function isObjectLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function invalidPatch(message: string): DeviceStateError {
  return new DeviceStateError(message, ErrorCode.INVALID_PATCH);
}

function listDirective(patch: PatchDocument, prefix: string, key: string): unknown[] | undefined {
  const value = patch[`${prefix}${key}`];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalidPatch(`${prefix}${key} must be a list`);
  }
  return value;
}

/**
 * Stable sort of `list` by position of each element's identity in `order`;
 * elements missing from `order` keep their relative order at the end
 */
function applyOrder(list: unknown[], order: unknown[] | undefined, identity: (value: unknown) => unknown): unknown[] {
  if (!order) {
    return list;
  }
  const position = (value: unknown): number => {
    const index = order.findIndex((entry) => _.isEqual(identity(entry), identity(value)));
    return index < 0 ? Number.MAX_SAFE_INTEGER : index;
  };
  return [...list].sort((a, b) => position(a) - position(b));
}

function mergeKeyedList(
  current: unknown[],
  entries: unknown[],
  schema: MergeListSchema,
  mergeKey: string,
  order: unknown[] | undefined,
): unknown[] {
  const identity = (value: unknown): unknown => (isObjectLike(value) ? value[mergeKey] : undefined);
  const result = current.map((element) => _.cloneDeep(element));

  for (const entry of entries) {
    if (!isRecord(entry) || entry[mergeKey] === undefined) {
      throw invalidPatch(`list entry has no merge key ${JSON.stringify(mergeKey)}`);
    }
    const index = result.findIndex((element) => _.isEqual(identity(element), entry[mergeKey]));

    if (entry[PATCH_DIRECTIVE] === 'delete') {
      if (index >= 0) {
        result.splice(index, 1);
      }
      continue;
    }

    const existing = index >= 0 ? result[index] : undefined;
    const base = isObjectLike(existing) ? existing : {};
    applyObject(base, entry, schema.items);
    if (index >= 0) {
      result[index] = base;
    } else {
      result.push(base);
    }
  }

  return applyOrder(result, order, identity);
}

function mergePrimitiveList(
  current: unknown[],
  additions: unknown[],
  deletions: unknown[] | undefined,
  order: unknown[] | undefined,
): unknown[] {
  const result = current.filter((value) => !(deletions ?? []).some((deleted) => _.isEqual(deleted, value)));
  for (const value of additions) {
    if (!result.some((existing) => _.isEqual(existing, value))) {
      result.push(value);
    }
  }
  return applyOrder(result, order, (value) => value);
}

function applyObject(target: Record<string, unknown>, patch: PatchDocument, schema: FieldSchema | undefined): void {
  const fields = new Set<string>();
  for (const key of Object.keys(patch)) {
    if (key === PATCH_DIRECTIVE) {
      continue;
    }
    const prefix = DIRECTIVE_PREFIXES.find((p) => key.startsWith(p));
    fields.add(prefix ? key.slice(prefix.length) : key);
  }

  for (const key of fields) {
    const field = childSchema(schema, key);
    const present = Object.prototype.hasOwnProperty.call(patch, key);
    const value = patch[key];

    if (isMergeList(field) && value !== null) {
      const additions = value === undefined ? [] : value;
      if (!Array.isArray(additions)) {
        throw invalidPatch(`${key} must be a list`);
      }
      const current = target[key];
      const list = Array.isArray(current) ? current : [];
      const order = listDirective(patch, SET_ELEMENT_ORDER_PREFIX, key);
      const merged = field.mergeKey !== undefined
        ? mergeKeyedList(list, additions, field, field.mergeKey, order)
        : mergePrimitiveList(list, additions, listDirective(patch, DELETE_FROM_PRIMITIVE_LIST_PREFIX, key), order);
      setEntry(target, key, merged);
      continue;
    }

    if (!present) {
      continue;
    }

    if (value === null) {
      delete target[key];
      continue;
    }

    if (isRecord(value) && !isAtomic(field)) {
      const current = target[key];
      const base = isObjectLike(current) ? current : {};
      applyObject(base, value, field);
      setEntry(target, key, base);
      continue;
    }

    setEntry(target, key, _.cloneDeep(value));
  }
}

/**
 * Apply a strategic merge patch to a copy of `target`, the way the store
 * merges it: `null` deletes, maps and structs merge, merge-keyed lists
 * merge by key and honor `$patch: delete` and `$setElementOrder`, merged
 * primitive lists honor `$deleteFromPrimitiveList`, everything else is replaced.
 */
export function applyPatch<T extends object>(target: T, patch: PatchDocument, schema: PatchSchema): T {
  const result = _.cloneDeep(target);
  if (!isObjectLike(result)) {
    throw invalidPatch('a patch can only be applied to an object');
  }
  applyObject(result, patch, schema);
  return result;
}

/**
 * Parse serialized patch bytes
 */
export function parsePatch(patchBytes: string): PatchDocument {
  let document: unknown;
  try {
    document = JSON.parse(patchBytes);
  } catch (err) {
    throw new DeviceStateError('patch is not valid JSON', ErrorCode.INVALID_PATCH, {}, err);
  }
  if (!isRecord(document)) {
    throw invalidPatch('patch must be a JSON object');
  }
  return document;
}
