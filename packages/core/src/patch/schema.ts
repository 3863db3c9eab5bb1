/**
 * Patch schemas
 * Per-field merge strategy of an object kind, the information a
 * strategic merge patch needs beyond the JSON itself
 * @module @devstate/core/patch/schema
 */

/**
 * Merge strategy of a single field
 * - scalar: replaced whole when it differs
 * - map: free-form keys, merged key by key
 * - struct: known fields, merged field by field
 * - list/replace: replaced whole when it differs
 * - list/merge: merged element by element, matched on `mergeKey`
 *   (object elements) or by value (primitive elements)
 */
export type FieldSchema =
  | { type: 'scalar' }
  | { type: 'map'; values?: FieldSchema }
  | { type: 'struct'; fields: Record<string, FieldSchema> }
  | { type: 'list'; strategy: 'replace' }
  | { type: 'list'; strategy: 'merge'; mergeKey?: string; items?: FieldSchema };

export type MergeListSchema = Extract<FieldSchema, { strategy: 'merge' }>;

/**
 * Schema of a whole object kind
 */
export type PatchSchema = Extract<FieldSchema, { type: 'struct' }>;

export const scalar = (): FieldSchema => ({ type: 'scalar' });

export const map = (values?: FieldSchema): FieldSchema => ({ type: 'map', values });

export const struct = (fields: Record<string, FieldSchema>): PatchSchema => ({ type: 'struct', fields });

export const replaceList = (): FieldSchema => ({ type: 'list', strategy: 'replace' });

export const mergeList = (mergeKey?: string, items?: FieldSchema): MergeListSchema => ({
  type: 'list',
  strategy: 'merge',
  mergeKey,
  items,
});

/**
 * Schema of `key` inside `schema`. Fields the schema does not name get
 * `undefined`: objects are then merged and lists replaced.
 */
export function childSchema(schema: FieldSchema | undefined, key: string): FieldSchema | undefined {
  if (schema?.type === 'struct') {
    return schema.fields[key];
  }
  if (schema?.type === 'map') {
    return schema.values;
  }
  return undefined;
}

export function isMergeList(schema: FieldSchema | undefined): schema is MergeListSchema {
  return schema?.type === 'list' && schema.strategy === 'merge';
}

/**
 * Whether a differing value is always replaced rather than merged into
 */
export function isAtomic(schema: FieldSchema | undefined): boolean {
  return schema?.type === 'scalar' || schema?.type === 'list';
}
