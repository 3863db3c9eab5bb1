/**
 * Resource primitives shared by the device model
 * @module @devstate/shared/types/resources
 */

/**
 * Name of a schedulable resource, e.g. `nvidia.com/gpu` or
 * `alpha/grpresource/gpu/0/cards`
 */
export type ResourceName = string;

/**
 * Integer amounts keyed by resource name
 */
export type ResourceList = Record<ResourceName, number>;

/**
 * Device assignment: requested resource -> concrete device resource it was allocated from
 */
export type ResourceLocation = Record<ResourceName, ResourceName>;

/**
 * Set an own entry, including one named `__proto__`, which plain assignment
 * would turn into a prototype change
 */
export function setEntry<V>(target: Record<string, V>, name: string, value: V): void {
  Object.defineProperty(target, name, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Copy every entry of `source` into `target`, overwriting collisions
 */
export function mergeResourceList(target: ResourceList, source: ResourceList): ResourceList {
  for (const [name, value] of Object.entries(source)) {
    setEntry(target, name, value);
  }
  return target;
}

/**
 * Shallow copy of a resource list
 */
export function copyResourceList(list: ResourceList): ResourceList {
  return { ...list };
}

/**
 * Whether a resource list or location has no entries
 */
export function isEmptyResources(list: ResourceList | ResourceLocation | undefined): boolean {
  return list === undefined || Object.keys(list).length === 0;
}
