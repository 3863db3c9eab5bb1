/**
 * Annotation codec
 * Round-trips the device model through the single reserved annotation
 * @module @devstate/core/codec/annotation-codec
 */

import {
  DeserializationError,
  SerializationError,
  createServiceLogger,
  newContainerInfo,
  newNodeInfo,
  newPodInfo,
  isRecord,
  setEntry,
  validateNodeInfo,
  validateNodeInfoDocument,
  validatePodInfo,
  validatePodInfoDocument,
  type ContainerInfo,
  type NodeInfo,
  type PodInfo,
  type ResourceList,
  type ResourceLocation,
} from '@devstate/shared';

/**
 * Reserved annotation key holding the serialized device model.
 * Every writer of device state must use exactly this key.
 */
export const DEVICE_INFO_ANNOTATION = 'KubeDevice/DeviceInfo';

/**
 * The metadata fields the codec reads and writes.
 * `V1ObjectMeta` from @kubernetes/client-node satisfies it.
 */
export interface AnnotatedMeta {
  name?: string;
  namespace?: string;
  annotations?: Record<string, string>;
}

const logger = createServiceLogger({}, { component: 'annotation-codec' });

// ============================================================================
// Wire documents
// ============================================================================

interface ContainerInfoDocument {
  requests?: ResourceList;
  kuberequests?: ResourceList;
  devrequests?: ResourceList;
  allocatefrom?: ResourceLocation;
}

interface NodeInfoDocument {
  name?: string;
  capacity?: ResourceList;
  allocatable?: ResourceList;
  used?: ResourceList;
  kubecap?: ResourceList;
  kubealloc?: ResourceList;
}

interface PodInfoDocument {
  podname?: string;
  nodename?: string;
  requests?: ResourceList;
  initcontainer?: Record<string, ContainerInfoDocument>;
  runningcontainer?: Record<string, ContainerInfoDocument>;
}

/**
 * Omit empty maps, like `omitempty` on the other writers of this annotation
 */
function nonEmpty<T extends object>(map: T): T | undefined {
  return Object.keys(map).length > 0 ? { ...map } : undefined;
}

function containerToDocument(container: ContainerInfo): ContainerInfoDocument {
  return {
    requests: nonEmpty(container.requests),
    kuberequests: nonEmpty(container.kubeRequests),
    devrequests: nonEmpty(container.devRequests),
    allocatefrom: nonEmpty(container.allocateFrom),
  };
}

function containersToDocument(
  containers: Record<string, ContainerInfo>,
): Record<string, ContainerInfoDocument> | undefined {
  const entries = Object.entries(containers);
  if (entries.length === 0) {
    return undefined;
  }
  return Object.fromEntries(entries.map(([name, c]) => [name, containerToDocument(c)]));
}

/**
 * Copy the entries of an already validated map
 */
function readResourceList(value: unknown): ResourceList {
  const list: ResourceList = {};
  if (isRecord(value)) {
    for (const [name, amount] of Object.entries(value)) {
      if (typeof amount === 'number') {
        setEntry(list, name, amount);
      }
    }
  }
  return list;
}

function readResourceLocation(value: unknown): ResourceLocation {
  const location: ResourceLocation = {};
  if (isRecord(value)) {
    for (const [name, device] of Object.entries(value)) {
      if (typeof device === 'string') {
        setEntry(location, name, device);
      }
    }
  }
  return location;
}

function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function readContainers(value: unknown): Record<string, ContainerInfo> {
  const containers: Record<string, ContainerInfo> = {};
  if (!isRecord(value)) {
    return containers;
  }
  for (const [name, doc] of Object.entries(value)) {
    const container = newContainerInfo();
    if (isRecord(doc)) {
      container.requests = readResourceList(doc.requests);
      container.kubeRequests = readResourceList(doc.kuberequests);
      container.devRequests = readResourceList(doc.devrequests);
      container.allocateFrom = readResourceLocation(doc.allocatefrom);
    }
    setEntry(containers, name, container);
  }
  return containers;
}

function parseDocument(value: string, kind: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new DeserializationError(
      `${kind} annotation ${DEVICE_INFO_ANNOTATION} is not valid JSON`,
      [],
      { field: DEVICE_INFO_ANNOTATION },
      err,
    );
  }
}

function stringify(document: object, kind: string): string {
  try {
    return JSON.stringify(document);
  } catch (err) {
    throw new SerializationError(`failed to serialize ${kind}`, [], {}, err);
  }
}

// ============================================================================
// Node info
// ============================================================================

/**
 * Serialize a node model to its annotation value
 */
export function encodeNodeInfo(info: NodeInfo): string {
  const result = validateNodeInfo(info);
  if (!result.valid) {
    throw new SerializationError('node info holds values that cannot be serialized', result.errors, {
      resourceKind: 'Node',
      resourceName: info.name,
    });
  }

  const document: NodeInfoDocument = {
    name: info.name || undefined,
    capacity: nonEmpty(info.capacity),
    allocatable: nonEmpty(info.allocatable),
    used: nonEmpty(info.used),
    kubecap: nonEmpty(info.kubeCap),
    kubealloc: nonEmpty(info.kubeAlloc),
  };
  return stringify(document, 'node info');
}

/**
 * Parse a node annotation value. An absent value is an empty model, not an error.
 */
export function decodeNodeInfo(value: string | undefined): NodeInfo {
  if (value === undefined) {
    return newNodeInfo();
  }

  const document = parseDocument(value, 'node');
  const result = validateNodeInfoDocument(document);
  if (!result.valid || !isRecord(document)) {
    throw new DeserializationError('node annotation holds an invalid device model', result.errors, {
      field: DEVICE_INFO_ANNOTATION,
    });
  }

  return {
    name: readString(document.name),
    capacity: readResourceList(document.capacity),
    allocatable: readResourceList(document.allocatable),
    used: readResourceList(document.used),
    kubeCap: readResourceList(document.kubecap),
    kubeAlloc: readResourceList(document.kubealloc),
  };
}

// ============================================================================
// Pod info
// ============================================================================

/**
 * Serialize a pod model to its annotation value
 */
export function encodePodInfo(info: PodInfo): string {
  const result = validatePodInfo(info);
  if (!result.valid) {
    throw new SerializationError('pod info holds values that cannot be serialized', result.errors, {
      resourceKind: 'Pod',
      resourceName: info.name,
    });
  }

  const document: PodInfoDocument = {
    podname: info.name || undefined,
    nodename: info.nodeName || undefined,
    requests: nonEmpty(info.requests),
    initcontainer: containersToDocument(info.initContainers),
    runningcontainer: containersToDocument(info.runningContainers),
  };
  return stringify(document, 'pod info');
}

/**
 * Parse a pod annotation value. An absent value is an empty model, not an error.
 */
export function decodePodInfo(value: string | undefined): PodInfo {
  if (value === undefined) {
    return newPodInfo();
  }

  const document = parseDocument(value, 'pod');
  const result = validatePodInfoDocument(document);
  if (!result.valid || !isRecord(document)) {
    throw new DeserializationError('pod annotation holds an invalid device model', result.errors, {
      field: DEVICE_INFO_ANNOTATION,
    });
  }

  return {
    name: readString(document.podname),
    nodeName: readString(document.nodename),
    requests: readResourceList(document.requests),
    initContainers: readContainers(document.initcontainer),
    runningContainers: readContainers(document.runningcontainer),
  };
}

// ============================================================================
// Metadata helpers
// ============================================================================

/**
 * Read the device model annotation, if present
 */
export function readDeviceInfoAnnotation(meta: AnnotatedMeta | undefined): string | undefined {
  return meta?.annotations?.[DEVICE_INFO_ANNOTATION];
}

function writeAnnotation(meta: AnnotatedMeta, value: string): void {
  if (!meta.annotations) {
    meta.annotations = {};
  }
  meta.annotations[DEVICE_INFO_ANNOTATION] = value;
}

/**
 * Store a node model on the metadata, used by the device advertiser
 */
export function nodeInfoToAnnotation(meta: AnnotatedMeta, info: NodeInfo): void {
  const value = encodeNodeInfo(info);
  writeAnnotation(meta, value);
  logger.trace('Node info converted to annotation', {
    resourceKind: 'Node',
    resourceName: meta.name,
    annotation: value,
  });
}

/**
 * Store a pod model on the metadata, used by the device scheduler
 */
export function podInfoToAnnotation(meta: AnnotatedMeta, info: PodInfo): void {
  const value = encodePodInfo(info);
  writeAnnotation(meta, value);
  logger.trace('Pod info converted to annotation', {
    resourceKind: 'Pod',
    resourceName: meta.name,
    namespace: meta.namespace,
    annotation: value,
  });
}
