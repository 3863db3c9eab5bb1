/**
 * Merge strategies of the Node and Pod kinds
 * @module @devstate/core/patch/kube-schemas
 */

import { map, mergeList, replaceList, struct, type PatchSchema } from './schema';

const OBJECT_META = struct({
  labels: map(),
  annotations: map(),
  finalizers: mergeList(),
  ownerReferences: mergeList('uid'),
  managedFields: replaceList(),
});

const RESOURCE_REQUIREMENTS = struct({
  limits: map(),
  requests: map(),
  claims: mergeList('name'),
});

const CONTAINER = struct({
  ports: mergeList('containerPort'),
  env: mergeList('name'),
  volumeMounts: mergeList('mountPath'),
  volumeDevices: mergeList('devicePath'),
  resources: RESOURCE_REQUIREMENTS,
});

export const NODE_SCHEMA: PatchSchema = struct({
  metadata: OBJECT_META,
  spec: struct({
    podCIDRs: mergeList(),
    taints: replaceList(),
  }),
  status: struct({
    capacity: map(),
    allocatable: map(),
    conditions: mergeList('type'),
    addresses: mergeList('type'),
    images: replaceList(),
    volumesInUse: replaceList(),
    volumesAttached: replaceList(),
  }),
});

export const POD_SCHEMA: PatchSchema = struct({
  metadata: OBJECT_META,
  spec: struct({
    initContainers: mergeList('name', CONTAINER),
    containers: mergeList('name', CONTAINER),
    ephemeralContainers: mergeList('name', CONTAINER),
    volumes: mergeList('name'),
    imagePullSecrets: mergeList('name'),
    hostAliases: mergeList('ip'),
    tolerations: replaceList(),
    overhead: map(),
  }),
  status: struct({
    conditions: mergeList('type'),
    podIPs: mergeList('ip'),
    hostIPs: mergeList('ip'),
    initContainerStatuses: replaceList(),
    containerStatuses: replaceList(),
  }),
});
