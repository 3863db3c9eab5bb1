/**
 * Pod reconciler
 * @module @devstate/core/reconcile/pod-reconciler
 */

import type { V1Container, V1Pod } from '@kubernetes/client-node';
import {
  copyResourceList,
  createServiceLogger,
  fillContainerInfo,
  setEntry,
  type ContainerInfo,
  type PodInfo,
} from '@devstate/shared';
import { decodePodInfo, readDeviceInfoAnnotation } from '../codec';
import { quantitiesToResourceList } from './quantity';

const logger = createServiceLogger({}, { component: 'pod-reconciler' });

/**
 * Overwrite `kubeRequests` of every container in the live spec, creating
 * missing entries, and optionally drop tentative allocations
 */
function addContainersToPodInfo(
  containers: Record<string, ContainerInfo>,
  specContainers: V1Container[] | undefined,
  invalidate: boolean,
): void {
  for (const spec of specContainers ?? []) {
    const container = fillContainerInfo(containers[spec.name] ?? {});
    quantitiesToResourceList(spec.resources?.requests, container.kubeRequests);
    setEntry(containers, spec.name, container);
  }

  if (invalidate) {
    for (const container of Object.values(containers)) {
      container.allocateFrom = {};
      container.devRequests = copyResourceList(container.requests);
    }
  }
}

/**
 * Build the scheduler's view of a pod from its annotation and live spec.
 *
 * With `invalidate`, every previously assigned device is forgotten: the
 * allocation is cleared, outstanding device requests are recomputed from
 * `requests`, and the scheduler's node assignment is erased.
 */
export function kubePodToPodInfo(pod: V1Pod, invalidate = false): PodInfo {
  const info = decodePodInfo(readDeviceInfoAnnotation(pod.metadata));
  info.name = pod.metadata?.name ?? '';

  addContainersToPodInfo(info.initContainers, pod.spec?.initContainers, invalidate);
  addContainersToPodInfo(info.runningContainers, pod.spec?.containers, invalidate);

  if (invalidate) {
    info.nodeName = '';
  }

  logger.debug('Pod converted to device scheduler pod info', {
    resourceKind: 'Pod',
    resourceName: info.name,
    namespace: pod.metadata?.namespace,
    invalidate,
    podInfo: info,
  });
  return info;
}
