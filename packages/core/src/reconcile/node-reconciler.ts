/**
 * Node reconciler
 * Merges a node's annotation with the scheduler's cached usage and the
 * orchestrator's reported capacity
 * @module @devstate/core/reconcile/node-reconciler
 */

import type { V1Node } from '@kubernetes/client-node';
import {
  createServiceLogger,
  isEmptyResources,
  mergeResourceList,
  type NodeInfo,
} from '@devstate/shared';
import { decodeNodeInfo, readDeviceInfoAnnotation, type AnnotatedMeta } from '../codec';
import { quantitiesToResourceList } from './quantity';

const logger = createServiceLogger({}, { component: 'node-reconciler' });

/**
 * Decode the node's device model and fold in previously cached usage.
 *
 * `existing.used` wins on key collision: the annotation may have been
 * written by a process with older usage counters than the caller's cache.
 */
export function annotationToNodeInfo(meta: AnnotatedMeta, existing?: NodeInfo): NodeInfo {
  const info = decodeNodeInfo(readDeviceInfoAnnotation(meta));

  if (info.name.trim().length === 0) {
    info.name = meta.name ?? '';
  }

  if (existing && !isEmptyResources(existing.used)) {
    mergeResourceList(info.used, existing.used);
  }

  logger.debug('Annotation converted to node info', {
    resourceKind: 'Node',
    resourceName: info.name,
    nodeInfo: info,
  });
  return info;
}

/**
 * Build the node's device model, with `kubeCap` and `kubeAlloc` copied from
 * `status.capacity` and `status.allocatable`
 */
export function kubeNodeToNodeInfo(node: V1Node, existing?: NodeInfo): NodeInfo {
  const info = annotationToNodeInfo(node.metadata ?? {}, existing);
  quantitiesToResourceList(node.status?.capacity, info.kubeCap);
  quantitiesToResourceList(node.status?.allocatable, info.kubeAlloc);
  return info;
}
