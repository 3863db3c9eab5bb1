/**
 * Test fixtures for nodes, pods and in-process stores
 */

import type { V1Container, V1Node, V1Pod } from '@kubernetes/client-node';
import { InMemoryObjectStore, NODE_SCHEMA, POD_SCHEMA } from '../src';

export function makeNode(name: string): V1Node {
  return {
    apiVersion: 'v1',
    kind: 'Node',
    metadata: { name, labels: { 'kubernetes.io/hostname': name } },
    spec: { podCIDR: '10.0.0.0/24' },
    status: {
      capacity: { cpu: '8', memory: '16Gi', 'nvidia.com/gpu': '2' },
      allocatable: { cpu: '7500m', memory: '15Gi', 'nvidia.com/gpu': '2' },
    },
  };
}

export function makeContainer(name: string, requests: Record<string, string> = {}): V1Container {
  return { name, image: `registry.test/${name}:1`, resources: { requests } };
}

export interface PodFixtureOptions {
  namespace?: string;
  nodeName?: string;
  initContainers?: V1Container[];
  annotations?: Record<string, string>;
}

export function makePod(name: string, containers: V1Container[], options: PodFixtureOptions = {}): V1Pod {
  const pod: V1Pod = {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { name, namespace: options.namespace ?? 'default' },
    spec: { containers },
    status: { phase: 'Pending' },
  };
  if (options.annotations && pod.metadata) {
    pod.metadata.annotations = options.annotations;
  }
  if (options.initContainers && pod.spec) {
    pod.spec.initContainers = options.initContainers;
  }
  if (options.nodeName && pod.spec) {
    pod.spec.nodeName = options.nodeName;
  }
  return pod;
}

export function createNodeStore(): InMemoryObjectStore<V1Node> {
  return new InMemoryObjectStore<V1Node>({ kind: 'Node', namespaced: false, schema: NODE_SCHEMA });
}

export function createPodStore(): InMemoryObjectStore<V1Pod> {
  return new InMemoryObjectStore<V1Pod>({
    kind: 'Pod',
    namespaced: true,
    schema: POD_SCHEMA,
    immutableFields: [['spec', 'nodeName']],
  });
}

/**
 * Run a function expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}
