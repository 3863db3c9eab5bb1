/**
 * Scheduler-private device model carried on Node and Pod annotations
 * @module @devstate/shared/types/device-info
 */

import type { ResourceList, ResourceLocation } from './resources';

/**
 * Device state of a single node
 */
export interface NodeInfo {
  /** Node name */
  name: string;
  /** Device capacity advertised by the node's device plugins */
  capacity: ResourceList;
  /** Device amounts available for scheduling */
  allocatable: ResourceList;
  /**
   * Cumulative device usage recorded by the scheduler.
   * Only ever merged into, never replaced, across reads of the same node.
   */
  used: ResourceList;
  /** Capacity reported by the orchestrator (`status.capacity`) */
  kubeCap: ResourceList;
  /** Allocatable reported by the orchestrator (`status.allocatable`) */
  kubeAlloc: ResourceList;
}

/**
 * Device state of a single container
 */
export interface ContainerInfo {
  /** Scheduler-semantic requests */
  requests: ResourceList;
  /** Requests declared on the live container spec; always overwritten on read */
  kubeRequests: ResourceList;
  /** Device requests still outstanding */
  devRequests: ResourceList;
  /** Device each request was allocated from */
  allocateFrom: ResourceLocation;
}

/**
 * Device state of a single pod
 */
export interface PodInfo {
  /** Pod name */
  name: string;
  /** Node chosen by the device scheduler (distinct from `spec.nodeName`) */
  nodeName: string;
  /** Pod-level requests */
  requests: ResourceList;
  /** Init containers by container name */
  initContainers: Record<string, ContainerInfo>;
  /** Regular containers by container name */
  runningContainers: Record<string, ContainerInfo>;
}

/**
 * Create an empty node model
 */
export function newNodeInfo(name = ''): NodeInfo {
  return {
    name,
    capacity: {},
    allocatable: {},
    used: {},
    kubeCap: {},
    kubeAlloc: {},
  };
}

/**
 * Create an empty container model
 */
export function newContainerInfo(): ContainerInfo {
  return {
    requests: {},
    kubeRequests: {},
    devRequests: {},
    allocateFrom: {},
  };
}

/**
 * Create an empty pod model
 */
export function newPodInfo(name = ''): PodInfo {
  return {
    name,
    nodeName: '',
    requests: {},
    initContainers: {},
    runningContainers: {},
  };
}

/**
 * Return a container whose maps are all present, keeping existing entries
 */
export function fillContainerInfo(container: Partial<ContainerInfo>): ContainerInfo {
  return {
    requests: container.requests ?? {},
    kubeRequests: container.kubeRequests ?? {},
    devRequests: container.devRequests ?? {},
    allocateFrom: container.allocateFrom ?? {},
  };
}
