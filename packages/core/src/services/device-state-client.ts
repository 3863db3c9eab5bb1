/**
 * Device state client
 * Read, reconcile and write back the device model of nodes and pods
 * @module @devstate/core/services/device-state-client
 */

import _ from 'lodash';
import { CoreV1Api, KubeConfig, type V1Node, type V1Pod } from '@kubernetes/client-node';
import { createServiceLogger, type Logger, type NodeInfo, type PodInfo } from '@devstate/shared';
import { nodeInfoToAnnotation, podInfoToAnnotation } from '../codec';
import { NODE_SCHEMA, POD_SCHEMA } from '../patch';
import { kubeNodeToNodeInfo, kubePodToPodInfo } from '../reconcile';
import { KubernetesNodeStore, KubernetesPodStore, type ObjectStore } from '../store';
import { patchObjectMetadata, patchObjectMetadataAndStatus, updateMetadataOnly } from '../sync';
import { applyLoggingConfig, type DeviceStateConfig } from '../config';

/**
 * Client options
 */
export interface DeviceStateClientOptions {
  /** Node store */
  nodes: ObjectStore<V1Node>;
  /** Pod store */
  pods: ObjectStore<V1Pod>;
  /** Logger (default: service logger) */
  logger?: Logger;
}

/**
 * Entry point for device advertisers and schedulers
 */
export class DeviceStateClient {
  private readonly nodes: ObjectStore<V1Node>;
  private readonly pods: ObjectStore<V1Pod>;
  private readonly logger: Logger;

  constructor(options: DeviceStateClientOptions) {
    this.nodes = options.nodes;
    this.pods = options.pods;
    this.logger = options.logger ?? createServiceLogger({}, { component: 'device-state-client' });
  }

  /**
   * Fetch a node and build its device model.
   * `existing` is the caller's cached model; its `used` counters are kept.
   */
  async getNodeInfo(name: string, existing?: NodeInfo): Promise<NodeInfo> {
    const node = await this.nodes.get(name);
    return kubeNodeToNodeInfo(node, existing);
  }

  /**
   * Store a node's device model on the live node, patching metadata and status
   */
  async writeNodeInfo(name: string, info: NodeInfo): Promise<V1Node> {
    const node = await this.nodes.get(name);
    const updated = _.cloneDeep(node);
    updated.metadata = updated.metadata ?? {};
    nodeInfoToAnnotation(updated.metadata, info);

    const result = await patchObjectMetadataAndStatus(this.nodes, name, node, updated, NODE_SCHEMA);
    this.logger.debug('Wrote node device info', {
      resourceKind: 'Node',
      resourceName: name,
      resourceVersion: result.metadata?.resourceVersion,
    });
    return result;
  }

  /**
   * Fetch a pod and build its device model, optionally invalidating allocations
   */
  async getPodInfo(name: string, namespace: string, invalidate = false): Promise<PodInfo> {
    const pod = await this.pods.get(name, namespace);
    return kubePodToPodInfo(pod, invalidate);
  }

  /**
   * Store a pod's device model on the live pod with a metadata patch
   */
  async writePodInfo(name: string, namespace: string, info: PodInfo): Promise<V1Pod> {
    const pod = await this.pods.get(name, namespace);
    const updated = _.cloneDeep(pod);
    updated.metadata = updated.metadata ?? {};
    podInfoToAnnotation(updated.metadata, info);

    const result = await patchObjectMetadata(this.pods, name, pod, updated, POD_SCHEMA);
    this.logger.debug('Wrote pod device info', {
      resourceKind: 'Pod',
      resourceName: name,
      namespace,
      resourceVersion: result.metadata?.resourceVersion,
    });
    return result;
  }

  /**
   * Store a pod's device model starting from a cached pod. Only the
   * annotations reach the store, so a stale cached placement is harmless.
   */
  async updatePodInfo(pod: V1Pod, info: PodInfo): Promise<V1Pod> {
    const desired = _.cloneDeep(pod);
    desired.metadata = desired.metadata ?? {};
    podInfoToAnnotation(desired.metadata, info);
    return updateMetadataOnly(this.pods, desired);
  }

  /**
   * Forget a pod's tentative device assignment and persist the result
   */
  async invalidatePodInfo(name: string, namespace: string): Promise<{ pod: V1Pod; info: PodInfo }> {
    const pod = await this.pods.get(name, namespace);
    const info = kubePodToPodInfo(pod, true);
    const updated = await this.updatePodInfo(pod, info);
    this.logger.info('Invalidated pod device allocation', { resourceKind: 'Pod', resourceName: name, namespace });
    return { pod: updated, info };
  }
}

/**
 * Build a client over the Kubernetes API and apply the configured logging.
 * Without an explicit file the `KUBECONFIG` list is merged the usual way.
 */
export function createDeviceStateClient(config: DeviceStateConfig): DeviceStateClient {
  applyLoggingConfig(config);

  const kubeConfig = new KubeConfig();
  if (config.kubeconfig) {
    kubeConfig.loadFromFile(config.kubeconfig);
  } else {
    kubeConfig.loadFromDefault();
  }
  if (config.context) {
    kubeConfig.setCurrentContext(config.context);
  }

  const api = kubeConfig.makeApiClient(CoreV1Api);
  return new DeviceStateClient({
    nodes: new KubernetesNodeStore(api),
    pods: new KubernetesPodStore(api),
  });
}
