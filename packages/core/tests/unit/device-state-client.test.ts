/**
 * Unit tests for the device state client
 * @module @devstate/core/tests/unit/device-state-client
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';
import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import type { V1Node, V1Pod } from '@kubernetes/client-node';
import {
  DeviceStateError,
  ErrorCode,
  NotFoundError,
  newNodeInfo,
  newPodInfo,
  resetLogging,
  type NodeInfo,
  type PodInfo,
} from '@devstate/shared';
import {
  DEFAULT_CONFIG,
  DEVICE_INFO_ANNOTATION,
  DeviceStateClient,
  createDeviceStateClient,
  decodePodInfo,
  readDeviceInfoAnnotation,
  type InMemoryObjectStore,
} from '../../src';
import { captureRejection, createNodeStore, createPodStore, makeContainer, makeNode, makePod } from '../fixtures';

const CARDS = 'alpha/grpresource/gpu/0/cards';

function scheduledPodInfo(): PodInfo {
  return {
    ...newPodInfo('pod-a'),
    nodeName: 'node-b',
    runningContainers: {
      main: {
        requests: { [CARDS]: 1 },
        kubeRequests: { gpu: 1 },
        devRequests: {},
        allocateFrom: { [CARDS]: CARDS },
      },
    },
  };
}

describe('DeviceStateClient', () => {
  let nodes: InMemoryObjectStore<V1Node>;
  let pods: InMemoryObjectStore<V1Pod>;
  let client: DeviceStateClient;

  beforeEach(() => {
    nodes = createNodeStore();
    pods = createPodStore();
    nodes.create(makeNode('node-a'));
    pods.create(makePod('pod-a', [makeContainer('main', { gpu: '1' })], { nodeName: 'node-b' }));
    client = new DeviceStateClient({ nodes, pods });
  });

  describe('nodes', () => {
    it('should write node info and read it back with orchestrator capacity', async () => {
      const info: NodeInfo = { ...newNodeInfo('node-a'), capacity: { [CARDS]: 1 }, used: { [CARDS]: 0 } };

      const written = await client.writeNodeInfo('node-a', info);
      expect(written.metadata?.annotations?.[DEVICE_INFO_ANNOTATION]).toBe(
        `{"name":"node-a","capacity":{"${CARDS}":1},"used":{"${CARDS}":0}}`,
      );
      expect(written.metadata?.resourceVersion).toBe('3');

      expect(await client.getNodeInfo('node-a')).toEqual({
        ...info,
        kubeCap: { cpu: 8, memory: 17179869184, 'nvidia.com/gpu': 2 },
        kubeAlloc: { cpu: 8, memory: 16106127360, 'nvidia.com/gpu': 2 },
      });
    });

    it('should keep cached usage on read', async () => {
      await client.writeNodeInfo('node-a', { ...newNodeInfo('node-a'), used: { [CARDS]: 0 } });
      const existing: NodeInfo = { ...newNodeInfo('node-a'), used: { [CARDS]: 1 } };

      expect((await client.getNodeInfo('node-a', existing)).used).toEqual({ [CARDS]: 1 });
    });

    it('should leave the rest of the node alone', async () => {
      const written = await client.writeNodeInfo('node-a', newNodeInfo('node-a'));
      expect(written.metadata?.labels).toEqual({ 'kubernetes.io/hostname': 'node-a' });
      expect(written.status?.capacity?.cpu).toBe('8');
    });

    it('should refuse a node whose capacity cannot be held exactly', async () => {
      const huge = makeNode('node-huge');
      huge.status = { capacity: { 'ephemeral-storage': '8Pi' } };
      nodes.create(huge);

      const err = await captureRejection(client.getNodeInfo('node-huge'));
      expect(err).toBeInstanceOf(DeviceStateError);
      expect(err instanceof DeviceStateError && err.code).toBe(ErrorCode.INVALID_QUANTITY);
    });
  });

  describe('pods', () => {
    it('should write pod info and read it back', async () => {
      await client.writePodInfo('pod-a', 'default', scheduledPodInfo());

      expect(await client.getPodInfo('pod-a', 'default')).toEqual(scheduledPodInfo());
    });

    it('should read pod info with invalidation', async () => {
      await client.writePodInfo('pod-a', 'default', scheduledPodInfo());

      const info = await client.getPodInfo('pod-a', 'default', true);
      expect(info.nodeName).toBe('');
      expect(info.runningContainers.main.devRequests).toEqual({ [CARDS]: 1 });
      expect(info.runningContainers.main.allocateFrom).toEqual({});
    });

    it('should update pod info from a cached pod with a stale placement', async () => {
      const cached = await pods.get('pod-a', 'default');
      if (cached.spec) cached.spec.nodeName = 'node-old';

      const updated = await client.updatePodInfo(cached, scheduledPodInfo());
      expect(updated.spec?.nodeName).toBe('node-b');
      expect(decodePodInfo(readDeviceInfoAnnotation(updated.metadata))).toEqual(scheduledPodInfo());
    });

    it('should persist an invalidated allocation', async () => {
      await client.writePodInfo('pod-a', 'default', scheduledPodInfo());

      const { pod, info } = await client.invalidatePodInfo('pod-a', 'default');
      expect(info.nodeName).toBe('');
      expect(info.runningContainers.main).toEqual({
        requests: { [CARDS]: 1 },
        kubeRequests: { gpu: 1 },
        devRequests: { [CARDS]: 1 },
        allocateFrom: {},
      });
      expect(decodePodInfo(readDeviceInfoAnnotation(pod.metadata))).toEqual(info);
      expect(await client.getPodInfo('pod-a', 'default')).toEqual(info);
    });

    it('should report a missing pod', async () => {
      await expect(client.getPodInfo('ghost', 'default')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});

function kubeconfigYaml(name: string): string {
  return [
    'apiVersion: v1',
    'kind: Config',
    'clusters:',
    `- name: ${name}`,
    '  cluster:',
    `    server: https://${name}.cluster.test:6443`,
    'users:',
    `- name: ${name}`,
    '  user:',
    '    token: test-token',
    'contexts:',
    `- name: ${name}`,
    '  context:',
    `    cluster: ${name}`,
    `    user: ${name}`,
    `current-context: ${name}`,
    '',
  ].join('\n');
}

describe('createDeviceStateClient', () => {
  let dir: string;
  let first: string;
  let second: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'devstate-kubeconfig-'));
    first = join(dir, 'first.yaml');
    second = join(dir, 'second.yaml');
    writeFileSync(first, kubeconfigYaml('first'));
    writeFileSync(second, kubeconfigYaml('second'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetLogging();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should merge every file of a KUBECONFIG path list', () => {
    vi.stubEnv('KUBECONFIG', `${first}${delimiter}${second}`);

    expect(createDeviceStateClient({ ...DEFAULT_CONFIG, context: 'second' })).toBeInstanceOf(DeviceStateClient);
  });

  it('should load only the file named on the command line', () => {
    vi.stubEnv('KUBECONFIG', join(dir, 'missing.yaml'));

    expect(createDeviceStateClient({ ...DEFAULT_CONFIG, kubeconfig: first })).toBeInstanceOf(DeviceStateClient);
  });
});
