/**
 * Unit tests for the Kubernetes-backed stores
 * @module @devstate/core/tests/unit/kubernetes-store
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NotFoundError } from '@devstate/shared';
import {
  KubernetesNodeStore,
  KubernetesPodStore,
  isApiNotFound,
  type CoreV1Client,
} from '../../src';
import { captureRejection, makeContainer, makeNode, makePod } from '../fixtures';

function apiError(code: number): Error {
  return Object.assign(new Error(`HTTP-Code: ${code}`), { code });
}

function fakeApi() {
  return {
    readNode: vi.fn<CoreV1Client['readNode']>(),
    patchNode: vi.fn<CoreV1Client['patchNode']>(),
    patchNodeStatus: vi.fn<CoreV1Client['patchNodeStatus']>(),
    replaceNode: vi.fn<CoreV1Client['replaceNode']>(),
    readNamespacedPod: vi.fn<CoreV1Client['readNamespacedPod']>(),
    patchNamespacedPod: vi.fn<CoreV1Client['patchNamespacedPod']>(),
    patchNamespacedPodStatus: vi.fn<CoreV1Client['patchNamespacedPodStatus']>(),
    replaceNamespacedPod: vi.fn<CoreV1Client['replaceNamespacedPod']>(),
  } satisfies CoreV1Client;
}

const PATCH = '{"metadata":{"annotations":{"KubeDevice/DeviceInfo":"{}"}}}';

describe('isApiNotFound', () => {
  it('should match errors carrying code 404 only', () => {
    expect(isApiNotFound(apiError(404))).toBe(true);
    expect(isApiNotFound(apiError(409))).toBe(false);
    expect(isApiNotFound(new Error('404'))).toBe(false);
    expect(isApiNotFound(undefined)).toBe(false);
  });
});

describe('KubernetesNodeStore', () => {
  let api: ReturnType<typeof fakeApi>;
  let store: KubernetesNodeStore;

  beforeEach(() => {
    api = fakeApi();
    store = new KubernetesNodeStore(api);
  });

  it('should read nodes', async () => {
    const node = makeNode('node-a');
    api.readNode.mockResolvedValue(node);

    expect(await store.get('node-a')).toBe(node);
    expect(api.readNode).toHaveBeenCalledWith({ name: 'node-a' });
  });

  it('should map 404 to NotFoundError with the API error as cause', async () => {
    const notFound = apiError(404);
    api.readNode.mockRejectedValue(notFound);

    const err = await captureRejection(store.get('ghost'));
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err instanceof NotFoundError && err.cause).toBe(notFound);
  });

  it('should pass other API errors through unchanged', async () => {
    const failure = apiError(500);
    api.readNode.mockRejectedValue(failure);

    expect(await captureRejection(store.get('node-a'))).toBe(failure);
  });

  it('should patch the main resource by default', async () => {
    api.patchNode.mockResolvedValue(makeNode('node-a'));

    await store.patch('node-a', PATCH);
    expect(api.patchNode).toHaveBeenCalledWith(
      { name: 'node-a', body: { metadata: { annotations: { 'KubeDevice/DeviceInfo': '{}' } } } },
      expect.anything(),
    );
    expect(api.patchNodeStatus).not.toHaveBeenCalled();
  });

  it('should patch status through the status endpoint', async () => {
    api.patchNodeStatus.mockResolvedValue(makeNode('node-a'));

    await store.patch('node-a', PATCH, { subResource: 'status' });
    expect(api.patchNodeStatus).toHaveBeenCalledTimes(1);
    expect(api.patchNode).not.toHaveBeenCalled();
  });

  it('should not map errors of a patch', async () => {
    const notFound = apiError(404);
    api.patchNode.mockRejectedValue(notFound);

    expect(await captureRejection(store.patch('node-a', PATCH))).toBe(notFound);
  });

  it('should replace nodes on update', async () => {
    const node = makeNode('node-a');
    api.replaceNode.mockResolvedValue(node);

    await store.update(node);
    expect(api.replaceNode).toHaveBeenCalledWith({ name: 'node-a', body: node });
  });
});

describe('KubernetesPodStore', () => {
  let api: ReturnType<typeof fakeApi>;
  let store: KubernetesPodStore;

  beforeEach(() => {
    api = fakeApi();
    store = new KubernetesPodStore(api);
  });

  it('should read pods from the default namespace when none is given', async () => {
    api.readNamespacedPod.mockResolvedValue(makePod('pod-a', []));

    await store.get('pod-a');
    expect(api.readNamespacedPod).toHaveBeenCalledWith({ name: 'pod-a', namespace: 'default' });
  });

  it('should name the namespace in NotFoundError', async () => {
    api.readNamespacedPod.mockRejectedValue(apiError(404));

    const err = await captureRejection(store.get('pod-a', 'team-a'));
    expect(err instanceof NotFoundError && err.message).toBe('Pod "team-a/pod-a" not found');
  });

  it('should patch status of the pod in its namespace', async () => {
    api.patchNamespacedPodStatus.mockResolvedValue(makePod('pod-a', []));

    await store.patch('pod-a', PATCH, { namespace: 'team-a', subResource: 'status' });
    expect(api.patchNamespacedPodStatus).toHaveBeenCalledWith(
      { name: 'pod-a', namespace: 'team-a', body: { metadata: { annotations: { 'KubeDevice/DeviceInfo': '{}' } } } },
      expect.anything(),
    );
  });

  it('should replace pods in their namespace on update', async () => {
    const pod = makePod('pod-a', [makeContainer('main')], { namespace: 'team-a' });
    api.replaceNamespacedPod.mockResolvedValue(pod);

    await store.update(pod);
    expect(api.replaceNamespacedPod).toHaveBeenCalledWith({ name: 'pod-a', namespace: 'team-a', body: pod });
  });
});
