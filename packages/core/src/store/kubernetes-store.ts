/**
 * Kubernetes-backed object stores
 * @module @devstate/core/store/kubernetes-store
 */

import {
  PatchStrategy,
  setHeaderOptions,
  type V1Node,
  type V1Pod,
} from '@kubernetes/client-node';
import { NotFoundError, createServiceLogger, type ErrorMeta } from '@devstate/shared';
import type { ObjectStore, PatchOptions } from './object-store';

type RequestOptions = ReturnType<typeof setHeaderOptions>;

/**
 * The `CoreV1Api` calls the stores make
 */
export interface CoreV1Client {
  readNode(param: { name: string }): Promise<V1Node>;
  patchNode(param: { name: string; body: object }, options?: RequestOptions): Promise<V1Node>;
  patchNodeStatus(param: { name: string; body: object }, options?: RequestOptions): Promise<V1Node>;
  replaceNode(param: { name: string; body: V1Node }): Promise<V1Node>;
  readNamespacedPod(param: { name: string; namespace: string }): Promise<V1Pod>;
  patchNamespacedPod(param: { name: string; namespace: string; body: object }, options?: RequestOptions): Promise<V1Pod>;
  patchNamespacedPodStatus(
    param: { name: string; namespace: string; body: object },
    options?: RequestOptions,
  ): Promise<V1Pod>;
  replaceNamespacedPod(param: { name: string; namespace: string; body: V1Pod }): Promise<V1Pod>;
}

const DEFAULT_NAMESPACE = 'default';

const logger = createServiceLogger({}, { component: 'kubernetes-store' });

function strategicMergePatch(): RequestOptions {
  return setHeaderOptions('Content-Type', PatchStrategy.StrategicMergePatch);
}

/**
 * Whether the API server answered 404
 */
export function isApiNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 404;
}

/**
 * Run a read, mapping 404 to `NotFoundError` with the API error as its cause
 */
async function read<T>(meta: ErrorMeta, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (isApiNotFound(err)) {
      throw new NotFoundError(meta, err);
    }
    throw err;
  }
}

/**
 * Parse patch bytes into the request body; the client serializes it again unchanged
 */
function patchBody(patchBytes: string): object {
  const body: unknown = JSON.parse(patchBytes);
  return typeof body === 'object' && body !== null ? body : {};
}

/**
 * Nodes through the core/v1 API
 */
export class KubernetesNodeStore implements ObjectStore<V1Node> {
  readonly kind = 'Node';
  readonly namespaced = false;

  constructor(private readonly api: CoreV1Client) {}

  async get(name: string): Promise<V1Node> {
    return read({ resourceKind: this.kind, resourceName: name }, () => this.api.readNode({ name }));
  }

  async patch(name: string, patchBytes: string, options: PatchOptions = {}): Promise<V1Node> {
    const body = patchBody(patchBytes);
    logger.trace('Patching node', { resourceKind: this.kind, resourceName: name, subResource: options.subResource, patch: patchBytes });
    if (options.subResource === 'status') {
      return this.api.patchNodeStatus({ name, body }, strategicMergePatch());
    }
    return this.api.patchNode({ name, body }, strategicMergePatch());
  }

  async update(node: V1Node): Promise<V1Node> {
    return this.api.replaceNode({ name: node.metadata?.name ?? '', body: node });
  }
}

/**
 * Pods through the core/v1 API
 */
export class KubernetesPodStore implements ObjectStore<V1Pod> {
  readonly kind = 'Pod';
  readonly namespaced = true;

  constructor(private readonly api: CoreV1Client) {}

  async get(name: string, namespace = DEFAULT_NAMESPACE): Promise<V1Pod> {
    return read({ resourceKind: this.kind, resourceName: name, namespace }, () =>
      this.api.readNamespacedPod({ name, namespace }),
    );
  }

  async patch(name: string, patchBytes: string, options: PatchOptions = {}): Promise<V1Pod> {
    const namespace = options.namespace ?? DEFAULT_NAMESPACE;
    const body = patchBody(patchBytes);
    logger.trace('Patching pod', {
      resourceKind: this.kind,
      resourceName: name,
      namespace,
      subResource: options.subResource,
      patch: patchBytes,
    });
    if (options.subResource === 'status') {
      return this.api.patchNamespacedPodStatus({ name, namespace, body }, strategicMergePatch());
    }
    return this.api.patchNamespacedPod({ name, namespace, body }, strategicMergePatch());
  }

  async update(pod: V1Pod): Promise<V1Pod> {
    return this.api.replaceNamespacedPod({
      name: pod.metadata?.name ?? '',
      namespace: pod.metadata?.namespace ?? DEFAULT_NAMESPACE,
      body: pod,
    });
  }
}
