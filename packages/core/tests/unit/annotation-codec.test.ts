/**
 * Unit tests for the annotation codec
 * @module @devstate/core/tests/unit/annotation-codec
 */

import { describe, it, expect } from 'vitest';
import {
  DeserializationError,
  SerializationError,
  newNodeInfo,
  newPodInfo,
  type NodeInfo,
  type PodInfo,
} from '@devstate/shared';
import {
  DEVICE_INFO_ANNOTATION,
  decodeNodeInfo,
  decodePodInfo,
  encodeNodeInfo,
  encodePodInfo,
  nodeInfoToAnnotation,
  podInfoToAnnotation,
  readDeviceInfoAnnotation,
  type AnnotatedMeta,
} from '../../src';
import { captureError } from '../fixtures';

describe('annotation codec', () => {
  it('should use the reserved annotation key', () => {
    expect(DEVICE_INFO_ANNOTATION).toBe('KubeDevice/DeviceInfo');
  });

  describe('node info', () => {
    const full: NodeInfo = {
      name: 'gpu-node-1',
      capacity: { 'alpha/grpresource/gpu/0/cards': 1, 'alpha/grpresource/gpu/1/cards': 1 },
      allocatable: { 'alpha/grpresource/gpu/0/cards': 1 },
      used: { 'alpha/grpresource/gpu/0/cards': 1 },
      kubeCap: { cpu: 8 },
      kubeAlloc: { cpu: 7 },
    };

    it('should round-trip a populated model', () => {
      expect(decodeNodeInfo(encodeNodeInfo(full))).toEqual(full);
    });

    it('should round-trip an empty model', () => {
      expect(decodeNodeInfo(encodeNodeInfo(newNodeInfo()))).toEqual(newNodeInfo());
    });

    it('should decode a missing annotation as an empty model', () => {
      expect(decodeNodeInfo(undefined)).toEqual(newNodeInfo());
    });

    it('should omit empty maps when encoding', () => {
      const info: NodeInfo = { ...newNodeInfo('n1'), used: { gpu: 2 } };
      expect(encodeNodeInfo(info)).toBe('{"name":"n1","used":{"gpu":2}}');
    });

    it('should keep a resource named like an object prototype key', () => {
      const value = '{"used":{"__proto__":3,"gpu":1}}';
      const info = decodeNodeInfo(value);
      expect(Object.keys(info.used)).toEqual(['__proto__', 'gpu']);
      expect(Object.getOwnPropertyDescriptor(info.used, '__proto__')?.value).toBe(3);
      expect(Object.getPrototypeOf(info.used)).toBe(Object.prototype);
      expect(encodeNodeInfo(info)).toBe(value);
    });

    it('should ignore unknown fields', () => {
      const info = decodeNodeInfo('{"name":"n1","scorer":{"gpu":1},"used":{"gpu":3}}');
      expect(info).toEqual({ ...newNodeInfo('n1'), used: { gpu: 3 } });
    });

    it('should decode null maps as empty', () => {
      expect(decodeNodeInfo('{"used":null}').used).toEqual({});
    });

    it('should reject malformed JSON', () => {
      expect(() => decodeNodeInfo('{"used":')).toThrow(DeserializationError);
      expect(() => decodeNodeInfo('')).toThrow(DeserializationError);
    });

    it('should reject a document that is not an object', () => {
      expect(() => decodeNodeInfo('[]')).toThrow(DeserializationError);
      expect(() => decodeNodeInfo('42')).toThrow(DeserializationError);
    });

    it('should report the field holding a value of the wrong type', () => {
      const err = captureError(() => decodeNodeInfo('{"used":{"gpu":"two"}}'));
      expect(err).toBeInstanceOf(DeserializationError);
      expect(err instanceof DeserializationError && err.issues).toEqual([
        { field: 'used.gpu', message: 'Resource amount must be a number', code: 'INVALID_TYPE' },
      ]);
    });

    it('should refuse to encode a non-integer amount', () => {
      const err = captureError(() => encodeNodeInfo({ ...newNodeInfo('n1'), used: { gpu: Number.NaN } }));
      expect(err).toBeInstanceOf(SerializationError);
      expect(err instanceof SerializationError && err.issues).toEqual([
        { field: 'used.gpu', message: 'Resource amount must be a safe integer', code: 'NOT_INTEGER' },
      ]);
      expect(() => encodeNodeInfo({ ...newNodeInfo('n1'), capacity: { gpu: 1.5 } })).toThrow(SerializationError);
    });
  });

  describe('pod info', () => {
    const full: PodInfo = {
      name: 'trainer-0',
      nodeName: 'gpu-node-1',
      requests: { 'alpha/grpresource/gpugrp1/0/gpugrp0/0/gpu/0/cards': 1 },
      initContainers: {
        setup: { requests: {}, kubeRequests: { cpu: 1 }, devRequests: {}, allocateFrom: {} },
      },
      runningContainers: {
        main: {
          requests: { 'alpha/grpresource/gpu/cards': 2 },
          kubeRequests: { 'nvidia.com/gpu': 2 },
          devRequests: { 'alpha/grpresource/gpu/cards': 2 },
          allocateFrom: { 'alpha/grpresource/gpu/cards': 'alpha/grpresource/gpu/0/cards' },
        },
        sidecar: { requests: {}, kubeRequests: {}, devRequests: {}, allocateFrom: {} },
      },
    };

    it('should round-trip a populated model', () => {
      expect(decodePodInfo(encodePodInfo(full))).toEqual(full);
    });

    it('should decode a missing annotation as an empty model', () => {
      expect(decodePodInfo(undefined)).toEqual(newPodInfo());
    });

    it('should use the wire field names', () => {
      const info: PodInfo = {
        ...newPodInfo('p'),
        runningContainers: {
          main: { requests: { gpu: 1 }, kubeRequests: {}, devRequests: {}, allocateFrom: { gpu: 'gpu0' } },
        },
      };
      expect(encodePodInfo(info)).toBe(
        '{"podname":"p","runningcontainer":{"main":{"requests":{"gpu":1},"allocatefrom":{"gpu":"gpu0"}}}}',
      );
    });

    it('should materialize every map of a container decoded without fields', () => {
      const info = decodePodInfo('{"runningcontainer":{"main":{}}}');
      expect(info.runningContainers.main).toEqual({
        requests: {},
        kubeRequests: {},
        devRequests: {},
        allocateFrom: {},
      });
    });

    it('should reject a non-string device location', () => {
      const err = captureError(() => decodePodInfo('{"runningcontainer":{"main":{"allocatefrom":{"gpu":3}}}}'));
      expect(err).toBeInstanceOf(DeserializationError);
      expect(err instanceof DeserializationError && err.issues).toEqual([
        {
          field: 'runningcontainer.main.allocatefrom.gpu',
          message: 'Resource location must be a string',
          code: 'INVALID_TYPE',
        },
      ]);
    });

    it('should report the in-memory field of a model that cannot be encoded', () => {
      const info: PodInfo = {
        ...newPodInfo('p'),
        initContainers: {
          setup: { requests: {}, kubeRequests: { cpu: Infinity }, devRequests: {}, allocateFrom: {} },
        },
      };
      const err = captureError(() => encodePodInfo(info));
      expect(err instanceof SerializationError && err.issues.map((issue) => issue.field)).toEqual([
        'initContainers.setup.kubeRequests.cpu',
      ]);
    });
  });

  describe('metadata helpers', () => {
    it('should create the annotations map when missing', () => {
      const meta: AnnotatedMeta = { name: 'n1' };
      nodeInfoToAnnotation(meta, newNodeInfo('n1'));
      expect(meta.annotations).toEqual({ [DEVICE_INFO_ANNOTATION]: '{"name":"n1"}' });
    });

    it('should keep the other annotations', () => {
      const meta: AnnotatedMeta = { name: 'p', annotations: { team: 'ml' } };
      podInfoToAnnotation(meta, newPodInfo('p'));
      expect(meta.annotations).toEqual({ team: 'ml', [DEVICE_INFO_ANNOTATION]: '{"podname":"p"}' });
    });

    it('should read the annotation when present', () => {
      expect(readDeviceInfoAnnotation({ annotations: { [DEVICE_INFO_ANNOTATION]: '{}' } })).toBe('{}');
      expect(readDeviceInfoAnnotation({ name: 'x' })).toBeUndefined();
      expect(readDeviceInfoAnnotation(undefined)).toBeUndefined();
    });
  });
});
