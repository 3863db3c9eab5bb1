/**
 * Validation of the device model, in memory and on the wire
 * @module @devstate/shared/validation/device-info-validation
 */

import type { ContainerInfo, NodeInfo, PodInfo } from '../types/device-info';
import { isRecord, toResult, type ValidationIssue, type ValidationResult } from './types';

/**
 * Validate a resource amount map. `undefined` and `null` count as empty.
 */
export function validateResourceList(value: unknown, field: string): ValidationIssue[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!isRecord(value)) {
    return [{ field, message: 'Resource list must be an object', code: 'INVALID_TYPE' }];
  }

  const errors: ValidationIssue[] = [];
  for (const [name, amount] of Object.entries(value)) {
    if (typeof amount !== 'number') {
      errors.push({
        field: `${field}.${name}`,
        message: 'Resource amount must be a number',
        code: 'INVALID_TYPE',
      });
    } else if (!Number.isSafeInteger(amount)) {
      errors.push({
        field: `${field}.${name}`,
        message: 'Resource amount must be a safe integer',
        code: 'NOT_INTEGER',
      });
    }
  }
  return errors;
}

/**
 * Validate a device assignment map. `undefined` and `null` count as empty.
 */
export function validateResourceLocation(value: unknown, field: string): ValidationIssue[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!isRecord(value)) {
    return [{ field, message: 'Resource location must be an object', code: 'INVALID_TYPE' }];
  }

  const errors: ValidationIssue[] = [];
  for (const [name, location] of Object.entries(value)) {
    if (typeof location !== 'string') {
      errors.push({
        field: `${field}.${name}`,
        message: 'Resource location must be a string',
        code: 'INVALID_TYPE',
      });
    }
  }
  return errors;
}

function validateOptionalString(value: unknown, field: string): ValidationIssue[] {
  if (value === undefined || value === null || typeof value === 'string') {
    return [];
  }
  return [{ field, message: `${field} must be a string`, code: 'INVALID_TYPE' }];
}

/**
 * Validate one container entry of a pod document
 */
export function validateContainerInfoDocument(value: unknown, field: string): ValidationIssue[] {
  if (!isRecord(value)) {
    return [{ field, message: 'Container info must be an object', code: 'INVALID_TYPE' }];
  }

  return [
    ...validateResourceList(value.requests, `${field}.requests`),
    ...validateResourceList(value.kuberequests, `${field}.kuberequests`),
    ...validateResourceList(value.devrequests, `${field}.devrequests`),
    ...validateResourceLocation(value.allocatefrom, `${field}.allocatefrom`),
  ];
}

function validateContainerMapDocument(value: unknown, field: string): ValidationIssue[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!isRecord(value)) {
    return [{ field, message: 'Container map must be an object', code: 'INVALID_TYPE' }];
  }

  return Object.entries(value).flatMap(([name, container]) =>
    validateContainerInfoDocument(container, `${field}.${name}`),
  );
}

/**
 * Validate a decoded node annotation document. Unknown keys are not checked.
 */
export function validateNodeInfoDocument(value: unknown): ValidationResult {
  if (!isRecord(value)) {
    return toResult([{ field: '', message: 'Node info must be a JSON object', code: 'INVALID_TYPE' }]);
  }

  return toResult([
    ...validateOptionalString(value.name, 'name'),
    ...validateResourceList(value.capacity, 'capacity'),
    ...validateResourceList(value.allocatable, 'allocatable'),
    ...validateResourceList(value.used, 'used'),
    ...validateResourceList(value.kubecap, 'kubecap'),
    ...validateResourceList(value.kubealloc, 'kubealloc'),
  ]);
}

/**
 * Validate a decoded pod annotation document. Unknown keys are not checked.
 */
export function validatePodInfoDocument(value: unknown): ValidationResult {
  if (!isRecord(value)) {
    return toResult([{ field: '', message: 'Pod info must be a JSON object', code: 'INVALID_TYPE' }]);
  }

  return toResult([
    ...validateOptionalString(value.podname, 'podname'),
    ...validateOptionalString(value.nodename, 'nodename'),
    ...validateResourceList(value.requests, 'requests'),
    ...validateContainerMapDocument(value.initcontainer, 'initcontainer'),
    ...validateContainerMapDocument(value.runningcontainer, 'runningcontainer'),
  ]);
}

function validateContainerInfo(container: ContainerInfo, field: string): ValidationIssue[] {
  return [
    ...validateResourceList(container.requests, `${field}.requests`),
    ...validateResourceList(container.kubeRequests, `${field}.kubeRequests`),
    ...validateResourceList(container.devRequests, `${field}.devRequests`),
    ...validateResourceLocation(container.allocateFrom, `${field}.allocateFrom`),
  ];
}

/**
 * Validate an in-memory node model before it is encoded
 */
export function validateNodeInfo(info: NodeInfo): ValidationResult {
  return toResult([
    ...validateResourceList(info.capacity, 'capacity'),
    ...validateResourceList(info.allocatable, 'allocatable'),
    ...validateResourceList(info.used, 'used'),
    ...validateResourceList(info.kubeCap, 'kubeCap'),
    ...validateResourceList(info.kubeAlloc, 'kubeAlloc'),
  ]);
}

/**
 * Validate an in-memory pod model before it is encoded
 */
export function validatePodInfo(info: PodInfo): ValidationResult {
  return toResult([
    ...validateResourceList(info.requests, 'requests'),
    ...Object.entries(info.initContainers).flatMap(([name, c]) =>
      validateContainerInfo(c, `initContainers.${name}`),
    ),
    ...Object.entries(info.runningContainers).flatMap(([name, c]) =>
      validateContainerInfo(c, `runningContainers.${name}`),
    ),
  ]);
}
