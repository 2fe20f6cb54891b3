// SPDX-License-Identifier: Apache-2.0

import {type KubernetesObject} from '@kubernetes/client-node';
import {DataValidationError} from '../../../../core/errors/data-validation-error.js';

export interface KubeObjectMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  resourceVersion?: string;
  generation?: number;
  [field: string]: unknown;
}

/** A Kubernetes object of any kind, as sent to or read from the API server */
export interface KubeObject {
  apiVersion: string;
  kind: string;
  metadata: KubeObjectMetadata;
  [field: string]: unknown;
}

export class KubeObjects {
  private constructor() {}

  /**
   * Converts an object returned by the Kubernetes client into a {@link KubeObject}.
   * @throws DataValidationError if the object lacks apiVersion, kind or metadata.name
   */
  public static fromKubernetesObject(object: KubernetesObject): KubeObject {
    const {apiVersion, kind, metadata} = object;
    const name = metadata?.name;
    if (!apiVersion || !kind || !metadata || !name) {
      throw new DataValidationError('invalid object returned by the API server', 'apiVersion, kind and metadata.name', {
        apiVersion,
        kind,
        name,
      });
    }
    const fields: Record<string, unknown> = {...object};
    return {...fields, apiVersion, kind, metadata: {...metadata, name}};
  }

  /** Returns the field at the given path, or undefined when any segment is missing */
  public static field(object: unknown, ...path: string[]): unknown {
    let current: unknown = object;
    for (const segment of path) {
      if (!KubeObjects.isRecord(current)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }

  public static stringField(object: unknown, ...path: string[]): string | undefined {
    const value = KubeObjects.field(object, ...path);
    return typeof value === 'string' ? value : undefined;
  }

  public static numberField(object: unknown, ...path: string[]): number | undefined {
    const value = KubeObjects.field(object, ...path);
    return typeof value === 'number' ? value : undefined;
  }

  public static arrayField(object: unknown, ...path: string[]): unknown[] {
    const value = KubeObjects.field(object, ...path);
    return Array.isArray(value) ? value : [];
  }

  public static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
