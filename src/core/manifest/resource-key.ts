// SPDX-License-Identifier: Apache-2.0

import {NamespaceName} from '../../integration/kube/resources/namespace/namespace-name.js';
import {CLUSTER_SCOPED_TYPES} from '../../integration/kube/resources/resource-type.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * Identifies a manifest by kind, namespace and name.
 *
 * The string form is `Kind/name` for cluster-scoped resources and `Kind/namespace/name` for namespaced ones.
 */
export class ResourceKey {
  private constructor(
    public readonly kind: string,
    public readonly name: string,
    public readonly namespace?: NamespaceName,
  ) {}

  public static of(kind: string, name: string, namespace?: NamespaceName): ResourceKey {
    if (!kind || !name) {
      throw new IllegalArgumentError('a resource key requires a kind and a name', {kind, name});
    }
    return new ResourceKey(kind, name, namespace);
  }

  /**
   * Parses `Kind/name` or `Kind/namespace/name`.
   *
   * @param value - the string form of the key
   * @param defaultNamespace - namespace given to a two-part key when its kind is namespaced
   * @throws IllegalArgumentError if the value has the wrong number of parts
   */
  public static parse(value: string, defaultNamespace?: NamespaceName): ResourceKey {
    const parts = value
      .trim()
      .split('/')
      .map(part => part.trim());
    if (parts.some(part => !part)) {
      throw new IllegalArgumentError(`invalid resource reference '${value}'`, value);
    }

    if (parts.length === 2) {
      const [kind, name] = parts;
      return ResourceKey.of(kind, name, ResourceKey.isClusterScoped(kind) ? undefined : defaultNamespace);
    }
    if (parts.length === 3) {
      const [kind, namespace, name] = parts;
      return ResourceKey.of(kind, name, NamespaceName.of(namespace));
    }

    throw new IllegalArgumentError(
      `invalid resource reference '${value}', expected Kind/name or Kind/namespace/name`,
      value,
    );
  }

  public static isClusterScoped(kind: string): boolean {
    return CLUSTER_SCOPED_TYPES.has(kind);
  }

  public get isNamespaced(): boolean {
    return this.namespace !== undefined;
  }

  public equals(other: ResourceKey): boolean {
    return this.toString() === other.toString();
  }

  public toString(): string {
    return this.namespace ? `${this.kind}/${this.namespace.name}/${this.name}` : `${this.kind}/${this.name}`;
  }
}
