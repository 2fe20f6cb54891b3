// SPDX-License-Identifier: Apache-2.0

import {isDns1123Label} from '../../kube-validation.js';
import {NamespaceNameInvalidError} from '../../errors/namespace-name-invalid-error.js';

/**
 * Represents a Kubernetes namespace name. A Kubernetes namespace name must
 * be a valid RFC-1123 DNS label.
 *
 * @include DNS_1123_LABEL
 */
export class NamespaceName {
  private constructor(public readonly name: string) {
    if (!this.isValid()) {
      throw new NamespaceNameInvalidError(name);
    }
  }

  /**
   * Creates a namespace name.
   *
   * @param name The name of the namespace.
   * @throws NamespaceNameInvalidError if the namespace name is invalid.
   */
  public static of(name: string): NamespaceName {
    return new NamespaceName(name);
  }

  /** Returns true when the given string would be accepted by {@link NamespaceName.of} */
  public static isValid(name: string): boolean {
    return isDns1123Label(name);
  }

  private isValid(): boolean {
    return isDns1123Label(this.name);
  }

  public equals(other: NamespaceName | undefined): boolean {
    return other instanceof NamespaceName && this.name === other.name;
  }

  public toString(): string {
    return this.name;
  }

  /**
   * Allows `NamespaceName` to be used as a primitive string in operations.
   */
  public [Symbol.toPrimitive](): string {
    return this.name;
  }

  public valueOf(): string {
    return this.name;
  }
}
