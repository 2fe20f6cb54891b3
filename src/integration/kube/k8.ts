// SPDX-License-Identifier: Apache-2.0

import {type Namespaces} from './resources/namespace/namespaces.js';
import {type Contexts} from './resources/context/contexts.js';
import {type Objects} from './resources/object/objects.js';

/**
 * A client for a single Kubernetes cluster context. Each resource family is reached through a fluent accessor.
 */
export interface K8 {
  /**
   * Fluent accessor for reading and manipulating namespaces.
   * @returns an object instance providing namespace operations
   */
  namespaces(): Namespaces;

  /**
   * Fluent accessor for reading the kubeconfig contexts.
   */
  contexts(): Contexts;

  /**
   * Fluent accessor for reading and writing objects of any kind.
   */
  objects(): Objects;
}
