// SPDX-License-Identifier: Apache-2.0

import {type NamespaceName} from './namespace-name.js';

export interface Namespaces {
  /**
   * Create a new namespace
   * @param namespace - the name of the namespace
   * @param dryRun - send the request with the server-side dry run flag
   * @returns false when the namespace was created concurrently by someone else
   */
  create(namespace: NamespaceName, dryRun?: boolean): Promise<boolean>;

  /**
   * Returns true if a namespace exists with the given name
   * @param namespace - namespace name
   */
  has(namespace: NamespaceName): Promise<boolean>;
}
