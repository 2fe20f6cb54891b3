// SPDX-License-Identifier: Apache-2.0

import {type KubeObject} from './kube-object.js';
import {type ObjectReference} from './object-reference.js';

/**
 * Generic access to objects of any kind, resolved through API discovery.
 */
export interface Objects {
  /**
   * Read an object
   * @returns the live object, or undefined when it does not exist
   * @throws ResourceReadError if the object could not be read
   */
  read(reference: ObjectReference): Promise<KubeObject | undefined>;

  /**
   * Create an object
   * @param object - the object to create
   * @param dryRun - send the request with the server-side dry run flag
   * @throws ResourceCreateError if the object could not be created
   */
  create(object: KubeObject, dryRun?: boolean): Promise<KubeObject>;

  /**
   * Replace an existing object. A `metadata.resourceVersion` on the object makes the write conditional.
   * @throws ResourceReplaceError if the object could not be replaced
   */
  replace(object: KubeObject, dryRun?: boolean): Promise<KubeObject>;

  /**
   * Delete an object
   * @returns false when the object did not exist
   * @throws ResourceDeleteError if the object could not be deleted
   */
  delete(reference: ObjectReference, dryRun?: boolean): Promise<boolean>;
}
