// SPDX-License-Identifier: Apache-2.0

import {type KubernetesObjectApi} from '@kubernetes/client-node';
import {type Objects} from '../../../resources/object/objects.js';
import {type KubeObject, KubeObjects} from '../../../resources/object/kube-object.js';
import {type ObjectReference} from '../../../resources/object/object-reference.js';
import {NamespaceName} from '../../../resources/namespace/namespace-name.js';
import {KubeApiResponse} from '../../../kube-api-response.js';
import {ResourceOperation} from '../../../resources/resource-operation.js';
import {
  ResourceCreateError,
  ResourceDeleteError,
  ResourceNotFoundError,
  ResourceReadError,
  ResourceReplaceError,
} from '../../../errors/resource-operation-errors.js';
import {FIELD_MANAGER} from '../../../../../core/constants.js';

const DRY_RUN_ALL = 'All';

/**
 * Reads and writes objects of any kind. The client resolves the REST path of each kind through API discovery.
 */
export class K8ClientObjects implements Objects {
  public constructor(private readonly objectApi: KubernetesObjectApi) {}

  public async read(reference: ObjectReference): Promise<KubeObject | undefined> {
    try {
      const resp = await this.objectApi.read(K8ClientObjects.header(reference));
      return KubeObjects.fromKubernetesObject(resp.body);
    } catch (error) {
      if (KubeApiResponse.isNotFound(error)) {
        return undefined;
      }
      throw new ResourceReadError(
        reference.kind,
        reference.namespace,
        reference.name,
        KubeApiResponse.wrap(error, ResourceOperation.READ, reference.kind, reference.namespace, reference.name),
      );
    }
  }

  public async create(object: KubeObject, dryRun: boolean = false): Promise<KubeObject> {
    try {
      const resp = await this.objectApi.create(object, undefined, dryRun ? DRY_RUN_ALL : undefined, FIELD_MANAGER);
      return KubeObjects.fromKubernetesObject(resp.body);
    } catch (error) {
      const namespace = K8ClientObjects.namespaceOf(object);
      throw new ResourceCreateError(
        object.kind,
        namespace,
        object.metadata.name,
        KubeApiResponse.wrap(error, ResourceOperation.CREATE, object.kind, namespace, object.metadata.name),
      );
    }
  }

  public async replace(object: KubeObject, dryRun: boolean = false): Promise<KubeObject> {
    try {
      const resp = await this.objectApi.replace(object, undefined, dryRun ? DRY_RUN_ALL : undefined, FIELD_MANAGER);
      return KubeObjects.fromKubernetesObject(resp.body);
    } catch (error) {
      const namespace = K8ClientObjects.namespaceOf(object);
      if (KubeApiResponse.isNotFound(error)) {
        throw new ResourceNotFoundError(ResourceOperation.REPLACE, object.kind, namespace, object.metadata.name, error);
      }
      throw new ResourceReplaceError(
        object.kind,
        namespace,
        object.metadata.name,
        KubeApiResponse.wrap(error, ResourceOperation.REPLACE, object.kind, namespace, object.metadata.name),
      );
    }
  }

  public async delete(reference: ObjectReference, dryRun: boolean = false): Promise<boolean> {
    try {
      await this.objectApi.delete(
        K8ClientObjects.header(reference),
        undefined,
        dryRun ? DRY_RUN_ALL : undefined,
        undefined,
        undefined,
        'Background',
      );
      return true;
    } catch (error) {
      if (KubeApiResponse.isNotFound(error)) {
        return false;
      }
      throw new ResourceDeleteError(
        reference.kind,
        reference.namespace,
        reference.name,
        KubeApiResponse.wrap(error, ResourceOperation.DELETE, reference.kind, reference.namespace, reference.name),
      );
    }
  }

  private static header(reference: ObjectReference): {
    apiVersion: string;
    kind: string;
    metadata: {name: string; namespace: string};
  } {
    return {
      apiVersion: reference.apiVersion,
      kind: reference.kind,
      metadata: {name: reference.name, namespace: reference.namespace?.name ?? ''},
    };
  }

  private static namespaceOf(object: KubeObject): NamespaceName | undefined {
    const namespace = object.metadata.namespace;
    return namespace && NamespaceName.isValid(namespace) ? NamespaceName.of(namespace) : undefined;
  }
}
