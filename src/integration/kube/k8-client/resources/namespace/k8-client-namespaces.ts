// SPDX-License-Identifier: Apache-2.0

import {type CoreV1Api} from '@kubernetes/client-node';
import {StatusCodes} from 'http-status-codes';
import {type Namespaces} from '../../../resources/namespace/namespaces.js';
import {type NamespaceName} from '../../../resources/namespace/namespace-name.js';
import {KubeApiResponse} from '../../../kube-api-response.js';
import {ResourceOperation} from '../../../resources/resource-operation.js';
import {ResourceType} from '../../../resources/resource-type.js';
import {ResourceCreateError, ResourceReadError} from '../../../errors/resource-operation-errors.js';

const DRY_RUN_ALL = 'All';

export class K8ClientNamespaces implements Namespaces {
  public constructor(private readonly kubeClient: CoreV1Api) {}

  public async create(namespace: NamespaceName, dryRun: boolean = false): Promise<boolean> {
    const payload = {
      metadata: {
        name: namespace.name,
      },
    };

    try {
      const resp = await this.kubeClient.createNamespace(payload, undefined, dryRun ? DRY_RUN_ALL : undefined);
      return resp.response.statusCode === StatusCodes.CREATED;
    } catch (error) {
      if (KubeApiResponse.isAlreadyExists(error)) {
        return false;
      }
      throw new ResourceCreateError(
        ResourceType.NAMESPACE,
        undefined,
        namespace.name,
        KubeApiResponse.wrap(error, ResourceOperation.CREATE, ResourceType.NAMESPACE, undefined, namespace.name),
      );
    }
  }

  public async has(namespace: NamespaceName): Promise<boolean> {
    try {
      await this.kubeClient.readNamespace(namespace.name);
      return true;
    } catch (error) {
      if (KubeApiResponse.isNotFound(error)) {
        return false;
      }
      throw new ResourceReadError(ResourceType.NAMESPACE, undefined, namespace.name, error);
    }
  }
}
