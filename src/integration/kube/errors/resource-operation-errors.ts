// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from '../../../core/errors/deckhand-error.js';
import {ResourceOperation} from '../resources/resource-operation.js';
import {type NamespaceName} from '../resources/namespace/namespace-name.js';
import {KubeApiResponse} from '../kube-api-response.js';

export class ResourceOperationError extends DeckhandError {
  /**
   * Instantiates a new error with a message and an optional cause.
   * @param operation - the operation that failed.
   * @param kind - the kind of resource the operation was performed on.
   * @param namespace - the namespace of the resource, undefined for cluster-scoped resources.
   * @param name - the name of the resource.
   * @param cause - optional underlying cause of the error.
   */
  public constructor(
    public readonly operation: ResourceOperation,
    public readonly kind: string,
    namespace: NamespaceName | undefined,
    name: string,
    cause?: unknown,
  ) {
    super(
      `failed to ${operation} ${kind} '${name}'` +
        (namespace ? ` in namespace '${namespace}'` : '') +
        ResourceOperationError.describeCause(cause),
      cause,
      {
        operation,
        kind,
        namespace: namespace?.name,
        name,
        statusCode: KubeApiResponse.statusCodeOf(cause),
      },
    );
  }

  private static describeCause(cause: unknown): string {
    const reason = KubeApiResponse.messageOf(cause);
    return reason ? `: ${reason}` : '';
  }
}

export class ResourceReadError extends ResourceOperationError {
  public constructor(kind: string, namespace: NamespaceName | undefined, name: string, cause?: unknown) {
    super(ResourceOperation.READ, kind, namespace, name, cause);
  }
}

export class ResourceCreateError extends ResourceOperationError {
  public constructor(kind: string, namespace: NamespaceName | undefined, name: string, cause?: unknown) {
    super(ResourceOperation.CREATE, kind, namespace, name, cause);
  }
}

export class ResourceReplaceError extends ResourceOperationError {
  public constructor(kind: string, namespace: NamespaceName | undefined, name: string, cause?: unknown) {
    super(ResourceOperation.REPLACE, kind, namespace, name, cause);
  }
}

export class ResourceDeleteError extends ResourceOperationError {
  public constructor(kind: string, namespace: NamespaceName | undefined, name: string, cause?: unknown) {
    super(ResourceOperation.DELETE, kind, namespace, name, cause);
  }
}

export class ResourceNotFoundError extends ResourceOperationError {
  public constructor(
    operation: ResourceOperation,
    kind: string,
    namespace: NamespaceName | undefined,
    name: string,
    cause?: unknown,
  ) {
    super(operation, kind, namespace, name, cause);
  }
}
