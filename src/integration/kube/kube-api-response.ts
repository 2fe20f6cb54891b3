// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';
import {type ResourceOperation} from './resources/resource-operation.js';
import {type NamespaceName} from './resources/namespace/namespace-name.js';
import {KubeApiError} from './errors/kube-api-error.js';

/**
 * Inspects the errors raised by the Kubernetes client. A failed call rejects with an `HttpError`
 * carrying the status code and the decoded `Status` body of the API server.
 */
export class KubeApiResponse {
  private constructor() {}

  public static statusCodeOf(error: unknown): number | undefined {
    if (!KubeApiResponse.isRecord(error)) {
      return undefined;
    }
    if (typeof error.statusCode === 'number') {
      return error.statusCode;
    }
    const response: unknown = error.response;
    if (KubeApiResponse.isRecord(response) && typeof response.statusCode === 'number') {
      return response.statusCode;
    }
    return undefined;
  }

  /** The message of the API server's Status body, or of the error itself */
  public static messageOf(error: unknown): string | undefined {
    if (!KubeApiResponse.isRecord(error)) {
      return undefined;
    }
    const body: unknown = error.body;
    if (KubeApiResponse.isRecord(body) && typeof body.message === 'string' && body.message) {
      return body.message;
    }
    return typeof error.message === 'string' && error.message ? error.message : undefined;
  }

  public static isNotFound(error: unknown): boolean {
    return KubeApiResponse.statusCodeOf(error) === StatusCodes.NOT_FOUND;
  }

  public static isConflict(error: unknown): boolean {
    return KubeApiResponse.statusCodeOf(error) === StatusCodes.CONFLICT;
  }

  public static isAlreadyExists(error: unknown): boolean {
    return KubeApiResponse.isConflict(error);
  }

  public static isFailingStatus(statusCode: number | undefined): boolean {
    return (statusCode || StatusCodes.INTERNAL_SERVER_ERROR) > StatusCodes.ACCEPTED;
  }

  /**
   * Converts a client error into a KubeApiError when it carries a failing HTTP status.
   * Errors without a status code (connection refused, invalid kubeconfig) are returned unchanged.
   */
  public static wrap(
    error: unknown,
    resourceOperation: ResourceOperation,
    kind: string,
    namespace: NamespaceName | undefined,
    name: string,
  ): unknown {
    const statusCode = KubeApiResponse.statusCodeOf(error);
    if (statusCode === undefined || !KubeApiResponse.isFailingStatus(statusCode)) {
      return error;
    }
    return new KubeApiError(
      `failed to ${resourceOperation} ${kind} '${name}'` + (namespace ? ` in namespace '${namespace}'` : ''),
      statusCode,
      error,
      {kind, resourceOperation, namespace: namespace?.name, name},
    );
  }

  private static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
  }
}
