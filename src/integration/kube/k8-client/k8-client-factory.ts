// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type K8Factory} from '../k8-factory.js';
import {type K8} from '../k8.js';
import {K8Client} from './k8-client.js';

@injectable()
export class K8ClientFactory implements K8Factory {
  private readonly k8Clients: Map<string, K8> = new Map<string, K8>();
  private defaultClient?: K8;

  public getK8(context: string): K8 {
    let client = this.k8Clients.get(context);
    if (!client) {
      client = this.createK8Client(context);
      this.k8Clients.set(context, client);
    }
    return client;
  }

  /**
   * Create a new k8Factory client for the given context
   * @param context - The context to create the k8Factory client for
   * @returns a new k8Factory client
   */
  private createK8Client(context: string): K8 {
    return new K8Client(context);
  }

  public default(): K8 {
    if (!this.defaultClient) {
      this.defaultClient = new K8Client(undefined);
    }
    return this.defaultClient;
  }
}
