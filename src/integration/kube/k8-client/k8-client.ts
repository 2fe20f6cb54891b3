// SPDX-License-Identifier: Apache-2.0

import * as k8s from '@kubernetes/client-node';
import {DeckhandError} from '../../../core/errors/deckhand-error.js';
import {type K8} from '../k8.js';
import {type Namespaces} from '../resources/namespace/namespaces.js';
import {type Contexts} from '../resources/context/contexts.js';
import {type Objects} from '../resources/object/objects.js';
import {K8ClientNamespaces} from './resources/namespace/k8-client-namespaces.js';
import {K8ClientContexts} from './resources/context/k8-client-contexts.js';
import {K8ClientObjects} from './resources/object/k8-client-objects.js';

/**
 * A kubernetes API wrapper bound to a single kubeconfig context.
 */
export class K8Client implements K8 {
  private readonly kubeConfig: k8s.KubeConfig;
  private readonly k8Namespaces: Namespaces;
  private readonly k8Contexts: Contexts;
  private readonly k8Objects: Objects;

  /**
   * Create a new client for the given context, if context is undefined it will use the current context in kubeconfig
   * @param context - The context to create the client for
   */
  public constructor(context?: string) {
    this.kubeConfig = K8Client.getKubeConfig(context);

    if (!this.kubeConfig.getCurrentContext()) {
      throw new DeckhandError('No active kubernetes context found. Please set current kubernetes context.');
    }

    if (!this.kubeConfig.getCurrentCluster()) {
      throw new DeckhandError('No active kubernetes cluster found. Please create a cluster and set current context.');
    }

    this.k8Namespaces = new K8ClientNamespaces(this.kubeConfig.makeApiClient(k8s.CoreV1Api));
    this.k8Contexts = new K8ClientContexts(this.kubeConfig);
    this.k8Objects = new K8ClientObjects(k8s.KubernetesObjectApi.makeApiClient(this.kubeConfig));
  }

  private static getKubeConfig(context?: string): k8s.KubeConfig {
    const kubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromDefault();

    if (context) {
      if (!kubeConfig.getContextObject(context)) {
        throw new DeckhandError(`No kube config context found with name ${context}`);
      }

      kubeConfig.setCurrentContext(context);
    }

    return kubeConfig;
  }

  public namespaces(): Namespaces {
    return this.k8Namespaces;
  }

  public contexts(): Contexts {
    return this.k8Contexts;
  }

  public objects(): Objects {
    return this.k8Objects;
  }
}
