// SPDX-License-Identifier: Apache-2.0

import {type KubeConfig} from '@kubernetes/client-node';
import {type Contexts} from '../../../resources/context/contexts.js';

export class K8ClientContexts implements Contexts {
  public constructor(private readonly kubeConfig: KubeConfig) {}

  public readCurrent(): string {
    return this.kubeConfig.getCurrentContext();
  }
}
