// SPDX-License-Identifier: Apache-2.0

import {type NamespaceName} from '../../../integration/kube/resources/namespace/namespace-name.js';
import {type Duration} from '../../../core/time/duration.js';

export interface DeployConfigClass {
  manifestDirectory: string;
  namespace: NamespaceName;
  /** kubeconfig context, the current context when undefined */
  context?: string;
  recursive: boolean;
  strict: boolean;
  diff: boolean;
  dryRun: boolean;
  continueOnError: boolean;
  wait: boolean;
  maxAttempts: number;
  pollInterval: Duration;
  includeNamespaces: boolean;
  force: boolean;
  quiet: boolean;
}
