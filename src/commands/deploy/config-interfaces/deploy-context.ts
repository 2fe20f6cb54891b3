// SPDX-License-Identifier: Apache-2.0

import {type DeployConfigClass} from './deploy-config-class.js';
import {type Manifest} from '../../../core/manifest/manifest.js';
import {type ApplyPlan} from '../../../core/ordering/apply-plan.js';
import {type ApplyResult, type DeleteResult, type DiffResult} from '../../../core/apply/apply-result.js';
import {type ResourceStatus} from '../../../core/status/resource-status.js';

export interface DeployContext {
  config?: DeployConfigClass;
  manifests: Manifest[];
  plan?: ApplyPlan;
  diffResults: DiffResult[];
  applyResults: ApplyResult[];
  deleteResults: DeleteResult[];
  statuses: ResourceStatus[];
}

export function createDeployContext(): DeployContext {
  return {
    manifests: [],
    diffResults: [],
    applyResults: [],
    deleteResults: [],
    statuses: [],
  };
}
