// SPDX-License-Identifier: Apache-2.0

import {type Manifest} from '../manifest/manifest.js';
import {type ResourceKey} from '../manifest/resource-key.js';

export interface PlanEntry {
  readonly manifest: Manifest;
  /** keys of manifests in the plan that must be applied first */
  readonly dependencies: readonly ResourceKey[];
  /** references to resources that are not part of the plan */
  readonly externalReferences: readonly ResourceKey[];
}

/** Manifests in application order */
export interface ApplyPlan {
  readonly entries: readonly PlanEntry[];
}
