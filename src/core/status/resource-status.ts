// SPDX-License-Identifier: Apache-2.0

import {type ResourceKey} from '../manifest/resource-key.js';

export enum ReadinessState {
  READY = 'ready',
  PROGRESSING = 'progressing',
  FAILED = 'failed',
  /** the object does not exist in the cluster */
  MISSING = 'missing',
}

export interface Readiness {
  readonly state: ReadinessState;
  readonly reason: string;
}

export interface ResourceStatus extends Readiness {
  readonly key: ResourceKey;
}
