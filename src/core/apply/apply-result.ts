// SPDX-License-Identifier: Apache-2.0

import {type ResourceKey} from '../manifest/resource-key.js';

export enum ApplyAction {
  CREATED = 'created',
  CONFIGURED = 'configured',
  UNCHANGED = 'unchanged',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export interface ApplyResult {
  readonly key: ResourceKey;
  readonly action: ApplyAction;
  /** the write was sent with the server-side dry run flag, or not sent at all */
  readonly dryRun: boolean;
  readonly error?: Error;
}

export enum DeleteAction {
  DELETED = 'deleted',
  ABSENT = 'absent',
  /** namespaces are kept unless their deletion is requested */
  KEPT = 'kept',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export interface DeleteResult {
  readonly key: ResourceKey;
  readonly action: DeleteAction;
  readonly dryRun: boolean;
  readonly error?: Error;
}

export type DiffAction = ApplyAction.CREATED | ApplyAction.CONFIGURED | ApplyAction.UNCHANGED;

export interface DiffResult {
  readonly key: ResourceKey;
  readonly action: DiffAction;
}
