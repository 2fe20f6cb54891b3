// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {color, type ListrLogger, PRESET_TIMER} from 'listr2';
import {NamespaceName} from '../integration/kube/resources/namespace/namespace-name.js';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- deckhand related constants ---------------------------------------------------------------------
export const DECKHAND_HOME_DIR = process.env.DECKHAND_HOME || PathEx.join(os.homedir(), '.deckhand');
export const DECKHAND_LOGS_DIR = PathEx.join(DECKHAND_HOME_DIR, 'logs');
export const DEFAULT_NAMESPACE = NamespaceName.of('default');
export const FIELD_MANAGER = 'deckhand';

export const MANIFEST_FILE_EXTENSIONS = ['.yaml', '.yml', '.json'];

// ------------------- annotations and labels written to or read from manifests ----------------------------------------
export const ANNOTATION_PREFIX = 'deckhand.io';
export const APPLIED_HASH_ANNOTATION = `${ANNOTATION_PREFIX}/applied-hash`;
export const DEPENDS_ON_ANNOTATION = `${ANNOTATION_PREFIX}/depends-on`;
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY_VALUE = 'deckhand';

// ------------------- readiness polling -------------------------------------------------------------------------------
export const POLL_MAX_ATTEMPTS = +process.env.DECKHAND_POLL_MAX_ATTEMPTS || 150;
export const POLL_DELAY = +process.env.DECKHAND_POLL_DELAY || 2000;

export const POD_PHASE_FAILED = 'Failed';
export const POD_PHASE_SUCCEEDED = 'Succeeded';
export const POD_CONDITION_READY = 'Ready';
export const CONDITION_STATUS_TRUE = 'True';
export const CONDITION_STATUS_FALSE = 'False';

/** Container waiting reasons that will not resolve without a change to the manifest */
export const POD_FATAL_WAITING_REASONS = [
  'CrashLoopBackOff',
  'ErrImagePull',
  'ImagePullBackOff',
  'CreateContainerConfigError',
  'InvalidImageName',
];

/**
 * Listr related
 * @returns a object that defines the default color options
 */
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number) => duration > 100,
  format: (duration: number) => {
    if (duration > 30_000) {
      return color.red;
    }

    return color.green;
  },
};

export interface ListrRendererOption {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  logger?: ListrLogger;
}

export const LISTR_DEFAULT_RENDERER_OPTION: ListrRendererOption = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};
