// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlags} from '../../types/flag-types.js';

const COMMON_OPTIONAL = [flags.namespace, flags.recursive, flags.strict, flags.devMode, flags.quiet];

export const PLAN_FLAGS: CommandFlags = {
  required: [flags.manifestDirectory],
  optional: [...COMMON_OPTIONAL, flags.diff, flags.context],
};

export const APPLY_FLAGS: CommandFlags = {
  required: [flags.manifestDirectory],
  optional: [
    ...COMMON_OPTIONAL,
    flags.context,
    flags.dryRun,
    flags.continueOnError,
    flags.wait,
    flags.maxAttempts,
    flags.pollInterval,
  ],
};

export const STATUS_FLAGS: CommandFlags = {
  required: [flags.manifestDirectory],
  optional: [...COMMON_OPTIONAL, flags.context],
};

export const DESTROY_FLAGS: CommandFlags = {
  required: [flags.manifestDirectory],
  optional: [
    ...COMMON_OPTIONAL,
    flags.context,
    flags.dryRun,
    flags.continueOnError,
    flags.includeNamespaces,
    flags.force,
  ],
};
