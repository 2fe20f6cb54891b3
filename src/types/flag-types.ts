// SPDX-License-Identifier: Apache-2.0

import {type DeckhandListrTaskWrapper} from './index.js';

export type FlagType = 'string' | 'boolean' | 'number';

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | number;
  alias?: string;
  type: FlagType;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}

/** Asks the user a yes/no question from inside a running task */
export type ConfirmationPrompt = <T>(task: DeckhandListrTaskWrapper<T>, message: string) => Promise<boolean>;

export interface PromptingCommandFlag extends CommandFlag {
  prompt: ConfirmationPrompt;
}
