// SPDX-License-Identifier: Apache-2.0

import {type ListrTask, type ListrTaskWrapper} from 'listr2';
import {type AnyYargs, type ArgvStruct} from './aliases.js';

// NOTE: DO NOT add any deckhand imports in this file to avoid circular dependencies

// the renderer type parameters are fixed by the Listr instance that runs the task
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type DeckhandListrTask<T> = ListrTask<T, any, any>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type DeckhandListrTaskWrapper<T> = ListrTaskWrapper<T, any, any>;

/** A top level command: its sub-commands are registered by the builder */
export interface CommandDefinition {
  command: string;
  describe: string;
  builder: (yargs: AnyYargs) => AnyYargs;
}

export type ConfigBuilder<C, T> = (argv: ArgvStruct, context_: T, task: DeckhandListrTaskWrapper<T>) => Promise<C>;
