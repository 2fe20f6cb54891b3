// SPDX-License-Identifier: Apache-2.0

import {DeployCommand} from './deploy/index.js';
import {type Options} from './base.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @param options it is an Options object containing logger
 * @returns an array of Yargs command builder
 */
export function Initialize(options: Options): CommandDefinition[] {
  return [new DeployCommand(options).getCommandDefinition()];
}
