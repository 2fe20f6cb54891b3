// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {Flags as commandFlags} from '../commands/flags.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {DeckhandError} from './errors/deckhand-error.js';
import {type DeckhandLogger} from './logging/deckhand-logger.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';

export type CommandAction = (argv: ArgvStruct) => Promise<boolean>;

export interface YargsCommandOptions {
  command: string;
  description: string;
  /** name of the parent command, used in log and error messages */
  commandNamespace: string;
  logger: DeckhandLogger;
  handler: CommandAction;
}

/**
 * A yargs sub-command that registers its flags and runs one handler.
 */
export class YargsCommand implements CommandModule<object, object> {
  public readonly command: string;
  public readonly describe: string;

  private readonly commandNamespace: string;
  private readonly logger: DeckhandLogger;
  private readonly action: CommandAction;
  private readonly flags: CommandFlags;

  public constructor(options: YargsCommandOptions, flags: CommandFlags) {
    const {command, description, commandNamespace, logger, handler} = options;

    if (!command) {
      throw new IllegalArgumentError("A string is required as the 'command' property", command);
    }
    if (!description) {
      throw new IllegalArgumentError("A string is required as the 'description' property", description);
    }
    if (!flags.required) {
      throw new IllegalArgumentError("An array of CommandFlag is required as the 'required' property", flags.required);
    }
    if (!flags.optional) {
      throw new IllegalArgumentError("An array of CommandFlag is required as the 'optional' property", flags.optional);
    }

    this.command = command;
    this.describe = description;
    this.commandNamespace = commandNamespace;
    this.logger = logger;
    this.action = handler;
    this.flags = flags;
  }

  public builder = (y: AnyYargs): AnyYargs => {
    commandFlags.setRequiredCommandFlags(y, ...this.flags.required);
    commandFlags.setOptionalCommandFlags(y, ...this.flags.optional);
    return y;
  };

  public handler = async (argv: ArgvStruct): Promise<void> => {
    const fullCommand = `${this.commandNamespace} ${this.command}`;
    this.logger.info(`==== Running '${fullCommand}' ===`);
    this.logger.info(commandFlags.stringifyArgv(argv));

    let succeeded: boolean;
    try {
      succeeded = await this.action(argv);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeckhandError(`${fullCommand} failed: ${message}`, error);
    }

    this.logger.info(`==== Finished running '${fullCommand}' ====`);
    if (!succeeded) {
      throw new DeckhandError(`${fullCommand} failed, expected returned value to be true`);
    }
  };
}
