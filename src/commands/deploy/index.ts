// SPDX-License-Identifier: Apache-2.0

import * as DeployFlags from './flags.js';
import {YargsCommand} from '../../core/yargs-command.js';
import {BaseCommand, type Options} from '../base.js';
import {type DeployCommandHandlers} from './handlers.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type AnyYargs, type ArgvStruct} from '../../types/aliases.js';
import {type CommandDefinition} from '../../types/index.js';
import {type CommandFlags} from '../../types/flag-types.js';

/**
 * Defines the core functionalities of 'deploy' command
 */
export class DeployCommand extends BaseCommand {
  public readonly handlers: DeployCommandHandlers;

  public constructor(options: Options) {
    super(options);

    this.handlers = patchInject<DeployCommandHandlers>(null, InjectTokens.DeployCommandHandlers, this.constructor.name);
  }

  public static readonly COMMAND_NAME = 'deploy';

  private subCommand(
    command: string,
    description: string,
    handler: (argv: ArgvStruct) => Promise<unknown>,
    flags: CommandFlags,
  ): YargsCommand {
    return new YargsCommand(
      {
        command,
        description,
        commandNamespace: DeployCommand.COMMAND_NAME,
        logger: this.logger,
        handler: async argv => {
          await handler(argv);
          return true;
        },
      },
      flags,
    );
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: DeployCommand.COMMAND_NAME,
      describe: 'Deploy a directory of manifests to a cluster',
      builder: (yargs: AnyYargs) => {
        return yargs
          .command(
            this.subCommand(
              'plan',
              'Print the order in which manifests would be applied',
              argv => this.handlers.plan(argv),
              DeployFlags.PLAN_FLAGS,
            ),
          )
          .command(
            this.subCommand(
              'apply',
              'Apply manifests in dependency order and wait until they are ready',
              argv => this.handlers.apply(argv),
              DeployFlags.APPLY_FLAGS,
            ),
          )
          .command(
            this.subCommand(
              'status',
              'Print the readiness of every manifest',
              argv => this.handlers.status(argv),
              DeployFlags.STATUS_FLAGS,
            ),
          )
          .command(
            this.subCommand(
              'destroy',
              'Delete manifests in reverse dependency order',
              argv => this.handlers.destroy(argv),
              DeployFlags.DESTROY_FLAGS,
            ),
          )
          .demandCommand(1, 'Select a deploy command');
      },
    };
  }
}
