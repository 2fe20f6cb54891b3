// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {CustomProcessOutput} from './core/process-output.js';
import {type DeckhandLogger} from './core/logging/deckhand-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type Middlewares} from './core/middlewares.js';
import {DeckhandError} from './core/errors/deckhand-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getDeckhandVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: DeckhandLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error initializing container: ${message}`, error);
    throw new DeckhandError('Error initializing container', error);
  }

  const logger = container.resolve<DeckhandLogger>(InjectTokens.DeckhandLogger);

  if (context) {
    // save the logger so that deckhand.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }
  process.on('unhandledRejection', reason => {
    logger.showUserError(new DeckhandError(`Unhandled Rejection, reason: ${String(reason)}`, reason));
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new DeckhandError(`Uncaught Exception: ${error.message}, origin: ${origin}`, error));
  });

  logger.debug('Initializing Deckhand CLI');
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new CustomProcessOutput(logger)});
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n******************************* Deckhand *****************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getDeckhandVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('')
    .usage('Usage:\n  deckhand <command> [options]')
    .alias('h', 'help')
    .version(false)
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [middlewares.setLoggerDevFlag(), middlewares.processArgumentsAndDisplayHeader()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  for (const definition of commands.Initialize({logger})) {
    rootCmd.command(definition.command, definition.describe, definition.builder);
  }

  rootCmd.fail((message, error) => {
    if (error) {
      throw error;
    }
    if (message.includes('Unknown argument')) {
      logger.showUser(message);
      rootCmd.showHelp();
    } else {
      logger.showUserError(new DeckhandError(`Error running Deckhand CLI, failure occurred: ${message}`));
    }
    rootCmd.exit(1, new DeckhandError(message));
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setOptionalCommandFlags(rootCmd, flags.devMode);
  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
