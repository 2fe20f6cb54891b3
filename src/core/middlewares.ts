// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type ConfigManager} from './config-manager.js';
import {type K8Factory} from '../integration/kube/k8-factory.js';
import {type DeckhandLogger} from './logging/deckhand-logger.js';
import {type ArgvStruct} from '../types/aliases.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';

/** shown in the header when no kubeconfig context can be read; commands that reach the cluster fail later */
export const NO_CONTEXT = '<none>';

@injectable()
export class Middlewares {
  public constructor(
    @inject(InjectTokens.ConfigManager) private readonly configManager: ConfigManager,
    @inject(InjectTokens.K8Factory) private readonly k8Factory: K8Factory,
    @inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.k8Factory = patchInject(k8Factory, InjectTokens.K8Factory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  /** The kubeconfig's current context, or a placeholder when no kubeconfig is usable */
  private static currentContext(k8Factory: K8Factory, logger: DeckhandLogger): string {
    try {
      return k8Factory.default().contexts().readCurrent();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Unable to read the current kubernetes context: ${message}`);
      return NO_CONTEXT;
    }
  }

  public setLoggerDevFlag(): (argv: ArgvStruct) => void {
    const logger = this.logger;

    return (argv: ArgvStruct): void => {
      if (argv[flags.devMode.name] === true) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }
    };
  }

  /**
   * Processes the Argv and display the command header
   *
   * @returns callback function to be executed from yargs
   */
  public processArgumentsAndDisplayHeader(): (argv: ArgvStruct) => void {
    const k8Factory = this.k8Factory;
    const configManager = this.configManager;
    const logger = this.logger;

    return (argv: ArgvStruct): void => {
      logger.debug('Processing arguments and displaying header');

      configManager.reset();
      configManager.update(argv);

      const contextName = configManager.getStringFlag(flags.context) || Middlewares.currentContext(k8Factory, logger);

      // Build data to be displayed
      const currentCommand: string = argv._.join(' ');
      const commandArguments: string = flags.stringifyArgv(argv);
      const commandData: string = (currentCommand + ' ' + commandArguments).trim();

      // Display command header
      logger.showUser(
        chalk.cyan('\n******************************* Deckhand *****************************************'),
      );
      logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(configManager.getVersion()));
      logger.showUser(chalk.cyan('Kubernetes Context\t:'), chalk.yellow(contextName));
      logger.showUser(chalk.cyan('Current Command\t\t:'), chalk.yellow(commandData));
      const namespace = configManager.getNamespaceFlag(flags.namespace);
      if (namespace) {
        logger.showUser(chalk.cyan('Default Namespace\t:'), chalk.yellow(namespace.name));
      }
      logger.showUser(chalk.cyan('**********************************************************************************'));
    };
  }
}
