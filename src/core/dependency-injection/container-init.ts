// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type DeckhandLogger} from '../logging/deckhand-logger.js';
import {DeckhandWinstonLogger} from '../logging/deckhand-winston-logger.js';
import * as constants from '../constants.js';
import {ConfigManager} from '../config-manager.js';
import {InjectTokens} from './inject-tokens.js';
import {K8ClientFactory} from '../../integration/kube/k8-client/k8-client-factory.js';
import {ManifestLoader} from '../manifest/manifest-loader.js';
import {DependencyOrderer} from '../ordering/dependency-orderer.js';
import {ApplyDriver} from '../apply/apply-driver.js';
import {StatusPoller} from '../status/status-poller.js';
import {DeployCommandHandlers} from '../../commands/deploy/handlers.js';
import {DeployCommandTasks} from '../../commands/deploy/tasks.js';
import {DeployCommandConfigs} from '../../commands/deploy/configs.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {PathEx} from '../../business/utils/path-ex.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.DECKHAND_HOME_DIR
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    homeDirectory: string = constants.DECKHAND_HOME_DIR,
    logLevel: string = 'debug',
    developmentMode: boolean = false,
    testLogger?: DeckhandLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<DeckhandLogger>(InjectTokens.DeckhandLogger).debug('Container already initialized');
      return;
    }

    // DeckhandLogger
    container.register(InjectTokens.HomeDirectory, {useValue: homeDirectory});
    container.register(InjectTokens.LogsDirectory, {useValue: PathEx.join(homeDirectory, 'logs')});
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    if (testLogger) {
      container.registerInstance(InjectTokens.DeckhandLogger, testLogger);
      container.resolve<DeckhandLogger>(InjectTokens.DeckhandLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.DeckhandLogger,
        {useClass: DeckhandWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<DeckhandLogger>(InjectTokens.DeckhandLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ConfigManager, {useClass: ConfigManager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.K8Factory, {useClass: K8ClientFactory}, {lifecycle: Lifecycle.Singleton});

    // Deploy engine
    container.register(InjectTokens.ManifestLoader, {useClass: ManifestLoader}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.DependencyOrderer,
      {useClass: DependencyOrderer},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.ApplyDriver, {useClass: ApplyDriver}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.StatusPoller, {useClass: StatusPoller}, {lifecycle: Lifecycle.Singleton});

    container.resolve<DeckhandLogger>(InjectTokens.DeckhandLogger).debug('Container initialized');
    Container.isInitialized = true;

    // Commands
    container.register(
      InjectTokens.DeployCommandHandlers,
      {useClass: DeployCommandHandlers},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.DeployCommandTasks,
      {useClass: DeployCommandTasks},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.DeployCommandConfigs,
      {useClass: DeployCommandConfigs},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Middlewares, {useClass: Middlewares}, {lifecycle: Lifecycle.Singleton});
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - the home directory to use, defaults to constants.DECKHAND_HOME_DIR
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(homeDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: DeckhandLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<DeckhandLogger>(InjectTokens.DeckhandLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
