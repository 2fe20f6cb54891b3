// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../../core/constants.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {CommandHandler} from '../../core/command-handler.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type DeckhandLogger} from '../../core/logging/deckhand-logger.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type DeployCommandTasks} from './tasks.js';
import {type DeployCommandConfigs} from './configs.js';
import {createDeployContext, type DeployContext} from './config-interfaces/deploy-context.js';

@injectable()
export class DeployCommandHandlers extends CommandHandler {
  public constructor(
    @inject(InjectTokens.DeployCommandTasks) private readonly tasks: DeployCommandTasks,
    @inject(InjectTokens.DeployCommandConfigs) private readonly configs: DeployCommandConfigs,
    @inject(InjectTokens.DeckhandLogger) logger: DeckhandLogger,
  ) {
    super(logger);

    this.tasks = patchInject(tasks, InjectTokens.DeployCommandTasks, this.constructor.name);
    this.configs = patchInject(configs, InjectTokens.DeployCommandConfigs, this.constructor.name);
  }

  /**
   * - Load and order the manifests.
   * - Print the apply order, and with --diff what would change in the cluster.
   */
  public async plan(argv: ArgvStruct): Promise<DeployContext> {
    return this.commandAction(
      createDeployContext(),
      [
        this.tasks.initialize(argv, this.configs.deployConfigBuilder.bind(this.configs)),
        this.tasks.loadManifests(),
        this.tasks.orderManifests(),
        this.tasks.showPlan(),
        this.tasks.showDiff(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'deploy plan',
    );
  }

  /**
   * - Load and order the manifests.
   * - Create or replace every manifest in order.
   * - Wait until the applied resources are ready.
   */
  public async apply(argv: ArgvStruct): Promise<DeployContext> {
    return this.commandAction(
      createDeployContext(),
      [
        this.tasks.initialize(argv, this.configs.deployConfigBuilder.bind(this.configs)),
        this.setupHomeDirectoryTask<DeployContext>(),
        this.tasks.loadManifests(),
        this.tasks.orderManifests(),
        this.tasks.applyManifests(),
        this.tasks.waitForReadiness(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'deploy apply',
    );
  }

  public async status(argv: ArgvStruct): Promise<DeployContext> {
    return this.commandAction(
      createDeployContext(),
      [
        this.tasks.initialize(argv, this.configs.deployConfigBuilder.bind(this.configs)),
        this.tasks.loadManifests(),
        this.tasks.orderManifests(),
        this.tasks.showStatus(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'deploy status',
    );
  }

  /**
   * - Load and order the manifests.
   * - Ask for confirmation unless --force or --quiet is set.
   * - Delete the manifests in reverse order.
   */
  public async destroy(argv: ArgvStruct): Promise<DeployContext> {
    return this.commandAction(
      createDeployContext(),
      [
        this.tasks.initialize(argv, this.configs.deployConfigBuilder.bind(this.configs)),
        this.setupHomeDirectoryTask<DeployContext>(),
        this.tasks.loadManifests(),
        this.tasks.orderManifests(),
        this.tasks.confirmDestroy(),
        this.tasks.deleteManifests(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'deploy destroy',
    );
  }
}
