// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../flags.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ConfigManager} from '../../core/config-manager.js';
import {type DeckhandLogger} from '../../core/logging/deckhand-logger.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {Duration} from '../../core/time/duration.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type DeployConfigClass} from './config-interfaces/deploy-config-class.js';
import {type DeployContext} from './config-interfaces/deploy-context.js';

@injectable()
export class DeployCommandConfigs {
  public constructor(
    @inject(InjectTokens.ConfigManager) private readonly configManager: ConfigManager,
    @inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  public async deployConfigBuilder(argv: ArgvStruct, context_: DeployContext): Promise<DeployConfigClass> {
    this.configManager.update(argv);

    const manifestDirectory = this.configManager.getStringFlag(flags.manifestDirectory);
    if (!manifestDirectory) {
      throw new MissingArgumentError(`--${flags.manifestDirectory.name} is required`);
    }

    const maxAttempts = this.configManager.getNumberFlag(flags.maxAttempts) ?? constants.POLL_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new IllegalArgumentError(`--${flags.maxAttempts.name} must be a positive integer`, maxAttempts);
    }

    const pollInterval = this.configManager.getNumberFlag(flags.pollInterval) ?? constants.POLL_DELAY;
    if (!Number.isInteger(pollInterval) || pollInterval < 0) {
      throw new IllegalArgumentError(`--${flags.pollInterval.name} must not be negative`, pollInterval);
    }

    context_.config = {
      manifestDirectory,
      namespace: this.configManager.getNamespaceFlag(flags.namespace) ?? constants.DEFAULT_NAMESPACE,
      context: this.configManager.getStringFlag(flags.context) || undefined,
      recursive: this.configManager.getBooleanFlag(flags.recursive),
      strict: this.configManager.getBooleanFlag(flags.strict),
      diff: this.configManager.getBooleanFlag(flags.diff),
      dryRun: this.configManager.getBooleanFlag(flags.dryRun),
      continueOnError: this.configManager.getBooleanFlag(flags.continueOnError),
      // wait is on unless turned off
      wait: this.configManager.getFlag(flags.wait) !== false,
      maxAttempts,
      pollInterval: Duration.ofMillis(pollInterval),
      includeNamespaces: this.configManager.getBooleanFlag(flags.includeNamespaces),
      force: this.configManager.getBooleanFlag(flags.force),
      quiet: this.configManager.getBooleanFlag(flags.quiet),
    };

    this.logger.debug(`deploy config: directory=${manifestDirectory}, namespace=${context_.config.namespace.name}`);

    return context_.config;
  }
}
