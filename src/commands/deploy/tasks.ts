// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type DeckhandLogger} from '../../core/logging/deckhand-logger.js';
import {type ManifestLoader} from '../../core/manifest/manifest-loader.js';
import {type DependencyOrderer} from '../../core/ordering/dependency-orderer.js';
import {type ApplyDriver} from '../../core/apply/apply-driver.js';
import {type StatusPoller} from '../../core/status/status-poller.js';
import {type ApplyPlan, type PlanEntry} from '../../core/ordering/apply-plan.js';
import {
  ApplyAction,
  type ApplyResult,
  DeleteAction,
  type DeleteResult,
  type DiffResult,
} from '../../core/apply/apply-result.js';
import {ReadinessState, type ResourceStatus} from '../../core/status/resource-status.js';
import {DeckhandError} from '../../core/errors/deckhand-error.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {UserBreak} from '../../core/errors/user-break.js';
import {Flags as flags} from '../flags.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type ConfigBuilder, type DeckhandListrTask} from '../../types/index.js';
import {type DeployConfigClass} from './config-interfaces/deploy-config-class.js';
import {type DeployContext} from './config-interfaces/deploy-context.js';

const DRY_RUN_SUFFIX = ' (dry run)';

@injectable()
export class DeployCommandTasks {
  public constructor(
    @inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger,
    @inject(InjectTokens.ManifestLoader) private readonly manifestLoader: ManifestLoader,
    @inject(InjectTokens.DependencyOrderer) private readonly dependencyOrderer: DependencyOrderer,
    @inject(InjectTokens.ApplyDriver) private readonly applyDriver: ApplyDriver,
    @inject(InjectTokens.StatusPoller) private readonly statusPoller: StatusPoller,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
    this.manifestLoader = patchInject(manifestLoader, InjectTokens.ManifestLoader, this.constructor.name);
    this.dependencyOrderer = patchInject(dependencyOrderer, InjectTokens.DependencyOrderer, this.constructor.name);
    this.applyDriver = patchInject(applyDriver, InjectTokens.ApplyDriver, this.constructor.name);
    this.statusPoller = patchInject(statusPoller, InjectTokens.StatusPoller, this.constructor.name);
  }

  public initialize(
    argv: ArgvStruct,
    configInit: ConfigBuilder<DeployConfigClass, DeployContext>,
  ): DeckhandListrTask<DeployContext> {
    return {
      title: 'Initialize',
      task: async (context_, task) => {
        context_.config = await configInit(argv, context_, task);
      },
    };
  }

  public loadManifests(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Load manifests',
      task: async (context_, task) => {
        const config = DeployCommandTasks.configOf(context_);
        context_.manifests = [
          ...this.manifestLoader.load(config.manifestDirectory, {
            recursive: config.recursive,
            defaultNamespace: config.namespace,
          }),
        ];
        task.title = `Load manifests: ${context_.manifests.length} loaded from ${config.manifestDirectory}`;
      },
    };
  }

  public orderManifests(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Order manifests',
      task: async (context_, task) => {
        const config = DeployCommandTasks.configOf(context_);
        context_.plan = this.dependencyOrderer.order(context_.manifests, {strict: config.strict});

        const externalReferences = context_.plan.entries.reduce(
          (count, entry) => count + entry.externalReferences.length,
          0,
        );
        task.title = `Order manifests: ${context_.plan.entries.length} in plan, ${externalReferences} external references`;
      },
    };
  }

  public showPlan(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Show apply order',
      task: async context_ => {
        const plan = DeployCommandTasks.planOf(context_);
        this.logger.showList('Apply order', DeployCommandTasks.describePlan(plan));
      },
    };
  }

  public showDiff(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Compare with the cluster',
      skip: context_ => !DeployCommandTasks.configOf(context_).diff,
      task: async context_ => {
        const config = DeployCommandTasks.configOf(context_);
        context_.diffResults = await this.applyDriver.diff(DeployCommandTasks.planOf(context_), {
          context: config.context,
        });
        this.logger.showList(
          'Changes',
          context_.diffResults.map(result => DeployCommandTasks.describeDiffResult(result)),
        );
      },
    };
  }

  public applyManifests(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Apply manifests',
      task: async (context_, task) => {
        const config = DeployCommandTasks.configOf(context_);
        const plan = DeployCommandTasks.planOf(context_);
        let handled = 0;

        context_.applyResults = await this.applyDriver.apply(plan, {
          context: config.context,
          dryRun: config.dryRun,
          continueOnError: config.continueOnError,
          onResult: result => {
            handled += 1;
            task.title = `Apply manifests: ${handled}/${plan.entries.length}`;
            task.output = DeployCommandTasks.describeApplyResult(result);
          },
        });
        task.title = `Apply manifests${config.dryRun ? DRY_RUN_SUFFIX : ''}`;

        this.logger.showList(
          'Apply results',
          context_.applyResults.map(result => DeployCommandTasks.describeApplyResult(result)),
        );

        DeployCommandTasks.throwOnFailures(
          'apply',
          context_.applyResults.filter(result => result.action === ApplyAction.FAILED),
          context_.applyResults.length,
        );
      },
    };
  }

  public waitForReadiness(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Wait for readiness',
      skip: context_ => {
        const config = DeployCommandTasks.configOf(context_);
        return !config.wait || config.dryRun;
      },
      task: async (context_, task) => {
        const config = DeployCommandTasks.configOf(context_);
        const plan = DeployCommandTasks.planOf(context_);

        context_.statuses = await this.statusPoller.waitForReady(plan, {
          context: config.context,
          maxAttempts: config.maxAttempts,
          delay: config.pollInterval,
          onProgress: (statuses, attempt) => {
            const ready = statuses.filter(status => status.state === ReadinessState.READY).length;
            task.title = `Wait for readiness: ${ready}/${statuses.length} ready, attempt ${attempt}/${config.maxAttempts}`;
          },
        });
        task.title = `Wait for readiness: ${context_.statuses.length} resources ready`;
      },
    };
  }

  public showStatus(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Read resource status',
      task: async context_ => {
        const config = DeployCommandTasks.configOf(context_);
        context_.statuses = await this.statusPoller.snapshot(DeployCommandTasks.planOf(context_), {
          context: config.context,
        });
        this.logger.showList(
          'Resource status',
          context_.statuses.map(status => DeployCommandTasks.describeStatus(status)),
        );
      },
    };
  }

  public confirmDestroy(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Confirm deletion',
      skip: context_ => {
        const config = DeployCommandTasks.configOf(context_);
        return config.force || config.quiet;
      },
      task: async (context_, task) => {
        const plan = DeployCommandTasks.planOf(context_);
        const confirmResult = await flags.force.prompt(
          task,
          `Are you sure you would like to delete ${plan.entries.length} resources?`,
        );

        if (!confirmResult) {
          throw new UserBreak('Aborted application by user prompt');
        }
      },
    };
  }

  public deleteManifests(): DeckhandListrTask<DeployContext> {
    return {
      title: 'Delete manifests',
      task: async (context_, task) => {
        const config = DeployCommandTasks.configOf(context_);
        const plan = DeployCommandTasks.planOf(context_);

        context_.deleteResults = await this.applyDriver.delete(plan, {
          context: config.context,
          dryRun: config.dryRun,
          continueOnError: config.continueOnError,
          includeNamespaces: config.includeNamespaces,
          onResult: result => {
            task.output = DeployCommandTasks.describeDeleteResult(result);
          },
        });
        task.title = `Delete manifests${config.dryRun ? DRY_RUN_SUFFIX : ''}`;

        this.logger.showList(
          'Delete results',
          context_.deleteResults.map(result => DeployCommandTasks.describeDeleteResult(result)),
        );

        DeployCommandTasks.throwOnFailures(
          'delete',
          context_.deleteResults.filter(result => result.action === DeleteAction.FAILED),
          context_.deleteResults.length,
        );
      },
    };
  }

  /** One line per plan entry: key, dependencies and external references */
  public static describePlan(plan: ApplyPlan): string[] {
    return plan.entries.map((entry, index) => `${index + 1}. ${DeployCommandTasks.describePlanEntry(entry)}`);
  }

  public static describePlanEntry(entry: PlanEntry): string {
    let line = entry.manifest.key.toString();
    if (entry.dependencies.length > 0) {
      line += ` after ${entry.dependencies.join(', ')}`;
    }
    if (entry.externalReferences.length > 0) {
      line += ` (external: ${entry.externalReferences.join(', ')})`;
    }
    return line;
  }

  public static describeDiffResult(result: DiffResult): string {
    return `${result.key}: ${result.action}`;
  }

  public static describeApplyResult(result: ApplyResult): string {
    const suffix = result.dryRun ? DRY_RUN_SUFFIX : '';
    if (result.error) {
      return `${result.key}: ${result.action}${suffix}, ${result.error.message}`;
    }
    return `${result.key}: ${result.action}${suffix}`;
  }

  public static describeDeleteResult(result: DeleteResult): string {
    const suffix = result.dryRun ? DRY_RUN_SUFFIX : '';
    if (result.error) {
      return `${result.key}: ${result.action}${suffix}, ${result.error.message}`;
    }
    return `${result.key}: ${result.action}${suffix}`;
  }

  public static describeStatus(status: ResourceStatus): string {
    return `${status.key}: ${status.state} (${status.reason})`;
  }

  private static throwOnFailures(operation: string, failures: {error?: Error}[], total: number): void {
    if (failures.length === 0) {
      return;
    }
    throw new DeckhandError(`${failures.length} of ${total} manifests failed to ${operation}`, failures[0].error);
  }

  private static configOf(context_: DeployContext): DeployConfigClass {
    if (!context_.config) {
      throw new MissingArgumentError('deploy config is not initialized');
    }
    return context_.config;
  }

  private static planOf(context_: DeployContext): ApplyPlan {
    if (!context_.plan) {
      throw new MissingArgumentError('apply plan is not available, manifests were not ordered');
    }
    return context_.plan;
  }
}
