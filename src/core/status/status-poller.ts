// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeckhandLogger} from '../logging/deckhand-logger.js';
import {ReadinessTimeoutError} from '../errors/readiness-timeout-error.js';
import {ResourceFailedError} from '../errors/resource-failed-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {Duration} from '../time/duration.js';
import {sleep} from '../helpers.js';
import * as constants from '../constants.js';
import {type K8Factory} from '../../integration/kube/k8-factory.js';
import {type K8} from '../../integration/kube/k8.js';
import {type KubeObject} from '../../integration/kube/resources/object/kube-object.js';
import {type Manifest, toObjectReference} from '../manifest/manifest.js';
import {type ApplyPlan} from '../ordering/apply-plan.js';
import {type ClusterOptions} from '../apply/apply-driver.js';
import {evaluateReadiness} from './readiness.js';
import {type Readiness, ReadinessState, type ResourceStatus} from './resource-status.js';

export interface WaitOptions extends ClusterOptions {
  /** number of polls before giving up */
  maxAttempts?: number;
  /** pause between polls */
  delay?: Duration;
  /** called with the statuses of every poll */
  onProgress?: (statuses: ResourceStatus[], attempt: number) => void;
}

/**
 * Polls the live objects of a plan and classifies their readiness.
 */
@injectable()
export class StatusPoller {
  public constructor(
    @inject(InjectTokens.K8Factory) private readonly k8Factory: K8Factory,
    @inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger,
  ) {
    this.k8Factory = patchInject(k8Factory, InjectTokens.K8Factory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  public evaluate(live: KubeObject): Readiness {
    return evaluateReadiness(live);
  }

  /**
   * Polls every manifest of the plan until all are ready.
   *
   * @returns the final status of every manifest, in plan order
   * @throws ResourceFailedError as soon as one resource has failed
   * @throws ReadinessTimeoutError if resources are still not ready after the last attempt
   */
  public async waitForReady(plan: ApplyPlan, options: WaitOptions = {}): Promise<ResourceStatus[]> {
    const maxAttempts = options.maxAttempts ?? constants.POLL_MAX_ATTEMPTS;
    const delay = options.delay ?? Duration.ofMillis(constants.POLL_DELAY);
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new IllegalArgumentError('maxAttempts must be a positive integer', maxAttempts);
    }

    const k8 = this.k8(options.context);
    const statuses = new Map<string, ResourceStatus>();
    let pending: Manifest[] = plan.entries.map(entry => entry.manifest);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const stillPending: Manifest[] = [];
      for (const manifest of pending) {
        const status = await this.poll(k8, manifest);
        statuses.set(manifest.key.toString(), status);

        if (status.state === ReadinessState.FAILED) {
          throw new ResourceFailedError(manifest.key.toString(), status.reason);
        }
        if (status.state !== ReadinessState.READY) {
          stillPending.push(manifest);
        }
      }
      pending = stillPending;

      const current = StatusPoller.inPlanOrder(plan, statuses);
      options.onProgress?.(current, attempt);
      this.logger.debug(`readiness attempt ${attempt}/${maxAttempts}: ${pending.length} resources pending`);

      if (pending.length === 0) {
        return current;
      }
      if (attempt < maxAttempts) {
        await sleep(delay);
      }
    }

    throw new ReadinessTimeoutError(
      pending.map(manifest => {
        const status = statuses.get(manifest.key.toString());
        return status ? `${manifest.key} (${status.reason})` : manifest.key.toString();
      }),
      maxAttempts,
    );
  }

  /** Reads every manifest's live object once */
  public async snapshot(plan: ApplyPlan, options: ClusterOptions = {}): Promise<ResourceStatus[]> {
    const k8 = this.k8(options.context);
    const statuses: ResourceStatus[] = [];
    for (const {manifest} of plan.entries) {
      const live = await k8.objects().read(toObjectReference(manifest));
      statuses.push(
        live
          ? {key: manifest.key, ...this.evaluate(live)}
          : {key: manifest.key, state: ReadinessState.MISSING, reason: 'not found'},
      );
    }
    return statuses;
  }

  /** a missing object counts as progressing, it may not have been created yet */
  private async poll(k8: K8, manifest: Manifest): Promise<ResourceStatus> {
    const live = await k8.objects().read(toObjectReference(manifest));
    if (!live) {
      return {key: manifest.key, state: ReadinessState.PROGRESSING, reason: 'not found'};
    }
    return {key: manifest.key, ...this.evaluate(live)};
  }

  private static inPlanOrder(plan: ApplyPlan, statuses: Map<string, ResourceStatus>): ResourceStatus[] {
    const ordered: ResourceStatus[] = [];
    for (const {manifest} of plan.entries) {
      const status = statuses.get(manifest.key.toString());
      if (status) {
        ordered.push(status);
      }
    }
    return ordered;
  }

  private k8(context?: string): K8 {
    return context ? this.k8Factory.getK8(context) : this.k8Factory.default();
  }
}
