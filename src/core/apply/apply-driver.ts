// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeckhandLogger} from '../logging/deckhand-logger.js';
import {DeckhandError} from '../errors/deckhand-error.js';
import {APPLIED_HASH_ANNOTATION, MANAGED_BY_LABEL, MANAGED_BY_VALUE} from '../constants.js';
import {type K8Factory} from '../../integration/kube/k8-factory.js';
import {type K8} from '../../integration/kube/k8.js';
import {type KubeObject, KubeObjects} from '../../integration/kube/resources/object/kube-object.js';
import {ResourceType} from '../../integration/kube/resources/resource-type.js';
import {type NamespaceName} from '../../integration/kube/resources/namespace/namespace-name.js';
import {type Manifest, toObjectReference} from '../manifest/manifest.js';
import {type ApplyPlan} from '../ordering/apply-plan.js';
import {appliedHash} from './applied-hash.js';
import {
  ApplyAction,
  type ApplyResult,
  DeleteAction,
  type DeleteResult,
  type DiffAction,
  type DiffResult,
} from './apply-result.js';

export interface ClusterOptions {
  /** kubeconfig context, the current context when omitted */
  context?: string;
}

export interface ApplyOptions extends ClusterOptions {
  dryRun?: boolean;
  continueOnError?: boolean;
  /** called after each manifest is handled */
  onResult?: (result: ApplyResult) => void;
}

export interface DeleteOptions extends ClusterOptions {
  dryRun?: boolean;
  continueOnError?: boolean;
  includeNamespaces?: boolean;
  onResult?: (result: DeleteResult) => void;
}

/** Fields the API server assigns that a replace must carry over from the live object */
const SERVER_ASSIGNED_FIELDS: Readonly<Record<string, readonly (readonly string[])[]>> = {
  [ResourceType.SERVICE]: [
    ['spec', 'clusterIP'],
    ['spec', 'clusterIPs'],
  ],
  [ResourceType.PERSISTENT_VOLUME_CLAIM]: [['spec', 'volumeName']],
};

interface ApplyRun {
  readonly k8: K8;
  readonly dryRun: boolean;
  /** namespaces of the plan, created by their own manifests */
  readonly plannedNamespaces: ReadonlySet<string>;
  /** namespaces known to exist, or in a dry run, known to be created */
  readonly ensuredNamespaces: Set<string>;
  /** dry run only: namespaces that do not exist yet, so nothing in them can be checked by the server */
  readonly absentNamespaces: Set<string>;
}

/**
 * Creates or replaces the manifests of a plan, one at a time in plan order.
 *
 * Every written object carries the digest of its manifest in the applied-hash annotation; a live object with the
 * same digest is left untouched.
 */
@injectable()
export class ApplyDriver {
  public constructor(
    @inject(InjectTokens.K8Factory) private readonly k8Factory: K8Factory,
    @inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger,
  ) {
    this.k8Factory = patchInject(k8Factory, InjectTokens.K8Factory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  public async apply(plan: ApplyPlan, options: ApplyOptions = {}): Promise<ApplyResult[]> {
    const dryRun = options.dryRun ?? false;
    const run: ApplyRun = {
      k8: this.k8(options.context),
      dryRun,
      plannedNamespaces: new Set(
        plan.entries
          .filter(entry => entry.manifest.key.kind === ResourceType.NAMESPACE)
          .map(entry => entry.manifest.key.name),
      ),
      ensuredNamespaces: new Set<string>(),
      absentNamespaces: new Set<string>(),
    };

    const results: ApplyResult[] = [];
    let stopped = false;
    for (const {manifest} of plan.entries) {
      let result: ApplyResult;
      if (stopped) {
        result = {key: manifest.key, action: ApplyAction.SKIPPED, dryRun};
      } else {
        try {
          result = await this.applyManifest(run, manifest);
        } catch (error) {
          result = {key: manifest.key, action: ApplyAction.FAILED, dryRun, error: ApplyDriver.toError(error)};
          this.logger.error(`failed to apply ${manifest.key}: ${result.error?.message}`);
          stopped = !options.continueOnError;
        }
      }

      results.push(result);
      options.onResult?.(result);
    }

    return results;
  }

  /** Deletes the manifests of a plan in reverse plan order */
  public async delete(plan: ApplyPlan, options: DeleteOptions = {}): Promise<DeleteResult[]> {
    const k8 = this.k8(options.context);
    const dryRun = options.dryRun ?? false;

    const results: DeleteResult[] = [];
    let stopped = false;
    for (const {manifest} of [...plan.entries].reverse()) {
      let result: DeleteResult;
      if (stopped) {
        result = {key: manifest.key, action: DeleteAction.SKIPPED, dryRun};
      } else if (manifest.key.kind === ResourceType.NAMESPACE && !options.includeNamespaces) {
        result = {key: manifest.key, action: DeleteAction.KEPT, dryRun};
      } else {
        try {
          const deleted = await k8.objects().delete(toObjectReference(manifest), dryRun);
          result = {key: manifest.key, action: deleted ? DeleteAction.DELETED : DeleteAction.ABSENT, dryRun};
          this.logger.info(`${manifest.key} ${result.action}${dryRun ? ' (dry run)' : ''}`);
        } catch (error) {
          result = {key: manifest.key, action: DeleteAction.FAILED, dryRun, error: ApplyDriver.toError(error)};
          this.logger.error(`failed to delete ${manifest.key}: ${result.error?.message}`);
          stopped = !options.continueOnError;
        }
      }

      results.push(result);
      options.onResult?.(result);
    }

    return results;
  }

  /** Reports what apply would do to each manifest without writing anything */
  public async diff(plan: ApplyPlan, options: ClusterOptions = {}): Promise<DiffResult[]> {
    const k8 = this.k8(options.context);
    const results: DiffResult[] = [];
    for (const {manifest} of plan.entries) {
      const live = await k8.objects().read(toObjectReference(manifest));
      results.push({key: manifest.key, action: ApplyDriver.compare(manifest, live)});
    }
    return results;
  }

  /** The applied-hash of a manifest, computed over the object as loaded */
  public static hashOf(manifest: Manifest): string {
    return appliedHash(manifest.object);
  }

  /** The object written to the cluster: the manifest plus the applied-hash annotation and managed-by label */
  public static desiredObject(manifest: Manifest): KubeObject {
    const object = structuredClone(manifest.object);
    object.metadata.annotations = {
      ...object.metadata.annotations,
      [APPLIED_HASH_ANNOTATION]: ApplyDriver.hashOf(manifest),
    };
    object.metadata.labels = {
      ...object.metadata.labels,
      [MANAGED_BY_LABEL]: MANAGED_BY_VALUE,
    };
    return object;
  }

  private static compare(manifest: Manifest, live: KubeObject | undefined): DiffAction {
    if (!live) {
      return ApplyAction.CREATED;
    }
    return live.metadata.annotations?.[APPLIED_HASH_ANNOTATION] === ApplyDriver.hashOf(manifest)
      ? ApplyAction.UNCHANGED
      : ApplyAction.CONFIGURED;
  }

  private async applyManifest(run: ApplyRun, manifest: Manifest): Promise<ApplyResult> {
    const {key} = manifest;
    const namespace = key.namespace;
    if (namespace) {
      await this.ensureNamespace(run, namespace);
    }

    let action: ApplyAction;
    if (namespace && run.absentNamespaces.has(namespace.name)) {
      // the server rejects dry run writes into a namespace that does not exist yet
      action = ApplyAction.CREATED;
    } else {
      action = await this.write(run, manifest);
    }

    if (key.kind === ResourceType.NAMESPACE) {
      run.ensuredNamespaces.add(key.name);
      if (run.dryRun && action === ApplyAction.CREATED) {
        run.absentNamespaces.add(key.name);
      }
    }

    this.logger.info(`${key} ${action}${run.dryRun ? ' (dry run)' : ''}`);
    return {key, action, dryRun: run.dryRun};
  }

  private async write(run: ApplyRun, manifest: Manifest): Promise<ApplyAction> {
    const objects = run.k8.objects();
    const live = await objects.read(toObjectReference(manifest));
    const action = ApplyDriver.compare(manifest, live);

    if (!live) {
      await objects.create(ApplyDriver.desiredObject(manifest), run.dryRun);
    } else if (action === ApplyAction.CONFIGURED) {
      const desired = ApplyDriver.desiredObject(manifest);
      ApplyDriver.carryServerAssignedFields(desired, live);
      desired.metadata.resourceVersion = live.metadata.resourceVersion;
      await objects.replace(desired, run.dryRun);
    }

    return action;
  }

  /** Creates a namespace the plan uses but does not declare */
  private async ensureNamespace(run: ApplyRun, namespace: NamespaceName): Promise<void> {
    if (run.ensuredNamespaces.has(namespace.name) || run.plannedNamespaces.has(namespace.name)) {
      return;
    }

    if (!(await run.k8.namespaces().has(namespace))) {
      await run.k8.namespaces().create(namespace, run.dryRun);
      this.logger.info(`Namespace/${namespace} created${run.dryRun ? ' (dry run)' : ''}`);
      if (run.dryRun) {
        run.absentNamespaces.add(namespace.name);
      }
    }
    run.ensuredNamespaces.add(namespace.name);
  }

  private static carryServerAssignedFields(desired: KubeObject, live: KubeObject): void {
    for (const path of SERVER_ASSIGNED_FIELDS[desired.kind] ?? []) {
      const parentPath = path.slice(0, -1);
      const field = path[path.length - 1];
      const desiredParent = KubeObjects.field(desired, ...parentPath);
      const liveValue = KubeObjects.field(live, ...path);
      if (KubeObjects.isRecord(desiredParent) && desiredParent[field] === undefined && liveValue !== undefined) {
        desiredParent[field] = liveValue;
      }
    }
  }

  private k8(context?: string): K8 {
    return context ? this.k8Factory.getK8(context) : this.k8Factory.default();
  }

  private static toError(error: unknown): Error {
    return error instanceof Error ? error : new DeckhandError(String(error));
  }
}
