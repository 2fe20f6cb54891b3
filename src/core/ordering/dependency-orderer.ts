// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeckhandLogger} from '../logging/deckhand-logger.js';
import {DependencyCycleError} from '../errors/dependency-cycle-error.js';
import {UnresolvedReferenceError} from '../errors/unresolved-reference-error.js';
import {ManifestLoadError} from '../errors/manifest-load-error.js';
import {DEPENDS_ON_ANNOTATION} from '../constants.js';
import {splitFlagInput} from '../helpers.js';
import {ResourceType} from '../../integration/kube/resources/resource-type.js';
import {KubeObjects} from '../../integration/kube/resources/object/kube-object.js';
import {type Manifest, type ManifestSet, describeSource} from '../manifest/manifest.js';
import {ResourceKey} from '../manifest/resource-key.js';
import {ReferenceExtractor} from './reference-extractor.js';
import {kindRank} from './kind-precedence.js';
import {type ApplyPlan, type PlanEntry} from './apply-plan.js';

export interface OrderOptions {
  /** fail on references to resources outside the manifest set instead of warning */
  strict?: boolean;
}

interface GraphNode {
  readonly index: number;
  readonly manifest: Manifest;
  readonly rank: number;
  /** indices of the nodes this node depends on, in discovery order */
  readonly dependencies: number[];
  readonly externalReferences: ResourceKey[];
  /** external references the workload can start without */
  readonly optionalExternalReferences: ResourceKey[];
}

/**
 * Orders manifests so that namespaces, secrets, configuration and claims are applied before the workloads that
 * consume them.
 */
@injectable()
export class DependencyOrderer {
  public constructor(@inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger) {
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  /**
   * Builds the apply plan of a manifest set.
   *
   * Among manifests whose dependencies are all placed, the one with the lower kind rank goes first, then the one
   * loaded first.
   *
   * @throws DependencyCycleError if the dependencies form a cycle
   * @throws UnresolvedReferenceError in strict mode, if a manifest refers to a resource outside the set
   */
  public order(manifests: ManifestSet, options: OrderOptions = {}): ApplyPlan {
    const nodes = this.buildGraph(manifests);
    this.checkExternalReferences(nodes, options.strict ?? false);

    const placed = new Set<number>();
    const entries: PlanEntry[] = [];
    while (entries.length < nodes.length) {
      const next = DependencyOrderer.nextReady(nodes, placed);
      if (!next) {
        throw new DependencyCycleError(DependencyOrderer.findCycle(nodes, placed));
      }

      placed.add(next.index);
      entries.push({
        manifest: next.manifest,
        dependencies: next.dependencies.map(index => nodes[index].manifest.key),
        externalReferences: [...next.externalReferences, ...next.optionalExternalReferences],
      });
    }

    this.logger.debug(`apply order: ${entries.map(entry => entry.manifest.key.toString()).join(', ')}`);
    return {entries};
  }

  /** The deletion order of a plan */
  public reverse(plan: ApplyPlan): ApplyPlan {
    return {entries: [...plan.entries].reverse()};
  }

  private buildGraph(manifests: ManifestSet): GraphNode[] {
    const indexByKey = new Map<string, number>();
    manifests.forEach((manifest, index) => indexByKey.set(manifest.key.toString(), index));
    const crdIndexByResource = DependencyOrderer.indexCustomResourceDefinitions(manifests);

    return manifests.map((manifest, index): GraphNode => {
      const node: GraphNode = {
        index,
        manifest,
        rank: kindRank(manifest.key.kind),
        dependencies: [],
        externalReferences: [],
        optionalExternalReferences: [],
      };

      const addDependency = (dependency: number): void => {
        if (!node.dependencies.includes(dependency)) {
          node.dependencies.push(dependency);
        }
      };
      const addReference = (key: ResourceKey, optional: boolean): void => {
        const dependency = indexByKey.get(key.toString());
        if (dependency !== undefined) {
          addDependency(dependency);
        } else if (optional) {
          node.optionalExternalReferences.push(key);
        } else {
          node.externalReferences.push(key);
        }
      };

      const namespace = manifest.key.namespace;
      if (namespace) {
        const namespaceIndex = indexByKey.get(ResourceKey.of(ResourceType.NAMESPACE, namespace.name).toString());
        if (namespaceIndex !== undefined) {
          addDependency(namespaceIndex);
        }
      }

      const crdIndex = crdIndexByResource.get(DependencyOrderer.customResourceId(manifest));
      if (crdIndex !== undefined && crdIndex !== index) {
        addDependency(crdIndex);
      }

      for (const reference of ReferenceExtractor.extract(manifest)) {
        addReference(reference.key, reference.optional);
      }

      for (const key of DependencyOrderer.declaredDependencies(manifest)) {
        addReference(key, false);
      }

      return node;
    });
  }

  /** keys named by the depends-on annotation */
  private static declaredDependencies(manifest: Manifest): ResourceKey[] {
    const annotation = manifest.object.metadata.annotations?.[DEPENDS_ON_ANNOTATION];
    if (!annotation) {
      return [];
    }

    return splitFlagInput(annotation).map(entry => {
      try {
        return ResourceKey.parse(entry, manifest.key.namespace);
      } catch (error) {
        throw new ManifestLoadError(
          `${manifest.key} has an invalid ${DEPENDS_ON_ANNOTATION} entry '${entry}'`,
          describeSource(manifest),
          error,
        );
      }
    });
  }

  /** `group/Kind` of every CRD in the set, mapped to its index */
  private static indexCustomResourceDefinitions(manifests: ManifestSet): Map<string, number> {
    const index = new Map<string, number>();
    manifests.forEach((manifest, position) => {
      if (manifest.key.kind !== ResourceType.CUSTOM_RESOURCE_DEFINITION) {
        return;
      }
      const group = KubeObjects.stringField(manifest.object, 'spec', 'group');
      const kind = KubeObjects.stringField(manifest.object, 'spec', 'names', 'kind');
      if (group && kind) {
        index.set(`${group}/${kind}`, position);
      }
    });
    return index;
  }

  private static customResourceId(manifest: Manifest): string {
    const separator = manifest.object.apiVersion.lastIndexOf('/');
    const group = separator > 0 ? manifest.object.apiVersion.slice(0, separator) : '';
    return `${group}/${manifest.key.kind}`;
  }

  private checkExternalReferences(nodes: GraphNode[], strict: boolean): void {
    const unresolved: string[] = [];
    for (const node of nodes) {
      for (const reference of node.externalReferences) {
        unresolved.push(`${node.manifest.key} -> ${reference}`);
      }
    }
    if (unresolved.length === 0) {
      return;
    }

    if (strict) {
      throw new UnresolvedReferenceError(unresolved);
    }
    for (const reference of unresolved) {
      this.logger.warn(`${reference} is not part of the manifest set and must already exist in the cluster`);
    }
  }

  private static nextReady(nodes: GraphNode[], placed: Set<number>): GraphNode | undefined {
    let best: GraphNode | undefined;
    for (const node of nodes) {
      if (placed.has(node.index) || !node.dependencies.every(dependency => placed.has(dependency))) {
        continue;
      }
      // nodes are visited in load order, so only a strictly lower rank replaces the current best
      if (!best || node.rank < best.rank) {
        best = node;
      }
    }
    return best;
  }

  /**
   * Every node left unplaced has an unplaced dependency, so following first unplaced dependencies from any of them
   * must revisit a node.
   */
  private static findCycle(nodes: GraphNode[], placed: Set<number>): string[] {
    const start = nodes.find(node => !placed.has(node.index));
    if (!start) {
      return [];
    }

    const path: number[] = [];
    let current: GraphNode = start;
    while (!path.includes(current.index)) {
      path.push(current.index);
      const next = current.dependencies.find(dependency => !placed.has(dependency));
      if (next === undefined) {
        return [];
      }
      current = nodes[next];
    }

    const cycle = path.slice(path.indexOf(current.index));
    return [...cycle, current.index].map(index => nodes[index].manifest.key.toString());
  }
}
