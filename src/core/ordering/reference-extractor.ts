// SPDX-License-Identifier: Apache-2.0

import {ResourceType} from '../../integration/kube/resources/resource-type.js';
import {KubeObjects} from '../../integration/kube/resources/object/kube-object.js';
import {type Manifest} from '../manifest/manifest.js';
import {ResourceKey} from '../manifest/resource-key.js';

/** A reference from a pod template to another resource */
export interface PodReference {
  readonly key: ResourceKey;
  /** the field that makes the reference, e.g. `envFrom.secretRef` */
  readonly via: string;
  /** the pod starts without the referenced resource */
  readonly optional: boolean;
}

// path to the pod spec of each workload kind
const POD_SPEC_PATHS: Readonly<Record<string, readonly string[]>> = {
  [ResourceType.POD]: ['spec'],
  [ResourceType.DEPLOYMENT]: ['spec', 'template', 'spec'],
  [ResourceType.STATEFUL_SET]: ['spec', 'template', 'spec'],
  [ResourceType.DAEMON_SET]: ['spec', 'template', 'spec'],
  [ResourceType.REPLICA_SET]: ['spec', 'template', 'spec'],
  [ResourceType.JOB]: ['spec', 'template', 'spec'],
  [ResourceType.CRON_JOB]: ['spec', 'jobTemplate', 'spec', 'template', 'spec'],
};

// every namespace has a service account named default
const DEFAULT_SERVICE_ACCOUNT = 'default';

/**
 * Collects the secrets, config maps, volume claims and service accounts a workload's pod template refers to.
 */
export class ReferenceExtractor {
  private readonly references = new Map<string, PodReference>();

  private constructor(private readonly manifest: Manifest) {}

  public static extract(manifest: Manifest): PodReference[] {
    const path = POD_SPEC_PATHS[manifest.key.kind];
    if (!path || !manifest.key.namespace) {
      return [];
    }

    const extractor = new ReferenceExtractor(manifest);
    extractor.visitPodSpec(KubeObjects.field(manifest.object, ...path));
    return [...extractor.references.values()];
  }

  private visitPodSpec(podSpec: unknown): void {
    for (const container of [
      ...KubeObjects.arrayField(podSpec, 'initContainers'),
      ...KubeObjects.arrayField(podSpec, 'containers'),
    ]) {
      this.visitContainer(container);
    }

    for (const volume of KubeObjects.arrayField(podSpec, 'volumes')) {
      this.visitVolume(volume);
    }

    for (const pullSecret of KubeObjects.arrayField(podSpec, 'imagePullSecrets')) {
      this.add(ResourceType.SECRET, KubeObjects.stringField(pullSecret, 'name'), 'imagePullSecrets', false);
    }

    const serviceAccount =
      KubeObjects.stringField(podSpec, 'serviceAccountName') ?? KubeObjects.stringField(podSpec, 'serviceAccount');
    if (serviceAccount !== DEFAULT_SERVICE_ACCOUNT) {
      this.add(ResourceType.SERVICE_ACCOUNT, serviceAccount, 'serviceAccountName', false);
    }
  }

  private visitContainer(container: unknown): void {
    for (const env of KubeObjects.arrayField(container, 'env')) {
      const secretKeyRef = KubeObjects.field(env, 'valueFrom', 'secretKeyRef');
      this.addSelector(ResourceType.SECRET, secretKeyRef, 'env.valueFrom.secretKeyRef');

      const configMapKeyRef = KubeObjects.field(env, 'valueFrom', 'configMapKeyRef');
      this.addSelector(ResourceType.CONFIG_MAP, configMapKeyRef, 'env.valueFrom.configMapKeyRef');
    }

    for (const envFrom of KubeObjects.arrayField(container, 'envFrom')) {
      this.addSelector(ResourceType.SECRET, KubeObjects.field(envFrom, 'secretRef'), 'envFrom.secretRef');
      this.addSelector(ResourceType.CONFIG_MAP, KubeObjects.field(envFrom, 'configMapRef'), 'envFrom.configMapRef');
    }
  }

  private visitVolume(volume: unknown): void {
    const secret = KubeObjects.field(volume, 'secret');
    this.add(
      ResourceType.SECRET,
      KubeObjects.stringField(secret, 'secretName'),
      'volumes.secret',
      KubeObjects.field(secret, 'optional') === true,
    );

    this.addSelector(ResourceType.CONFIG_MAP, KubeObjects.field(volume, 'configMap'), 'volumes.configMap');

    this.add(
      ResourceType.PERSISTENT_VOLUME_CLAIM,
      KubeObjects.stringField(volume, 'persistentVolumeClaim', 'claimName'),
      'volumes.persistentVolumeClaim',
      false,
    );

    for (const source of KubeObjects.arrayField(volume, 'projected', 'sources')) {
      this.addSelector(ResourceType.SECRET, KubeObjects.field(source, 'secret'), 'volumes.projected.secret');
      this.addSelector(ResourceType.CONFIG_MAP, KubeObjects.field(source, 'configMap'), 'volumes.projected.configMap');
    }
  }

  /** a `{name, optional}` selector as used by key refs, envFrom and config map volumes */
  private addSelector(kind: ResourceType, selector: unknown, via: string): void {
    this.add(
      kind,
      KubeObjects.stringField(selector, 'name'),
      via,
      KubeObjects.field(selector, 'optional') === true,
    );
  }

  private add(kind: ResourceType, name: string | undefined, via: string, optional: boolean): void {
    if (!name) {
      return;
    }

    const key = ResourceKey.of(kind, name, this.manifest.key.namespace);
    const previous = this.references.get(key.toString());
    if (previous) {
      // a reference is optional only when every use of it is
      if (previous.optional && !optional) {
        this.references.set(key.toString(), {...previous, optional: false});
      }
      return;
    }
    this.references.set(key.toString(), {key, via, optional});
  }
}
