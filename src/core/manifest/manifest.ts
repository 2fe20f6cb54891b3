// SPDX-License-Identifier: Apache-2.0

import {type KubeObject} from '../../integration/kube/resources/object/kube-object.js';
import {type ObjectReference} from '../../integration/kube/resources/object/object-reference.js';
import {type ResourceKey} from './resource-key.js';

/** A single resource description read from a manifest file */
export interface Manifest {
  readonly key: ResourceKey;
  readonly object: KubeObject;
  /** path of the file the manifest was read from */
  readonly source: string;
  /** zero-based position of the YAML document inside its file */
  readonly documentIndex: number;
}

/** Manifests in load order: files sorted by path, documents in file order */
export type ManifestSet = readonly Manifest[];

export function toObjectReference(manifest: Manifest): ObjectReference {
  return {
    apiVersion: manifest.object.apiVersion,
    kind: manifest.key.kind,
    name: manifest.key.name,
    namespace: manifest.key.namespace,
  };
}

export function describeSource(manifest: Manifest): string {
  return `${manifest.source} (document ${manifest.documentIndex})`;
}
