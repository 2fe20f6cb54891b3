// SPDX-License-Identifier: Apache-2.0

import {ResourceType} from '../../integration/kube/resources/resource-type.js';

/**
 * Application order of well-known kinds, used to break ties between manifests no dependency edge orders.
 * Kinds that are not listed come last.
 */
export const KIND_PRECEDENCE: readonly string[] = [
  ResourceType.NAMESPACE,
  ResourceType.CUSTOM_RESOURCE_DEFINITION,
  ResourceType.PRIORITY_CLASS,
  ResourceType.STORAGE_CLASS,
  ResourceType.RESOURCE_QUOTA,
  ResourceType.LIMIT_RANGE,
  ResourceType.SERVICE_ACCOUNT,
  ResourceType.SECRET,
  ResourceType.CONFIG_MAP,
  ResourceType.PERSISTENT_VOLUME,
  ResourceType.PERSISTENT_VOLUME_CLAIM,
  ResourceType.CLUSTER_ROLE,
  ResourceType.ROLE,
  ResourceType.CLUSTER_ROLE_BINDING,
  ResourceType.ROLE_BINDING,
  ResourceType.SERVICE,
  ResourceType.DAEMON_SET,
  ResourceType.POD,
  ResourceType.REPLICA_SET,
  ResourceType.DEPLOYMENT,
  ResourceType.STATEFUL_SET,
  ResourceType.JOB,
  ResourceType.CRON_JOB,
  ResourceType.INGRESS_CLASS,
  ResourceType.INGRESS,
  ResourceType.HORIZONTAL_POD_AUTOSCALER,
  ResourceType.POD_DISRUPTION_BUDGET,
  ResourceType.NETWORK_POLICY,
];

const RANKS = new Map<string, number>(KIND_PRECEDENCE.map((kind, index) => [kind, index]));

export function kindRank(kind: string): number {
  return RANKS.get(kind) ?? KIND_PRECEDENCE.length;
}
