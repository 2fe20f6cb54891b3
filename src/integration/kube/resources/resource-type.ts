// SPDX-License-Identifier: Apache-2.0

/** Resource kinds the tool knows how to order and check for readiness */
export enum ResourceType {
  NAMESPACE = 'Namespace',
  CUSTOM_RESOURCE_DEFINITION = 'CustomResourceDefinition',
  PRIORITY_CLASS = 'PriorityClass',
  STORAGE_CLASS = 'StorageClass',
  RESOURCE_QUOTA = 'ResourceQuota',
  LIMIT_RANGE = 'LimitRange',
  SERVICE_ACCOUNT = 'ServiceAccount',
  SECRET = 'Secret',
  CONFIG_MAP = 'ConfigMap',
  PERSISTENT_VOLUME = 'PersistentVolume',
  PERSISTENT_VOLUME_CLAIM = 'PersistentVolumeClaim',
  CLUSTER_ROLE = 'ClusterRole',
  CLUSTER_ROLE_BINDING = 'ClusterRoleBinding',
  ROLE = 'Role',
  ROLE_BINDING = 'RoleBinding',
  SERVICE = 'Service',
  DAEMON_SET = 'DaemonSet',
  POD = 'Pod',
  REPLICA_SET = 'ReplicaSet',
  DEPLOYMENT = 'Deployment',
  HORIZONTAL_POD_AUTOSCALER = 'HorizontalPodAutoscaler',
  STATEFUL_SET = 'StatefulSet',
  JOB = 'Job',
  CRON_JOB = 'CronJob',
  POD_DISRUPTION_BUDGET = 'PodDisruptionBudget',
  INGRESS_CLASS = 'IngressClass',
  INGRESS = 'Ingress',
  NETWORK_POLICY = 'NetworkPolicy',
}

/** Kinds that are not namespaced */
export const CLUSTER_SCOPED_TYPES: ReadonlySet<string> = new Set<string>([
  ResourceType.NAMESPACE,
  ResourceType.CUSTOM_RESOURCE_DEFINITION,
  ResourceType.PRIORITY_CLASS,
  ResourceType.STORAGE_CLASS,
  ResourceType.PERSISTENT_VOLUME,
  ResourceType.CLUSTER_ROLE,
  ResourceType.CLUSTER_ROLE_BINDING,
  ResourceType.INGRESS_CLASS,
]);
