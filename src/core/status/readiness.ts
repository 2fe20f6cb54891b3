// SPDX-License-Identifier: Apache-2.0

import {type KubeObject, KubeObjects} from '../../integration/kube/resources/object/kube-object.js';
import {ResourceType} from '../../integration/kube/resources/resource-type.js';
import * as constants from '../constants.js';
import {type Readiness, ReadinessState} from './resource-status.js';

type Evaluator = (object: KubeObject) => Readiness;

const ready = (reason: string): Readiness => ({state: ReadinessState.READY, reason});
const progressing = (reason: string): Readiness => ({state: ReadinessState.PROGRESSING, reason});
const failed = (reason: string): Readiness => ({state: ReadinessState.FAILED, reason});

function condition(object: KubeObject, type: string): Record<string, unknown> | undefined {
  return KubeObjects.arrayField(object, 'status', 'conditions')
    .filter(KubeObjects.isRecord)
    .find(entry => entry.type === type);
}

function isConditionTrue(object: KubeObject, type: string): boolean {
  return condition(object, type)?.status === constants.CONDITION_STATUS_TRUE;
}

/** progressing while the controller has not yet seen the latest spec */
function checkObservedGeneration(object: KubeObject): Readiness | undefined {
  const generation = object.metadata.generation;
  const observed = KubeObjects.numberField(object, 'status', 'observedGeneration');
  if (generation !== undefined && (observed === undefined || observed < generation)) {
    return progressing(`waiting for the controller to observe generation ${generation}`);
  }
  return undefined;
}

function desiredReplicas(object: KubeObject): number {
  return KubeObjects.numberField(object, 'spec', 'replicas') ?? 1;
}

function statusCount(object: KubeObject, field: string): number {
  return KubeObjects.numberField(object, 'status', field) ?? 0;
}

const deployment: Evaluator = object => {
  const progress = condition(object, 'Progressing');
  if (progress?.status === constants.CONDITION_STATUS_FALSE && progress.reason === 'ProgressDeadlineExceeded') {
    return failed(`progress deadline exceeded${typeof progress.message === 'string' ? `: ${progress.message}` : ''}`);
  }

  const generation = checkObservedGeneration(object);
  if (generation) {
    return generation;
  }

  const replicas = desiredReplicas(object);
  const updated = statusCount(object, 'updatedReplicas');
  if (updated !== replicas) {
    return progressing(`${updated} of ${replicas} replicas updated`);
  }
  const readyReplicas = statusCount(object, 'readyReplicas');
  if (readyReplicas !== replicas) {
    return progressing(`${readyReplicas} of ${replicas} replicas ready`);
  }
  const available = statusCount(object, 'availableReplicas');
  if (available !== replicas) {
    return progressing(`${available} of ${replicas} replicas available`);
  }
  return ready(`${available} of ${replicas} replicas available`);
};

const statefulSet: Evaluator = object => {
  const generation = checkObservedGeneration(object);
  if (generation) {
    return generation;
  }

  const replicas = desiredReplicas(object);
  const readyReplicas = statusCount(object, 'readyReplicas');
  if (readyReplicas !== replicas) {
    return progressing(`${readyReplicas} of ${replicas} replicas ready`);
  }

  const currentRevision = KubeObjects.stringField(object, 'status', 'currentRevision');
  const updateRevision = KubeObjects.stringField(object, 'status', 'updateRevision');
  if (!updateRevision || currentRevision !== updateRevision) {
    return progressing(`waiting for the rollout of revision ${updateRevision ?? '<unknown>'}`);
  }
  return ready(`${readyReplicas} of ${replicas} replicas ready`);
};

const daemonSet: Evaluator = object => {
  const generation = checkObservedGeneration(object);
  if (generation) {
    return generation;
  }

  const desired = statusCount(object, 'desiredNumberScheduled');
  const updated = statusCount(object, 'updatedNumberScheduled');
  if (updated !== desired) {
    return progressing(`${updated} of ${desired} pods updated`);
  }
  const numberReady = statusCount(object, 'numberReady');
  if (numberReady !== desired) {
    return progressing(`${numberReady} of ${desired} pods ready`);
  }
  return ready(`${numberReady} of ${desired} pods ready`);
};

const replicaSet: Evaluator = object => {
  const replicas = desiredReplicas(object);
  const readyReplicas = statusCount(object, 'readyReplicas');
  return readyReplicas === replicas
    ? ready(`${readyReplicas} of ${replicas} replicas ready`)
    : progressing(`${readyReplicas} of ${replicas} replicas ready`);
};

const pod: Evaluator = object => {
  const phase = KubeObjects.stringField(object, 'status', 'phase');
  if (phase === constants.POD_PHASE_SUCCEEDED) {
    return ready('pod succeeded');
  }
  if (phase === constants.POD_PHASE_FAILED) {
    const reason =
      KubeObjects.stringField(object, 'status', 'message') ?? KubeObjects.stringField(object, 'status', 'reason');
    return failed(reason ? `pod failed: ${reason}` : 'pod failed');
  }

  const containerStatuses = [
    ...KubeObjects.arrayField(object, 'status', 'initContainerStatuses'),
    ...KubeObjects.arrayField(object, 'status', 'containerStatuses'),
  ];
  for (const containerStatus of containerStatuses) {
    const waitingReason = KubeObjects.stringField(containerStatus, 'state', 'waiting', 'reason');
    if (waitingReason && constants.POD_FATAL_WAITING_REASONS.includes(waitingReason)) {
      const name = KubeObjects.stringField(containerStatus, 'name') ?? '<unknown>';
      return failed(`container ${name} is waiting: ${waitingReason}`);
    }
  }

  if (isConditionTrue(object, constants.POD_CONDITION_READY)) {
    return ready('pod is ready');
  }
  return progressing(`pod is ${phase ?? 'Pending'}`);
};

const job: Evaluator = object => {
  if (isConditionTrue(object, 'Complete')) {
    return ready('job complete');
  }
  const failure = condition(object, 'Failed');
  if (failure?.status === constants.CONDITION_STATUS_TRUE) {
    const message = typeof failure.message === 'string' ? failure.message : failure.reason;
    return failed(typeof message === 'string' && message ? `job failed: ${message}` : 'job failed');
  }

  const completions = KubeObjects.numberField(object, 'spec', 'completions') ?? 1;
  return progressing(`${statusCount(object, 'succeeded')} of ${completions} completions`);
};

const persistentVolumeClaim: Evaluator = object => {
  const phase = KubeObjects.stringField(object, 'status', 'phase');
  if (phase === 'Bound') {
    return ready('claim is Bound');
  }
  if (phase === 'Lost') {
    return failed('claim lost its volume');
  }
  return progressing(`claim is ${phase ?? 'Pending'}`);
};

const service: Evaluator = object => {
  const type = KubeObjects.stringField(object, 'spec', 'type') ?? 'ClusterIP';
  if (type === 'ExternalName') {
    return ready('external name service');
  }
  if (type === 'LoadBalancer') {
    return KubeObjects.arrayField(object, 'status', 'loadBalancer', 'ingress').length > 0
      ? ready('load balancer ingress assigned')
      : progressing('waiting for load balancer ingress');
  }

  const clusterIP = KubeObjects.stringField(object, 'spec', 'clusterIP');
  if (clusterIP === 'None') {
    return ready('headless service');
  }
  return clusterIP ? ready(`cluster IP ${clusterIP}`) : progressing('waiting for cluster IP');
};

const namespace: Evaluator = object => {
  const phase = KubeObjects.stringField(object, 'status', 'phase');
  return phase === 'Active' ? ready('namespace is Active') : progressing(`namespace is ${phase ?? 'Pending'}`);
};

const EVALUATORS: Readonly<Record<string, Evaluator>> = {
  [ResourceType.DEPLOYMENT]: deployment,
  [ResourceType.STATEFUL_SET]: statefulSet,
  [ResourceType.DAEMON_SET]: daemonSet,
  [ResourceType.REPLICA_SET]: replicaSet,
  [ResourceType.POD]: pod,
  [ResourceType.JOB]: job,
  [ResourceType.PERSISTENT_VOLUME_CLAIM]: persistentVolumeClaim,
  [ResourceType.SERVICE]: service,
  [ResourceType.NAMESPACE]: namespace,
};

/**
 * Classifies a live object as ready, progressing or failed. Kinds without a specific rule are ready once they exist.
 */
export function evaluateReadiness(object: KubeObject): Readiness {
  const evaluator: Evaluator | undefined = EVALUATORS[object.kind];
  return evaluator ? evaluator(object) : ready('resource exists');
}
