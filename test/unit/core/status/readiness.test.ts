// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {evaluateReadiness} from '../../../../src/core/status/readiness.js';
import {type KubeObject} from '../../../../src/integration/kube/resources/object/kube-object.js';

function live(kind: string, fields: Record<string, unknown>, generation?: number): KubeObject {
  return {
    apiVersion: 'v1',
    kind,
    metadata: {name: 'web', namespace: 'default', ...(generation === undefined ? {} : {generation})},
    ...fields,
  };
}

describe('Readiness', () => {
  describe('Deployment', () => {
    const rolledOut = {
      observedGeneration: 2,
      updatedReplicas: 2,
      readyReplicas: 2,
      availableReplicas: 2,
    };

    it('should be ready when every replica is updated, ready and available', () => {
      expect(evaluateReadiness(live('Deployment', {spec: {replicas: 2}, status: rolledOut}, 2))).to.deep.equal({
        state: 'ready',
        reason: '2 of 2 replicas available',
      });
    });

    it('should default to one replica', () => {
      const status = {updatedReplicas: 1, readyReplicas: 1, availableReplicas: 1};
      expect(evaluateReadiness(live('Deployment', {spec: {}, status})).state).to.equal('ready');
    });

    it('should wait for the controller to observe the latest generation', () => {
      expect(evaluateReadiness(live('Deployment', {spec: {replicas: 2}, status: rolledOut}, 3))).to.deep.equal({
        state: 'progressing',
        reason: 'waiting for the controller to observe generation 3',
      });
    });

    it('should report the first replica count that is behind', () => {
      const status = {...rolledOut, updatedReplicas: 2, readyReplicas: 1};
      expect(evaluateReadiness(live('Deployment', {spec: {replicas: 2}, status}, 2))).to.deep.equal({
        state: 'progressing',
        reason: '1 of 2 replicas ready',
      });
    });

    it('should fail when the progress deadline is exceeded', () => {
      const status = {
        conditions: [
          {type: 'Available', status: 'False'},
          {
            type: 'Progressing',
            status: 'False',
            reason: 'ProgressDeadlineExceeded',
            message: 'ReplicaSet "web-5d9" has timed out progressing.',
          },
        ],
      };
      expect(evaluateReadiness(live('Deployment', {spec: {replicas: 1}, status}, 1))).to.deep.equal({
        state: 'failed',
        reason: 'progress deadline exceeded: ReplicaSet "web-5d9" has timed out progressing.',
      });
    });
  });

  describe('StatefulSet', () => {
    it('should be ready when all replicas run the update revision', () => {
      const status = {observedGeneration: 1, readyReplicas: 3, currentRevision: 'db-1', updateRevision: 'db-1'};
      expect(evaluateReadiness(live('StatefulSet', {spec: {replicas: 3}, status}, 1))).to.deep.equal({
        state: 'ready',
        reason: '3 of 3 replicas ready',
      });
    });

    it('should wait for the rollout of the update revision', () => {
      const status = {observedGeneration: 1, readyReplicas: 3, currentRevision: 'db-1', updateRevision: 'db-2'};
      expect(evaluateReadiness(live('StatefulSet', {spec: {replicas: 3}, status}, 1))).to.deep.equal({
        state: 'progressing',
        reason: 'waiting for the rollout of revision db-2',
      });
    });
  });

  describe('DaemonSet', () => {
    it('should compare scheduled, updated and ready pods', () => {
      const status = {observedGeneration: 1, desiredNumberScheduled: 2, updatedNumberScheduled: 2, numberReady: 1};
      expect(evaluateReadiness(live('DaemonSet', {status}, 1))).to.deep.equal({
        state: 'progressing',
        reason: '1 of 2 pods ready',
      });
      expect(evaluateReadiness(live('DaemonSet', {status: {...status, numberReady: 2}}, 1)).state).to.equal('ready');
    });
  });

  describe('ReplicaSet', () => {
    it('should compare ready replicas', () => {
      expect(evaluateReadiness(live('ReplicaSet', {spec: {replicas: 2}, status: {readyReplicas: 2}})).state).to.equal(
        'ready',
      );
      expect(evaluateReadiness(live('ReplicaSet', {spec: {replicas: 2}, status: {}}))).to.deep.equal({
        state: 'progressing',
        reason: '0 of 2 replicas ready',
      });
    });
  });

  describe('Pod', () => {
    it('should be ready when the Ready condition is true', () => {
      const status = {phase: 'Running', conditions: [{type: 'Ready', status: 'True'}]};
      expect(evaluateReadiness(live('Pod', {status}))).to.deep.equal({state: 'ready', reason: 'pod is ready'});
    });

    it('should treat a succeeded pod as ready', () => {
      expect(evaluateReadiness(live('Pod', {status: {phase: 'Succeeded'}})).state).to.equal('ready');
    });

    it('should fail on a failed phase', () => {
      expect(evaluateReadiness(live('Pod', {status: {phase: 'Failed', reason: 'Evicted'}}))).to.deep.equal({
        state: 'failed',
        reason: 'pod failed: Evicted',
      });
    });

    it('should fail on a container that cannot start', () => {
      const status = {
        phase: 'Pending',
        containerStatuses: [{name: 'web', state: {waiting: {reason: 'ErrImagePull'}}}],
      };
      expect(evaluateReadiness(live('Pod', {status}))).to.deep.equal({
        state: 'failed',
        reason: 'container web is waiting: ErrImagePull',
      });
    });

    it('should keep waiting while containers are being created', () => {
      const status = {
        phase: 'Pending',
        containerStatuses: [{name: 'web', state: {waiting: {reason: 'ContainerCreating'}}}],
      };
      expect(evaluateReadiness(live('Pod', {status}))).to.deep.equal({state: 'progressing', reason: 'pod is Pending'});
    });
  });

  describe('Job', () => {
    it('should follow the Complete and Failed conditions', () => {
      expect(
        evaluateReadiness(live('Job', {status: {conditions: [{type: 'Complete', status: 'True'}]}})).state,
      ).to.equal('ready');
      expect(
        evaluateReadiness(
          live('Job', {status: {conditions: [{type: 'Failed', status: 'True', reason: 'BackoffLimitExceeded'}]}}),
        ),
      ).to.deep.equal({state: 'failed', reason: 'job failed: BackoffLimitExceeded'});
      expect(evaluateReadiness(live('Job', {spec: {completions: 3}, status: {succeeded: 1}}))).to.deep.equal({
        state: 'progressing',
        reason: '1 of 3 completions',
      });
    });
  });

  describe('PersistentVolumeClaim', () => {
    it('should follow the claim phase', () => {
      expect(evaluateReadiness(live('PersistentVolumeClaim', {status: {phase: 'Bound'}})).state).to.equal('ready');
      expect(evaluateReadiness(live('PersistentVolumeClaim', {status: {phase: 'Lost'}})).state).to.equal('failed');
      expect(evaluateReadiness(live('PersistentVolumeClaim', {status: {phase: 'Pending'}})).state).to.equal(
        'progressing',
      );
    });
  });

  describe('Service', () => {
    it('should wait for a load balancer ingress', () => {
      const spec = {type: 'LoadBalancer', clusterIP: '10.96.0.12'};
      expect(evaluateReadiness(live('Service', {spec, status: {loadBalancer: {}}}))).to.deep.equal({
        state: 'progressing',
        reason: 'waiting for load balancer ingress',
      });
      expect(
        evaluateReadiness(live('Service', {spec, status: {loadBalancer: {ingress: [{ip: '172.18.0.2'}]}}})).state,
      ).to.equal('ready');
    });

    it('should be ready with a cluster IP', () => {
      expect(evaluateReadiness(live('Service', {spec: {clusterIP: '10.96.0.10'}}))).to.deep.equal({
        state: 'ready',
        reason: 'cluster IP 10.96.0.10',
      });
      expect(evaluateReadiness(live('Service', {spec: {}})).state).to.equal('progressing');
    });

    it('should treat headless and external name services as ready', () => {
      expect(evaluateReadiness(live('Service', {spec: {clusterIP: 'None'}})).reason).to.equal('headless service');
      expect(evaluateReadiness(live('Service', {spec: {type: 'ExternalName'}})).state).to.equal('ready');
    });
  });

  describe('Namespace', () => {
    it('should be ready when Active', () => {
      expect(evaluateReadiness(live('Namespace', {status: {phase: 'Active'}})).state).to.equal('ready');
      expect(evaluateReadiness(live('Namespace', {status: {phase: 'Terminating'}}))).to.deep.equal({
        state: 'progressing',
        reason: 'namespace is Terminating',
      });
    });
  });

  it('should treat other kinds as ready once they exist', () => {
    expect(evaluateReadiness(live('ConfigMap', {data: {}}))).to.deep.equal({state: 'ready', reason: 'resource exists'});
  });
});
