// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';

import {StatusPoller} from '../../../../src/core/status/status-poller.js';
import {ReadinessState} from '../../../../src/core/status/resource-status.js';
import {ReadinessTimeoutError} from '../../../../src/core/errors/readiness-timeout-error.js';
import {ResourceFailedError} from '../../../../src/core/errors/resource-failed-error.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {type KubeObject} from '../../../../src/integration/kube/resources/object/kube-object.js';
import {type ApplyPlan} from '../../../../src/core/ordering/apply-plan.js';
import {createManifest, createPlan, getTestLogger} from '../../../test-utility.js';
import {InMemoryK8, InMemoryK8Factory} from '../../../helpers/in-memory-k8.js';

const configMap: KubeObject = {
  apiVersion: 'v1',
  kind: 'ConfigMap',
  metadata: {name: 'settings', namespace: 'default'},
  data: {url: 'mongodb-service'},
};

const deployment: KubeObject = {
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: {name: 'web', namespace: 'default'},
  spec: {replicas: 1},
};

const pod: KubeObject = {
  apiVersion: 'v1',
  kind: 'Pod',
  metadata: {name: 'debug', namespace: 'default'},
  spec: {containers: [{name: 'debug', image: 'busybox'}]},
};

function withStatus(object: KubeObject, status: Record<string, unknown>): KubeObject {
  return {...object, status};
}

const AVAILABLE = {updatedReplicas: 1, readyReplicas: 1, availableReplicas: 1};

describe('StatusPoller', () => {
  let k8: InMemoryK8;
  let poller: StatusPoller;
  let plan: ApplyPlan;

  beforeEach(() => {
    k8 = new InMemoryK8();
    poller = new StatusPoller(new InMemoryK8Factory(k8), getTestLogger());
    plan = createPlan([createManifest(configMap), createManifest(deployment)]);
  });

  afterEach(() => sinon.restore());

  describe('waitForReady', () => {
    it('should return once every resource is ready', async () => {
      k8.objects().put(configMap);
      k8.objects().put(withStatus(deployment, AVAILABLE));

      const statuses = await poller.waitForReady(plan, {maxAttempts: 1, delay: Duration.ZERO});

      expect(statuses.map(status => [status.key.toString(), status.state, status.reason])).to.deep.equal([
        ['ConfigMap/default/settings', 'ready', 'resource exists'],
        ['Deployment/default/web', 'ready', '1 of 1 replicas available'],
      ]);
    });

    it('should poll until a progressing resource becomes ready', async () => {
      k8.objects().put(configMap);
      k8.objects().put(withStatus(deployment, {updatedReplicas: 1}));
      const onProgress = sinon.spy(() => {
        k8.objects().put(withStatus(deployment, AVAILABLE));
      });

      const statuses = await poller.waitForReady(plan, {maxAttempts: 3, delay: Duration.ZERO, onProgress});

      expect(onProgress).to.have.been.calledTwice;
      expect(onProgress.firstCall.args).to.have.lengthOf(2);
      expect(statuses[1].state).to.equal(ReadinessState.READY);
    });

    it('should only poll the resources that are still pending', async () => {
      k8.objects().put(configMap);
      k8.objects().put(withStatus(deployment, {updatedReplicas: 1}));
      const read = sinon.spy(k8.objects(), 'read');

      await expect(poller.waitForReady(plan, {maxAttempts: 2, delay: Duration.ZERO})).to.be.rejectedWith(
        ReadinessTimeoutError,
      );
      expect(read).to.have.callCount(3);
    });

    it('should count a missing resource as progressing and time out', async () => {
      k8.objects().put(configMap);

      await expect(poller.waitForReady(plan, {maxAttempts: 2, delay: Duration.ZERO})).to.be.rejectedWith(
        ReadinessTimeoutError,
        'resources not ready after 2 attempts: Deployment/default/web (not found)',
      );
    });

    it('should fail as soon as a resource has failed', async () => {
      k8.objects().put(
        withStatus(pod, {
          phase: 'Pending',
          containerStatuses: [{name: 'debug', state: {waiting: {reason: 'ErrImagePull'}}}],
        }),
      );

      await expect(
        poller.waitForReady(createPlan([createManifest(pod)]), {maxAttempts: 5, delay: Duration.ZERO}),
      ).to.be.rejectedWith(ResourceFailedError, 'Pod/default/debug failed: container debug is waiting: ErrImagePull');
    });

    it('should reject an attempt budget below one', async () => {
      await expect(poller.waitForReady(plan, {maxAttempts: 0})).to.be.rejectedWith(
        IllegalArgumentError,
        'maxAttempts must be a positive integer',
      );
    });
  });

  describe('snapshot', () => {
    it('should classify every live object once', async () => {
      k8.objects().put(withStatus(deployment, {updatedReplicas: 1}));

      const statuses = await poller.snapshot(plan);

      expect(statuses.map(status => [status.key.toString(), status.state, status.reason])).to.deep.equal([
        ['ConfigMap/default/settings', 'missing', 'not found'],
        ['Deployment/default/web', 'progressing', '0 of 1 replicas ready'],
      ]);
    });
  });

  it('should evaluate a single object', () => {
    expect(poller.evaluate(configMap)).to.deep.equal({state: 'ready', reason: 'resource exists'});
  });
});
