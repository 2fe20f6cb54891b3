// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';
import {Listr} from 'listr2';

import {DeployCommandTasks} from '../../../../src/commands/deploy/tasks.js';
import {
  createDeployContext,
  type DeployContext,
} from '../../../../src/commands/deploy/config-interfaces/deploy-context.js';
import {type DeployConfigClass} from '../../../../src/commands/deploy/config-interfaces/deploy-config-class.js';
import {ManifestLoader} from '../../../../src/core/manifest/manifest-loader.js';
import {ResourceKey} from '../../../../src/core/manifest/resource-key.js';
import {DependencyOrderer} from '../../../../src/core/ordering/dependency-orderer.js';
import {ApplyDriver} from '../../../../src/core/apply/apply-driver.js';
import {ApplyAction, DeleteAction} from '../../../../src/core/apply/apply-result.js';
import {StatusPoller} from '../../../../src/core/status/status-poller.js';
import {ReadinessState} from '../../../../src/core/status/resource-status.js';
import {DeckhandError} from '../../../../src/core/errors/deckhand-error.js';
import {UserBreak} from '../../../../src/core/errors/user-break.js';
import {Flags as flags} from '../../../../src/commands/flags.js';
import {MissingArgumentError} from '../../../../src/core/errors/missing-argument-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {NamespaceName} from '../../../../src/integration/kube/resources/namespace/namespace-name.js';
import {type DeckhandLogger} from '../../../../src/core/logging/deckhand-logger.js';
import {type DeckhandListrTask} from '../../../../src/types/index.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {createManifest, getTestLogger, MANIFESTS_DIR} from '../../../test-utility.js';
import {InMemoryK8, InMemoryK8Factory} from '../../../helpers/in-memory-k8.js';

function shopConfig(overrides: Partial<DeployConfigClass> = {}): DeployConfigClass {
  return {
    manifestDirectory: PathEx.join(MANIFESTS_DIR, 'nested'),
    namespace: NamespaceName.of('default'),
    recursive: true,
    strict: false,
    diff: false,
    dryRun: false,
    continueOnError: false,
    wait: false,
    maxAttempts: 3,
    pollInterval: Duration.ZERO,
    includeNamespaces: false,
    force: true,
    quiet: false,
    ...overrides,
  };
}

async function run(tasks: DeckhandListrTask<DeployContext>[], context_: DeployContext): Promise<DeployContext> {
  return new Listr<DeployContext, 'silent', 'silent'>(tasks, {ctx: context_, renderer: 'silent'}).run();
}

describe('DeployCommandTasks', () => {
  describe('formatting', () => {
    it('should describe a plan entry with its dependencies and external references', () => {
      const entry = {
        manifest: createManifest({
          apiVersion: 'apps/v1',
          kind: 'Deployment',
          metadata: {name: 'web', namespace: 'default'},
        }),
        dependencies: [ResourceKey.of('Secret', 'a', NamespaceName.of('default'))],
        externalReferences: [ResourceKey.of('Secret', 'x', NamespaceName.of('default'))],
      };

      expect(DeployCommandTasks.describePlanEntry(entry)).to.equal(
        'Deployment/default/web after Secret/default/a (external: Secret/default/x)',
      );
      expect(DeployCommandTasks.describePlan({entries: [entry]})).to.deep.equal([
        '1. Deployment/default/web after Secret/default/a (external: Secret/default/x)',
      ]);
    });

    it('should describe results', () => {
      const key = ResourceKey.of('ConfigMap', 'settings', NamespaceName.of('default'));

      expect(DeployCommandTasks.describeDiffResult({key, action: ApplyAction.CONFIGURED})).to.equal(
        'ConfigMap/default/settings: configured',
      );
      expect(DeployCommandTasks.describeApplyResult({key, action: ApplyAction.CREATED, dryRun: true})).to.equal(
        'ConfigMap/default/settings: created (dry run)',
      );
      expect(
        DeployCommandTasks.describeApplyResult({
          key,
          action: ApplyAction.FAILED,
          dryRun: false,
          error: new Error('forbidden'),
        }),
      ).to.equal('ConfigMap/default/settings: failed, forbidden');
      expect(DeployCommandTasks.describeDeleteResult({key, action: DeleteAction.ABSENT, dryRun: false})).to.equal(
        'ConfigMap/default/settings: absent',
      );
      expect(
        DeployCommandTasks.describeStatus({key, state: ReadinessState.READY, reason: 'resource exists'}),
      ).to.equal('ConfigMap/default/settings: ready (resource exists)');
    });
  });

  describe('task lists', () => {
    let k8: InMemoryK8;
    let logger: DeckhandLogger;
    let tasks: DeployCommandTasks;

    beforeEach(() => {
      k8 = new InMemoryK8();
      const k8Factory = new InMemoryK8Factory(k8);
      logger = getTestLogger();
      tasks = new DeployCommandTasks(
        logger,
        new ManifestLoader(logger),
        new DependencyOrderer(logger),
        new ApplyDriver(k8Factory, logger),
        new StatusPoller(k8Factory, logger),
      );
    });

    afterEach(() => sinon.restore());

    function initialize(config: DeployConfigClass): DeckhandListrTask<DeployContext> {
      return tasks.initialize({_: ['deploy']}, async () => config);
    }

    it('should load, order and print the plan', async () => {
      const showList = sinon.stub(logger, 'showList');

      const context_ = await run(
        [initialize(shopConfig()), tasks.loadManifests(), tasks.orderManifests(), tasks.showPlan(), tasks.showDiff()],
        createDeployContext(),
      );

      expect(context_.manifests).to.have.lengthOf(4);
      expect(context_.plan?.entries).to.have.lengthOf(4);
      expect(context_.diffResults).to.deep.equal([]);
      expect(showList).to.have.been.calledOnce;
      const [title, lines] = showList.firstCall.args;
      expect(title).to.equal('Apply order');
      expect(lines[0]).to.equal('1. Namespace/shop');
      expect(lines[3]).to.equal(
        '4. Deployment/shop/web after Namespace/shop, ConfigMap/shop/web-config (external: Secret/shop/web-tls)',
      );
    });

    it('should compare with the cluster when asked for a diff', async () => {
      sinon.stub(logger, 'showList');

      const context_ = await run(
        [initialize(shopConfig({diff: true})), tasks.loadManifests(), tasks.orderManifests(), tasks.showDiff()],
        createDeployContext(),
      );

      expect(context_.diffResults.map(result => result.action)).to.deep.equal([
        'created',
        'created',
        'created',
        'created',
      ]);
    });

    it('should apply the plan and skip waiting in a dry run', async () => {
      sinon.stub(logger, 'showList');
      const waitForReady = sinon.spy(StatusPoller.prototype, 'waitForReady');

      const context_ = await run(
        [
          initialize(shopConfig({dryRun: true, wait: true})),
          tasks.loadManifests(),
          tasks.orderManifests(),
          tasks.applyManifests(),
          tasks.waitForReadiness(),
        ],
        createDeployContext(),
      );

      expect(context_.applyResults.every(result => result.dryRun)).to.be.true;
      expect(waitForReady).not.to.have.been.called;
      expect(k8.objects().get('ConfigMap', 'shop', 'web-config')).to.be.undefined;
    });

    it('should fail the task when a manifest fails to apply', async () => {
      sinon.stub(logger, 'showList');
      const create = sinon.stub(k8.objects(), 'create');
      create.withArgs(sinon.match.has('kind', 'Service')).rejects(new Error('connection refused'));
      create.callThrough();

      const error = await run(
        [initialize(shopConfig()), tasks.loadManifests(), tasks.orderManifests(), tasks.applyManifests()],
        createDeployContext(),
      ).catch((error_: unknown) => error_);

      expect(error).to.be.instanceOf(DeckhandError);
      expect(error).to.have.property('message', '1 of 4 manifests failed to apply');
    });

    it('should read the status of every manifest', async () => {
      const showList = sinon.stub(logger, 'showList');

      const context_ = await run(
        [initialize(shopConfig()), tasks.loadManifests(), tasks.orderManifests(), tasks.showStatus()],
        createDeployContext(),
      );

      expect(context_.statuses.map(status => status.state)).to.deep.equal(['missing', 'missing', 'missing', 'missing']);
      expect(showList).to.have.been.calledWith('Resource status');
    });

    it('should delete without a prompt when forced and keep the namespace', async () => {
      sinon.stub(logger, 'showList');
      await run(
        [initialize(shopConfig()), tasks.loadManifests(), tasks.orderManifests(), tasks.applyManifests()],
        createDeployContext(),
      );

      const context_ = await run(
        [
          initialize(shopConfig()),
          tasks.loadManifests(),
          tasks.orderManifests(),
          tasks.confirmDestroy(),
          tasks.deleteManifests(),
        ],
        createDeployContext(),
      );

      expect(context_.deleteResults.map(result => result.action)).to.deep.equal([
        'deleted',
        'deleted',
        'deleted',
        'kept',
      ]);
    });

    describe('destroy confirmation', () => {
      async function applyShop(): Promise<void> {
        await run(
          [initialize(shopConfig()), tasks.loadManifests(), tasks.orderManifests(), tasks.applyManifests()],
          createDeployContext(),
        );
      }

      function destroyTasks(): DeckhandListrTask<DeployContext>[] {
        return [
          initialize(shopConfig({force: false})),
          tasks.loadManifests(),
          tasks.orderManifests(),
          tasks.confirmDestroy(),
          tasks.deleteManifests(),
        ];
      }

      beforeEach(async () => {
        sinon.stub(logger, 'showList');
        await applyShop();
      });

      it('should stop without deleting when the user declines', async () => {
        const prompt = sinon.stub(flags.force, 'prompt').resolves(false);
        const remove = sinon.spy(k8.objects(), 'delete');

        await expect(run(destroyTasks(), createDeployContext())).to.be.rejectedWith(
          UserBreak,
          'Aborted application by user prompt',
        );

        expect(prompt).to.have.been.calledOnce;
        expect(prompt.firstCall.args[1]).to.equal('Are you sure you would like to delete 4 resources?');
        expect(remove).not.to.have.been.called;
        expect(k8.objects().store.size).to.equal(4);
      });

      it('should delete once the user confirms', async () => {
        sinon.stub(flags.force, 'prompt').resolves(true);

        const context_ = await run(destroyTasks(), createDeployContext());

        expect(context_.deleteResults.map(result => result.action)).to.deep.equal([
          'deleted',
          'deleted',
          'deleted',
          'kept',
        ]);
        expect(k8.objects().store.size).to.equal(1);
      });

      it('should not prompt in quiet mode', async () => {
        const prompt = sinon.stub(flags.force, 'prompt').resolves(false);

        const context_ = await run(
          [
            initialize(shopConfig({force: false, quiet: true})),
            tasks.loadManifests(),
            tasks.orderManifests(),
            tasks.confirmDestroy(),
            tasks.deleteManifests(),
          ],
          createDeployContext(),
        );

        expect(prompt).not.to.have.been.called;
        expect(context_.deleteResults).to.have.lengthOf(4);
      });
    });

    it('should require an initialized config', async () => {
      await expect(run([tasks.loadManifests()], createDeployContext())).to.be.rejectedWith(
        MissingArgumentError,
        'deploy config is not initialized',
      );
    });

    it('should require an ordered plan', async () => {
      await expect(run([initialize(shopConfig()), tasks.showPlan()], createDeployContext())).to.be.rejectedWith(
        MissingArgumentError,
        'apply plan is not available, manifests were not ordered',
      );
    });
  });
});
