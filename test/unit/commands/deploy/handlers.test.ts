// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';

import {DeployCommandHandlers} from '../../../../src/commands/deploy/handlers.js';
import {DeployCommandTasks} from '../../../../src/commands/deploy/tasks.js';
import {DeployCommandConfigs} from '../../../../src/commands/deploy/configs.js';
import {ConfigManager} from '../../../../src/core/config-manager.js';
import {ManifestLoader} from '../../../../src/core/manifest/manifest-loader.js';
import {DependencyOrderer} from '../../../../src/core/ordering/dependency-orderer.js';
import {ApplyDriver} from '../../../../src/core/apply/apply-driver.js';
import {StatusPoller} from '../../../../src/core/status/status-poller.js';
import {DeckhandError} from '../../../../src/core/errors/deckhand-error.js';
import {UserBreak} from '../../../../src/core/errors/user-break.js';
import {Flags as flags} from '../../../../src/commands/flags.js';
import {type DeckhandLogger} from '../../../../src/core/logging/deckhand-logger.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {getTestLogger, MANIFESTS_DIR} from '../../../test-utility.js';
import {InMemoryK8, InMemoryK8Factory} from '../../../helpers/in-memory-k8.js';

describe('DeployCommandHandlers', () => {
  let logger: DeckhandLogger;
  let k8: InMemoryK8;
  let handlers: DeployCommandHandlers;

  beforeEach(() => {
    logger = getTestLogger();
    k8 = new InMemoryK8();
    const k8Factory = new InMemoryK8Factory(k8);
    const tasks = new DeployCommandTasks(
      logger,
      new ManifestLoader(logger),
      new DependencyOrderer(logger),
      new ApplyDriver(k8Factory, logger),
      new StatusPoller(k8Factory, logger),
    );
    handlers = new DeployCommandHandlers(tasks, new DeployCommandConfigs(new ConfigManager(logger), logger), logger);
    sinon.stub(logger, 'showList');
    sinon.stub(handlers, 'setupHomeDirectory').returns([]);
  });

  const SHOP_ARGV = {dir: PathEx.join(MANIFESTS_DIR, 'nested'), recursive: true};

  afterEach(() => sinon.restore());

  it('should plan the nested manifests', async () => {
    const context_ = await handlers.plan({
      _: ['deploy', 'plan'],
      dir: PathEx.join(MANIFESTS_DIR, 'nested'),
      recursive: true,
    });

    expect(context_.plan?.entries.map(entry => entry.manifest.key.toString())).to.deep.equal([
      'Namespace/shop',
      'ConfigMap/shop/web-config',
      'Service/shop/web',
      'Deployment/shop/web',
    ]);
    expect(k8.objects().store.size).to.equal(0);
  });

  it('should read the status without writing', async () => {
    const context_ = await handlers.status({
      _: ['deploy', 'status'],
      dir: PathEx.join(MANIFESTS_DIR, 'nested'),
      recursive: true,
    });

    expect(context_.statuses).to.have.lengthOf(4);
    expect(k8.objects().store.size).to.equal(0);
  });

  it('should apply the manifests into the cluster', async () => {
    const context_ = await handlers.apply({_: ['deploy', 'apply'], ...SHOP_ARGV, wait: false});

    expect(context_.applyResults.map(result => [result.key.toString(), result.action])).to.deep.equal([
      ['Namespace/shop', 'created'],
      ['ConfigMap/shop/web-config', 'created'],
      ['Service/shop/web', 'created'],
      ['Deployment/shop/web', 'created'],
    ]);
    expect(k8.objects().get('Deployment', 'shop', 'web')).not.to.be.undefined;
  });

  it('should destroy the applied manifests when forced', async () => {
    await handlers.apply({_: ['deploy', 'apply'], ...SHOP_ARGV, wait: false});
    const prompt = sinon.stub(flags.force, 'prompt').resolves(false);

    const context_ = await handlers.destroy({_: ['deploy', 'destroy'], ...SHOP_ARGV, force: true});

    expect(prompt).not.to.have.been.called;
    expect(context_.deleteResults.map(result => result.action)).to.deep.equal(['deleted', 'deleted', 'deleted', 'kept']);
    expect([...k8.objects().store.keys()]).to.deep.equal(['Namespace/shop']);
  });

  it('should abort the destroy when the user declines', async () => {
    await handlers.apply({_: ['deploy', 'apply'], ...SHOP_ARGV, wait: false});
    sinon.stub(flags.force, 'prompt').resolves(false);

    const error = await handlers.destroy({_: ['deploy', 'destroy'], ...SHOP_ARGV}).catch((error_: unknown) => error_);

    expect(error).to.be.instanceOf(DeckhandError);
    expect(error).to.have.property('message', 'deploy destroy: Aborted application by user prompt');
    expect(error).to.have.property('cause').that.is.instanceOf(UserBreak);
    expect(k8.objects().store.size).to.equal(4);
  });

  it('should prefix a failure with the command', async () => {
    await expect(handlers.plan({_: ['deploy', 'plan']})).to.be.rejectedWith(
      DeckhandError,
      'deploy plan: --dir is required',
    );
  });
});
