// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {DeckhandError} from '../../../src/core/errors/deckhand-error.js';
import {MissingArgumentError} from '../../../src/core/errors/missing-argument-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {DataValidationError} from '../../../src/core/errors/data-validation-error.js';
import {ManifestLoadError} from '../../../src/core/errors/manifest-load-error.js';
import {DependencyCycleError} from '../../../src/core/errors/dependency-cycle-error.js';
import {UnresolvedReferenceError} from '../../../src/core/errors/unresolved-reference-error.js';
import {ReadinessTimeoutError} from '../../../src/core/errors/readiness-timeout-error.js';
import {ResourceFailedError} from '../../../src/core/errors/resource-failed-error.js';

describe('Errors', () => {
  const message = 'errorMessage';
  const cause = new Error('cause');

  it('should construct correct DeckhandError', () => {
    const error = new DeckhandError(message, cause);
    expect(error).to.be.instanceof(Error);
    expect(error.name).to.equal('DeckhandError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.deep.equal(cause);
    expect(error.meta).to.deep.equal({});
    expect(error.stack).to.contain('Caused by: Error: cause');
  });

  it('should carry the status code of the cause', () => {
    const error = new DeckhandError(message, {statusCode: 409});
    expect(error.statusCode).to.equal(409);
    expect(new DeckhandError(message).statusCode).to.be.undefined;
  });

  it('should construct correct MissingArgumentError', () => {
    const error = new MissingArgumentError(message);
    expect(error).to.be.instanceof(DeckhandError);
    expect(error.name).to.equal('MissingArgumentError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.deep.equal({});
    expect(error.meta).to.deep.equal({});
  });

  it('should construct correct IllegalArgumentError', () => {
    const value = 'invalid argument';
    const error = new IllegalArgumentError(message, value);
    expect(error).to.be.instanceof(DeckhandError);
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.message).to.equal(message);
    expect(error.meta).to.deep.equal({value});
  });

  it('should construct correct DataValidationError', () => {
    const error = new DataValidationError(message, 'expected', 'found');
    expect(error).to.be.instanceof(DeckhandError);
    expect(error.name).to.equal('DataValidationError');
    expect(error.meta).to.deep.equal({expected: 'expected', found: 'found'});
  });

  it('should prefix ManifestLoadError with its source', () => {
    const error = new ManifestLoadError('missing kind', 'app/secret.yaml');
    expect(error.name).to.equal('ManifestLoadError');
    expect(error.message).to.equal('app/secret.yaml: missing kind');
    expect(error.meta).to.deep.equal({source: 'app/secret.yaml'});
  });

  it('should list the cycle in DependencyCycleError', () => {
    const cycle = ['Secret/default/a', 'ConfigMap/default/b', 'Secret/default/a'];
    const error = new DependencyCycleError(cycle);
    expect(error.message).to.equal(
      'dependency cycle detected: Secret/default/a -> ConfigMap/default/b -> Secret/default/a',
    );
    expect(error.cycle).to.deep.equal(cycle);
  });

  it('should list the references in UnresolvedReferenceError', () => {
    const error = new UnresolvedReferenceError(['Deployment/default/web -> Secret/default/creds']);
    expect(error.message).to.equal(
      'references to resources outside the manifest set: Deployment/default/web -> Secret/default/creds',
    );
  });

  it('should list pending resources in ReadinessTimeoutError', () => {
    const error = new ReadinessTimeoutError(['Deployment/default/web', 'Service/default/web'], 3);
    expect(error.message).to.equal('resources not ready after 3 attempts: Deployment/default/web, Service/default/web');
    expect(error.pending).to.deep.equal(['Deployment/default/web', 'Service/default/web']);
    expect(error.meta).to.deep.equal({pending: ['Deployment/default/web', 'Service/default/web'], attempts: 3});
  });

  it('should name the resource in ResourceFailedError', () => {
    const error = new ResourceFailedError('Pod/default/web', 'container web is waiting: ErrImagePull');
    expect(error.message).to.equal('Pod/default/web failed: container web is waiting: ErrImagePull');
    expect(error.resource).to.equal('Pod/default/web');
    expect(error.reason).to.equal('container web is waiting: ErrImagePull');
  });
});
