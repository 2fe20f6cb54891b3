// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {KubeApiResponse} from '../../../../src/integration/kube/kube-api-response.js';
import {KubeApiError} from '../../../../src/integration/kube/errors/kube-api-error.js';
import {ResourceOperation} from '../../../../src/integration/kube/resources/resource-operation.js';
import {NamespaceName} from '../../../../src/integration/kube/resources/namespace/namespace-name.js';
import {ResourceCreateError} from '../../../../src/integration/kube/errors/resource-operation-errors.js';

describe('KubeApiResponse', () => {
  const notFound = {statusCode: 404, body: {message: 'secrets "creds" not found'}};
  const conflict = {response: {statusCode: 409}, body: {message: 'already exists'}};

  it('should read the status code from the error or its response', () => {
    expect(KubeApiResponse.statusCodeOf(notFound)).to.equal(404);
    expect(KubeApiResponse.statusCodeOf(conflict)).to.equal(409);
    expect(KubeApiResponse.statusCodeOf(new Error('connect ECONNREFUSED'))).to.be.undefined;
    expect(KubeApiResponse.statusCodeOf(undefined)).to.be.undefined;
  });

  it('should classify not found and conflict', () => {
    expect(KubeApiResponse.isNotFound(notFound)).to.be.true;
    expect(KubeApiResponse.isNotFound(conflict)).to.be.false;
    expect(KubeApiResponse.isAlreadyExists(conflict)).to.be.true;
  });

  it('should prefer the message of the Status body', () => {
    expect(KubeApiResponse.messageOf(notFound)).to.equal('secrets "creds" not found');
    expect(KubeApiResponse.messageOf(new Error('connect ECONNREFUSED'))).to.equal('connect ECONNREFUSED');
    expect(KubeApiResponse.messageOf('text')).to.be.undefined;
  });

  it('should wrap errors with a failing status', () => {
    const wrapped = KubeApiResponse.wrap(
      notFound,
      ResourceOperation.READ,
      'Secret',
      NamespaceName.of('default'),
      'creds',
    );

    expect(wrapped).to.be.instanceof(KubeApiError);
    expect(wrapped).to.have.property(
      'message',
      "failed to read Secret 'creds' in namespace 'default', statusCode: 404",
    );
  });

  it('should return errors without a status unchanged', () => {
    const error = new Error('connect ECONNREFUSED');
    expect(KubeApiResponse.wrap(error, ResourceOperation.READ, 'Namespace', undefined, 'mongo')).to.equal(error);
  });

  it('should describe the cause in resource operation errors', () => {
    const error = new ResourceCreateError('Secret', NamespaceName.of('default'), 'creds', conflict);
    expect(error.message).to.equal("failed to create Secret 'creds' in namespace 'default': already exists");
    expect(error.meta).to.deep.equal({
      operation: 'create',
      kind: 'Secret',
      namespace: 'default',
      name: 'creds',
      statusCode: 409,
    });
  });
});
