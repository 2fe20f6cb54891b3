// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {ResourceKey} from '../../../../src/core/manifest/resource-key.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {NamespaceName} from '../../../../src/integration/kube/resources/namespace/namespace-name.js';

describe('ResourceKey', () => {
  const shop = NamespaceName.of('shop');

  it('should format namespaced and cluster-scoped keys', () => {
    expect(ResourceKey.of('Secret', 'creds', shop).toString()).to.equal('Secret/shop/creds');
    expect(ResourceKey.of('Namespace', 'shop').toString()).to.equal('Namespace/shop');
  });

  it('should require a kind and a name', () => {
    expect(() => ResourceKey.of('', 'creds')).to.throw(IllegalArgumentError, 'a resource key requires a kind and a name');
  });

  it('should parse a two-part key into the default namespace', () => {
    const key = ResourceKey.parse('ConfigMap/settings', shop);

    expect(key.toString()).to.equal('ConfigMap/shop/settings');
    expect(key.isNamespaced).to.be.true;
  });

  it('should not give cluster-scoped kinds a namespace', () => {
    expect(ResourceKey.parse('StorageClass/fast', shop).toString()).to.equal('StorageClass/fast');
  });

  it('should parse a three-part key', () => {
    expect(ResourceKey.parse(' Secret / other / creds ', shop).toString()).to.equal('Secret/other/creds');
  });

  it('should reject malformed keys', () => {
    expect(() => ResourceKey.parse('Secret')).to.throw(
      IllegalArgumentError,
      "invalid resource reference 'Secret', expected Kind/name or Kind/namespace/name",
    );
    expect(() => ResourceKey.parse('Secret//creds')).to.throw(
      IllegalArgumentError,
      "invalid resource reference 'Secret//creds'",
    );
  });

  it('should compare by string form', () => {
    expect(ResourceKey.of('Secret', 'creds', shop).equals(ResourceKey.parse('Secret/shop/creds'))).to.be.true;
    expect(ResourceKey.of('Secret', 'creds', shop).equals(ResourceKey.of('Secret', 'creds'))).to.be.false;
  });
});
