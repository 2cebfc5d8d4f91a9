// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {RancherContext} from '../../../../src/integration/rancher/model/rancher-context.js';
import {ClusterEntry} from '../../../../src/integration/rancher/model/cluster-entry.js';
import {namespaceName} from '../../../../src/integration/rancher/model/namespace-entry.js';

describe('RancherContext', () => {
  it('parses the cluster and a project name containing spaces', () => {
    const context = RancherContext.parse('Cluster:staging Project:Team Apps\n');

    expect(context?.clusterName).to.equal('staging');
    expect(context?.projectName).to.equal('Team Apps');
    expect(context?.context).to.equal('staging:Team Apps');
  });

  it('skips lines that do not name both a cluster and a project', () => {
    const context = RancherContext.parse('Saving config\nCluster:staging\nCluster:prod Project:Default');

    expect(context?.context).to.equal('prod:Default');
  });

  it('returns undefined for unrelated output', () => {
    expect(RancherContext.parse('not logged in')).to.be.undefined;
  });
});

describe('ClusterEntry', () => {
  it('reads the id, name and current marker', () => {
    const entry = ClusterEntry.fromJson({ID: 'c-m-123', Current: '*', Cluster: {name: 'staging'}});

    expect(entry).to.deep.equal(new ClusterEntry('c-m-123', 'staging', true));
  });

  it('reads a missing cluster object as an empty name', () => {
    expect(ClusterEntry.fromJson({ID: 'local', Current: ''})).to.deep.equal(new ClusterEntry('local', '', false));
  });
});

describe('namespaceName', () => {
  it('prefers name, then ID, then Namespace.id', () => {
    expect(namespaceName({name: 'apps', ID: 'other'})).to.equal('apps');
    expect(namespaceName({ID: 'data'})).to.equal('data');
    expect(namespaceName({Namespace: {id: 'cattle-system'}})).to.equal('cattle-system');
    expect(namespaceName({State: 'active'})).to.be.undefined;
  });
});
