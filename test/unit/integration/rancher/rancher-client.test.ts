// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {RancherClient} from '../../../../src/integration/rancher/rancher-client.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

describe('RancherClient', () => {
  let runner: FakeCommandRunner;
  let rancher: RancherClient;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    rancher = new RancherClient(runner, Duration.ofSeconds(5), new RecordingLogger());
  });

  it('reads the current context', async () => {
    runner.succeed('rancher context current', 'Cluster:staging Project:Default\n');

    const context = await rancher.currentContext();

    expect(context?.context).to.equal('staging:Default');
  });

  it('returns no context when the CLI fails', async () => {
    runner.fail('rancher context current', 'not logged in');

    expect(await rancher.currentContext()).to.be.undefined;
  });

  it('lists clusters from JSON lines and skips invalid lines', async () => {
    runner.succeed(
      'rancher cluster ls --format json',
      [
        JSON.stringify({ID: 'c-1', Current: '', Cluster: {name: 'prod'}}),
        'garbage',
        JSON.stringify({ID: 'c-2', Current: '*', Cluster: {name: 'staging'}}),
      ].join('\n'),
    );

    const clusters = await rancher.listClusters();

    expect(clusters.map(cluster => cluster.name)).to.deep.equal(['prod', 'staging']);
    expect(clusters.map(cluster => cluster.current)).to.deep.equal([false, true]);
  });

  it('lists namespace names', async () => {
    runner.succeed(
      'rancher namespaces ls --format json',
      [JSON.stringify({ID: 'apps'}), JSON.stringify({Namespace: {id: 'data'}}), JSON.stringify({Other: 1})].join('\n'),
    );

    expect(await rancher.listNamespaces()).to.deep.equal(['apps', 'data']);
  });

  it('returns no namespaces when the CLI fails', async () => {
    runner.fail('rancher namespaces ls --format json');

    expect(await rancher.listNamespaces()).to.deep.equal([]);
  });

  it('fetches secrets through kubectl', async () => {
    runner.succeed('rancher kubectl get secret sh.helm.release.v1.db.v1 -n data -o json', '{}');

    const result = await rancher.getSecret('sh.helm.release.v1.db.v1', 'data');

    expect(result).to.deep.equal({ok: true, output: '{}'});
  });
});
