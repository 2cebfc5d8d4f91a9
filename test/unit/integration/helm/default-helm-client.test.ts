// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {DefaultHelmClient} from '../../../../src/integration/helm/impl/default-helm-client.js';
import {Repository} from '../../../../src/integration/helm/model/repository.js';
import {KubeAuthentication} from '../../../../src/integration/helm/request/authentication/kube-authentication.js';
import {HelmExecutionException} from '../../../../src/integration/helm/helm-execution-exception.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

describe('DefaultHelmClient', () => {
  const authentication = new KubeAuthentication('/tmp/fleetgen-test/kubeconfig.yaml');
  let runner: FakeCommandRunner;
  let helm: DefaultHelmClient;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    helm = new DefaultHelmClient(runner, Duration.ofSeconds(5), new RecordingLogger());
  });

  it('adds the repository with --force-update', async () => {
    runner.succeed('helm repo add --force-update eea https://charts.example.test/', '"eea" has been added');

    await helm.addRepository(new Repository('eea', 'https://charts.example.test/'));

    expect(runner.commandLines()).to.deep.equal(['helm repo add --force-update eea https://charts.example.test/']);
  });

  it('propagates a failed repository update', async () => {
    runner.fail('helm repo update', 'Error: no repositories found');

    await expect(helm.updateRepositories()).to.be.rejectedWith(HelmExecutionException);
  });

  it('searches the repository by keyword', async () => {
    runner.succeed(
      'helm search repo --output json eea/',
      JSON.stringify([{name: 'eea/postgres', version: '2.1.0', app_version: '15', description: 'PostgreSQL'}]),
    );

    const results = await helm.searchRepository('eea/');

    expect(results.map(result => result.name)).to.deep.equal(['eea/postgres']);
    expect(results[0].appVersion).to.equal('15');
  });

  it('lists releases in one namespace through the kubeconfig environment', async () => {
    runner.succeed(
      'helm list --output json --namespace data',
      JSON.stringify([
        {
          name: 'db',
          namespace: 'data',
          revision: '3',
          updated: '2026-01-01',
          status: 'deployed',
          chart: 'postgres-2.1.0',
          app_version: '15',
        },
      ]),
    );

    const releases = await helm.listReleases('data', authentication);

    expect(releases).to.have.lengthOf(1);
    expect(releases[0].chart).to.equal('postgres-2.1.0');
    expect(releases[0].revision).to.equal('3');
    expect(runner.calls[0].environment).to.deep.equal({KUBECONFIG: '/tmp/fleetgen-test/kubeconfig.yaml'});
  });

  it('lists releases of all namespaces when no namespace is given', async () => {
    runner.succeed('helm list --all-namespaces --output json', '[]');

    expect(await helm.listReleases(undefined, authentication)).to.deep.equal([]);
  });

  it('reads release metadata and values', async () => {
    runner
      .succeed(
        'helm get metadata --output json --namespace data db',
        JSON.stringify({name: 'db', chart: 'postgres', version: '2.1.0', appVersion: '15'}),
      )
      .succeed('helm get values --output yaml --namespace data db', 'replicaCount: 2\n');

    const metadata = await helm.getReleaseMetadata('db', 'data', authentication);
    const values = await helm.getReleaseValues('db', 'data', 'yaml', authentication);

    expect(metadata.chart).to.equal('postgres');
    expect(metadata.version).to.equal('2.1.0');
    expect(metadata.appVersion).to.equal('15');
    expect(values).to.equal('replicaCount: 2\n');
  });
});
