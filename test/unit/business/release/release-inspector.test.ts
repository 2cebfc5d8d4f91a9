// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import {ReleaseInspector} from '../../../../src/business/release/release-inspector.js';
import {DefaultHelmClient} from '../../../../src/integration/helm/impl/default-helm-client.js';
import {KubeConfigProvider} from '../../../../src/integration/kube/kube-config-provider.js';
import {RancherClient} from '../../../../src/integration/rancher/rancher-client.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

describe('ReleaseInspector', () => {
  const listCommand = 'helm list --output json --namespace data';
  let runner: FakeCommandRunner;
  let provider: KubeConfigProvider;
  let inspector: ReleaseInspector;

  beforeEach(() => {
    runner = new FakeCommandRunner().succeed('rancher kubectl config view --raw', 'apiVersion: v1\nkind: Config\n');
    const logger = new RecordingLogger();
    const timeout = Duration.ofSeconds(5);
    provider = new KubeConfigProvider(new RancherClient(runner, timeout, logger), logger);
    inspector = new ReleaseInspector(new DefaultHelmClient(runner, timeout, logger), provider, logger);
  });

  afterEach(() => {
    provider.dispose();
  });

  const listing = JSON.stringify([
    {name: 'db', namespace: 'data', revision: '2', status: 'deployed', chart: 'postgres-2.1.0', app_version: '15'},
  ]);

  it('takes chart name and versions from the release metadata', async () => {
    runner
      .succeed(listCommand, listing)
      .succeed(
        'helm get metadata --output json --namespace data db',
        JSON.stringify({name: 'db', chart: 'postgres', version: '2.1.0', appVersion: '15'}),
      );

    expect(await inspector.listReleases('data')).to.deep.equal([
      {
        name: 'db',
        namespace: 'data',
        chart: 'postgres',
        revision: '2',
        status: 'deployed',
        chartVersion: '2.1.0',
        appVersion: '15',
      },
    ]);
  });

  it('keeps the listed chart when the metadata cannot be read', async () => {
    runner.succeed(listCommand, listing);

    const [release] = await inspector.listReleases('data');

    expect(release.chart).to.equal('postgres-2.1.0');
    expect(release.chartVersion).to.equal('');
    expect(release.appVersion).to.equal('');
  });

  it('returns no releases when helm fails', async () => {
    runner.fail(listCommand, 'Error: Kubernetes cluster unreachable');

    expect(await inspector.listReleases('data')).to.deep.equal([]);
  });

  it('returns no releases without a kubeconfig', async () => {
    const logger = new RecordingLogger();
    const failing = new FakeCommandRunner();
    const offline = new ReleaseInspector(
      new DefaultHelmClient(failing, Duration.ofSeconds(5), logger),
      new KubeConfigProvider(new RancherClient(failing, Duration.ofSeconds(5), logger), logger),
      logger,
    );

    expect(await offline.listReleases()).to.deep.equal([]);
    expect(failing.commandLines()).to.deep.equal(['rancher kubectl config view --raw']);
  });

  it('reads values printed as JSON surrounded by warnings', async () => {
    runner.succeed(
      'helm get values --output json --namespace data db',
      'WARNING: kubeconfig is group-readable\n{"replicaCount": 2, "image": {"tag": "15"}}\n',
    );

    expect(await inspector.getReleaseValues('db', 'data')).to.deep.equal({replicaCount: 2, image: {tag: '15'}});
  });

  it('falls back to YAML values', async () => {
    runner
      .fail('helm get values --output json --namespace data db')
      .succeed('helm get values --output yaml --namespace data db', 'replicaCount: 3\n');

    expect(await inspector.getReleaseValues('db', 'data')).to.deep.equal({replicaCount: 3});
  });

  it('reads unusable values as an empty mapping', async () => {
    runner
      .succeed('helm get values --output json --namespace data db', 'null')
      .succeed('helm get values --output yaml --namespace data db', '- a\n- b\n');

    expect(await inspector.getReleaseValues('db', 'data')).to.deep.equal({});
  });

  it('isolates the outermost JSON object', () => {
    expect(ReleaseInspector.parseJsonValues('noise {"a": {"b": 1}} trailing')).to.deep.equal({a: {b: 1}});
    expect(ReleaseInspector.parseJsonValues('[1, 2]')).to.be.undefined;
    expect(ReleaseInspector.parseJsonValues('')).to.be.undefined;
    expect(ReleaseInspector.parseJsonValues('no braces')).to.be.undefined;
  });

  it('keeps large integers of JSON values exact', () => {
    expect(ReleaseInspector.parseJsonValues('{"accountId": 12345678901234567890, "replicas": 3}')).to.deep.equal({
      accountId: 12345678901234567890n,
      replicas: 3,
    });
  });
});
