// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import {ReleaseCommand} from '../../../src/commands/release.js';
import {ReleaseInspector} from '../../../src/business/release/release-inspector.js';
import {ReleaseMetadataDecoder} from '../../../src/business/release/release-metadata-decoder.js';
import {DefaultHelmClient} from '../../../src/integration/helm/impl/default-helm-client.js';
import {KubeConfigProvider} from '../../../src/integration/kube/kube-config-provider.js';
import {RancherClient} from '../../../src/integration/rancher/rancher-client.js';
import {MissingArgumentError} from '../../../src/core/errors/missing-argument-error.js';
import {Duration} from '../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('ReleaseCommand', () => {
  let runner: FakeCommandRunner;
  let logger: RecordingLogger;
  let provider: KubeConfigProvider;
  let command: ReleaseCommand;

  beforeEach(() => {
    runner = new FakeCommandRunner().succeed('rancher kubectl config view --raw', 'apiVersion: v1\n');
    logger = new RecordingLogger();
    const timeout = Duration.ofSeconds(5);
    const rancher = new RancherClient(runner, timeout, logger);
    provider = new KubeConfigProvider(rancher, logger);
    command = new ReleaseCommand(
      new ReleaseInspector(new DefaultHelmClient(runner, timeout, logger), provider, logger),
      new ReleaseMetadataDecoder(rancher, logger),
      logger,
    );
  });

  afterEach(() => {
    provider.dispose();
  });

  it('describes a release on one line', () => {
    const release = {
      name: 'db',
      namespace: 'data',
      chart: 'postgres',
      revision: '3',
      status: 'deployed',
      chartVersion: '2.1.0',
      appVersion: '15',
    };

    expect(ReleaseCommand.describeRelease(release)).to.equal('data/db  postgres-2.1.0 (app 15)  revision 3  deployed');
    expect(ReleaseCommand.describeRelease({...release, chartVersion: '', appVersion: ''})).to.equal(
      'data/db  postgres  revision 3  deployed',
    );
  });

  it('lists the releases of every namespace', async () => {
    runner.succeed('helm list --all-namespaces --output json', '[]');

    await command.list({_: ['release', 'list']});

    expect(logger.shown).to.deep.equal(['Releases in all namespaces']);
  });

  it('prints release values as YAML', async () => {
    runner.succeed('helm get values --output json --namespace data db', '{"replicaCount": 2}');

    await command.values({_: ['release', 'values'], release: 'db', namespace: 'data'});

    expect(logger.shown).to.deep.equal(['replicaCount: 2\n']);
  });

  it('requires a release and a namespace', async () => {
    await expect(command.metadata({_: ['release', 'metadata'], release: 'db'})).to.be.rejectedWith(
      MissingArgumentError,
      'Both --release and --namespace are required',
    );
  });
});
