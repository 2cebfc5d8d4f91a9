// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import {ClusterContextManager} from '../../../../src/core/config/cluster-context-manager.js';
import {LocalConfig} from '../../../../src/core/config/local/local-config.js';
import {RancherClient} from '../../../../src/integration/rancher/rancher-client.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';
import {getTestCacheDirectory, removeTestDirectory} from '../../../test-utility.js';

describe('ClusterContextManager', () => {
  const contextCommand = 'rancher context current';
  const clustersCommand = 'rancher cluster ls --format json';
  let root: string;
  let runner: FakeCommandRunner;
  let localConfig: LocalConfig;
  let manager: ClusterContextManager;

  beforeEach(() => {
    root = getTestCacheDirectory('cluster-context');
    runner = new FakeCommandRunner();
    const logger = new RecordingLogger();
    localConfig = new LocalConfig(PathEx.join(root, 'local-config.yaml'), logger);
    manager = new ClusterContextManager(localConfig, new RancherClient(runner, Duration.ofSeconds(5), logger), logger);
  });

  afterEach(() => {
    removeTestDirectory(root);
  });

  it('detects the cluster id of the current cluster', async () => {
    runner
      .succeed(contextCommand, 'Cluster:prod Project:Default\n')
      .succeed(
        clustersCommand,
        [
          JSON.stringify({ID: 'c-9', Current: '', Cluster: {name: 'staging'}}),
          JSON.stringify({ID: 'c-1', Current: '*', Cluster: {name: 'prod'}}),
        ].join('\n'),
      );

    expect(await manager.detect()).to.deep.equal({context: 'prod:Default', clusterId: 'c-1', clusterName: 'prod'});
  });

  it('uses the project name when the cluster id cannot be found', async () => {
    runner.succeed(contextCommand, 'Cluster:prod Project:Team Apps\n').fail(clustersCommand);

    expect(await manager.detect()).to.deep.equal({
      context: 'prod:Team Apps',
      clusterId: 'Team Apps',
      clusterName: 'prod',
    });
  });

  it('detects nothing without a rancher context', async () => {
    runner.fail(contextCommand, 'not logged in');

    expect(await manager.detect()).to.be.undefined;
    expect(runner.commandLines()).to.deep.equal([contextCommand]);
  });

  it('stores a detected context and reuses it', async () => {
    runner
      .succeed(contextCommand, 'Cluster:prod Project:Default\n')
      .succeed(clustersCommand, JSON.stringify({ID: 'c-1', Current: '*', Cluster: {name: 'prod'}}));

    const detected = await manager.current();
    const again = await manager.current();

    expect(detected).to.deep.equal({context: 'prod:Default', clusterId: 'c-1', clusterName: 'prod'});
    expect(again).to.deep.equal(detected);
    expect(localConfig.configFileExists()).to.be.true;
    expect(runner.commandLines()).to.deep.equal([contextCommand, clustersCommand]);
  });

  it('attempts detection once and then reads the empty context', async () => {
    runner.fail(contextCommand);

    expect(await manager.current()).to.deep.equal({context: '', clusterId: '', clusterName: ''});
    expect(await manager.current()).to.deep.equal({context: '', clusterId: '', clusterName: ''});
    expect(runner.commandLines()).to.deep.equal([contextCommand]);
  });

  it('prefers a stored context over detection', async () => {
    await manager.set({context: 'dev:Default', clusterId: 'c-5', clusterName: 'dev'});

    expect(await manager.current()).to.deep.equal({context: 'dev:Default', clusterId: 'c-5', clusterName: 'dev'});
    expect(runner.calls).to.be.empty;
  });
});
