// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {HelmExecutionBuilder} from '../../../../src/integration/helm/execution/helm-execution-builder.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

describe('HelmExecutionBuilder', () => {
  const newBuilder = (runner: FakeCommandRunner = new FakeCommandRunner()): HelmExecutionBuilder =>
    new HelmExecutionBuilder(runner, Duration.ofSeconds(5), new RecordingLogger());

  it('orders subcommands, flags, named arguments and positionals', () => {
    const command = newBuilder()
      .subcommands('get', 'values')
      .positional('web')
      .argument('output', 'json')
      .flag('--all')
      .argument('namespace', 'apps')
      .buildCommand();

    expect(command).to.deep.equal(['get', 'values', '--all', '--output', 'json', '--namespace', 'apps', 'web']);
  });

  it('rejects empty argument values', () => {
    expect(() => newBuilder().argument('output', '')).to.throw('value must not be null');
    expect(() => newBuilder().positional('')).to.throw('value must not be null');
    expect(() => newBuilder().environmentVariable('', 'x')).to.throw('name must not be null');
  });

  it('passes environment variables to the runner', async () => {
    const runner = new FakeCommandRunner().succeed('helm repo update', 'done');
    const execution = newBuilder(runner)
      .subcommands('repo', 'update')
      .environmentVariable('KUBECONFIG', '/tmp/kubeconfig.yaml')
      .build();

    expect(execution.commandLine).to.equal('helm repo update');
    expect(await execution.responseText()).to.equal('done');
    expect(runner.calls[0].environment).to.deep.equal({KUBECONFIG: '/tmp/kubeconfig.yaml'});
  });
});
