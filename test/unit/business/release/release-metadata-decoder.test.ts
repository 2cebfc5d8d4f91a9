// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {ReleaseMetadataDecoder} from '../../../../src/business/release/release-metadata-decoder.js';
import {EMPTY_CHART_METADATA} from '../../../../src/business/release/release-record.js';
import {RancherClient} from '../../../../src/integration/rancher/rancher-client.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';
import {encodeReleaseSecretData, releaseSecretJson} from '../../../test-utility.js';

describe('ReleaseMetadataDecoder', () => {
  const secretCommand = 'rancher kubectl get secret sh.helm.release.v1.db.v1 -n data -o json';
  let runner: FakeCommandRunner;
  let decoder: ReleaseMetadataDecoder;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    const logger = new RecordingLogger();
    decoder = new ReleaseMetadataDecoder(new RancherClient(runner, Duration.ofSeconds(5), logger), logger);
  });

  it('names the secret after the release and revision', () => {
    expect(ReleaseMetadataDecoder.secretName('db', '3')).to.equal('sh.helm.release.v1.db.v3');
  });

  it('decodes the metadata stored in the first revision', async () => {
    const release = {chart: {metadata: {name: 'postgres', version: '2.1.0', appVersion: '15', description: 'DB'}}};
    runner.succeed(secretCommand, releaseSecretJson(encodeReleaseSecretData(release, true)));

    expect(await decoder.decode('db', 'data')).to.deep.equal({
      name: 'postgres',
      version: '2.1.0',
      appVersion: '15',
      description: 'DB',
    });
  });

  it('reads the secret of the requested revision', async () => {
    runner.succeed(
      'rancher kubectl get secret sh.helm.release.v1.db.v4 -n data -o json',
      releaseSecretJson(encodeReleaseSecretData({chart: {metadata: {name: 'postgres', version: '3.0.0'}}})),
    );

    const metadata = await decoder.decode('db', 'data', '4');

    expect(metadata.version).to.equal('3.0.0');
  });

  it('resolves to empty metadata when the secret cannot be read', async () => {
    runner.fail(secretCommand, 'Error from server (NotFound)');

    expect(await decoder.decode('db', 'data')).to.equal(EMPTY_CHART_METADATA);
  });

  it('resolves to empty metadata when the payload is corrupted', async () => {
    runner.succeed(secretCommand, releaseSecretJson('%%%not-base64%%%'));

    expect(await decoder.decode('db', 'data')).to.deep.equal({name: '', version: '', appVersion: '', description: ''});
  });
});
