// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import * as constants from '../../../../src/core/constants.js';
import {ChartCatalogCache} from '../../../../src/business/catalog/chart-catalog-cache.js';
import {DefaultHelmClient} from '../../../../src/integration/helm/impl/default-helm-client.js';
import {Repository} from '../../../../src/integration/helm/model/repository.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {FakeCommandRunner} from '../../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';
import {FixedClock, getTestCacheDirectory, removeTestDirectory} from '../../../test-utility.js';

describe('ChartCatalogCache', () => {
  const repository = new Repository('eea', 'https://charts.example.test/');
  const addCommand = 'helm repo add --force-update eea https://charts.example.test/';
  const searchCommand = 'helm search repo --output json eea/';
  const now = new Date('2026-03-01T12:00:00.000Z');

  let directory: string;
  let cacheFile: string;
  let runner: FakeCommandRunner;
  let clock: FixedClock;
  let cache: ChartCatalogCache;

  const writeCache = (charts: string[], timestamp: string): void => {
    fs.writeFileSync(cacheFile, JSON.stringify({charts, timestamp, version: '1.0'}));
  };

  const repositoryAnswers = (names: string[]): void => {
    runner
      .succeed(addCommand, '"eea" has been added')
      .succeed('helm repo update', 'Update Complete')
      .succeed(searchCommand, JSON.stringify(names.map(name => ({name, version: '1.0.0'}))));
  };

  beforeEach(() => {
    directory = getTestCacheDirectory('catalog');
    cacheFile = PathEx.join(directory, 'charts-cache.json');
    runner = new FakeCommandRunner();
    clock = new FixedClock(now);
    const logger = new RecordingLogger();
    cache = new ChartCatalogCache(
      new DefaultHelmClient(runner, Duration.ofSeconds(5), logger),
      repository,
      cacheFile,
      constants.FALLBACK_CHARTS_FILE,
      clock,
      logger,
    );
  });

  afterEach(() => {
    removeTestDirectory(directory);
  });

  it('answers from a fresh disk cache without contacting the repository', async () => {
    writeCache(['volto', 'postgres'], '2026-03-01T11:30:00.000Z');

    const charts = await cache.getCatalog();

    expect(charts).to.deep.equal(['postgres', 'volto']);
    expect(runner.calls).to.have.lengthOf(0);
  });

  it('refetches an expired cache and rewrites the file', async () => {
    writeCache(['volto'], '2026-03-01T10:00:00.000Z');
    repositoryAnswers(['eea/redis', 'other/nginx', 'eea/postgres']);

    const charts = await cache.getCatalog();

    expect(charts).to.deep.equal(['postgres', 'redis']);
    expect(runner.commandLines()).to.deep.equal([addCommand, 'helm repo update', searchCommand]);
    expect(JSON.parse(fs.readFileSync(cacheFile, 'utf8'))).to.deep.equal({
      charts: ['postgres', 'redis'],
      timestamp: '2026-03-01T12:00:00.000Z',
      version: '1.0',
    });
  });

  it('keeps serving the in-memory snapshot until it expires', async () => {
    repositoryAnswers(['eea/redis']);

    await cache.getCatalog();
    clock.advanceMinutes(59);
    await cache.getCatalog();

    expect(runner.calls).to.have.lengthOf(3);

    clock.advanceMinutes(2);
    await cache.getCatalog();

    expect(runner.calls).to.have.lengthOf(6);
  });

  it('returns the stale cache when the repository cannot be reached', async () => {
    writeCache(['volto', 'postgres'], '2026-02-01T00:00:00.000Z');
    runner.fail(addCommand, 'Error: connection refused');

    expect(await cache.getCatalog()).to.deep.equal(['postgres', 'volto']);
  });

  it('falls back to the bundled list when there is no cache and the fetch fails', async () => {
    runner.fail(addCommand, 'Error: connection refused');

    const charts = await cache.getCatalog();

    expect(charts).to.have.lengthOf(63);
    expect(charts[0]).to.equal('advisory-board-backend');
    expect(charts).to.include('postgres');
    expect([...charts].sort()).to.deep.equal([...charts]);
    expect(fs.existsSync(cacheFile)).to.be.false;
  });

  it('falls back to the bundled list when the repository reports no charts', async () => {
    repositoryAnswers([]);

    expect(await cache.getCatalog()).to.have.lengthOf(63);
  });

  it('never contacts the repository when remote fetches are not allowed', async () => {
    writeCache(['volto'], '2026-02-01T00:00:00.000Z');

    expect(await cache.getCatalog(false, false)).to.deep.equal(['volto']);
    expect(runner.calls).to.have.lengthOf(0);
  });

  it('uses the bundled list offline when nothing is cached', async () => {
    const charts = await cache.getCatalog(false, false);

    expect(charts).to.have.lengthOf(63);
    expect(runner.calls).to.have.lengthOf(0);
  });

  it('refetches a fresh cache when a refresh is forced', async () => {
    writeCache(['volto'], '2026-03-01T11:59:00.000Z');
    repositoryAnswers(['eea/volto', 'eea/wise-frontend']);

    expect(await cache.refresh()).to.deep.equal(['volto', 'wise-frontend']);
    expect(runner.calls).to.have.lengthOf(3);
  });

  it('ignores a cache file that is not valid JSON', async () => {
    fs.writeFileSync(cacheFile, '{not json');
    repositoryAnswers(['eea/redis']);

    expect(await cache.getCatalog()).to.deep.equal(['redis']);
  });

  it('treats a cache without a timestamp as expired', async () => {
    fs.writeFileSync(cacheFile, JSON.stringify({charts: ['volto']}));
    runner.fail(addCommand);

    expect(await cache.getCatalog()).to.deep.equal(['volto']);
    expect(runner.calls).to.have.lengthOf(1);
  });

  describe('when the bundled list cannot be used', () => {
    const builtInCharts = ['elastic7', 'haproxy', 'keycloak-eea', 'memcached', 'postgres', 'redis', 'varnish', 'volto'];

    const cacheWithFallbackFile = (fallbackFile: string, logger: RecordingLogger): ChartCatalogCache =>
      new ChartCatalogCache(
        new DefaultHelmClient(runner, Duration.ofSeconds(5), logger),
        repository,
        cacheFile,
        fallbackFile,
        clock,
        logger,
      );

    it('serves the built-in list when the file is missing', async () => {
      const logger = new RecordingLogger();
      const missing = PathEx.join(directory, 'missing-charts.json');
      runner.fail(addCommand, 'Error: connection refused');

      const charts = await cacheWithFallbackFile(missing, logger).getCatalog();

      expect(charts).to.deep.equal(builtInCharts);
      expect(logger.errors).to.deep.equal([`Failed to read fallback chart list: ${missing}`]);
    });

    it('serves the built-in list offline when the file holds no chart names', async () => {
      const logger = new RecordingLogger();
      const malformed = PathEx.join(directory, 'fallback-charts.json');
      fs.writeFileSync(malformed, JSON.stringify({charts: [1, '']}));

      const charts = await cacheWithFallbackFile(malformed, logger).getCatalog(false, false);

      expect(charts).to.deep.equal(builtInCharts);
      expect(logger.errors).to.deep.equal([`Fallback chart list is malformed or empty: ${malformed}`]);
      expect(runner.calls).to.have.lengthOf(0);
    });
  });
});
