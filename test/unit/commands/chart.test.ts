// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import * as constants from '../../../src/core/constants.js';
import {ChartCommand} from '../../../src/commands/chart.js';
import {ChartCatalogCache} from '../../../src/business/catalog/chart-catalog-cache.js';
import {DefaultHelmClient} from '../../../src/integration/helm/impl/default-helm-client.js';
import {Repository} from '../../../src/integration/helm/model/repository.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {Duration} from '../../../src/core/time/duration.js';
import {FakeCommandRunner} from '../../helpers/fake-command-runner.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';
import {FixedClock, getTestCacheDirectory, removeTestDirectory} from '../../test-utility.js';

describe('ChartCommand', () => {
  let directory: string;
  let runner: FakeCommandRunner;
  let logger: RecordingLogger;
  let command: ChartCommand;

  beforeEach(() => {
    directory = getTestCacheDirectory('chart-command');
    const cacheFile = PathEx.join(directory, 'charts-cache.json');
    fs.writeFileSync(
      cacheFile,
      JSON.stringify({charts: ['postgres', 'volto'], timestamp: '2026-03-01T11:30:00.000Z', version: '1.0'}),
    );
    runner = new FakeCommandRunner();
    logger = new RecordingLogger();
    const catalog = new ChartCatalogCache(
      new DefaultHelmClient(runner, Duration.ofSeconds(5), logger),
      new Repository('eea', 'https://charts.example.test/'),
      cacheFile,
      constants.FALLBACK_CHARTS_FILE,
      new FixedClock(new Date('2026-03-01T12:00:00.000Z')),
      logger,
    );
    command = new ChartCommand(catalog, logger);
  });

  afterEach(() => {
    removeTestDirectory(directory);
  });

  it('lists the charts matching the search term', async () => {
    expect(await command.list({_: ['chart', 'list'], search: 'post'})).to.be.true;

    expect(logger.shown).to.deep.equal([
      "Charts in 'eea' repository (1)",
      'postgres  Infrastructure  EEA Infrastructure application',
    ]);
    expect(runner.calls).to.be.empty;
  });

  it('suggests completions for a partial name', async () => {
    await command.suggest({_: ['chart', 'suggest'], partial: 'vo', offline: true});

    expect(logger.shown).to.deep.equal(['Suggestions', 'volto']);
  });

  it('names itself and defines its subcommands', () => {
    const definition = command.getCommandDefinition();

    expect(command.getCommandName()).to.equal('chart');
    expect(definition.command).to.equal('chart');
  });
});
