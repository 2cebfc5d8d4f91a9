// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';
import {YargsCommand} from '../core/yargs-command.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import * as constants from '../core/constants.js';
import {type FleetLogger} from '../core/logging/fleet-logger.js';
import {type ChartCatalogCache} from '../business/catalog/chart-catalog-cache.js';
import {filterCharts, suggestCharts, tabulateCharts} from '../business/catalog/chart-catalog.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Browses the chart catalog of the configured Helm repository
 */
export class ChartCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'chart';

  private readonly catalog: ChartCatalogCache;

  public constructor(
    @inject(InjectTokens.ChartCatalogCache) catalog?: ChartCatalogCache,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    super(logger);
    this.catalog = patchInject(catalog, InjectTokens.ChartCatalogCache, this.constructor.name);
  }

  public getCommandName(): string {
    return ChartCommand.COMMAND_NAME;
  }

  public async list(argv: ArgvStruct): Promise<boolean> {
    const charts = await this.catalog.getCatalog(
      flags.getBoolean(argv, flags.forceRefresh),
      !flags.getBoolean(argv, flags.offline),
    );
    const rows = tabulateCharts(filterCharts(flags.getString(argv, flags.search) ?? '', charts));
    const width = Math.max(0, ...rows.map(([name]) => name.length));
    this.logger.showList(
      `Charts in '${constants.HELM_REPO_NAME}' repository (${rows.length})`,
      rows.map(([name, category, description]) => `${name.padEnd(width)}  ${category.padEnd(14)}  ${description}`),
    );
    return true;
  }

  public async suggest(argv: ArgvStruct): Promise<boolean> {
    const charts = await this.catalog.getCatalog(false, !flags.getBoolean(argv, flags.offline));
    this.logger.showList('Suggestions', suggestCharts(flags.getString(argv, flags.partial) ?? '', charts));
    return true;
  }

  public async refresh(): Promise<boolean> {
    const charts = await this.catalog.refresh();
    this.logger.showUser(`Chart catalog holds ${charts.length} charts`);
    return true;
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: ChartCommand.COMMAND_NAME,
      describe: `List and search the charts of the '${constants.HELM_REPO_NAME}' Helm repository`,
      builder: (yargs: AnyYargs): AnyYargs =>
        yargs
          .command(
            YargsCommand.of(
              {
                command: 'list',
                description: 'List the available charts, optionally filtered by a search term',
                commandDef: this,
                handler: argv => this.list(argv),
              },
              {required: [], optional: [flags.search, flags.forceRefresh, flags.offline]},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'suggest',
                description: 'Complete a partial chart name',
                commandDef: this,
                handler: argv => this.suggest(argv),
              },
              {required: [flags.partial], optional: [flags.offline]},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'refresh',
                description: 'Query the repository and rewrite the chart cache',
                commandDef: this,
                handler: () => this.refresh(),
              },
              {required: [], optional: []},
            ),
          )
          .demandCommand(1, 'Select a chart command'),
    };
  }
}
