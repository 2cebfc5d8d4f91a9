// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject} from 'tsyringe-neo';
import {Listr} from 'listr2';
import chalk from 'chalk';
import * as yaml from 'yaml';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';
import {YargsCommand} from '../core/yargs-command.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import * as constants from '../core/constants.js';
import {ErrorMessages} from '../core/error-messages.js';
import {FleetError} from '../core/errors/fleet-error.js';
import {MissingArgumentError} from '../core/errors/missing-argument-error.js';
import {type FleetLogger} from '../core/logging/fleet-logger.js';
import {type ChartCatalogCache} from '../business/catalog/chart-catalog-cache.js';
import {type ReleaseInspector} from '../business/release/release-inspector.js';
import {type ConfigurationResolver} from '../business/fleet/configuration-resolver.js';
import {
  type ArtifactGenerator,
  type RenderedArtifacts,
  type WrittenArtifacts,
} from '../business/fleet/artifact-generator.js';
import {type ExistingConfigurations} from '../business/fleet/existing-configurations.js';
import {type ConfigMapDeployer} from '../business/fleet/configmap-deployer.js';
import {type ChartSelection, type FleetConfig, type ResolutionOverrides} from '../business/fleet/fleet-config.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition, type Optional} from '../types/index.js';

interface GenerateContext {
  selection?: ChartSelection;
  appName?: string;
  valuesYaml?: string;
  config?: FleetConfig;
  rendered?: RenderedArtifacts;
  written?: WrittenArtifacts;
}

/**
 * Generates, lists, shows and deploys Fleet configurations
 */
export class ConfigCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'config';

  private readonly catalog: ChartCatalogCache;
  private readonly inspector: ReleaseInspector;
  private readonly resolver: ConfigurationResolver;
  private readonly generator: ArtifactGenerator;
  private readonly existing: ExistingConfigurations;
  private readonly deployer: ConfigMapDeployer;

  public constructor(
    @inject(InjectTokens.ChartCatalogCache) catalog?: ChartCatalogCache,
    @inject(InjectTokens.ReleaseInspector) inspector?: ReleaseInspector,
    @inject(InjectTokens.ConfigurationResolver) resolver?: ConfigurationResolver,
    @inject(InjectTokens.ArtifactGenerator) generator?: ArtifactGenerator,
    @inject(InjectTokens.ExistingConfigurations) existing?: ExistingConfigurations,
    @inject(InjectTokens.ConfigMapDeployer) deployer?: ConfigMapDeployer,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    super(logger);
    this.catalog = patchInject(catalog, InjectTokens.ChartCatalogCache, this.constructor.name);
    this.inspector = patchInject(inspector, InjectTokens.ReleaseInspector, this.constructor.name);
    this.resolver = patchInject(resolver, InjectTokens.ConfigurationResolver, this.constructor.name);
    this.generator = patchInject(generator, InjectTokens.ArtifactGenerator, this.constructor.name);
    this.existing = patchInject(existing, InjectTokens.ExistingConfigurations, this.constructor.name);
    this.deployer = patchInject(deployer, InjectTokens.ConfigMapDeployer, this.constructor.name);
  }

  public getCommandName(): string {
    return ConfigCommand.COMMAND_NAME;
  }

  /** Executes the generate CLI command */
  public async generate(argv: ArgvStruct): Promise<boolean> {
    const chartName = flags.getString(argv, flags.chartName);
    const releaseName = flags.getString(argv, flags.releaseName);
    const namespace = flags.getString(argv, flags.namespace);
    const valuesFile = flags.getString(argv, flags.valuesFile);
    const dryRun = flags.getBoolean(argv, flags.dryRun);
    const deploy = flags.getBoolean(argv, flags.deploy);

    if (chartName && releaseName) {
      throw new MissingArgumentError(ErrorMessages.CHART_AND_RELEASE_EXCLUSIVE);
    }
    if (!chartName && !releaseName) {
      throw new MissingArgumentError(ErrorMessages.CHART_OR_RELEASE_REQUIRED);
    }

    const tasks = new Listr<GenerateContext>(
      [
        {
          title: 'Select chart',
          task: async context_ => {
            if (releaseName) {
              context_.selection = await this.selectRelease(releaseName, namespace);
              context_.appName = flags.getString(argv, flags.appName) ?? releaseName;
              return;
            }

            const chart = chartName ?? '';
            const charts = await this.catalog.getCatalog(false, !flags.getBoolean(argv, flags.offline));
            if (!charts.includes(chart)) {
              this.logger.warn(`Chart '${chart}' is not in the '${constants.HELM_REPO_NAME}' catalog`);
            }
            context_.selection = {kind: 'catalog', chartName: chart};
            context_.appName = flags.getString(argv, flags.appName) ?? chart;
          },
        },
        {
          title: 'Read values',
          task: async context_ => {
            if (valuesFile) {
              context_.valuesYaml = fs.readFileSync(valuesFile, 'utf8');
              return;
            }
            const selection = context_.selection;
            if (selection?.kind === 'release') {
              const values = await this.inspector.getReleaseValues(selection.release.name, selection.namespace);
              context_.valuesYaml = Object.keys(values).length > 0 ? yaml.stringify(values) : '';
            }
          },
        },
        {
          title: 'Resolve configuration',
          task: async context_ => {
            if (!context_.selection || !context_.appName) {
              throw new FleetError('No chart was selected');
            }
            const overrides: ResolutionOverrides = {
              namespace: context_.selection.kind === 'catalog' ? namespace : undefined,
              targetCluster: flags.getString(argv, flags.targetCluster),
              valuesYaml: context_.valuesYaml,
              dependencies: flags.getList(argv, flags.dependencies),
            };
            context_.config = await this.resolver.resolve(context_.selection, {appName: context_.appName}, overrides);
          },
        },
        {
          title: 'Render artifacts',
          enabled: () => dryRun,
          task: async context_ => {
            context_.rendered = await this.generator.render(ConfigCommand.requireConfig(context_.config));
          },
        },
        {
          title: 'Write artifacts',
          enabled: () => !dryRun,
          task: async context_ => {
            context_.written = await this.generator.write(ConfigCommand.requireConfig(context_.config));
          },
        },
        {
          title: 'Deploy ConfigMap',
          enabled: () => deploy && !dryRun,
          task: async context_ => {
            const outcome = await this.deployer.deploy(ConfigCommand.requireConfig(context_.config));
            if (!outcome.ok) {
              throw new FleetError(outcome.message);
            }
            this.logger.info(outcome.message);
          },
        },
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
    );

    let context_: GenerateContext;
    try {
      context_ = await tasks.run();
    } catch (error) {
      throw new FleetError('Error generating the Fleet configuration', error);
    }

    if (context_.rendered) {
      this.showArtifacts(context_.rendered);
    }
    if (context_.written) {
      this.logger.showList(`Configuration '${context_.written.address.key}' written`, [
        context_.written.bundleManifestPath,
        context_.written.configObjectPath,
      ]);
    }
    return true;
  }

  public async list(): Promise<boolean> {
    const configurations = this.existing.list();
    this.logger.showList(
      'Generated configurations',
      configurations.map(
        configuration =>
          `${configuration.key}  namespace: ${configuration.namespace}  chart: ${configuration.chartName}`,
      ),
    );
    return true;
  }

  public async show(argv: ArgvStruct): Promise<boolean> {
    const key = ConfigCommand.requireKey(argv);
    const loaded = this.existing.load(key);
    if (loaded.bundleManifest === undefined && loaded.configObject === undefined) {
      throw new FleetError(ErrorMessages.CONFIGURATION_NOT_FOUND(key));
    }

    this.logger.showUser(chalk.green(`\n *** ${loaded.bundleManifestPath} ***`));
    this.logger.showUser(loaded.bundleManifest ?? chalk.blue('[ Missing ]'));
    this.logger.showUser(chalk.green(`\n *** ${loaded.configObjectPath} ***`));
    this.logger.showUser(loaded.configObject ?? chalk.blue('[ Missing ]'));
    return true;
  }

  public async deploy(argv: ArgvStruct): Promise<boolean> {
    const loaded = this.existing.load(ConfigCommand.requireKey(argv));
    if (loaded.configObject === undefined) {
      throw new FleetError(ErrorMessages.CONFIG_OBJECT_MISSING(loaded.configObjectPath));
    }

    const outcome = await this.deployer.deployDocument(loaded.configObject);
    if (!outcome.ok) {
      throw new FleetError(outcome.message);
    }
    this.logger.showUser(chalk.green(outcome.message));
    return true;
  }

  private async selectRelease(releaseName: string, namespace: Optional<string>): Promise<ChartSelection> {
    if (!namespace) {
      throw new MissingArgumentError('--namespace is required together with --release');
    }
    const releases = await this.inspector.listReleases(namespace);
    const release = releases.find(candidate => candidate.name === releaseName);
    if (!release) {
      throw new FleetError(ErrorMessages.RELEASE_NOT_FOUND(releaseName, namespace));
    }
    return {kind: 'release', namespace, release};
  }

  private showArtifacts(rendered: RenderedArtifacts): void {
    this.logger.showUser(chalk.green(`\n *** ${constants.FLEET_BUNDLE_FILE} ***`));
    this.logger.showUser(rendered.bundleManifest);
    this.logger.showUser(chalk.green(`\n *** ${constants.VALUES_KEY} ***`));
    this.logger.showUser(rendered.valuesDocument);
    this.logger.showUser(chalk.green('\n *** ConfigMap ***'));
    this.logger.showUser(rendered.configObject);
  }

  private static requireConfig(config: Optional<FleetConfig>): FleetConfig {
    if (!config) {
      throw new FleetError('The configuration has not been resolved');
    }
    return config;
  }

  private static requireKey(argv: ArgvStruct): string {
    const key = flags.getString(argv, flags.configKey);
    if (!key) {
      throw new MissingArgumentError('--config is required');
    }
    return key;
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: ConfigCommand.COMMAND_NAME,
      describe: 'Generate and manage Fleet GitOps configurations',
      builder: (yargs: AnyYargs): AnyYargs =>
        yargs
          .command(
            YargsCommand.of(
              {
                command: 'generate',
                description: 'Generate the bundle manifest and ConfigMap for a chart or an installed release',
                commandDef: this,
                handler: argv => this.generate(argv),
              },
              {
                required: [],
                optional: [
                  flags.chartName,
                  flags.releaseName,
                  flags.namespace,
                  flags.appName,
                  flags.targetCluster,
                  flags.valuesFile,
                  flags.dependencies,
                  flags.dryRun,
                  flags.deploy,
                  flags.offline,
                ],
              },
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'list',
                description: 'List previously generated configurations',
                commandDef: this,
                handler: () => this.list(),
              },
              {required: [], optional: []},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'show',
                description: 'Print the files of a generated configuration',
                commandDef: this,
                handler: argv => this.show(argv),
              },
              {required: [flags.configKey], optional: []},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'deploy',
                description: 'Apply the ConfigMap of a generated configuration to the cluster',
                commandDef: this,
                handler: argv => this.deploy(argv),
              },
              {required: [flags.configKey], optional: []},
            ),
          )
          .demandCommand(1, 'Select a config command'),
    };
  }
}
