// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {ValuesParseError} from '../../core/errors/values-parse-error.js';
import {ErrorMessages} from '../../core/error-messages.js';
import * as constants from '../../core/constants.js';
import {type ReleaseMetadataDecoder} from '../release/release-metadata-decoder.js';
import {type ReleaseRecord} from '../release/release-record.js';
import {isRecord, type JsonRecord, parseYamlExact} from '../utils/records.js';
import {
  type ApplicationIdentity,
  type ChartSelection,
  emptyFleetConfig,
  type FleetConfig,
  type ResolutionOverrides,
  sanitizeName,
} from './fleet-config.js';

/**
 * Builds the canonical FleetConfig for a chart picked from the catalog or for a release already running in the
 * cluster.
 */
@injectable()
export class ConfigurationResolver {
  private readonly decoder: ReleaseMetadataDecoder;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.ReleaseMetadataDecoder) decoder?: ReleaseMetadataDecoder,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.decoder = patchInject(decoder, InjectTokens.ReleaseMetadataDecoder, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * @throws MissingArgumentError when the application name is blank
   * @throws ValuesParseError when the values text is not a YAML mapping
   */
  public async resolve(
    selection: ChartSelection,
    identity: ApplicationIdentity,
    overrides: ResolutionOverrides = {},
  ): Promise<FleetConfig> {
    if (!identity.appName?.trim()) {
      throw new MissingArgumentError(ErrorMessages.APP_NAME_REQUIRED);
    }

    const values = ConfigurationResolver.parseValues(overrides.valuesYaml ?? '');
    const config = emptyFleetConfig(identity.appName.trim());

    switch (selection.kind) {
      case 'catalog': {
        this.applyCatalogSelection(config, selection.chartName);
        break;
      }
      case 'release': {
        await this.applyReleaseSelection(config, selection.namespace, selection.release);
        break;
      }
      default: {
        const unreachable: never = selection;
        throw new MissingArgumentError(`Unsupported chart selection: ${JSON.stringify(unreachable)}`);
      }
    }

    if (overrides.namespace) {
      config.namespace = overrides.namespace;
    }
    config.targetCluster = overrides.targetCluster ?? '';
    config.dependencies = [...(overrides.dependencies ?? [])];
    config.values = values;

    ConfigurationResolver.finalize(config);
    this.logger.debug(
      `Resolved configuration: app=${config.appName}, namespace=${config.namespace}, ` +
        `chart=${config.chartName}@${config.chartVersion}, existing=${config.isExistingRelease}`,
    );
    return config;
  }

  /**
   * Reads the values text. Blank text and an empty document read as an empty mapping.
   * @throws ValuesParseError when the text is not valid YAML or is not a mapping
   */
  public static parseValues(valuesYaml: string): JsonRecord {
    if (!valuesYaml.trim()) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = parseYamlExact(valuesYaml);
    } catch (error) {
      throw new ValuesParseError(error instanceof Error ? error.message : String(error), error);
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      const kind = Array.isArray(parsed) ? 'a sequence' : typeof parsed;
      throw new ValuesParseError(`expected a mapping at the top level, got ${kind}`);
    }
    return parsed;
  }

  /**
   * Defaults the namespace to the application name, then renames the application to `<namespace>-<chart>`.
   */
  public static finalize(config: FleetConfig): void {
    if (!config.namespace) {
      config.namespace = config.appName;
    }
    config.appName = sanitizeName(`${config.namespace}-${config.chartName}`);
  }

  private applyCatalogSelection(config: FleetConfig, chartName: string): void {
    if (!chartName?.trim()) {
      throw new MissingArgumentError('A chart name is required');
    }
    config.chartName = chartName;
    config.chartVersion = constants.DEFAULT_CHART_VERSION;
    config.repositoryUrl = constants.HELM_REPO_URL;
    config.isExistingRelease = false;
  }

  private async applyReleaseSelection(config: FleetConfig, namespace: string, release: ReleaseRecord): Promise<void> {
    if (!release.name?.trim()) {
      throw new MissingArgumentError('A release name is required');
    }

    let chart = release.chart;
    let chartVersion = release.chartVersion;
    let appVersion = release.appVersion;
    let description = '';

    if (!chart || !chartVersion || !appVersion) {
      const decoded = await this.decoder.decode(release.name, namespace || release.namespace, release.revision);
      chart = chart || decoded.name;
      chartVersion = chartVersion || decoded.version;
      appVersion = appVersion || decoded.appVersion;
      description = decoded.description;
    }

    config.namespace = namespace || release.namespace;
    config.chartName = chart;
    config.chartVersion = chartVersion || constants.DEFAULT_CHART_VERSION;
    config.repositoryUrl = constants.HELM_REPO_URL;
    config.isExistingRelease = true;
    config.releaseName = release.name;
    config.chartMetadata = {name: chart, version: chartVersion, appVersion, description};
  }
}
