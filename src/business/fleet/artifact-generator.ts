// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import * as yaml from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {type LocalConfig} from '../../core/config/local/local-config.js';
import {type ClusterContextManager} from '../../core/config/cluster-context-manager.js';
import * as constants from '../../core/constants.js';
import {type ReleaseMetadataDecoder} from '../release/release-metadata-decoder.js';
import {type ChartMetadata, EMPTY_CHART_METADATA, hasChartMetadata} from '../release/release-record.js';
import {PathEx} from '../utils/path-ex.js';
import {type FleetConfig} from './fleet-config.js';
import {StorageAddress} from './storage-address.js';

// Helm and Fleet read these documents as YAML 1.1: strings such as `yes` or `on` stay quoted.
const STRINGIFY_OPTIONS = {sortMapEntries: true, version: '1.1'} as const;

export interface RenderedArtifacts {
  bundleManifest: string;
  valuesDocument: string;
  configObject: string;
}

export interface WrittenArtifacts {
  address: StorageAddress;
  bundleManifestPath: string;
  configObjectPath: string;
  rendered: RenderedArtifacts;
}

/**
 * Renders a resolved FleetConfig into the bundle manifest, the values document and the ConfigMap carrying the
 * values, and writes them below the two storage roots.
 */
@injectable()
export class ArtifactGenerator {
  private readonly decoder: ReleaseMetadataDecoder;
  private readonly localConfig: LocalConfig;
  private readonly clusterContextManager: ClusterContextManager;
  private readonly logger: FleetLogger;
  private valuesTemplate?: string;

  public constructor(
    @inject(InjectTokens.ReleaseMetadataDecoder) decoder?: ReleaseMetadataDecoder,
    @inject(InjectTokens.LocalConfig) localConfig?: LocalConfig,
    @inject(InjectTokens.ClusterContextManager) clusterContextManager?: ClusterContextManager,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.decoder = patchInject(decoder, InjectTokens.ReleaseMetadataDecoder, this.constructor.name);
    this.localConfig = patchInject(localConfig, InjectTokens.LocalConfig, this.constructor.name);
    this.clusterContextManager = patchInject(
      clusterContextManager,
      InjectTokens.ClusterContextManager,
      this.constructor.name,
    );
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public static configObjectName(config: FleetConfig): string {
    return `${config.appName}${constants.CONFIG_OBJECT_NAME_SUFFIX}`;
  }

  public async render(config: FleetConfig): Promise<RenderedArtifacts> {
    const valuesDocument = this.renderValues(config);
    const metadata = await this.metadataFor(config);
    return {
      bundleManifest: ArtifactGenerator.renderBundleManifest(config, metadata),
      valuesDocument,
      configObject: ArtifactGenerator.renderConfigObject(config, valuesDocument),
    };
  }

  /**
   * Renders the artifacts and overwrites the files at the storage address, which defaults to the current cluster
   * context and the application name.
   */
  public async write(config: FleetConfig, address?: StorageAddress): Promise<WrittenArtifacts> {
    const target = address ?? StorageAddress.forContext(await this.clusterContextManager.current(), config.appName);
    const rendered = await this.render(config);
    const {appsDirectory, intDirectory} = this.localConfig.storageRoots();

    const bundleManifestPath = target.bundleManifestPath(appsDirectory);
    fs.mkdirSync(PathEx.resolve(bundleManifestPath, '..'), {recursive: true});
    fs.writeFileSync(bundleManifestPath, rendered.bundleManifest);

    const configObjectPath = target.configObjectPath(intDirectory);
    fs.mkdirSync(PathEx.resolve(configObjectPath, '..'), {recursive: true});
    fs.writeFileSync(configObjectPath, rendered.configObject);

    this.logger.info(`Wrote ${bundleManifestPath} and ${configObjectPath}`);
    return {address: target, bundleManifestPath, configObjectPath, rendered};
  }

  public renderValues(config: FleetConfig): string {
    if (Object.keys(config.values).length > 0) {
      return yaml.stringify(config.values, STRINGIFY_OPTIONS);
    }
    return this.loadValuesTemplate().replaceAll('{chart_name}', config.chartName);
  }

  public static renderConfigObject(config: FleetConfig, valuesDocument: string): string {
    const configMap = {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: {
        name: ArtifactGenerator.configObjectName(config),
        namespace: config.namespace,
      },
      data: {
        [constants.VALUES_KEY]: valuesDocument,
      },
    };
    return yaml.stringify(configMap, STRINGIFY_OPTIONS);
  }

  /**
   * Metadata fields that are set become comment lines above the manifest. A metadata version replaces the
   * `latest` placeholder in the rendered manifest only.
   */
  public static renderBundleManifest(config: FleetConfig, metadata: ChartMetadata): string {
    let version = config.chartVersion || constants.DEFAULT_CHART_VERSION;
    if (metadata.version && version === constants.DEFAULT_CHART_VERSION) {
      version = metadata.version;
    }

    const manifest: Record<string, unknown> = {
      defaultNamespace: config.namespace,
      helm: {
        chart: config.chartName,
        repo: config.repositoryUrl,
        version,
        valuesFrom: [
          {
            configMapKeyRef: {
              name: ArtifactGenerator.configObjectName(config),
              key: constants.VALUES_KEY,
            },
          },
        ],
      },
      rolloutStrategy: {...config.rolloutStrategy},
    };

    if (config.targetCluster) {
      manifest.targets = [
        {
          name: config.targetCluster,
          clusterSelector: {matchLabels: {[constants.CLUSTER_NAME_LABEL]: config.targetCluster}},
        },
      ];
    }

    const comments = [
      ...commentLines('Chart Name', metadata.name),
      ...commentLines('Chart Version', metadata.version),
      ...commentLines('App Version', metadata.appVersion),
      ...commentLines('Description', metadata.description),
    ];

    const body = yaml.stringify(manifest, STRINGIFY_OPTIONS);
    return comments.length > 0 ? `${comments.join('\n')}\n---\n${body}` : body;
  }

  private async metadataFor(config: FleetConfig): Promise<ChartMetadata> {
    if (hasChartMetadata(config.chartMetadata)) {
      return config.chartMetadata;
    }
    if (config.isExistingRelease && config.releaseName) {
      return this.decoder.decode(config.releaseName, config.namespace);
    }
    return EMPTY_CHART_METADATA;
  }

  private loadValuesTemplate(): string {
    if (this.valuesTemplate === undefined) {
      this.valuesTemplate = fs.readFileSync(constants.VALUES_TEMPLATE_FILE, 'utf8');
    }
    return this.valuesTemplate;
  }
}

/**
 * Renders a metadata field as comment lines, commenting out every line of a multi-line value.
 */
function commentLines(label: string, value: string): string[] {
  const text = value.trimEnd();
  if (!text) {
    return [];
  }
  const [first, ...rest] = text.split(/\r\n|\r|\n/);
  return [`# ${label}: ${first}`, ...rest.map(line => `# ${line}`.trimEnd())];
}
