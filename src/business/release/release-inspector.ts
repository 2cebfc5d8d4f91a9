// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type ReleaseItem} from '../../integration/helm/model/release/release-item.js';
import {type KubeAuthentication} from '../../integration/helm/request/authentication/kube-authentication.js';
import {type KubeConfigProvider} from '../../integration/kube/kube-config-provider.js';
import {isRecord, type JsonRecord, parseYamlExact, tryParseJsonExact} from '../utils/records.js';
import {type ReleaseRecord} from './release-record.js';

/**
 * Reads deployed releases and their values from the cluster of the current rancher context.
 */
@injectable()
export class ReleaseInspector {
  private readonly helm: HelmClient;
  private readonly kubeConfigProvider: KubeConfigProvider;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.Helm) helm?: HelmClient,
    @inject(InjectTokens.KubeConfigProvider) kubeConfigProvider?: KubeConfigProvider,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.helm = patchInject(helm, InjectTokens.Helm, this.constructor.name);
    this.kubeConfigProvider = patchInject(kubeConfigProvider, InjectTokens.KubeConfigProvider, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * Lists releases in the namespace, or in every namespace. Chart name and versions come from
   * `helm get metadata`; the chart column of the list is used when that fails.
   * @returns the releases, or an empty list when the cluster cannot be queried
   */
  public async listReleases(namespace?: string): Promise<ReleaseRecord[]> {
    const authentication = await this.kubeConfigProvider.acquire();
    if (!authentication) {
      this.logger.error('No kubeconfig available');
      return [];
    }

    let items: ReleaseItem[];
    try {
      items = await this.helm.listReleases(namespace, authentication);
    } catch (error) {
      this.logger.error(`Failed to list helm releases${namespace ? ` in ${namespace}` : ''}`, error);
      return [];
    }

    const releases: ReleaseRecord[] = [];
    for (const item of items) {
      releases.push(await this.toRecord(item, authentication));
    }
    this.logger.debug(`Found ${releases.length} helm releases`);
    return releases;
  }

  /**
   * Reads the user-supplied values of a release as JSON, then as YAML.
   * @returns the values mapping, or an empty mapping when neither form can be read
   */
  public async getReleaseValues(releaseName: string, namespace: string): Promise<JsonRecord> {
    const authentication = await this.kubeConfigProvider.acquire();
    if (!authentication) {
      return {};
    }

    try {
      const output = await this.helm.getReleaseValues(releaseName, namespace, 'json', authentication);
      const values = ReleaseInspector.parseJsonValues(output);
      if (values) {
        return values;
      }
    } catch (error) {
      this.logger.debug(`helm get values --output json failed for ${releaseName}: ${String(error)}`);
    }

    try {
      const output = await this.helm.getReleaseValues(releaseName, namespace, 'yaml', authentication);
      const values: unknown = output.trim() ? parseYamlExact(output) : {};
      return isRecord(values) ? values : {};
    } catch (error) {
      this.logger.error(`Failed to read values of release ${releaseName} in ${namespace}`, error);
      return {};
    }
  }

  /**
   * Parses JSON output, isolating the outermost object when helm prints warnings around it.
   */
  public static parseJsonValues(output: string): JsonRecord | undefined {
    if (!output.trim()) {
      return undefined;
    }

    let parsed = tryParseJsonExact(output);
    if (parsed === undefined) {
      const start = output.indexOf('{');
      const end = output.lastIndexOf('}');
      if (start === -1 || end <= start) {
        return undefined;
      }
      parsed = tryParseJsonExact(output.slice(start, end + 1));
    }
    return isRecord(parsed) ? parsed : undefined;
  }

  private async toRecord(item: ReleaseItem, authentication: KubeAuthentication): Promise<ReleaseRecord> {
    let chart = item.chart;
    let chartVersion = '';
    let appVersion = '';

    try {
      const metadata = await this.helm.getReleaseMetadata(item.name, item.namespace, authentication);
      chart = metadata.chart;
      chartVersion = metadata.version;
      appVersion = metadata.appVersion;
    } catch (error) {
      this.logger.debug(`Failed to get metadata for ${item.name}: ${String(error)}`);
    }

    return {
      name: item.name,
      namespace: item.namespace,
      chart,
      revision: item.revision,
      status: item.status,
      chartVersion,
      appVersion,
    };
  }
}
